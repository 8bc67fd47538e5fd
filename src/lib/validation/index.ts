/**
 * Validation wrapper: thin layer over zod that returns Result<T, ValidationError>.
 *
 * Snapshot loading and trade parsing validate untrusted input through this
 * module. `z` is re-exported so schemas are built without importing zod
 * elsewhere.
 */

import { z } from "zod";
import { ErrorCategory, TradingError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error listing every validation issue found. */
export class ValidationError extends TradingError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, {
			issueCount: issues.length,
		});
		this.name = "ValidationError";
		this.issues = issues;
	}

	/** First issue as `path: message`, for log lines. */
	summary(): string {
		const first = this.issues[0];
		if (!first) return this.message;
		const where = first.path.length > 0 ? first.path.join(".") : "(root)";
		return `${where}: ${first.message}`;
	}
}

/** Validate data against a schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	label = "Validation failed",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError(label, issues));
}
