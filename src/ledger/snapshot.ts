/**
 * Ledger snapshots: versionless JSON, one document per account.
 *
 * Decimals are written as plain-notation strings and ids as raw strings, so a
 * snapshot is `JSON.stringify(ledger.toState())`. Loading validates every
 * field with zod before the ledger is rebuilt.
 */

import { ValidationError, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { marketId, tokenId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { TradeSide } from "../shared/trade-side.js";
import { type LedgerOptions, PositionLedger } from "./position-ledger.js";
import { CloseKind, type LedgerState } from "./types.js";

const decimalSchema = z
	.string()
	.regex(/^-?\d+(\.\d+)?$/, "expected a decimal string")
	.transform((value) => Decimal.from(value));

const marketIdSchema = z.string().trim().min(1).transform((value) => marketId(value));
const tokenIdSchema = z.string().trim().min(1).transform((value) => tokenId(value));
const timestampSchema = z.number().int().nonnegative();

const positionSchema = z.object({
	tokenId: tokenIdSchema,
	marketId: marketIdSchema,
	outcome: z.string(),
	netSize: decimalSchema,
	avgEntryPrice: decimalSchema,
	openedAtMs: timestampSchema,
	lastUpdateMs: timestampSchema,
	title: z.string(),
	displayName: z.string(),
});

const closedSchema = z.object({
	tokenId: tokenIdSchema,
	marketId: marketIdSchema,
	outcome: z.string(),
	title: z.string(),
	size: decimalSchema,
	entryPrice: decimalSchema,
	exitPrice: decimalSchema,
	realizedPnl: decimalSchema,
	openedAtMs: timestampSchema,
	closedAtMs: timestampSchema,
	kind: z.enum([CloseKind.FullClose, CloseKind.PartialClose, CloseKind.HedgeClose, CloseKind.PartialHedge]),
});

const resolvedSchema = z.object({
	marketId: marketIdSchema,
	tokenId: tokenIdSchema,
	outcome: z.string(),
	title: z.string(),
	winningOutcome: z.string(),
	size: decimalSchema,
	entryPrice: decimalSchema,
	resolvedPrice: decimalSchema,
	costBasis: decimalSchema,
	payout: decimalSchema,
	realizedPnl: decimalSchema,
	resolvedAtMs: timestampSchema,
});

const historySchema = z.object({
	timestampMs: timestampSchema,
	transactionHash: z.string(),
	marketId: marketIdSchema,
	tokenId: tokenIdSchema,
	outcome: z.string(),
	side: z.enum([TradeSide.Buy, TradeSide.Sell]),
	size: decimalSchema,
	price: decimalSchema,
	copySize: decimalSchema,
	copyValue: decimalSchema,
	title: z.string(),
});

export const ledgerSnapshotSchema = z.object({
	openPositions: z.array(positionSchema),
	closedPositions: z.array(closedSchema),
	resolvedPositions: z.array(resolvedSchema),
	tradeHistory: z.array(historySchema),
	realizedPnl: decimalSchema,
	archivedPnl: decimalSchema.optional(),
});

/** The JSON shape of a persisted ledger. */
export type LedgerSnapshot = z.input<typeof ledgerSnapshotSchema>;

export function serializeLedger(ledger: PositionLedger): string {
	return JSON.stringify(ledger.toState());
}

/** Validates a parsed snapshot document into ledger state. */
export function parseLedgerState(data: unknown): Result<LedgerState, ValidationError> {
	const parsed = validate(ledgerSnapshotSchema, data, "Invalid ledger snapshot");
	if (!parsed.ok) return parsed;
	const { archivedPnl, ...rest } = parsed.value;
	return ok({ ...rest, archivedPnl: archivedPnl ?? Decimal.zero() });
}

/**
 * Rebuilds a ledger from its JSON snapshot.
 * @returns Err(ValidationError) for unparseable JSON or a malformed document
 */
export function deserializeLedger(json: string, options: LedgerOptions = {}): Result<PositionLedger, ValidationError> {
	let data: unknown;
	try {
		data = JSON.parse(json);
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return err(new ValidationError("Invalid ledger snapshot", [{ path: [], message }]));
	}
	const state = parseLedgerState(data);
	if (!state.ok) return state;
	return ok(PositionLedger.restore(state.value, options));
}
