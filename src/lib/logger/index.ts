/**
 * Logger: structured JSON logging backed by pino.
 *
 * Components receive a Logger instead of creating one, so a ledger built in a
 * test has no process-wide logging state. Use `child()` to bind context such as
 * `{ component: "registry", account }`.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
	readonly level: LogLevel;
	/** Field paths censored in every record, e.g. `["order.signature"]` */
	readonly redactPaths?: readonly string[];
	/** Defaults to stdout */
	readonly destination?: { write(msg: string): void };
	/** Fields bound to every record */
	readonly bindings?: Record<string, unknown>;
}

export interface Logger {
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Factory ─────────────────────────────────────────────────────────

type LevelMethod = "debug" | "info" | "warn" | "error";

function forward(target: pino.Logger, level: LevelMethod, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		target[level](String(msgOrObj ?? ""));
		return;
	}
	if (msgOrObj instanceof Error) {
		target[level]({ err: msgOrObj }, msg ?? msgOrObj.message);
		return;
	}
	target[level](msgOrObj, msg ?? "");
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		debug(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "debug", msgOrObj, msg);
		},
		info(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "error", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info", bindings: { service: "copybot" } });
 * logger.child({ account: "42" }).info({ tokenId }, "position opened");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	let pinoLogger: pino.Logger;
	if (config.destination) {
		const target = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				target.write(chunk);
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	return wrapPino(config.bindings ? pinoLogger.child(config.bindings) : pinoLogger);
}

/** Logger that drops everything; the default for components built without one. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
