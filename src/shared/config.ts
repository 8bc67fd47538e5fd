/**
 * Copy-trading configuration.
 *
 * Defaults are safe (dry run on, small notional cap). `configFromEnv` reads
 * COPYBOT_* overrides; `resolveConfig` merges and validates them.
 */

import { ConfigError } from "./errors.js";

export type ConfigLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface CopyConfig {
	/** Copy size as a multiple of the watched account's fill size */
	readonly riskMultiplier: number;
	/** Largest notional (size × price) a single copy may carry */
	readonly maxTradeUsdc: number;
	/** Delay between feed polls */
	readonly pollIntervalMs: number;
	/** Delay between resolution checks for markets with open positions */
	readonly resolutionCheckIntervalMs: number;
	/** When true, ledgers are updated but no orders are placed */
	readonly dryRun: boolean;
	/** Closed-position records kept per ledger */
	readonly maxClosedPositions: number;
	/** Trade-history records kept per ledger */
	readonly maxTradeHistory: number;
	/** Transaction hashes remembered for dedup */
	readonly maxSeenTrades: number;
	/** Directory holding one snapshot file per account */
	readonly dataDir: string;
	/** File holding the trade cursor and seen transaction hashes */
	readonly statePath: string;
	readonly logLevel: ConfigLogLevel;
}

export const DEFAULT_COPY_CONFIG: CopyConfig = {
	riskMultiplier: 1,
	maxTradeUsdc: 100,
	pollIntervalMs: 2_000,
	resolutionCheckIntervalMs: 60_000,
	dryRun: true,
	maxClosedPositions: 200,
	maxTradeHistory: 1_000,
	maxSeenTrades: 10_000,
	dataDir: "./data/ledgers",
	statePath: "./data/copy-state.json",
	logLevel: "info",
};

const LOG_LEVELS: readonly ConfigLogLevel[] = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
	"silent",
];

/** Mutable builder shape for constructing Partial<CopyConfig>. */
interface MutableCopyConfig {
	riskMultiplier?: number;
	maxTradeUsdc?: number;
	pollIntervalMs?: number;
	resolutionCheckIntervalMs?: number;
	dryRun?: boolean;
	maxClosedPositions?: number;
	maxTradeHistory?: number;
	maxSeenTrades?: number;
	dataDir?: string;
	statePath?: string;
	logLevel?: ConfigLogLevel;
}

type NumericKey = {
	[K in keyof MutableCopyConfig]-?: MutableCopyConfig[K] extends number | undefined ? K : never;
}[keyof MutableCopyConfig];

/**
 * Reads config overrides from environment variables.
 * Supported: COPYBOT_RISK_MULTIPLIER, COPYBOT_MAX_TRADE_USDC, COPYBOT_POLL_INTERVAL_MS,
 * COPYBOT_RESOLUTION_INTERVAL_MS, COPYBOT_DRY_RUN, COPYBOT_DATA_DIR, COPYBOT_STATE_PATH,
 * COPYBOT_LOG_LEVEL.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<CopyConfig> {
	const result: MutableCopyConfig = {};

	parsePositiveNumberEnv(env, "COPYBOT_RISK_MULTIPLIER", "riskMultiplier", result);
	parsePositiveNumberEnv(env, "COPYBOT_MAX_TRADE_USDC", "maxTradeUsdc", result);
	parsePositiveIntEnv(env, "COPYBOT_POLL_INTERVAL_MS", "pollIntervalMs", result);
	parsePositiveIntEnv(env, "COPYBOT_RESOLUTION_INTERVAL_MS", "resolutionCheckIntervalMs", result);

	const dryRun = env["COPYBOT_DRY_RUN"];
	if (dryRun !== undefined) {
		const normalized = dryRun.trim().toLowerCase();
		if (!["true", "false", "1", "0", "yes", "no"].includes(normalized)) {
			throw new ConfigError(`Invalid COPYBOT_DRY_RUN: "${dryRun}" must be true or false`);
		}
		result.dryRun = normalized === "true" || normalized === "1" || normalized === "yes";
	}

	const dataDir = env["COPYBOT_DATA_DIR"];
	if (dataDir) {
		result.dataDir = dataDir;
	}

	const statePath = env["COPYBOT_STATE_PATH"];
	if (statePath) {
		result.statePath = statePath;
	}

	const logLevel = env["COPYBOT_LOG_LEVEL"];
	if (logLevel) {
		const level = LOG_LEVELS.find((l) => l === logLevel.trim().toLowerCase());
		if (level === undefined) {
			throw new ConfigError(`Invalid COPYBOT_LOG_LEVEL: "${logLevel}"`);
		}
		result.logLevel = level;
	}

	return result;
}

/**
 * Merges overrides over the defaults and checks the numeric limits.
 * @throws ConfigError when a limit is not positive
 */
export function resolveConfig(overrides: Partial<CopyConfig> = {}): CopyConfig {
	const config: CopyConfig = { ...DEFAULT_COPY_CONFIG, ...overrides };
	const positive: readonly NumericKey[] = [
		"riskMultiplier",
		"maxTradeUsdc",
		"pollIntervalMs",
		"resolutionCheckIntervalMs",
		"maxClosedPositions",
		"maxTradeHistory",
		"maxSeenTrades",
	];
	for (const key of positive) {
		const value = config[key];
		if (!Number.isFinite(value) || value <= 0) {
			throw new ConfigError(`${key} must be a positive number, got ${value}`, { key, value });
		}
	}
	return config;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parsePositiveIntEnv(
	env: NodeJS.ProcessEnv,
	envKey: string,
	configKey: NumericKey,
	result: MutableCopyConfig,
): void {
	const raw = env[envKey];
	if (!raw) return;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a positive integer`);
	}
	result[configKey] = parsed;
}

function parsePositiveNumberEnv(
	env: NodeJS.ProcessEnv,
	envKey: string,
	configKey: NumericKey,
	result: MutableCopyConfig,
): void {
	const raw = env[envKey];
	if (!raw) return;
	const parsed = Number(raw.trim());
	if (raw.trim().length === 0 || !Number.isFinite(parsed) || parsed <= 0) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a positive number`);
	}
	result[configKey] = parsed;
}
