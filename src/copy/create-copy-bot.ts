/**
 * Wires a copy engine from configuration: pino logger, file-backed ledger
 * and state stores, registry and engine.
 */

import { type Logger, createLogger } from "../lib/logger/index.js";
import { FileLedgerStore } from "../persistence/file-ledger-store.js";
import { FileStateStore } from "../persistence/file-state-store.js";
import type { LedgerStore } from "../persistence/ledger-store.js";
import type { StateStore } from "../persistence/state-store.js";
import { LedgerRegistry } from "../registry/ledger-registry.js";
import { type CopyConfig, configFromEnv, resolveConfig } from "../shared/config.js";
import { ConfigError, classifyError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { CopyEngine } from "./copy-engine.js";
import type { Notifier, OrderPlacer, PriceSource, ResolutionDetector, TradeFeed } from "./ports.js";

export interface CopyBotPorts {
	readonly feed: TradeFeed;
	readonly orders: OrderPlacer;
	readonly notifier: Notifier;
	readonly resolutions: ResolutionDetector;
	readonly prices: PriceSource;
}

export interface CopyBotOptions {
	/** Applied over COPYBOT_* environment overrides */
	readonly config?: Partial<CopyConfig>;
	readonly env?: NodeJS.ProcessEnv;
	/** Defaults to a FileLedgerStore in `config.dataDir` */
	readonly store?: LedgerStore;
	/** Defaults to a FileStateStore at `config.statePath` */
	readonly stateStore?: StateStore;
	/** Defaults to a pino logger at `config.logLevel` */
	readonly logger?: Logger;
	readonly clock?: Clock;
}

export interface CopyBot {
	readonly config: CopyConfig;
	readonly logger: Logger;
	readonly registry: LedgerRegistry;
	readonly engine: CopyEngine;
}

export function createCopyBot(ports: CopyBotPorts, options: CopyBotOptions = {}): Result<CopyBot, ConfigError> {
	let config: CopyConfig;
	try {
		config = resolveConfig({ ...configFromEnv(options.env), ...options.config });
	} catch (e: unknown) {
		if (e instanceof ConfigError) return err(e);
		return err(new ConfigError(classifyError(e).message, { cause: e }));
	}

	const logger = options.logger ?? createLogger({ level: config.logLevel, bindings: { service: "copybot" } });
	const registry = LedgerRegistry.create({
		store: options.store ?? FileLedgerStore.create({ directory: config.dataDir }),
		logger,
		maxClosedPositions: config.maxClosedPositions,
		maxTradeHistory: config.maxTradeHistory,
	});

	const engine = CopyEngine.create({
		...ports,
		registry,
		config,
		logger,
		stateStore: options.stateStore ?? FileStateStore.create({ path: config.statePath }),
		clock: options.clock,
	});
	if (!engine.ok) return engine;

	logger.info(
		{ dryRun: config.dryRun, riskMultiplier: config.riskMultiplier, maxTradeUsdc: config.maxTradeUsdc },
		"copy bot configured",
	);
	return ok({ config, logger, registry, engine: engine.value });
}
