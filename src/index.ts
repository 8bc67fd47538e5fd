// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type MarketId,
	type TokenId,
	type AccountKey,
	marketId,
	tokenId,
	accountKey,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	Decimal,
	TradeSide,
	isTradeSide,
	type Clock,
	SystemClock,
	FakeClock,
	type CopyConfig,
	type ConfigLogLevel,
	DEFAULT_COPY_CONFIG,
	configFromEnv,
	resolveConfig,
	TradingError,
	ErrorCategory,
	PersistenceError,
	NetworkError,
	ConfigError,
	SystemError,
	classifyError,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { ValidationError, type ValidationIssue, validate } from "./lib/validation/index.js";
export { TypedEmitter, type EventMap } from "./lib/events/index.js";

// ── Ledger ───────────────────────────────────────────────────────────
export {
	EPSILON,
	DRIFT_TOLERANCE,
	CloseKind,
	PositionEventKind,
	type Trade,
	type ResolutionEvent,
	type CurrentPriceMap,
	type Position,
	type ClosedPositionRecord,
	type ResolvedPositionRecord,
	type TradeHistoryRecord,
	type PositionEvent,
	type PositionChangeEvent,
	type PositionCloseEvent,
	type ResolutionResult,
	type WindowStats,
	type ConsistencyReport,
	type LedgerState,
	PositionLedger,
	type LedgerOptions,
	replayPeakExposure,
	type ExposureReplayInput,
	formatPnl,
	formatPrice,
	formatSize,
	ledgerSnapshotSchema,
	type LedgerSnapshot,
	serializeLedger,
	parseLedgerState,
	deserializeLedger,
} from "./ledger/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export {
	type LedgerStore,
	MemoryLedgerStore,
	FileLedgerStore,
	type FileLedgerStoreConfig,
	type StateStore,
	MemoryStateStore,
	FileStateStore,
	type FileStateStoreConfig,
} from "./persistence/index.js";
export { LedgerRegistry, type LedgerRegistryConfig, type MutationOutcome } from "./registry/index.js";

// ── Sizing ───────────────────────────────────────────────────────────
export {
	type CopySizer,
	type CopySizing,
	type SizingInput,
	ProportionalSizer,
	type ProportionalSizerConfig,
	screenTrade,
} from "./sizing/index.js";

// ── Copy Engine ──────────────────────────────────────────────────────
export {
	CopyEngine,
	resolutionMessage,
	type CopyEngineDeps,
	type CopyEngineEvents,
	type PollSummary,
	type TradeOutcome,
	type PortfolioSummary,
	createCopyBot,
	type CopyBot,
	type CopyBotOptions,
	type CopyBotPorts,
	TradeDeduplicator,
	type TradeDeduplicatorConfig,
	type DeduplicatorState,
	deduplicatorStateSchema,
	parseDeduplicatorState,
	activitySchema,
	parseActivity,
	type TradeFeed,
	type CopyOrder,
	type OrderPlacer,
	type Notification,
	type Notifier,
	type ResolutionDetector,
	type PriceSource,
} from "./copy/index.js";
