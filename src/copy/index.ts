export {
	CopyEngine,
	resolutionMessage,
	type CopyEngineDeps,
	type CopyEngineEvents,
	type PollSummary,
	type TradeOutcome,
	type PortfolioSummary,
} from "./copy-engine.js";
export { createCopyBot, type CopyBot, type CopyBotOptions, type CopyBotPorts } from "./create-copy-bot.js";
export {
	TradeDeduplicator,
	type TradeDeduplicatorConfig,
	type DeduplicatorState,
	deduplicatorStateSchema,
	parseDeduplicatorState,
} from "./trade-deduplicator.js";
export { activitySchema, parseActivity } from "./activity.js";
export type {
	TradeFeed,
	CopyOrder,
	OrderPlacer,
	Notification,
	Notifier,
	ResolutionDetector,
	PriceSource,
} from "./ports.js";
