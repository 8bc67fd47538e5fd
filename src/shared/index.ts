export {
	type MarketId,
	type TokenId,
	type AccountKey,
	marketId,
	tokenId,
	accountKey,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	unwrap,
	isOk,
	isErr,
} from "./result.js";

export {
	ErrorCategory,
	TradingError,
	PersistenceError,
	NetworkError,
	ConfigError,
	SystemError,
	classifyError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { TradeSide, isTradeSide } from "./trade-side.js";
export { type Clock, SystemClock, FakeClock } from "./time.js";
export {
	type CopyConfig,
	type ConfigLogLevel,
	DEFAULT_COPY_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
