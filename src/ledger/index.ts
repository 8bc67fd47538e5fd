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
} from "./types.js";
export { PositionLedger, type LedgerOptions } from "./position-ledger.js";
export { replayPeakExposure, heldOutcome, type ExposureReplayInput } from "./exposure.js";
export { formatPnl, formatPrice, formatSize } from "./format.js";
export {
	ledgerSnapshotSchema,
	type LedgerSnapshot,
	serializeLedger,
	parseLedgerState,
	deserializeLedger,
} from "./snapshot.js";
