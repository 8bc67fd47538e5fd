/**
 * Position ledger domain types.
 */

import { Decimal } from "../shared/decimal.js";
import type { MarketId, TokenId } from "../shared/identifiers.js";
import type { TradeSide } from "../shared/trade-side.js";

/** Sizes below this are dust and never count as a live position. */
export const EPSILON = Decimal.from("0.000001");

/** Allowed gap between cached and recomputed realized P&L. */
export const DRIFT_TOLERANCE = Decimal.from("0.000001");

// ── Inputs ──────────────────────────────────────────────────────────

/** A fill observed on the watched account, deduplicated upstream by hash. */
export interface Trade {
	readonly transactionHash: string;
	readonly timestampMs: number;
	readonly marketId: MarketId;
	readonly tokenId: TokenId;
	readonly outcome: string;
	readonly side: TradeSide;
	readonly size: Decimal;
	/** Fill price in (0, 1] */
	readonly price: Decimal;
	readonly title: string;
}

/** Result of resolution detection for one market. */
export interface ResolutionEvent {
	readonly marketId: MarketId;
	readonly winningOutcome: string;
	readonly resolvedAtMs: number;
	readonly resolvedPrice: Decimal;
}

/** Current outcome-token prices in [0, 1]. Missing tokens are skipped. */
export type CurrentPriceMap = ReadonlyMap<TokenId, Decimal>;

// ── Records ─────────────────────────────────────────────────────────

/** Net inventory in one outcome token. Positive is long, negative short. */
export interface Position {
	readonly tokenId: TokenId;
	readonly marketId: MarketId;
	readonly outcome: string;
	readonly netSize: Decimal;
	readonly avgEntryPrice: Decimal;
	readonly openedAtMs: number;
	readonly lastUpdateMs: number;
	readonly title: string;
	readonly displayName: string;
}

export const CloseKind = {
	FullClose: "FULL_CLOSE",
	PartialClose: "PARTIAL_CLOSE",
	HedgeClose: "HEDGE_CLOSE",
	PartialHedge: "PARTIAL_HEDGE",
} as const;

export type CloseKind = (typeof CloseKind)[keyof typeof CloseKind];

/**
 * Realized slice of a position. Hedge records carry the hedged leg's token and
 * entry price, an outcome of `"<opposite> → <current>"` and an exit price of
 * `1 - fillPrice`.
 */
export interface ClosedPositionRecord {
	readonly tokenId: TokenId;
	readonly marketId: MarketId;
	readonly outcome: string;
	readonly title: string;
	/** Closed quantity, unsigned */
	readonly size: Decimal;
	readonly entryPrice: Decimal;
	readonly exitPrice: Decimal;
	readonly realizedPnl: Decimal;
	readonly openedAtMs: number;
	readonly closedAtMs: number;
	readonly kind: CloseKind;
}

export interface ResolvedPositionRecord {
	readonly marketId: MarketId;
	readonly tokenId: TokenId;
	readonly outcome: string;
	readonly title: string;
	readonly winningOutcome: string;
	/** Signed net size at resolution */
	readonly size: Decimal;
	readonly entryPrice: Decimal;
	readonly resolvedPrice: Decimal;
	readonly costBasis: Decimal;
	readonly payout: Decimal;
	readonly realizedPnl: Decimal;
	readonly resolvedAtMs: number;
}

/** Accepted fill with the account's copy size. Analytics only. */
export interface TradeHistoryRecord {
	readonly timestampMs: number;
	readonly transactionHash: string;
	readonly marketId: MarketId;
	readonly tokenId: TokenId;
	readonly outcome: string;
	readonly side: TradeSide;
	readonly size: Decimal;
	readonly price: Decimal;
	readonly copySize: Decimal;
	readonly copyValue: Decimal;
	readonly title: string;
}

// ── Events ──────────────────────────────────────────────────────────

export const PositionEventKind = {
	Opened: "OPENED",
	Increased: "INCREASED",
	PartialClose: "PARTIAL_CLOSE",
	FullClose: "FULL_CLOSE",
	Reversed: "REVERSED",
	HedgeClose: "HEDGE_CLOSE",
	PartialHedge: "PARTIAL_HEDGE",
} as const;

export type PositionEventKind = (typeof PositionEventKind)[keyof typeof PositionEventKind];

interface PositionEventBase {
	readonly humanMessage: string;
	readonly realizedPnlDelta: Decimal;
	readonly timestampMs: number;
}

/** A position was opened or grown; `record` is its new state. */
export interface PositionChangeEvent extends PositionEventBase {
	readonly kind: typeof PositionEventKind.Opened | typeof PositionEventKind.Increased;
	readonly record: Position;
}

/** P&L was realized; `position` is what remains open on that token, if anything. */
export interface PositionCloseEvent extends PositionEventBase {
	readonly kind:
		| typeof PositionEventKind.PartialClose
		| typeof PositionEventKind.FullClose
		| typeof PositionEventKind.Reversed
		| typeof PositionEventKind.HedgeClose
		| typeof PositionEventKind.PartialHedge;
	readonly record: ClosedPositionRecord;
	readonly position: Position | null;
}

export type PositionEvent = PositionChangeEvent | PositionCloseEvent;

// ── Query results ───────────────────────────────────────────────────

export interface ResolutionResult {
	readonly totalPnl: Decimal;
	readonly resolved: readonly ResolvedPositionRecord[];
}

export interface WindowStats {
	readonly startMs: number;
	readonly endMs: number;
	readonly volume: Decimal;
	readonly maxValue: Decimal;
	readonly maxTrade: TradeHistoryRecord | null;
	readonly tradeCount: number;
	readonly peakExposure: Decimal;
	/** Closed-position P&L only; resolution P&L is reported separately */
	readonly pnl: Decimal;
}

export interface ConsistencyReport {
	readonly consistent: boolean;
	readonly cached: Decimal;
	readonly recomputed: Decimal;
	readonly drift: Decimal;
}

/** Plain state of a ledger, as persisted. */
export interface LedgerState {
	readonly openPositions: readonly Position[];
	readonly closedPositions: readonly ClosedPositionRecord[];
	readonly resolvedPositions: readonly ResolvedPositionRecord[];
	readonly tradeHistory: readonly TradeHistoryRecord[];
	readonly realizedPnl: Decimal;
	/** Realized P&L of closed records evicted from the bounded log */
	readonly archivedPnl: Decimal;
}
