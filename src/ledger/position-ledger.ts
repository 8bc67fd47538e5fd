/**
 * PositionLedger: positions, realized P&L and resolution settlement for one account.
 *
 * The append-only logs (closed, resolved) are the source of truth for realized
 * P&L; the cached total is a projection that is reconciled on every read and
 * write. Operations are synchronous and never read a clock: a fill is stamped
 * with its own trade timestamp, a settlement with its resolution time.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import type { MarketId, TokenId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/trade-side.js";
import { replayPeakExposure } from "./exposure.js";
import {
	closedMessage,
	displayName,
	hedgeMessage,
	increasedMessage,
	openedMessage,
	reversedMessage,
} from "./format.js";
import {
	CloseKind,
	type ClosedPositionRecord,
	type ConsistencyReport,
	type CurrentPriceMap,
	DRIFT_TOLERANCE,
	EPSILON,
	type LedgerState,
	type Position,
	type PositionCloseEvent,
	type PositionEvent,
	PositionEventKind,
	type ResolutionEvent,
	type ResolutionResult,
	type ResolvedPositionRecord,
	type Trade,
	type TradeHistoryRecord,
	type WindowStats,
} from "./types.js";

const DEFAULT_MAX_CLOSED = 200;
const DEFAULT_MAX_HISTORY = 1000;

export interface LedgerOptions {
	/** Closed records retained; older ones are folded into archived P&L (default 200) */
	readonly maxClosedPositions?: number;
	/** Trade history records retained (default 1000) */
	readonly maxTradeHistory?: number;
	readonly logger?: Logger;
}

function resolutionKey(record: Pick<ResolvedPositionRecord, "tokenId" | "marketId" | "resolvedAtMs">): string {
	return `${record.tokenId}|${record.marketId}|${record.resolvedAtMs}`;
}

export class PositionLedger {
	private readonly positions = new Map<TokenId, Position>();
	private closed: ClosedPositionRecord[] = [];
	private resolved: ResolvedPositionRecord[] = [];
	private history: TradeHistoryRecord[] = [];
	private readonly resolvedKeys = new Set<string>();
	private cachedRealized = Decimal.zero();
	private archived = Decimal.zero();

	private readonly maxClosed: number;
	private readonly maxHistory: number;
	private readonly logger: Logger;

	private constructor(options: LedgerOptions) {
		this.maxClosed = options.maxClosedPositions ?? DEFAULT_MAX_CLOSED;
		this.maxHistory = options.maxTradeHistory ?? DEFAULT_MAX_HISTORY;
		this.logger = options.logger ?? silentLogger();
	}

	/** Creates an empty ledger. */
	static create(options: LedgerOptions = {}): PositionLedger {
		return new PositionLedger(options);
	}

	/**
	 * Rebuilds a ledger from persisted state. Dust positions are dropped, and
	 * bounded logs longer than the limits are compacted.
	 */
	static restore(state: LedgerState, options: LedgerOptions = {}): PositionLedger {
		const ledger = new PositionLedger(options);
		for (const position of state.openPositions) {
			if (position.netSize.abs().gte(EPSILON)) {
				ledger.positions.set(position.tokenId, position);
			}
		}
		ledger.closed = [...state.closedPositions];
		ledger.resolved = [...state.resolvedPositions];
		ledger.history = [...state.tradeHistory];
		for (const record of ledger.resolved) {
			ledger.resolvedKeys.add(resolutionKey(record));
		}
		ledger.archived = state.archivedPnl;
		ledger.cachedRealized = state.realizedPnl;
		ledger.compactClosed();
		ledger.compactHistory();
		ledger.reconcile("restore");
		return ledger;
	}

	// ── Mutations ──────────────────────────────────────────────────

	/**
	 * Applies one copied fill. Callers screen the trade first (price in (0, 1]).
	 * @param copySize - Size copied for this account; at or below dust it is a no-op
	 * @returns Events in the order they happened (a hedge precedes the position change)
	 */
	applyTrade(trade: Trade, copySize: Decimal): PositionEvent[] {
		if (copySize.lte(EPSILON)) return [];

		this.recordHistory(trade, copySize);

		const events: PositionEvent[] = [];
		if (trade.side === TradeSide.Buy) {
			const hedge = this.applyHedge(trade, copySize);
			if (hedge) events.push(hedge);
		}
		events.push(this.applyNet(trade, copySize));

		this.reconcile("applyTrade");
		this.logger.debug(
			{ tokenId: trade.tokenId, side: trade.side, copySize: copySize.toString(), events: events.map((e) => e.kind) },
			"trade applied",
		);
		return events;
	}

	/**
	 * Settles every open position in the market. A position already settled for
	 * the same (token, market, resolution time) is skipped.
	 *
	 * Winners pay `size × resolvedPrice / entryPrice`; losers pay nothing.
	 */
	applyResolution(event: ResolutionEvent): ResolutionResult {
		const resolved: ResolvedPositionRecord[] = [];
		let totalPnl = Decimal.zero();

		for (const position of [...this.positions.values()]) {
			if (position.marketId !== event.marketId) continue;

			const key = resolutionKey({
				tokenId: position.tokenId,
				marketId: event.marketId,
				resolvedAtMs: event.resolvedAtMs,
			});
			if (this.resolvedKeys.has(key)) {
				this.logger.debug({ tokenId: position.tokenId, resolvedAtMs: event.resolvedAtMs }, "duplicate resolution skipped");
				continue;
			}

			const size = position.netSize;
			const entryPrice = position.avgEntryPrice;
			const costBasis = size.mul(entryPrice);
			let payout = Decimal.zero();
			if (position.outcome === event.winningOutcome) {
				payout = entryPrice.isPositive()
					? size.mul(event.resolvedPrice.div(entryPrice))
					: size.mul(event.resolvedPrice);
			}
			const realizedPnl = payout.sub(costBasis);

			const record: ResolvedPositionRecord = {
				marketId: position.marketId,
				tokenId: position.tokenId,
				outcome: position.outcome,
				title: position.title,
				winningOutcome: event.winningOutcome,
				size,
				entryPrice,
				resolvedPrice: event.resolvedPrice,
				costBasis,
				payout,
				realizedPnl,
				resolvedAtMs: event.resolvedAtMs,
			};

			this.positions.delete(position.tokenId);
			this.resolved.push(record);
			this.resolvedKeys.add(key);
			this.cachedRealized = this.cachedRealized.add(realizedPnl);
			totalPnl = totalPnl.add(realizedPnl);
			resolved.push(record);
		}

		this.reconcile("applyResolution");
		if (resolved.length > 0) {
			this.logger.info(
				{ marketId: event.marketId, winningOutcome: event.winningOutcome, positions: resolved.length, pnl: totalPnl.toString() },
				"market resolved",
			);
		}
		return { totalPnl, resolved };
	}

	/** Clears every collection and both P&L totals. */
	reset(): void {
		this.positions.clear();
		this.closed = [];
		this.resolved = [];
		this.history = [];
		this.resolvedKeys.clear();
		this.cachedRealized = Decimal.zero();
		this.archived = Decimal.zero();
	}

	// ── Queries ────────────────────────────────────────────────────

	/** Realized P&L, corrected from the logs when the cached total drifted. */
	realizedPnl(): Decimal {
		return this.reconcile("realizedPnl");
	}

	/** Compares the cached total with the logs without correcting it. */
	checkConsistency(): ConsistencyReport {
		const recomputed = this.recomputeRealized();
		const drift = recomputed.sub(this.cachedRealized).abs();
		return {
			consistent: drift.lte(DRIFT_TOLERANCE),
			cached: this.cachedRealized,
			recomputed,
			drift,
		};
	}

	/** Mark-to-market P&L of open positions; tokens without a price are skipped. */
	unrealizedPnl(prices: CurrentPriceMap): Decimal {
		let total = Decimal.zero();
		for (const position of this.positions.values()) {
			const current = prices.get(position.tokenId);
			if (current === undefined) continue;
			if (position.netSize.isPositive()) {
				total = total.add(current.sub(position.avgEntryPrice).mul(position.netSize));
			} else {
				total = total.add(position.avgEntryPrice.sub(current).mul(position.netSize.abs()));
			}
		}
		return total;
	}

	/** Closed-position P&L with `closedAtMs >= startMs`. */
	realizedPnlSince(startMs: number): Decimal {
		return Decimal.sum(this.closed.filter((r) => r.closedAtMs >= startMs).map((r) => r.realizedPnl));
	}

	/** Volume, largest trade, peak exposure and closed P&L over `[startMs, endMs)`. */
	statsForWindow(startMs: number, endMs: number): WindowStats {
		const trades = this.history
			.filter((t) => t.timestampMs >= startMs && t.timestampMs < endMs)
			.sort((a, b) => a.timestampMs - b.timestampMs);

		let volume = Decimal.zero();
		let maxValue = Decimal.zero();
		let maxTrade: TradeHistoryRecord | null = null;
		for (const trade of trades) {
			volume = volume.add(trade.copyValue);
			if (maxTrade === null || trade.copyValue.gt(maxValue)) {
				maxValue = trade.copyValue;
				maxTrade = trade;
			}
		}

		const pnl = Decimal.sum(
			this.closed.filter((r) => r.closedAtMs >= startMs && r.closedAtMs < endMs).map((r) => r.realizedPnl),
		);

		return {
			startMs,
			endMs,
			volume,
			maxValue,
			maxTrade,
			tradeCount: trades.length,
			peakExposure: replayPeakExposure({
				startMs,
				endMs,
				history: [...this.history].sort((a, b) => a.timestampMs - b.timestampMs),
				closed: this.closed,
				open: this.positions.values(),
			}),
			pnl,
		};
	}

	/** Σ |netSize| × avgEntryPrice over open positions. */
	openExposure(): Decimal {
		return Decimal.sum([...this.positions.values()].map((p) => p.netSize.abs().mul(p.avgEntryPrice)));
	}

	openPositions(): readonly Position[] {
		return [...this.positions.values()];
	}

	position(tokenId: TokenId): Position | null {
		return this.positions.get(tokenId) ?? null;
	}

	/** Most recent closed records, newest first. */
	recentClosed(count: number): readonly ClosedPositionRecord[] {
		if (count <= 0) return [];
		return this.closed.slice(-count).reverse();
	}

	closedPositions(): readonly ClosedPositionRecord[] {
		return [...this.closed];
	}

	resolvedPositions(): readonly ResolvedPositionRecord[] {
		return [...this.resolved];
	}

	tradeHistory(): readonly TradeHistoryRecord[] {
		return [...this.history];
	}

	/** Market ids with at least one open position. */
	openMarkets(): readonly MarketId[] {
		return [...new Set([...this.positions.values()].map((p) => p.marketId))];
	}

	toState(): LedgerState {
		return {
			openPositions: this.openPositions(),
			closedPositions: this.closedPositions(),
			resolvedPositions: this.resolvedPositions(),
			tradeHistory: this.tradeHistory(),
			realizedPnl: this.realizedPnl(),
			archivedPnl: this.archived,
		};
	}

	// ── Internal: trade accounting ─────────────────────────────────

	private recordHistory(trade: Trade, copySize: Decimal): void {
		this.history.push({
			timestampMs: trade.timestampMs,
			transactionHash: trade.transactionHash,
			marketId: trade.marketId,
			tokenId: trade.tokenId,
			outcome: trade.outcome,
			side: trade.side,
			size: trade.size,
			price: trade.price,
			copySize,
			copyValue: copySize.mul(trade.price),
			title: trade.title,
		});
		this.compactHistory();
	}

	/** Buying one outcome while long the other locks `1 - oppositeEntry - fill` per matched unit. */
	private applyHedge(trade: Trade, copySize: Decimal): PositionCloseEvent | null {
		const opposite = this.findLongOpposite(trade);
		if (!opposite) return null;

		const closingSize = Decimal.min(opposite.netSize.abs(), copySize);
		const pnl = closingSize.mul(Decimal.one().sub(opposite.avgEntryPrice).sub(trade.price));
		const remaining = opposite.netSize.sub(closingSize);
		const fullyHedged = remaining.abs().lt(EPSILON);

		let left: Position | null = null;
		if (fullyHedged) {
			this.positions.delete(opposite.tokenId);
		} else {
			left = { ...opposite, netSize: remaining, lastUpdateMs: trade.timestampMs };
			this.positions.set(opposite.tokenId, left);
		}

		const kind = fullyHedged ? CloseKind.HedgeClose : CloseKind.PartialHedge;
		const record: ClosedPositionRecord = {
			tokenId: opposite.tokenId,
			marketId: opposite.marketId,
			outcome: `${opposite.outcome} → ${trade.outcome}`,
			title: opposite.title || trade.title,
			size: closingSize,
			entryPrice: opposite.avgEntryPrice,
			exitPrice: Decimal.one().sub(trade.price),
			realizedPnl: pnl,
			openedAtMs: opposite.openedAtMs,
			closedAtMs: trade.timestampMs,
			kind,
		};
		this.appendClosed(record);

		return {
			kind: fullyHedged ? PositionEventKind.HedgeClose : PositionEventKind.PartialHedge,
			humanMessage: hedgeMessage(kind, record),
			record,
			position: left,
			realizedPnlDelta: pnl,
			timestampMs: trade.timestampMs,
		};
	}

	private findLongOpposite(trade: Trade): Position | null {
		for (const position of this.positions.values()) {
			if (
				position.marketId === trade.marketId &&
				position.tokenId !== trade.tokenId &&
				position.outcome !== trade.outcome &&
				position.netSize.isPositive()
			) {
				return position;
			}
		}
		return null;
	}

	private applyNet(trade: Trade, copySize: Decimal): PositionEvent {
		const signed = trade.side === TradeSide.Buy ? copySize : copySize.neg();
		const current = this.positions.get(trade.tokenId);

		if (!current || current.netSize.abs().lt(EPSILON)) {
			const opened = this.freshPosition(trade, signed);
			this.positions.set(trade.tokenId, opened);
			return {
				kind: PositionEventKind.Opened,
				humanMessage: openedMessage(opened),
				record: opened,
				realizedPnlDelta: Decimal.zero(),
				timestampMs: trade.timestampMs,
			};
		}

		if (current.netSize.sign() === signed.sign()) {
			const curAbs = current.netSize.abs();
			const avg = curAbs
				.mul(current.avgEntryPrice)
				.add(copySize.mul(trade.price))
				.div(curAbs.add(copySize));
			const increased: Position = {
				...current,
				netSize: current.netSize.add(signed),
				avgEntryPrice: avg,
				lastUpdateMs: trade.timestampMs,
			};
			this.positions.set(trade.tokenId, increased);
			return {
				kind: PositionEventKind.Increased,
				humanMessage: increasedMessage(increased),
				record: increased,
				realizedPnlDelta: Decimal.zero(),
				timestampMs: trade.timestampMs,
			};
		}

		return this.reduce(trade, current, signed);
	}

	private reduce(trade: Trade, current: Position, signed: Decimal): PositionCloseEvent {
		const curSign = current.netSize.sign();
		const closingSize = Decimal.min(current.netSize.abs(), signed.abs());
		const pnl = closingSize.mul(trade.price.sub(current.avgEntryPrice)).mul(Decimal.from(curSign));
		const remaining = current.netSize.add(signed);

		let eventKind: PositionCloseEvent["kind"];
		let left: Position | null;
		if (remaining.abs().lt(EPSILON)) {
			this.positions.delete(trade.tokenId);
			eventKind = PositionEventKind.FullClose;
			left = null;
		} else if (remaining.sign() !== curSign) {
			left = this.freshPosition(trade, remaining);
			this.positions.set(trade.tokenId, left);
			eventKind = PositionEventKind.Reversed;
		} else {
			left = { ...current, netSize: remaining, lastUpdateMs: trade.timestampMs };
			this.positions.set(trade.tokenId, left);
			eventKind = PositionEventKind.PartialClose;
		}

		const record: ClosedPositionRecord = {
			tokenId: current.tokenId,
			marketId: current.marketId,
			outcome: current.outcome,
			title: current.title,
			size: closingSize,
			entryPrice: current.avgEntryPrice,
			exitPrice: trade.price,
			realizedPnl: pnl,
			openedAtMs: current.openedAtMs,
			closedAtMs: trade.timestampMs,
			kind: eventKind === PositionEventKind.PartialClose ? CloseKind.PartialClose : CloseKind.FullClose,
		};
		this.appendClosed(record);

		let humanMessage: string;
		if (eventKind === PositionEventKind.Reversed && left) {
			humanMessage = reversedMessage(record, left);
		} else if (eventKind === PositionEventKind.FullClose) {
			humanMessage = closedMessage("CLOSED", record);
		} else {
			humanMessage = `${closedMessage("PARTIAL_CLOSE", record)}, remaining ${left ? left.netSize.abs().toFixed(2) : "0.00"}`;
		}

		return {
			kind: eventKind,
			humanMessage,
			record,
			position: left,
			realizedPnlDelta: pnl,
			timestampMs: trade.timestampMs,
		};
	}

	private freshPosition(trade: Trade, netSize: Decimal): Position {
		return {
			tokenId: trade.tokenId,
			marketId: trade.marketId,
			outcome: trade.outcome,
			netSize,
			avgEntryPrice: trade.price,
			openedAtMs: trade.timestampMs,
			lastUpdateMs: trade.timestampMs,
			title: trade.title,
			displayName: displayName(trade.title, trade.outcome),
		};
	}

	// ── Internal: logs and reconciliation ──────────────────────────

	private appendClosed(record: ClosedPositionRecord): void {
		this.closed.push(record);
		this.cachedRealized = this.cachedRealized.add(record.realizedPnl);
		this.compactClosed();
	}

	/** Evicts the oldest closed records, folding their P&L into the archive. */
	private compactClosed(): void {
		const excess = this.closed.length - this.maxClosed;
		if (excess <= 0) return;
		const evicted = this.closed.splice(0, excess);
		this.archived = this.archived.add(Decimal.sum(evicted.map((r) => r.realizedPnl)));
	}

	private compactHistory(): void {
		const excess = this.history.length - this.maxHistory;
		if (excess > 0) this.history.splice(0, excess);
	}

	private recomputeRealized(): Decimal {
		return this.archived
			.add(Decimal.sum(this.closed.map((r) => r.realizedPnl)))
			.add(Decimal.sum(this.resolved.map((r) => r.realizedPnl)));
	}

	private reconcile(operation: string): Decimal {
		const recomputed = this.recomputeRealized();
		const drift = recomputed.sub(this.cachedRealized).abs();
		if (drift.gt(DRIFT_TOLERANCE)) {
			this.logger.warn(
				{
					operation,
					cached: this.cachedRealized.toString(),
					recomputed: recomputed.toString(),
					drift: drift.toString(),
				},
				"realized P&L drifted from the logs; corrected",
			);
		}
		this.cachedRealized = recomputed;
		return recomputed;
	}
}
