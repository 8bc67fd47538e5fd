/**
 * Peak concurrent exposure over a window, by replaying fills over scratch legs
 * keyed `marketId:outcome`.
 *
 * The book at the window start is rebuilt by replaying the retained history
 * before it. State older than the oldest retained fill is seeded from the
 * records: closed records opened before that fill and closed at or after it,
 * and open positions opened before it, rewound by the retained fills on their
 * token. A BUY first consumes a long leg on the other outcome of the same
 * market; what is left of it grows its own leg. A SELL shrinks its own leg,
 * never below zero. Leg notional shrinks in proportion to size.
 */

import { Decimal } from "../shared/decimal.js";
import type { MarketId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/trade-side.js";
import {
	type ClosedPositionRecord,
	EPSILON,
	type Position,
	type TradeHistoryRecord,
} from "./types.js";

const HEDGE_ARROW = " → ";

interface ScratchLeg {
	readonly marketId: MarketId;
	readonly outcome: string;
	readonly size: Decimal;
	readonly notional: Decimal;
}

export interface ExposureReplayInput {
	readonly startMs: number;
	readonly endMs: number;
	/** Every retained fill, oldest first */
	readonly history: readonly TradeHistoryRecord[];
	readonly closed: readonly ClosedPositionRecord[];
	readonly open: Iterable<Position>;
}

/** Outcome that was actually held; hedge records name `"<held> → <bought>"`. */
export function heldOutcome(recordOutcome: string): string {
	const arrow = recordOutcome.indexOf(HEDGE_ARROW);
	return arrow === -1 ? recordOutcome : recordOutcome.slice(0, arrow);
}

function legKey(marketId: MarketId, outcome: string): string {
	return `${marketId}:${outcome}`;
}

class ScratchBook {
	private readonly legs = new Map<string, ScratchLeg>();

	add(marketId: MarketId, outcome: string, size: Decimal, notional: Decimal): void {
		const key = legKey(marketId, outcome);
		const leg = this.legs.get(key);
		this.legs.set(key, {
			marketId,
			outcome,
			size: (leg?.size ?? Decimal.zero()).add(size),
			notional: (leg?.notional ?? Decimal.zero()).add(notional),
		});
	}

	/** Shrinks a leg by up to `size`; returns the amount actually removed. */
	reduce(key: string, size: Decimal): Decimal {
		const leg = this.legs.get(key);
		if (!leg || !leg.size.isPositive()) return Decimal.zero();

		const removed = Decimal.min(leg.size, size);
		const remaining = leg.size.sub(removed);
		if (remaining.lt(EPSILON)) {
			this.legs.delete(key);
			return removed;
		}
		const keptShare = remaining.div(leg.size);
		this.legs.set(key, { ...leg, size: remaining, notional: leg.notional.mul(keptShare) });
		return removed;
	}

	oppositeKey(marketId: MarketId, outcome: string): string | null {
		for (const [key, leg] of this.legs) {
			if (leg.marketId === marketId && leg.outcome !== outcome && leg.size.isPositive()) {
				return key;
			}
		}
		return null;
	}

	total(): Decimal {
		return Decimal.sum([...this.legs.values()].map((leg) => leg.notional));
	}
}

export function replayPeakExposure(input: ExposureReplayInput): Decimal {
	const book = new ScratchBook();
	const horizonMs = input.history[0]?.timestampMs ?? Number.POSITIVE_INFINITY;

	for (const record of input.closed) {
		if (record.openedAtMs < horizonMs && record.closedAtMs >= horizonMs) {
			book.add(
				record.marketId,
				heldOutcome(record.outcome),
				record.size,
				record.size.mul(record.entryPrice),
			);
		}
	}
	for (const position of input.open) {
		if (position.openedAtMs >= horizonMs) continue;
		const size = sizeAtHorizon(position, input.history);
		if (size.gte(EPSILON)) {
			book.add(position.marketId, position.outcome, size, size.mul(position.avgEntryPrice));
		}
	}

	let index = 0;
	for (; index < input.history.length; index++) {
		const trade = input.history[index];
		if (!trade || trade.timestampMs >= input.startMs) break;
		replay(book, trade);
	}

	let peak = book.total();
	for (; index < input.history.length; index++) {
		const trade = input.history[index];
		if (!trade || trade.timestampMs >= input.endMs) break;
		replay(book, trade);
		peak = Decimal.max(peak, book.total());
	}

	return peak;
}

function replay(book: ScratchBook, trade: TradeHistoryRecord): void {
	if (trade.side === TradeSide.Buy) {
		let remaining = trade.copySize;
		const opposite = book.oppositeKey(trade.marketId, trade.outcome);
		if (opposite !== null) {
			remaining = remaining.sub(book.reduce(opposite, remaining));
		}
		if (remaining.gte(EPSILON)) {
			book.add(trade.marketId, trade.outcome, remaining, remaining.mul(trade.price));
		}
		return;
	}
	book.reduce(legKey(trade.marketId, trade.outcome), trade.copySize);
}

/** Size of a position before the retained fills on its token; zero if they flipped it. */
function sizeAtHorizon(position: Position, history: readonly TradeHistoryRecord[]): Decimal {
	let net = position.netSize;
	for (const trade of history) {
		if (trade.tokenId !== position.tokenId) continue;
		net = trade.side === TradeSide.Buy ? net.sub(trade.copySize) : net.add(trade.copySize);
	}
	const sameSide = position.netSize.isNegative() ? net.isNegative() : net.isPositive();
	return sameSide ? net.abs() : Decimal.zero();
}
