import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { marketId, tokenId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/trade-side.js";
import { PositionLedger } from "./position-ledger.js";
import { deserializeLedger, serializeLedger } from "./snapshot.js";
import { EPSILON } from "./types.js";

const MARKETS = [marketId("mkt-a"), marketId("mkt-b")];
const OUTCOMES = ["Up", "Down"];

const stepArb = fc.record({
	/** 0 resolves the market, anything else trades */
	action: fc.integer({ min: 0, max: 9 }),
	market: fc.integer({ min: 0, max: 1 }),
	outcome: fc.integer({ min: 0, max: 1 }),
	buy: fc.boolean(),
	/** Copy size in tenths */
	tenths: fc.integer({ min: 1, max: 500 }),
	cents: fc.integer({ min: 1, max: 99 }),
});

type Step = {
	readonly action: number;
	readonly market: number;
	readonly outcome: number;
	readonly buy: boolean;
	readonly tenths: number;
	readonly cents: number;
};

/** Runs the steps, returning the ledger and the P&L total reported through events. */
function run(steps: readonly Step[], onStep?: (ledger: PositionLedger) => void) {
	const ledger = PositionLedger.create({ maxClosedPositions: 5, maxTradeHistory: 8 });
	let reported = Decimal.zero();

	steps.forEach((step, i) => {
		const market = MARKETS[step.market];
		const outcome = OUTCOMES[step.outcome];
		if (!market || !outcome) return;
		const timestampMs = (i + 1) * 1000;
		const price = Decimal.from(step.cents).div(Decimal.from(100));

		if (step.action === 0) {
			const result = ledger.applyResolution({
				marketId: market,
				winningOutcome: outcome,
				resolvedAtMs: timestampMs,
				resolvedPrice: price,
			});
			reported = reported.add(result.totalPnl);
		} else {
			const events = ledger.applyTrade(
				{
					transactionHash: `0x${i}`,
					timestampMs,
					marketId: market,
					tokenId: tokenId(`${market}-${outcome}`),
					outcome,
					side: step.buy ? TradeSide.Buy : TradeSide.Sell,
					size: Decimal.from(step.tenths),
					price,
					title: "",
				},
				Decimal.from(step.tenths).div(Decimal.from(10)),
			);
			for (const event of events) {
				reported = reported.add(event.realizedPnlDelta);
			}
		}
		onStep?.(ledger);
	});

	return { ledger, reported };
}

describe("PositionLedger (property-based)", () => {
	it("realized P&L equals archived plus every logged record", () => {
		fc.assert(
			fc.property(fc.array(stepArb, { maxLength: 40 }), (steps) => {
				run(steps, (ledger) => {
					const state = ledger.toState();
					const fromLogs = state.archivedPnl
						.add(Decimal.sum(state.closedPositions.map((r) => r.realizedPnl)))
						.add(Decimal.sum(state.resolvedPositions.map((r) => r.realizedPnl)));
					expect(state.realizedPnl.sub(fromLogs).abs().lte(Decimal.from("0.000001"))).toBe(true);
				});
			}),
			{ numRuns: 200 },
		);
	});

	it("realized P&L equals the sum of reported deltas", () => {
		fc.assert(
			fc.property(fc.array(stepArb, { maxLength: 40 }), (steps) => {
				const { ledger, reported } = run(steps);
				expect(ledger.realizedPnl().sub(reported).abs().lte(Decimal.from("0.000001"))).toBe(true);
			}),
			{ numRuns: 200 },
		);
	});

	it("never holds a dust position and respects log bounds", () => {
		fc.assert(
			fc.property(fc.array(stepArb, { maxLength: 40 }), (steps) => {
				run(steps, (ledger) => {
					for (const position of ledger.openPositions()) {
						expect(position.netSize.abs().gte(EPSILON)).toBe(true);
						expect(position.avgEntryPrice.isPositive()).toBe(true);
					}
					expect(ledger.closedPositions().length).toBeLessThanOrEqual(5);
					expect(ledger.tradeHistory().length).toBeLessThanOrEqual(8);
				});
			}),
			{ numRuns: 200 },
		);
	});

	it("repeating a resolution changes nothing", () => {
		fc.assert(
			fc.property(fc.array(stepArb, { maxLength: 30 }), fc.integer({ min: 0, max: 1 }), (steps, m) => {
				const { ledger } = run(steps);
				const event = {
					marketId: MARKETS[m] ?? marketId("mkt-a"),
					winningOutcome: "Up",
					resolvedAtMs: 999_999,
					resolvedPrice: Decimal.from("0.97"),
				};
				ledger.applyResolution(event);
				const once = serializeLedger(ledger);
				ledger.applyResolution(event);
				expect(serializeLedger(ledger)).toBe(once);
			}),
			{ numRuns: 200 },
		);
	});

	it("snapshots round-trip", () => {
		fc.assert(
			fc.property(fc.array(stepArb, { maxLength: 40 }), (steps) => {
				const { ledger } = run(steps);
				const json = serializeLedger(ledger);
				const restored = deserializeLedger(json, { maxClosedPositions: 5, maxTradeHistory: 8 });
				expect(restored.ok).toBe(true);
				if (restored.ok) expect(serializeLedger(restored.value)).toBe(json);
			}),
			{ numRuns: 100 },
		);
	});
});
