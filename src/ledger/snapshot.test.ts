import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { marketId, tokenId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/trade-side.js";
import { PositionLedger } from "./position-ledger.js";
import { deserializeLedger, parseLedgerState, serializeLedger } from "./snapshot.js";
import type { Trade } from "./types.js";

const d = Decimal.from;
const BTC = marketId("mkt-btc");
const ETH = marketId("mkt-eth");

function trade(side: TradeSide, token: string, outcome: string, price: string, timestampMs: number, market = BTC): Trade {
	return {
		transactionHash: `0x${token}-${timestampMs}`,
		timestampMs,
		marketId: market,
		tokenId: tokenId(token),
		outcome,
		side,
		size: d("50"),
		price: d(price),
		title: "Will it close higher?",
	};
}

function busyLedger(): PositionLedger {
	const ledger = PositionLedger.create({ maxClosedPositions: 2 });
	ledger.applyTrade(trade(TradeSide.Buy, "up", "Up", "0.55", 1000), d("10"));
	ledger.applyTrade(trade(TradeSide.Buy, "down", "Down", "0.40", 2000), d("4"));
	ledger.applyTrade(trade(TradeSide.Sell, "up", "Up", "0.65", 3000), d("2"));
	ledger.applyTrade(trade(TradeSide.Buy, "eth-up", "Up", "0.3", 3500, ETH), d("3"));
	ledger.applyTrade(trade(TradeSide.Sell, "eth-up", "Up", "0.35", 3600, ETH), d("1"));
	ledger.applyTrade(trade(TradeSide.Buy, "eth-up", "Up", "0.31", 3700, ETH), d("7"));
	ledger.applyResolution({ marketId: ETH, winningOutcome: "Up", resolvedAtMs: 4000, resolvedPrice: d("0.98") });
	return ledger;
}

describe("ledger snapshots", () => {
	it("round-trips every collection field for field", () => {
		const original = busyLedger();
		const json = serializeLedger(original);

		const restored = deserializeLedger(json, { maxClosedPositions: 2 });
		expect(restored.ok).toBe(true);
		if (!restored.ok) return;

		const state = restored.value.toState();
		expect(state.openPositions).toHaveLength(2);
		expect(state.closedPositions).toHaveLength(2);
		expect(state.resolvedPositions).toHaveLength(1);
		expect(state.tradeHistory).toHaveLength(6);
		expect(state.archivedPnl.isZero()).toBe(false);
		expect(JSON.parse(serializeLedger(restored.value))).toEqual(JSON.parse(json));
		expect(state.realizedPnl.eq(original.realizedPnl())).toBe(true);
	});

	it("writes decimals as strings and ids as plain strings", () => {
		const ledger = PositionLedger.create();
		ledger.applyTrade(trade(TradeSide.Buy, "up", "Up", "0.55", 1000), d("10"));

		const doc = JSON.parse(serializeLedger(ledger)) as { openPositions: Record<string, unknown>[] };
		expect(doc.openPositions[0]).toEqual({
			tokenId: "up",
			marketId: "mkt-btc",
			outcome: "Up",
			netSize: "10",
			avgEntryPrice: "0.55",
			openedAtMs: 1000,
			lastUpdateMs: 1000,
			title: "Will it close higher?",
			displayName: "Will it close higher? [Up]",
		});
	});

	it("restored ledgers keep rejecting duplicate resolutions", () => {
		const original = busyLedger();
		const restored = deserializeLedger(serializeLedger(original));
		if (!restored.ok) throw restored.error;

		restored.value.applyTrade(trade(TradeSide.Buy, "eth-up", "Up", "0.5", 5000, ETH), d("1"));
		const repeat = restored.value.applyResolution({
			marketId: ETH,
			winningOutcome: "Up",
			resolvedAtMs: 4000,
			resolvedPrice: d("0.98"),
		});
		expect(repeat.resolved).toEqual([]);
	});

	it("accepts a snapshot without archived P&L", () => {
		const result = parseLedgerState({
			openPositions: [],
			closedPositions: [],
			resolvedPositions: [],
			tradeHistory: [],
			realizedPnl: "0",
		});
		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value.archivedPnl.isZero()).toBe(true);
	});

	it("rejects malformed decimals with the field path", () => {
		const result = parseLedgerState({
			openPositions: [],
			closedPositions: [],
			resolvedPositions: [],
			tradeHistory: [],
			realizedPnl: "1e5",
		});
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("VALIDATION_FAILED");
			expect(result.error.summary()).toBe("realizedPnl: expected a decimal string");
		}
	});

	it("rejects an unknown trade side", () => {
		const ledger = PositionLedger.create();
		ledger.applyTrade(trade(TradeSide.Buy, "up", "Up", "0.55", 1000), d("10"));
		const doc = JSON.parse(serializeLedger(ledger)) as { tradeHistory: Record<string, unknown>[] };
		const [first] = doc.tradeHistory;
		if (first) first["side"] = "HOLD";

		const result = parseLedgerState(doc);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.issues[0]?.path).toEqual(["tradeHistory", 0, "side"]);
	});

	it("rejects text that is not JSON", () => {
		const result = deserializeLedger("{not json");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe("Invalid ledger snapshot");
	});
});
