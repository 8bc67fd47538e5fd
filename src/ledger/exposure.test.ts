import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { marketId, tokenId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/trade-side.js";
import { heldOutcome, replayPeakExposure } from "./exposure.js";
import { CloseKind, type ClosedPositionRecord, type Position, type TradeHistoryRecord } from "./types.js";

const d = Decimal.from;
const MKT = marketId("mkt-1");

function historyRecord(side: TradeSide, outcome: string, copySize: string, price: string, timestampMs: number): TradeHistoryRecord {
	return {
		timestampMs,
		transactionHash: `0x${timestampMs}`,
		marketId: MKT,
		tokenId: tokenId(`tok-${outcome}`),
		outcome,
		side,
		size: d(copySize),
		price: d(price),
		copySize: d(copySize),
		copyValue: d(copySize).mul(d(price)),
		title: "",
	};
}

describe("heldOutcome", () => {
	it("returns the hedged leg of a hedge record", () => {
		expect(heldOutcome("Up → Down")).toBe("Up");
		expect(heldOutcome("Down")).toBe("Down");
	});
});

describe("replayPeakExposure", () => {
	it("tracks the running maximum of leg notional", () => {
		const peak = replayPeakExposure({
			startMs: 0,
			endMs: 1_000,
			history: [
				historyRecord(TradeSide.Buy, "Up", "10", "0.5", 10),
				historyRecord(TradeSide.Buy, "Up", "10", "0.7", 20),
				historyRecord(TradeSide.Sell, "Up", "15", "0.8", 30),
				historyRecord(TradeSide.Buy, "Up", "2", "0.5", 40),
			],
			closed: [],
			open: [],
		});
		expect(peak.toString()).toBe("12");
	});

	it("adds the unmatched part of a hedge buy to its own leg", () => {
		const peak = replayPeakExposure({
			startMs: 0,
			endMs: 1_000,
			history: [
				historyRecord(TradeSide.Buy, "Up", "10", "0.5", 10),
				historyRecord(TradeSide.Buy, "Down", "30", "0.4", 20),
			],
			closed: [],
			open: [],
		});
		expect(peak.toString()).toBe("8");
	});

	it("never lets a sell push a leg below zero", () => {
		const peak = replayPeakExposure({
			startMs: 0,
			endMs: 1_000,
			history: [
				historyRecord(TradeSide.Sell, "Up", "5", "0.5", 10),
				historyRecord(TradeSide.Buy, "Up", "4", "0.5", 20),
			],
			closed: [],
			open: [],
		});
		expect(peak.toString()).toBe("2");
	});

	it("seeds hedge records under the outcome that was held", () => {
		const hedge: ClosedPositionRecord = {
			tokenId: tokenId("tok-Up"),
			marketId: MKT,
			outcome: "Up → Down",
			title: "",
			size: d("10"),
			entryPrice: d("0.6"),
			exitPrice: d("0.6"),
			realizedPnl: d("0"),
			openedAtMs: 50,
			closedAtMs: 150,
			kind: CloseKind.HedgeClose,
		};
		const peak = replayPeakExposure({
			startMs: 100,
			endMs: 1_000,
			history: [historyRecord(TradeSide.Sell, "Up", "10", "0.6", 150)],
			closed: [hedge],
			open: [],
		});
		expect(peak.toString()).toBe("6");
	});

	it("rebuilds the window start from earlier fills", () => {
		const peak = replayPeakExposure({
			startMs: 100,
			endMs: 300,
			history: [
				historyRecord(TradeSide.Buy, "Up", "10", "0.5", 50),
				historyRecord(TradeSide.Buy, "Up", "10", "0.5", 150),
				historyRecord(TradeSide.Buy, "Up", "90", "0.5", 500),
			],
			closed: [],
			open: [],
		});
		expect(peak.toString()).toBe("10");
	});

	it("rewinds a position older than the retained history by its later fills", () => {
		const position: Position = {
			tokenId: tokenId("tok-Up"),
			marketId: MKT,
			outcome: "Up",
			netSize: d("20"),
			avgEntryPrice: d("0.5"),
			openedAtMs: 10,
			lastUpdateMs: 150,
			title: "",
			displayName: "Up",
		};
		const peak = replayPeakExposure({
			startMs: 100,
			endMs: 300,
			history: [historyRecord(TradeSide.Buy, "Up", "10", "0.5", 150)],
			closed: [],
			open: [position],
		});
		expect(peak.toString()).toBe("10");
	});
});
