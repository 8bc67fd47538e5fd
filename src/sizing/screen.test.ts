import { describe, expect, it } from "vitest";
import type { Trade } from "../ledger/types.js";
import { Decimal } from "../shared/decimal.js";
import { marketId, tokenId } from "../shared/identifiers.js";
import { TradeSide } from "../shared/trade-side.js";
import { screenTrade } from "./screen.js";

const d = Decimal.from;

const base: Trade = {
	transactionHash: "0xabc",
	timestampMs: 1000,
	marketId: marketId("mkt-1"),
	tokenId: tokenId("tok-1"),
	outcome: "Up",
	side: TradeSide.Buy,
	size: d("10"),
	price: d("0.5"),
	title: "Test market",
};

describe("screenTrade", () => {
	it("passes a well-formed trade through", () => {
		expect(screenTrade(base)).toEqual({ ok: true, value: base });
	});

	it("accepts a price of exactly 1", () => {
		expect(screenTrade({ ...base, price: d("1") }).ok).toBe(true);
	});

	const rejections: ReadonlyArray<[Partial<Trade>, string]> = [
		[{ size: d("0") }, "size must be > 0, got 0"],
		[{ size: d("-1") }, "size must be > 0, got -1"],
		[{ price: d("0") }, "price must be > 0, got 0"],
		[{ price: d("1.2") }, "price must be <= 1, got 1.2"],
	];

	it.each(rejections)("rejects %o", (patch, reason) => {
		expect(screenTrade({ ...base, ...patch })).toEqual({ ok: false, error: reason });
	});
});
