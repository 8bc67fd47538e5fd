import { describe, expect, it } from "vitest";
import { accountKey, marketId, tokenId } from "./identifiers.js";

describe("branded identifiers", () => {
	it("trims and keeps the raw string", () => {
		expect(marketId("  0xmarket ")).toBe("0xmarket");
		expect(tokenId("123456")).toBe("123456");
	});

	it("accepts numeric chat ids as account keys", () => {
		expect(accountKey(-100123)).toBe("-100123");
	});

	it("rejects empty values", () => {
		expect(() => marketId("   ")).toThrow("MarketId cannot be empty");
		expect(() => tokenId("")).toThrow("TokenId cannot be empty");
		expect(() => accountKey("")).toThrow("AccountKey cannot be empty");
	});
});
