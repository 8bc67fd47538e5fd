import { describe, expect, it } from "vitest";
import { Decimal } from "./decimal.js";

const d = Decimal.from;

describe("Decimal", () => {
	describe("factory methods", () => {
		it("creates from string and number", () => {
			expect(d("1.5").toString()).toBe("1.5");
			expect(d(100).toString()).toBe("100");
			expect(d("-0.25").toString()).toBe("-0.25");
		});

		it("zero and one constants", () => {
			expect(Decimal.zero().toString()).toBe("0");
			expect(Decimal.one().toString()).toBe("1");
		});

		it("rejects invalid inputs", () => {
			expect(() => d("")).toThrow("empty string");
			expect(() => d(Number.NaN)).toThrow("invalid number");
			expect(() => d(Number.POSITIVE_INFINITY)).toThrow("invalid number");
		});

		it("sums an iterable", () => {
			expect(Decimal.sum([d("0.1"), d("0.2"), d("0.3")]).toString()).toBe("0.6");
			expect(Decimal.sum([]).isZero()).toBe(true);
		});
	});

	describe("arithmetic", () => {
		it("has no binary float error on cents", () => {
			expect(d("0.1").add(d("0.2")).toString()).toBe("0.3");
			expect(d("1").sub(d("0.55")).sub(d("0.40")).toString()).toBe("0.05");
		});

		it("multiplies and divides", () => {
			expect(d("15").mul(d("0.6")).toString()).toBe("9");
			expect(d("9.5").div(d("15")).toFixed(4)).toBe("0.6333");
		});

		it("throws on division by zero", () => {
			expect(() => d("1").div(Decimal.zero())).toThrow("division by zero");
		});

		it("negates and takes absolute value", () => {
			expect(d("5").neg().toString()).toBe("-5");
			expect(d("-5").abs().toString()).toBe("5");
		});
	});

	describe("sign and comparison", () => {
		it("reports the sign", () => {
			expect(d("-3").sign()).toBe(-1);
			expect(Decimal.zero().sign()).toBe(0);
			expect(d("0.000001").sign()).toBe(1);
		});

		it("compares values", () => {
			expect(d("0.5").gt(d("0.4"))).toBe(true);
			expect(d("0.5").gte(d("0.5"))).toBe(true);
			expect(d("0.4").lt(d("0.5"))).toBe(true);
			expect(d("0.5").lte(d("0.5"))).toBe(true);
			expect(d("0.50").eq(d("0.5"))).toBe(true);
		});

		it("min and max", () => {
			expect(Decimal.min(d("3"), d("7")).toString()).toBe("3");
			expect(Decimal.max(d("3"), d("7")).toString()).toBe("7");
		});
	});

	describe("conversion", () => {
		it("prints small values in plain notation", () => {
			expect(d("1e-7").toString()).toBe("0.0000001");
		});

		it("round-trips a long quotient through its string form", () => {
			const third = d("1").div(d("3"));
			expect(d(third.toString()).eq(third)).toBe(true);
		});

		it("serializes to JSON as a string", () => {
			expect(JSON.stringify({ price: d("0.65") })).toBe('{"price":"0.65"}');
		});

		it("toFixed rounds half up", () => {
			expect(d("2.345").toFixed(2)).toBe("2.35");
		});
	});
});
