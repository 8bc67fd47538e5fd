/**
 * Decimal: immutable money type for prices, sizes and P&L.
 *
 * Backed by decimal.js-light with 40 significant digits. Nothing outside this
 * file imports decimal.js-light directly; ledger code only sees this facade.
 */

import { Decimal as DecimalJs } from "decimal.js-light";

DecimalJs.set({ precision: 40 });

export class Decimal {
	private readonly raw: DecimalJs;

	private constructor(raw: DecimalJs) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * @throws Error on a non-finite number or an empty/unparseable string
	 * @example Decimal.from("0.55")
	 */
	static from(value: string | number): Decimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`Decimal.from: invalid number ${value}`);
			}
			return new Decimal(new DecimalJs(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("Decimal.from: empty string");
		}
		return new Decimal(new DecimalJs(trimmed));
	}

	static zero(): Decimal {
		return new Decimal(new DecimalJs(0));
	}

	static one(): Decimal {
		return new Decimal(new DecimalJs(1));
	}

	/** Sum of a list; zero for an empty list. */
	static sum(values: Iterable<Decimal>): Decimal {
		let total = Decimal.zero();
		for (const v of values) {
			total = total.add(v);
		}
		return total;
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: Decimal): Decimal {
		return new Decimal(this.raw.plus(other.raw));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.raw.minus(other.raw));
	}

	mul(other: Decimal): Decimal {
		return new Decimal(this.raw.times(other.raw));
	}

	/** @throws Error when dividing by zero */
	div(other: Decimal): Decimal {
		if (other.raw.isZero()) {
			throw new Error("Decimal.div: division by zero");
		}
		return new Decimal(this.raw.dividedBy(other.raw));
	}

	neg(): Decimal {
		return new Decimal(this.raw.negated());
	}

	abs(): Decimal {
		return new Decimal(this.raw.absoluteValue());
	}

	/** -1, 0 or 1 */
	sign(): -1 | 0 | 1 {
		if (this.raw.isZero()) return 0;
		return this.raw.isNegative() ? -1 : 1;
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: Decimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: Decimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: Decimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: Decimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: Decimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	static min(a: Decimal, b: Decimal): Decimal {
		return a.lte(b) ? a : b;
	}

	static max(a: Decimal, b: Decimal): Decimal {
		return a.gte(b) ? a : b;
	}

	// ── Conversion ─────────────────────────────────────────────────

	/** Lossy; for display and test tolerances only. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	/**
	 * Plain (non-exponential) notation without trailing zeros. Round-trips
	 * exactly through `Decimal.from`.
	 * @example Decimal.from("1.500").toString() // "1.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	toJSON(): string {
		return this.toString();
	}
}
