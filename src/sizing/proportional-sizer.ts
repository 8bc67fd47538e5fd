/**
 * Proportional copy sizer.
 *
 * Copies `riskMultiplier` times the watched fill, capped so that one copy
 * never costs more than `maxTradeUsdc`.
 */

import { Decimal } from "../shared/decimal.js";
import { type Result, err, ok } from "../shared/result.js";
import type { CopySizer, CopySizing, SizingInput } from "./types.js";

export interface ProportionalSizerConfig {
	readonly riskMultiplier: number;
	readonly maxTradeUsdc: number;
}

export class ProportionalSizer implements CopySizer {
	readonly name = "Proportional";
	private readonly multiplier: Decimal;
	private readonly maxValue: Decimal;

	private constructor(multiplier: Decimal, maxValue: Decimal) {
		this.multiplier = multiplier;
		this.maxValue = maxValue;
	}

	static create(config: ProportionalSizerConfig): Result<ProportionalSizer, Error> {
		if (!Number.isFinite(config.riskMultiplier) || config.riskMultiplier <= 0) {
			return err(new Error("ProportionalSizer.create: riskMultiplier must be > 0"));
		}
		if (!Number.isFinite(config.maxTradeUsdc) || config.maxTradeUsdc <= 0) {
			return err(new Error("ProportionalSizer.create: maxTradeUsdc must be > 0"));
		}
		return ok(new ProportionalSizer(Decimal.from(config.riskMultiplier), Decimal.from(config.maxTradeUsdc)));
	}

	size(input: SizingInput): CopySizing {
		if (!input.price.isPositive() || !input.size.isPositive()) {
			return { size: Decimal.zero(), value: Decimal.zero(), capped: false };
		}

		const desired = input.size.mul(this.multiplier);
		const desiredValue = desired.mul(input.price);
		if (desiredValue.gt(this.maxValue)) {
			return { size: this.maxValue.div(input.price), value: this.maxValue, capped: true };
		}
		return { size: desired, value: desiredValue, capped: false };
	}
}
