/**
 * Copy sizing types.
 */

import type { Decimal } from "../shared/decimal.js";

export interface SizingInput {
	/** Size of the watched account's fill, in shares */
	readonly size: Decimal;
	/** Fill price in (0, 1] */
	readonly price: Decimal;
}

export interface CopySizing {
	readonly size: Decimal; // Shares to copy
	readonly value: Decimal; // size × price, in settlement currency
	readonly capped: boolean; // True when the notional cap reduced the size
}

export interface CopySizer {
	readonly name: string;
	size(input: SizingInput): CopySizing;
}
