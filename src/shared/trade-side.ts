/**
 * TradeSide: direction of a fill, and binary-market outcome helpers.
 *
 * Every market has exactly two outcome labels ("Up"/"Down", "Yes"/"No").
 * The ledger never assumes which label is which; it only compares them.
 */

export const TradeSide = {
	Buy: "BUY",
	Sell: "SELL",
} as const;

export type TradeSide = (typeof TradeSide)[keyof typeof TradeSide];

/** Type guard for a raw side string coming off a feed. */
export function isTradeSide(value: string): value is TradeSide {
	return value === TradeSide.Buy || value === TradeSide.Sell;
}
