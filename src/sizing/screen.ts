/**
 * Trade screening: rejects fills the ledger must never see.
 */

import type { Trade } from "../ledger/types.js";
import { Decimal } from "../shared/decimal.js";
import { type Result, err, ok } from "../shared/result.js";
import { isTradeSide } from "../shared/trade-side.js";

/**
 * @returns the trade unchanged, or the reason it was rejected
 * @example screenTrade(trade) // err("price must be <= 1, got 1.2")
 */
export function screenTrade(trade: Trade): Result<Trade, string> {
	if (trade.marketId.length === 0 || trade.tokenId.length === 0) {
		return err("missing market or token id");
	}
	if (!isTradeSide(trade.side)) {
		return err(`unknown side ${String(trade.side)}`);
	}
	if (!trade.size.isPositive()) {
		return err(`size must be > 0, got ${trade.size.toString()}`);
	}
	if (!trade.price.isPositive()) {
		return err(`price must be > 0, got ${trade.price.toString()}`);
	}
	if (trade.price.gt(Decimal.one())) {
		return err(`price must be <= 1, got ${trade.price.toString()}`);
	}
	return ok(trade);
}
