/**
 * Parsing of raw trade activity as served by the exchange's data API.
 *
 * Timestamps arrive in epoch seconds; sizes and prices as numbers or numeric
 * strings. Feed implementations map each activity through `parseActivity`.
 */

import type { Trade } from "../ledger/types.js";
import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { marketId, tokenId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { TradeSide } from "../shared/trade-side.js";

const numeric = z
	.union([z.number().finite(), z.string().trim().regex(/^-?\d+(\.\d+)?$/, "expected a number")])
	.transform((value) => Decimal.from(value));

export const activitySchema = z
	.object({
		transactionHash: z.string().trim().min(1),
		timestamp: z.number().int().nonnegative(),
		market: z.string().trim().min(1),
		asset: z.string().trim().min(1),
		outcome: z.string(),
		side: z.enum([TradeSide.Buy, TradeSide.Sell]),
		size: numeric,
		price: numeric,
		title: z.string().default(""),
	})
	.transform(
		(a): Trade => ({
			transactionHash: a.transactionHash,
			timestampMs: a.timestamp * 1000,
			marketId: marketId(a.market),
			tokenId: tokenId(a.asset),
			outcome: a.outcome,
			side: a.side,
			size: a.size,
			price: a.price,
			title: a.title,
		}),
	);

export function parseActivity(raw: unknown): Result<Trade, ValidationError> {
	return validate(activitySchema, raw, "Invalid trade activity");
}
