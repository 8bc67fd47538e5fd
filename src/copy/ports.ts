/**
 * Collaborators the copy engine consumes. Implementations live outside this
 * package (HTTP poller, exchange client, chat front end, resolution detector).
 *
 * Every port reports expected failures as `Result` errors; anything thrown is
 * classified with `classifyError` by the engine.
 */

import type {
	CurrentPriceMap,
	PositionEvent,
	ResolutionEvent,
	ResolvedPositionRecord,
	Trade,
} from "../ledger/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { AccountKey, MarketId, TokenId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { TradeSide } from "../shared/trade-side.js";

export interface TradeFeed {
	/** Fills of the watched account at or after `sinceMs`, in any order. */
	fetchTradesSince(sinceMs: number): Promise<Result<readonly Trade[], TradingError>>;
}

export interface CopyOrder {
	readonly tokenId: TokenId;
	readonly marketId: MarketId;
	readonly side: TradeSide;
	readonly size: Decimal;
	readonly price: Decimal;
	/** Hash of the watched fill this order copies */
	readonly sourceTransactionHash: string;
}

export interface OrderPlacer {
	/** @returns the exchange order id */
	place(order: CopyOrder): Promise<Result<string, TradingError>>;
}

export type Notification =
	| { readonly type: "position"; readonly event: PositionEvent }
	| { readonly type: "resolution"; readonly record: ResolvedPositionRecord; readonly humanMessage: string };

export interface Notifier {
	notify(account: AccountKey, notification: Notification): Promise<Result<void, TradingError>>;
}

export interface ResolutionDetector {
	/** Resolutions known for any of the markets; unresolved markets are omitted. */
	detect(marketIds: readonly MarketId[]): Promise<Result<readonly ResolutionEvent[], TradingError>>;
}

export interface PriceSource {
	/** Current prices; tokens without a quote are omitted. */
	prices(tokenIds: readonly TokenId[]): Promise<Result<CurrentPriceMap, TradingError>>;
}
