/**
 * Domain primitive identifiers: branded types for compile-time safety.
 *
 * Each identifier wraps a string with a unique brand, so a MarketId can never
 * be passed where a TokenId or an AccountKey is expected.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Exchange market (condition) identifier shared by both outcome tokens. */
export type MarketId = Brand<string, "MarketId">;
/** Identifier of one outcome token of a market. */
export type TokenId = Brand<string, "TokenId">;
/** External account key (chat or session id) that owns one ledger. */
export type AccountKey = Brand<string, "AccountKey">;

// ── Factory functions with validation ────────────────────────────────

function createBrandedId<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/** Create a validated MarketId from a raw string. Throws if empty. */
export function marketId(value: string): MarketId {
	return createBrandedId(value, "MarketId");
}

/** Create a validated TokenId from a raw string. Throws if empty. */
export function tokenId(value: string): TokenId {
	return createBrandedId(value, "TokenId");
}

/** Create a validated AccountKey from a raw string (numeric chat ids are accepted). Throws if empty. */
export function accountKey(value: string | number): AccountKey {
	return createBrandedId(String(value), "AccountKey");
}
