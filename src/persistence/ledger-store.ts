import type { AccountKey } from "../shared/identifiers.js";

/**
 * Durable storage for ledger snapshots, one JSON document per account.
 *
 * Implementations throw on I/O failure; the registry turns that into a
 * PersistenceError without touching the in-memory ledger.
 */
export interface LedgerStore {
	/** @returns the stored snapshot, or null when the account has none */
	read(key: AccountKey): Promise<string | null>;
	write(key: AccountKey, json: string): Promise<void>;
	/** Removing a missing key is not an error. */
	remove(key: AccountKey): Promise<void>;
	keys(): Promise<readonly AccountKey[]>;
}
