/**
 * MemoryLedgerStore: snapshots kept in a Map, for tests and dry runs.
 */

import type { AccountKey } from "../shared/identifiers.js";
import type { LedgerStore } from "./ledger-store.js";

export class MemoryLedgerStore implements LedgerStore {
	private readonly docs = new Map<AccountKey, string>();
	private writes = 0;

	async read(key: AccountKey): Promise<string | null> {
		return this.docs.get(key) ?? null;
	}

	async write(key: AccountKey, json: string): Promise<void> {
		this.docs.set(key, json);
		this.writes += 1;
	}

	async remove(key: AccountKey): Promise<void> {
		this.docs.delete(key);
	}

	async keys(): Promise<readonly AccountKey[]> {
		return [...this.docs.keys()];
	}

	/** Number of successful writes since creation. */
	get writeCount(): number {
		return this.writes;
	}
}
