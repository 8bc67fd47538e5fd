/**
 * FileLedgerStore: one `<account>.json` file per account in a directory.
 *
 * Writes go to a temporary file that is renamed over the target, so a crash
 * mid-write leaves the previous snapshot intact. Account keys are
 * URI-encoded into file names.
 */

import { readdir, unlink } from "node:fs/promises";
import { join } from "node:path";
import type { PersistenceError } from "../shared/errors.js";
import { type AccountKey, accountKey } from "../shared/identifiers.js";
import { isNodeError, persistenceFailure, readIfExists, writeAtomic } from "./atomic-file.js";
import type { LedgerStore } from "./ledger-store.js";

const EXTENSION = ".json";

export interface FileLedgerStoreConfig {
	readonly directory: string;
}

export class FileLedgerStore implements LedgerStore {
	private readonly directory: string;

	private constructor(config: FileLedgerStoreConfig) {
		this.directory = config.directory;
	}

	static create(config: FileLedgerStoreConfig): FileLedgerStore {
		return new FileLedgerStore(config);
	}

	/** Snapshot path for an account. */
	pathFor(key: AccountKey): string {
		return join(this.directory, `${encodeURIComponent(key)}${EXTENSION}`);
	}

	async read(key: AccountKey): Promise<string | null> {
		const path = this.pathFor(key);
		try {
			return await readIfExists(path);
		} catch (err: unknown) {
			throw failure("read", path, err);
		}
	}

	async write(key: AccountKey, json: string): Promise<void> {
		const path = this.pathFor(key);
		try {
			await writeAtomic(path, json);
		} catch (err: unknown) {
			throw failure("write", path, err);
		}
	}

	async remove(key: AccountKey): Promise<void> {
		const path = this.pathFor(key);
		try {
			await unlink(path);
		} catch (err: unknown) {
			if (isNodeError(err) && err.code === "ENOENT") {
				return;
			}
			throw failure("remove", path, err);
		}
	}

	async keys(): Promise<readonly AccountKey[]> {
		let names: string[];
		try {
			names = await readdir(this.directory);
		} catch (err: unknown) {
			if (isNodeError(err) && err.code === "ENOENT") {
				return [];
			}
			throw failure("list", this.directory, err);
		}
		return names
			.filter((name) => name.endsWith(EXTENSION))
			.map((name) => accountKey(decodeURIComponent(name.slice(0, -EXTENSION.length))));
	}
}

function failure(operation: string, path: string, err: unknown): PersistenceError {
	return persistenceFailure("FileLedgerStore", operation, path, err);
}
