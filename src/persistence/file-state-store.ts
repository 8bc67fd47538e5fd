/**
 * FileStateStore: one JSON document at a fixed path, replaced atomically.
 */

import type { PersistenceError } from "../shared/errors.js";
import { persistenceFailure, readIfExists, writeAtomic } from "./atomic-file.js";
import type { StateStore } from "./state-store.js";

export interface FileStateStoreConfig {
	readonly path: string;
}

export class FileStateStore implements StateStore {
	readonly path: string;

	private constructor(config: FileStateStoreConfig) {
		this.path = config.path;
	}

	static create(config: FileStateStoreConfig): FileStateStore {
		return new FileStateStore(config);
	}

	async read(): Promise<string | null> {
		try {
			return await readIfExists(this.path);
		} catch (err: unknown) {
			throw this.failure("read", err);
		}
	}

	async write(json: string): Promise<void> {
		try {
			await writeAtomic(this.path, json);
		} catch (err: unknown) {
			throw this.failure("write", err);
		}
	}

	private failure(operation: string, err: unknown): PersistenceError {
		return persistenceFailure("FileStateStore", operation, this.path, err);
	}
}
