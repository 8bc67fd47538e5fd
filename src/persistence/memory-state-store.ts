import type { StateStore } from "./state-store.js";

/** StateStore held in memory, for tests and dry runs. */
export class MemoryStateStore implements StateStore {
	private doc: string | null;

	constructor(initial: string | null = null) {
		this.doc = initial;
	}

	async read(): Promise<string | null> {
		return this.doc;
	}

	async write(json: string): Promise<void> {
		this.doc = json;
	}
}
