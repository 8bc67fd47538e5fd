/**
 * TradeDeduplicator: admits each transaction hash once.
 *
 * Remembers up to `maxSeen` hashes (oldest forgotten first) and the newest
 * admitted timestamp, which is the cursor for the next feed poll. Polls ask
 * for trades at or after the cursor, so the newest trades are fetched again
 * and rejected here.
 */

import type { Trade } from "../ledger/types.js";
import { ValidationError, validate, z } from "../lib/validation/index.js";
import { type Result, err } from "../shared/result.js";

const DEFAULT_MAX_SEEN = 10_000;

export interface TradeDeduplicatorConfig {
	/** Cursor before any trade is admitted */
	readonly startMs: number;
	readonly maxSeen?: number;
}

export interface DeduplicatorState {
	readonly cursorMs: number;
	readonly hashes: readonly string[];
}

export const deduplicatorStateSchema = z.object({
	cursorMs: z.number().int().nonnegative(),
	hashes: z.array(z.string().min(1)),
});

/** Parses a saved `toState()` document. */
export function parseDeduplicatorState(json: string): Result<DeduplicatorState, ValidationError> {
	let data: unknown;
	try {
		data = JSON.parse(json);
	} catch (e: unknown) {
		const message = e instanceof Error ? e.message : String(e);
		return err(new ValidationError("Invalid copy state", [{ path: [], message }]));
	}
	return validate(deduplicatorStateSchema, data, "Invalid copy state");
}

export class TradeDeduplicator {
	private readonly seen = new Set<string>();
	private readonly maxSeen: number;
	private cursor: number;

	private constructor(startMs: number, maxSeen: number) {
		this.cursor = startMs;
		this.maxSeen = maxSeen;
	}

	static create(config: TradeDeduplicatorConfig): TradeDeduplicator {
		return new TradeDeduplicator(config.startMs, config.maxSeen ?? DEFAULT_MAX_SEEN);
	}

	static restore(state: DeduplicatorState, maxSeen = DEFAULT_MAX_SEEN): TradeDeduplicator {
		const dedup = new TradeDeduplicator(state.cursorMs, maxSeen);
		for (const hash of state.hashes) {
			dedup.remember(hash);
		}
		return dedup;
	}

	/** False for an empty or already-admitted hash. */
	admit(trade: Pick<Trade, "transactionHash" | "timestampMs">): boolean {
		if (trade.transactionHash.length === 0 || this.seen.has(trade.transactionHash)) {
			return false;
		}
		this.remember(trade.transactionHash);
		if (trade.timestampMs > this.cursor) {
			this.cursor = trade.timestampMs;
		}
		return true;
	}

	cursorMs(): number {
		return this.cursor;
	}

	get size(): number {
		return this.seen.size;
	}

	toState(): DeduplicatorState {
		return { cursorMs: this.cursor, hashes: [...this.seen] };
	}

	private remember(hash: string): void {
		this.seen.add(hash);
		if (this.seen.size <= this.maxSeen) return;
		for (const oldest of this.seen) {
			this.seen.delete(oldest);
			if (this.seen.size <= this.maxSeen) break;
		}
	}
}
