/**
 * The engine and the deduplicator ask a Clock for "now" so tests can pin it.
 * The ledger never reads a clock: records carry the fill or resolution time.
 */

export interface Clock {
	/** Epoch milliseconds. */
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Clock that only moves when a test moves it. */
export class FakeClock implements Clock {
	private currentMs: number;

	constructor(startMs = 0) {
		this.currentMs = startMs;
	}

	now(): number {
		return this.currentMs;
	}

	advance(ms: number): void {
		this.currentMs += ms;
	}

	set(ms: number): void {
		this.currentMs = ms;
	}
}
