/**
 * LedgerRegistry: one PositionLedger per account key, loaded lazily and
 * saved after every mutation.
 *
 * All work on one key runs through a promise chain, so loads, mutations and
 * saves for an account never interleave. Different keys never wait on each
 * other. A failed save is reported on the outcome; the in-memory ledger keeps
 * the mutation and the next successful save persists it.
 */

import {
	type LedgerOptions,
	PositionLedger,
	type PositionEvent,
	type ResolutionEvent,
	type ResolutionResult,
	type Trade,
	deserializeLedger,
	serializeLedger,
} from "../ledger/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { LedgerStore } from "../persistence/ledger-store.js";
import type { Decimal } from "../shared/decimal.js";
import { PersistenceError } from "../shared/errors.js";
import type { AccountKey } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

export interface LedgerRegistryConfig {
	readonly store: LedgerStore;
	readonly logger?: Logger;
	readonly maxClosedPositions?: number;
	readonly maxTradeHistory?: number;
}

/** What a mutation returned, plus the error of the save that followed it, if any. */
export interface MutationOutcome<T> {
	readonly value: T;
	readonly saveError: PersistenceError | null;
}

export class LedgerRegistry {
	private readonly store: LedgerStore;
	private readonly logger: Logger;
	private readonly ledgerOptions: Omit<LedgerOptions, "logger">;
	private readonly ledgers = new Map<AccountKey, PositionLedger>();
	private readonly locks = new Map<AccountKey, Promise<void>>();

	private constructor(config: LedgerRegistryConfig) {
		this.store = config.store;
		this.logger = (config.logger ?? silentLogger()).child({ component: "registry" });
		this.ledgerOptions = {
			maxClosedPositions: config.maxClosedPositions,
			maxTradeHistory: config.maxTradeHistory,
		};
	}

	static create(config: LedgerRegistryConfig): LedgerRegistry {
		return new LedgerRegistry(config);
	}

	// ── Mutations ──────────────────────────────────────────────────

	/**
	 * Runs `fn` against the account's ledger and saves the result.
	 * @returns Err when the ledger could not be loaded; a save failure is `saveError`
	 */
	mutate<T>(key: AccountKey, fn: (ledger: PositionLedger) => T): Promise<Result<MutationOutcome<T>, PersistenceError>> {
		return this.withLock(key, async (): Promise<Result<MutationOutcome<T>, PersistenceError>> => {
			const loaded = await this.load(key);
			if (!loaded.ok) return loaded;
			const value = fn(loaded.value);
			const saveError = await this.save(key, loaded.value);
			return ok({ value, saveError });
		});
	}

	applyTrade(
		key: AccountKey,
		trade: Trade,
		copySize: Decimal,
	): Promise<Result<MutationOutcome<PositionEvent[]>, PersistenceError>> {
		return this.mutate(key, (ledger) => ledger.applyTrade(trade, copySize));
	}

	applyResolution(
		key: AccountKey,
		event: ResolutionEvent,
	): Promise<Result<MutationOutcome<ResolutionResult>, PersistenceError>> {
		return this.mutate(key, (ledger) => ledger.applyResolution(event));
	}

	/** Clears the account's ledger and persists the empty state. */
	reset(key: AccountKey): Promise<Result<MutationOutcome<void>, PersistenceError>> {
		return this.mutate(key, (ledger) => ledger.reset());
	}

	// ── Reads ──────────────────────────────────────────────────────

	/** Runs a read against the account's ledger, in order with its mutations. */
	view<T>(key: AccountKey, fn: (ledger: PositionLedger) => T): Promise<Result<T, PersistenceError>> {
		return this.withLock(key, async (): Promise<Result<T, PersistenceError>> => {
			const loaded = await this.load(key);
			if (!loaded.ok) return loaded;
			return ok(fn(loaded.value));
		});
	}

	/** Accounts with a stored snapshot or a ledger in memory. */
	async accounts(): Promise<Result<readonly AccountKey[], PersistenceError>> {
		let stored: readonly AccountKey[];
		try {
			stored = await this.store.keys();
		} catch (e: unknown) {
			return err(toPersistenceError(e, "Listing ledger snapshots failed", {}));
		}
		return ok([...new Set([...stored, ...this.ledgers.keys()])]);
	}

	/** Accounts whose ledger is loaded in memory. */
	loaded(): readonly AccountKey[] {
		return [...this.ledgers.keys()];
	}

	/** Whether a read or mutation for the account is queued or running. */
	busy(key: AccountKey): boolean {
		return this.locks.has(key);
	}

	// ── Internal ───────────────────────────────────────────────────

	private withLock<T>(key: AccountKey, task: () => Promise<T>): Promise<T> {
		const prev = this.locks.get(key) ?? Promise.resolve();
		const run = prev.then(task);
		const tail = run.then(
			() => undefined,
			() => undefined,
		);
		this.locks.set(key, tail);
		// Last one out drops the entry so idle accounts hold no chain.
		return run.finally(() => {
			if (this.locks.get(key) === tail) this.locks.delete(key);
		});
	}

	private async load(key: AccountKey): Promise<Result<PositionLedger, PersistenceError>> {
		const cached = this.ledgers.get(key);
		if (cached) return ok(cached);

		let json: string | null;
		try {
			json = await this.store.read(key);
		} catch (e: unknown) {
			const error = toPersistenceError(e, `Reading ledger for ${key} failed`, { account: key });
			this.logger.error({ account: key, err: error }, "ledger load failed");
			return err(error);
		}

		const options: LedgerOptions = {
			...this.ledgerOptions,
			logger: this.logger.child({ component: "ledger", account: key }),
		};

		if (json === null) {
			const ledger = PositionLedger.create(options);
			this.ledgers.set(key, ledger);
			this.logger.debug({ account: key }, "ledger created");
			return ok(ledger);
		}

		const restored = deserializeLedger(json, options);
		if (!restored.ok) {
			const error = new PersistenceError(`Ledger snapshot for ${key} is invalid: ${restored.error.summary()}`, {
				account: key,
				cause: restored.error,
			});
			this.logger.error({ account: key, issues: restored.error.issues.length }, "ledger snapshot invalid");
			return err(error);
		}
		this.ledgers.set(key, restored.value);
		this.logger.debug({ account: key }, "ledger loaded");
		return ok(restored.value);
	}

	private async save(key: AccountKey, ledger: PositionLedger): Promise<PersistenceError | null> {
		try {
			await this.store.write(key, serializeLedger(ledger));
			return null;
		} catch (e: unknown) {
			const error = toPersistenceError(e, `Saving ledger for ${key} failed`, { account: key });
			this.logger.error({ account: key, err: error }, "ledger save failed");
			return error;
		}
	}
}

function toPersistenceError(e: unknown, message: string, context: Record<string, unknown>): PersistenceError {
	if (e instanceof PersistenceError) return e;
	const detail = e instanceof Error ? e.message : String(e);
	return new PersistenceError(`${message}: ${detail}`, { ...context, cause: e });
}
