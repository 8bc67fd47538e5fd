/**
 * CopyEngine: mirrors the watched account's fills into every subscribed
 * account's ledger.
 *
 * Flow per poll: feed → dedup → screen → order placement (once, unless dry
 * run) → size per account → registry → notifier. Resolutions flow from the
 * detector into every account holding the market. Network calls never run
 * inside the registry lock: prices and resolutions are fetched first.
 */

import {
	type ClosedPositionRecord,
	type CurrentPriceMap,
	EPSILON,
	type Position,
	type PositionEvent,
	type ResolutionEvent,
	type ResolutionResult,
	type ResolvedPositionRecord,
	type Trade,
	formatPnl,
	formatPrice,
	formatSize,
} from "../ledger/index.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { StateStore } from "../persistence/state-store.js";
import type { LedgerRegistry } from "../registry/ledger-registry.js";
import type { CopySizer } from "../sizing/types.js";
import { ProportionalSizer } from "../sizing/proportional-sizer.js";
import { screenTrade } from "../sizing/screen.js";
import type { CopyConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigError, PersistenceError, type TradingError, classifyError } from "../shared/errors.js";
import type { AccountKey, MarketId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type {
	CopyOrder,
	Notification,
	Notifier,
	OrderPlacer,
	PriceSource,
	ResolutionDetector,
	TradeFeed,
} from "./ports.js";
import { TradeDeduplicator, parseDeduplicatorState } from "./trade-deduplicator.js";

// ── Types ───────────────────────────────────────────────────────────

export interface CopyEngineDeps {
	readonly registry: LedgerRegistry;
	readonly feed: TradeFeed;
	readonly orders: OrderPlacer;
	readonly notifier: Notifier;
	readonly resolutions: ResolutionDetector;
	readonly prices: PriceSource;
	readonly config: CopyConfig;
	/** Where the trade cursor and seen hashes survive restarts; none keeps them in memory */
	readonly stateStore?: StateStore;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export type CopyEngineEvents = {
	position: (account: AccountKey, event: PositionEvent) => void;
	resolution: (account: AccountKey, result: ResolutionResult, event: ResolutionEvent) => void;
	rejected: (trade: Trade, reason: string) => void;
	order_failed: (order: CopyOrder, error: TradingError) => void;
	persist_failed: (account: AccountKey, error: PersistenceError) => void;
	state_save_failed: (error: PersistenceError) => void;
};

export interface PollSummary {
	readonly fetched: number;
	readonly duplicates: number;
	readonly copied: number;
	readonly rejected: number;
}

export interface TradeOutcome {
	readonly copied: boolean;
	/** Accounts whose ledger took the trade */
	readonly accounts: number;
	readonly events: number;
}

export interface PortfolioSummary {
	readonly account: AccountKey;
	readonly positions: readonly Position[];
	readonly recentClosed: readonly ClosedPositionRecord[];
	readonly realizedPnl: Decimal;
	/** Null when prices could not be fetched */
	readonly unrealizedPnl: Decimal | null;
	readonly openExposure: Decimal;
}

const RECENT_CLOSED = 5;

export function resolutionMessage(record: ResolvedPositionRecord): string {
	const verdict = record.outcome === record.winningOutcome ? "WON" : "LOST";
	return `RESOLVED ${verdict} ${record.outcome} ${formatSize(record.size)} @ ${formatPrice(record.entryPrice)} payout $${record.payout.toFixed(2)} P&L ${formatPnl(record.realizedPnl)} | ${record.title}`;
}

// ── Engine ──────────────────────────────────────────────────────────

export class CopyEngine extends TypedEmitter<CopyEngineEvents> {
	private readonly deps: CopyEngineDeps;
	private readonly logger: Logger;
	private readonly defaultSizer: CopySizer;
	private readonly subscriptions = new Map<AccountKey, CopySizer>();
	private dedup: TradeDeduplicator;
	private stateLoaded: boolean;
	private readonly inFlight = new Set<Promise<void>>();

	private pollTimer: ReturnType<typeof setInterval> | null = null;
	private resolutionTimer: ReturnType<typeof setInterval> | null = null;
	private pollInProgress = false;
	private resolutionInProgress = false;

	private constructor(deps: CopyEngineDeps, defaultSizer: CopySizer) {
		super();
		this.deps = deps;
		this.defaultSizer = defaultSizer;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "copy-engine" });
		this.dedup = TradeDeduplicator.create({
			startMs: (deps.clock ?? SystemClock).now(),
			maxSeen: deps.config.maxSeenTrades,
		});
		this.stateLoaded = deps.stateStore === undefined;
	}

	/** @returns Err(ConfigError) when the sizing settings are invalid */
	static create(deps: CopyEngineDeps): Result<CopyEngine, ConfigError> {
		const sizer = ProportionalSizer.create({
			riskMultiplier: deps.config.riskMultiplier,
			maxTradeUsdc: deps.config.maxTradeUsdc,
		});
		if (!sizer.ok) {
			return err(new ConfigError(sizer.error.message, { cause: sizer.error }));
		}
		return ok(new CopyEngine(deps, sizer.value));
	}

	// ── Subscriptions ──────────────────────────────────────────────

	/** Starts copying into the account's ledger, with its own sizer or the configured one. */
	subscribe(account: AccountKey, sizer?: CopySizer): void {
		this.subscriptions.set(account, sizer ?? this.defaultSizer);
		this.logger.info({ account, sizer: (sizer ?? this.defaultSizer).name }, "account subscribed");
	}

	/** @returns false when the account was not subscribed */
	unsubscribe(account: AccountKey): boolean {
		const removed = this.subscriptions.delete(account);
		if (removed) this.logger.info({ account }, "account unsubscribed");
		return removed;
	}

	accounts(): readonly AccountKey[] {
		return [...this.subscriptions.keys()];
	}

	/** Cursor for the next feed poll. */
	cursorMs(): number {
		return this.dedup.cursorMs();
	}

	// ── Trade cursor ───────────────────────────────────────────────

	/**
	 * Restores the trade cursor and seen hashes from the state store. Called by
	 * the first `pollOnce`; an unreadable document is logged and replaced.
	 * @returns whether saved state was restored
	 */
	async loadState(): Promise<Result<boolean, PersistenceError>> {
		const store = this.deps.stateStore;
		if (store === undefined) return ok(false);

		let json: string | null;
		try {
			json = await store.read();
		} catch (e: unknown) {
			const error = toPersistenceError(e, "Reading copy state failed");
			this.logger.error({ err: error }, "copy state unavailable");
			return err(error);
		}
		this.stateLoaded = true;
		if (json === null) {
			this.logger.info({ cursorMs: this.dedup.cursorMs() }, "no saved copy state; starting fresh");
			return ok(false);
		}

		const state = parseDeduplicatorState(json);
		if (!state.ok) {
			this.logger.warn({ reason: state.error.summary() }, "saved copy state is invalid; starting fresh");
			return ok(false);
		}
		this.dedup = TradeDeduplicator.restore(state.value, this.deps.config.maxSeenTrades);
		this.logger.info({ cursorMs: state.value.cursorMs, hashes: this.dedup.size }, "copy state restored");
		return ok(true);
	}

	// ── Trades ─────────────────────────────────────────────────────

	/** Fetches new trades and processes them oldest first. */
	async pollOnce(): Promise<Result<PollSummary, TradingError>> {
		if (!this.stateLoaded) {
			const loaded = await this.loadState();
			if (!loaded.ok) return loaded;
		}

		const since = this.dedup.cursorMs();
		const fetched = await callPort(() => this.deps.feed.fetchTradesSince(since));
		if (!fetched.ok) {
			this.logger.warn({ since, err: fetched.error }, "trade feed poll failed");
			return fetched;
		}

		const ordered = [...fetched.value].sort((a, b) => a.timestampMs - b.timestampMs);
		const fresh = ordered.filter((trade) => this.dedup.admit(trade));

		let copied = 0;
		let rejected = 0;
		for (const trade of fresh) {
			const outcome = await this.processTrade(trade);
			if (outcome.copied) copied += 1;
			else rejected += 1;
			await this.saveState();
		}

		if (fresh.length > 0) {
			this.logger.info({ fetched: fetched.value.length, copied, rejected }, "poll processed");
		}
		return ok({
			fetched: fetched.value.length,
			duplicates: fetched.value.length - fresh.length,
			copied,
			rejected,
		});
	}

	/**
	 * Screens one trade, places the copy order and applies it to every
	 * subscribed ledger. Order placement runs in the background; `flush()`
	 * waits for it.
	 */
	async processTrade(trade: Trade): Promise<TradeOutcome> {
		const screened = screenTrade(trade);
		if (!screened.ok) {
			this.logger.warn({ transactionHash: trade.transactionHash, reason: screened.error }, "trade rejected");
			this.emit("rejected", trade, screened.error);
			return { copied: false, accounts: 0, events: 0 };
		}

		this.logger.info(
			{
				transactionHash: trade.transactionHash,
				marketId: trade.marketId,
				outcome: trade.outcome,
				side: trade.side,
				size: trade.size.toString(),
				price: trade.price.toString(),
			},
			"new trade",
		);

		this.placeCopyOrder(trade);

		let accounts = 0;
		let events = 0;
		for (const [account, sizer] of this.subscriptions) {
			const sizing = sizer.size(trade);
			if (sizing.size.lte(EPSILON)) continue;

			const applied = await this.deps.registry.applyTrade(account, trade, sizing.size);
			if (!applied.ok) {
				this.logger.error({ account, err: applied.error }, "ledger unavailable; trade not recorded");
				this.emit("persist_failed", account, applied.error);
				continue;
			}
			if (applied.value.saveError) {
				this.emit("persist_failed", account, applied.value.saveError);
			}

			accounts += 1;
			for (const event of applied.value.value) {
				events += 1;
				this.emit("position", account, event);
				await this.notify(account, { type: "position", event });
			}
		}

		return { copied: true, accounts, events };
	}

	// ── Resolutions ────────────────────────────────────────────────

	/**
	 * Settles the market in every subscribed ledger holding it.
	 * @returns the P&L applied across all accounts
	 */
	async applyResolution(event: ResolutionEvent): Promise<Decimal> {
		let total = Decimal.zero();
		for (const account of this.subscriptions.keys()) {
			const holds = await this.deps.registry.view(account, (ledger) =>
				ledger.openMarkets().includes(event.marketId),
			);
			if (!holds.ok) {
				this.emit("persist_failed", account, holds.error);
				continue;
			}
			if (!holds.value) continue;

			const applied = await this.deps.registry.applyResolution(account, event);
			if (!applied.ok) {
				this.emit("persist_failed", account, applied.error);
				continue;
			}
			if (applied.value.saveError) {
				this.emit("persist_failed", account, applied.value.saveError);
			}

			const result = applied.value.value;
			if (result.resolved.length === 0) continue;
			total = total.add(result.totalPnl);
			this.emit("resolution", account, result, event);
			for (const record of result.resolved) {
				await this.notify(account, { type: "resolution", record, humanMessage: resolutionMessage(record) });
			}
		}
		return total;
	}

	/**
	 * Asks the detector about every market with an open position.
	 * @returns the number of resolution events applied
	 */
	async checkResolutions(): Promise<Result<number, TradingError>> {
		const markets = new Set<MarketId>();
		for (const account of this.subscriptions.keys()) {
			const open = await this.deps.registry.view(account, (ledger) => ledger.openMarkets());
			if (!open.ok) {
				this.emit("persist_failed", account, open.error);
				continue;
			}
			for (const market of open.value) markets.add(market);
		}
		if (markets.size === 0) return ok(0);

		const detected = await callPort(() => this.deps.resolutions.detect([...markets]));
		if (!detected.ok) {
			this.logger.warn({ markets: markets.size, err: detected.error }, "resolution check failed");
			return detected;
		}

		for (const event of detected.value) {
			const pnl = await this.applyResolution(event);
			this.logger.info(
				{ marketId: event.marketId, winningOutcome: event.winningOutcome, pnl: pnl.toString() },
				"resolution applied",
			);
		}
		return ok(detected.value.length);
	}

	// ── Reporting ──────────────────────────────────────────────────

	/** Open positions with realized and mark-to-market P&L. */
	async portfolio(account: AccountKey): Promise<Result<PortfolioSummary, PersistenceError>> {
		// Read twice on purpose: the price fetch must not run inside the account lock.
		const tokens = await this.deps.registry.view(account, (ledger) =>
			ledger.openPositions().map((p) => p.tokenId),
		);
		if (!tokens.ok) return tokens;

		let quotes: Result<CurrentPriceMap, TradingError> | null = null;
		if (tokens.value.length > 0) {
			quotes = await callPort(() => this.deps.prices.prices(tokens.value));
			if (!quotes.ok) {
				this.logger.warn({ account, err: quotes.error }, "price fetch failed; unrealized P&L unavailable");
			}
		}
		const prices = quotes;

		return this.deps.registry.view(account, (ledger) => {
			let unrealizedPnl: Decimal | null = Decimal.zero();
			if (prices !== null) unrealizedPnl = prices.ok ? ledger.unrealizedPnl(prices.value) : null;
			return {
				account,
				positions: ledger.openPositions(),
				recentClosed: ledger.recentClosed(RECENT_CLOSED),
				realizedPnl: ledger.realizedPnl(),
				unrealizedPnl,
				openExposure: ledger.openExposure(),
			};
		});
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/** Polls the feed and checks resolutions on the configured intervals. */
	start(): void {
		if (this.pollTimer !== null) return;
		this.pollTimer = setInterval(() => this.track(this.runPoll()), this.deps.config.pollIntervalMs);
		this.resolutionTimer = setInterval(
			() => this.track(this.runResolutionCheck()),
			this.deps.config.resolutionCheckIntervalMs,
		);
		this.logger.info(
			{ dryRun: this.deps.config.dryRun, accounts: this.subscriptions.size },
			"copy engine started",
		);
	}

	stop(): void {
		if (this.pollTimer !== null) clearInterval(this.pollTimer);
		if (this.resolutionTimer !== null) clearInterval(this.resolutionTimer);
		this.pollTimer = null;
		this.resolutionTimer = null;
		this.logger.info("copy engine stopped");
	}

	isRunning(): boolean {
		return this.pollTimer !== null;
	}

	/** Waits for background order placements and timer runs to settle. */
	async flush(): Promise<void> {
		while (this.inFlight.size > 0) {
			await Promise.all([...this.inFlight]);
		}
	}

	// ── Internal ───────────────────────────────────────────────────

	private async saveState(): Promise<void> {
		const store = this.deps.stateStore;
		if (store === undefined) return;
		try {
			await store.write(JSON.stringify(this.dedup.toState()));
		} catch (e: unknown) {
			const error = toPersistenceError(e, "Saving copy state failed");
			this.logger.error({ err: error }, "copy state not saved");
			this.emit("state_save_failed", error);
		}
	}

	private placeCopyOrder(trade: Trade): void {
		const sizing = this.defaultSizer.size(trade);
		if (this.deps.config.dryRun) {
			this.logger.info(
				{ size: sizing.size.toFixed(2), value: sizing.value.toFixed(2), capped: sizing.capped },
				"dry run; order not placed",
			);
			return;
		}
		if (sizing.size.lte(EPSILON)) return;

		const order: CopyOrder = {
			tokenId: trade.tokenId,
			marketId: trade.marketId,
			side: trade.side,
			size: sizing.size,
			price: trade.price,
			sourceTransactionHash: trade.transactionHash,
		};
		this.track(this.place(order));
	}

	private async place(order: CopyOrder): Promise<void> {
		const placed = await callPort(() => this.deps.orders.place(order));
		if (placed.ok) {
			this.logger.info(
				{ orderId: placed.value, side: order.side, size: order.size.toFixed(2), price: order.price.toFixed(4) },
				"order placed",
			);
			return;
		}
		this.logger.error({ err: placed.error, tokenId: order.tokenId }, "order failed");
		this.emit("order_failed", order, placed.error);
	}

	private async notify(account: AccountKey, notification: Notification): Promise<void> {
		const sent = await callPort(() => this.deps.notifier.notify(account, notification));
		if (!sent.ok) {
			this.logger.warn({ account, err: sent.error }, "notification failed");
		}
	}

	private async runPoll(): Promise<void> {
		if (this.pollInProgress) return;
		this.pollInProgress = true;
		try {
			await this.pollOnce();
		} catch (e: unknown) {
			this.logger.error({ err: classifyError(e) }, "poll crashed");
		} finally {
			this.pollInProgress = false;
		}
	}

	private async runResolutionCheck(): Promise<void> {
		if (this.resolutionInProgress) return;
		this.resolutionInProgress = true;
		try {
			await this.checkResolutions();
		} catch (e: unknown) {
			this.logger.error({ err: classifyError(e) }, "resolution check crashed");
		} finally {
			this.resolutionInProgress = false;
		}
	}

	private track(task: Promise<void>): void {
		const tracked = task
			.catch((e: unknown) => {
				this.logger.error({ err: classifyError(e) }, "background task failed");
			})
			.finally(() => {
				this.inFlight.delete(tracked);
			});
		this.inFlight.add(tracked);
	}
}

/** Runs a port call, turning anything it throws into a classified error. */
async function callPort<T>(call: () => Promise<Result<T, TradingError>>): Promise<Result<T, TradingError>> {
	try {
		return await call();
	} catch (e: unknown) {
		return err(classifyError(e));
	}
}

function toPersistenceError(e: unknown, message: string): PersistenceError {
	if (e instanceof PersistenceError) return e;
	return new PersistenceError(`${message}: ${classifyError(e).message}`, { cause: e });
}
