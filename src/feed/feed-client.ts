/**
 * FeedClient — one authenticated market-data session, wired end to end.
 *
 * Frames flow socket → SessionManager → FeedDispatcher → handlers →
 * MarketState and EventStore. The client also logs a status line every
 * `statusIntervalMs` and owns orderly shutdown.
 *
 * @example
 * ```ts
 * const created = await FeedClient.create({ config: { storeDir: "./data" } });
 * if (!created.ok) throw created.error;
 * const feed = created.value;
 * feed.start();
 * feed.subscribeOrderbook([instrumentId("KXCPI-26JAN-T0.3")]);
 * ```
 */

import { RequestSigner, loadCredentials } from "../auth/index.js";
import type { AnyFeedHandler, DispatcherStats, FeedHandler } from "../events/event-dispatcher.js";
import { FeedDispatcher } from "../events/event-dispatcher.js";
import type { FeedEventKind, FillEvent, TradeEvent } from "../events/feed-events.js";
import type { Logger } from "../lib/logger/index.js";
import { createLogger, toLogLevel } from "../lib/logger/index.js";
import type { PublishedOrderbook } from "../market/types.js";
import { EventStore } from "../persistence/event-store.js";
import { FileStorageBackend } from "../persistence/file-backend.js";
import { MemoryStorageBackend } from "../persistence/memory-backend.js";
import type {
	LatestTicker,
	QueryRange,
	RecordKind,
	StorageBackend,
	StoreStats,
	StoredRecordOf,
} from "../persistence/types.js";
import type { FeedConfig } from "../shared/config.js";
import { resolveFeedConfig } from "../shared/config.js";
import type { FeedError } from "../shared/errors.js";
import { classifyError } from "../shared/errors.js";
import type { InstrumentId, SubscriptionId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { SessionManager } from "../websocket/session-manager.js";
import type {
	HeaderSigner,
	SessionState,
	SessionStats,
	StateChange,
	WsClientFactory,
} from "../websocket/types.js";
import { registerFeedHandlers } from "./handlers.js";
import { MarketState } from "./market-state.js";
import { publishOrderbook } from "./orderbook-handler.js";

export interface FeedClientDeps {
	readonly config: FeedConfig;
	readonly signer: HeaderSigner;
	readonly backend: StorageBackend;
	readonly logger: Logger;
	readonly clientFactory?: WsClientFactory | undefined;
	readonly clock?: Clock | undefined;
	readonly random?: (() => number) | undefined;
}

export interface FeedClientOptions {
	/** Overrides applied on top of defaults and FEED_* variables */
	readonly config?: Partial<FeedConfig> | undefined;
	/** Environment-derived values; read from process.env when absent */
	readonly env?: Partial<FeedConfig> | undefined;
	/** Skip credential loading, e.g. for a pre-built signer */
	readonly signer?: HeaderSigner | undefined;
	readonly backend?: StorageBackend | undefined;
	readonly logger?: Logger | undefined;
	readonly clientFactory?: WsClientFactory | undefined;
	readonly clock?: Clock | undefined;
}

export interface FeedStatus {
	readonly session: SessionStats;
	readonly dispatcher: DispatcherStats;
	readonly store: StoreStats;
	readonly staleBooks: readonly InstrumentId[];
}

export class FeedClient {
	readonly config: FeedConfig;
	readonly market: MarketState;
	private readonly log: Logger;
	private readonly session: SessionManager;
	private readonly dispatcher: FeedDispatcher;
	private readonly store: EventStore;
	private statusTimer: ReturnType<typeof setInterval> | null = null;
	private shutdownPromise: Promise<void> | null = null;

	/**
	 * Resolve configuration, load credentials and pick a backend
	 * (JSONL files under `storeDir`, in-memory otherwise).
	 */
	static async create(options: FeedClientOptions = {}): Promise<Result<FeedClient, FeedError>> {
		let config: FeedConfig;
		try {
			config = resolveFeedConfig(options.config, options.env);
		} catch (error: unknown) {
			return err(classifyError(error));
		}

		const logger =
			options.logger ??
			createLogger({ level: toLogLevel(config.logLevel), bindings: { service: "marketstream" } });

		let signer = options.signer;
		if (signer === undefined) {
			const credentials = await loadCredentials({
				keyId: config.keyId,
				privateKeyPem: config.privateKeyPem,
				privateKeyPath: config.privateKeyPath,
			});
			if (!credentials.ok) return credentials;
			signer = new RequestSigner(credentials.value, {
				clock: options.clock,
				headerPrefix: config.headerPrefix,
			});
		}

		const backend =
			options.backend ??
			(config.storeDir !== undefined
				? FileStorageBackend.create({ dir: config.storeDir, logger })
				: new MemoryStorageBackend());

		return ok(
			new FeedClient({
				config,
				signer,
				backend,
				logger,
				clientFactory: options.clientFactory,
				clock: options.clock,
			}),
		);
	}

	constructor(deps: FeedClientDeps) {
		const { config } = deps;
		const clock = deps.clock ?? SystemClock;
		this.config = config;
		this.log = deps.logger.child({ component: "feed" });
		this.market = new MarketState({ recentLimit: config.recentTradesLimit });
		this.store = new EventStore({
			backend: deps.backend,
			maxAttempts: config.storeMaxAttempts,
			retryDelayMs: config.storeRetryDelayMs,
			logger: deps.logger,
		});
		this.dispatcher = new FeedDispatcher({
			workerCount: config.workerCount,
			queueCapacity: config.queueCapacity,
			malformedThreshold: config.malformedThreshold,
			malformedWindowMs: config.malformedWindowMs,
			fatalErrorCodes: config.sessionFatalErrorCodes,
			clock,
			logger: deps.logger,
		});
		this.session = new SessionManager({
			config,
			signer: deps.signer,
			sink: this.dispatcher,
			clientFactory: deps.clientFactory,
			clock,
			logger: deps.logger,
			random: deps.random,
		});

		registerFeedHandlers(this.dispatcher, {
			state: this.market,
			store: this.store,
			session: this.session,
			logger: deps.logger,
		});
		this.dispatcher.on("unknown", (event) => {
			this.log.debug({ type: event.type }, "Unhandled frame type");
		});
		this.session.on("state_change", (change) => this.handleStateChange(change));
	}

	get state(): SessionState {
		return this.session.state;
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	start(): void {
		if (this.shutdownPromise !== null) {
			this.log.warn("Feed is shut down; start ignored");
			return;
		}
		this.session.start();
		if (this.statusTimer === null && this.config.statusIntervalMs > 0) {
			this.statusTimer = setInterval(() => this.reportStatus(), this.config.statusIntervalMs);
			this.statusTimer.unref();
		}
	}

	/** Stop the session, deliver queued events and drain the store. Idempotent. */
	shutdown(): Promise<void> {
		if (this.shutdownPromise === null) this.shutdownPromise = this.doShutdown();
		return this.shutdownPromise;
	}

	// ── Subscriptions ──────────────────────────────────────────────

	subscribeTicker(instruments: readonly InstrumentId[] = []): SubscriptionId {
		return this.session.subscribe("ticker", instruments);
	}

	subscribeTrades(instruments: readonly InstrumentId[] = []): SubscriptionId {
		return this.session.subscribe("trade", instruments);
	}

	subscribeFills(instruments: readonly InstrumentId[] = []): SubscriptionId {
		return this.session.subscribe("fill", instruments);
	}

	/** One subscription per instrument, so a resync touches only the book that needs it. */
	subscribeOrderbook(instruments: readonly InstrumentId[]): SubscriptionId[] {
		return instruments.map((id) => this.session.subscribe("orderbook_delta", [id]));
	}

	unsubscribe(id: SubscriptionId): boolean {
		return this.session.unsubscribe(id);
	}

	// ── Consumers ──────────────────────────────────────────────────

	/** Observe decoded events after the built-in handlers have run. */
	on<K extends FeedEventKind>(kind: K, handler: FeedHandler<K>): () => void {
		return this.dispatcher.on(kind, handler);
	}

	onAny(handler: AnyFeedHandler): () => void {
		return this.dispatcher.onAny(handler);
	}

	onStateChange(listener: (change: StateChange) => void): () => void {
		return this.session.on("state_change", listener);
	}

	// ── Queries ────────────────────────────────────────────────────

	latestTicker(instrumentId: InstrumentId): Promise<LatestTicker | undefined> {
		return this.store.latestTicker(instrumentId);
	}

	latestOrderbook(instrumentId: InstrumentId): Promise<PublishedOrderbook | undefined> {
		return this.store.latestOrderbook(instrumentId);
	}

	tradeHistory(instrumentId: InstrumentId, limit: number): Promise<Array<StoredRecordOf<"trade">>> {
		return this.store.tradeHistory(instrumentId, limit);
	}

	fillHistory(instrumentId: InstrumentId, limit: number): Promise<Array<StoredRecordOf<"fill">>> {
		return this.store.fillHistory(instrumentId, limit);
	}

	query<K extends RecordKind>(
		instrumentId: InstrumentId,
		kind: K,
		range: QueryRange = {},
	): AsyncIterable<StoredRecordOf<K>> {
		return this.store.query(instrumentId, kind, range);
	}

	recentTrades(instrumentId: InstrumentId): TradeEvent[] {
		return this.market.recentTrades(instrumentId);
	}

	recentFills(instrumentId: InstrumentId): FillEvent[] {
		return this.market.recentFills(instrumentId);
	}

	/** Resolves once every event received so far has been handled and stored. */
	async settle(): Promise<void> {
		await this.dispatcher.flush();
		await this.store.flush();
	}

	status(): FeedStatus {
		return {
			session: this.session.stats(),
			dispatcher: this.dispatcher.stats(),
			store: this.store.stats(),
			staleBooks: this.market.staleBooks(),
		};
	}

	// ── Internals ──────────────────────────────────────────────────

	private handleStateChange(change: StateChange): void {
		if (change.to !== "degraded") return;
		const invalidated = this.market.invalidateBooks();
		for (const book of invalidated) publishOrderbook(this.store, book);
		if (invalidated.length > 0) {
			this.log.info({ books: invalidated.length }, "Connection lost, orderbooks await a fresh snapshot");
		}
	}

	private reportStatus(): void {
		const { session, dispatcher, store, staleBooks } = this.status();
		this.log.info(
			{
				state: session.state,
				reconnects: session.reconnects,
				subscriptions: session.subscriptions,
				framesReceived: session.framesReceived,
				dispatched: dispatcher.dispatched,
				malformed: dispatcher.malformed,
				dropped: dispatcher.dropped,
				queued: dispatcher.queued,
				handlerP99Ms: dispatcher.latency.p99Ms,
				stored: store.written,
				storeDropped: store.dropped,
				staleBooks: staleBooks.length,
			},
			"Feed status",
		);
	}

	private async doShutdown(): Promise<void> {
		if (this.statusTimer !== null) {
			clearInterval(this.statusTimer);
			this.statusTimer = null;
		}
		this.session.stop();
		await this.dispatcher.flush();
		await this.store.close();
		const { written, dropped } = this.store.stats();
		this.log.info({ written, dropped }, "Feed shut down");
	}
}
