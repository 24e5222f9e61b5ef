/**
 * FeedDispatcher — raw frames in, typed events out to kind-keyed handlers.
 *
 * The receive loop calls `onFrame()` and never waits for handler work: events
 * are pushed onto per-partition bounded queues and drained asynchronously.
 * Partitions are picked by instrument, so one instrument's events are always
 * handled in arrival order. Handlers for one event run one after another and
 * a throwing or rejecting handler is logged without affecting the others.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { LatencyHistogram, type LatencySummary } from "../observability/latency-histogram.js";
import type { MalformedFrameError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { BoundedQueue } from "./bounded-queue.js";
import type { FeedEvent, FeedEventKind, FeedEventMap } from "./feed-events.js";
import { FEED_EVENT_KINDS, isMarketEvent } from "./feed-events.js";
import { FrameErrorBreaker } from "./frame-breaker.js";
import { parseFrame } from "./frame-parser.js";

export type FeedHandler<K extends FeedEventKind> = (event: FeedEventMap[K]) => void | Promise<void>;
export type AnyFeedHandler = (event: FeedEvent) => void | Promise<void>;

type HandlerMap = { [K in FeedEventKind]: Array<FeedHandler<K>> };

export type FrameOutcome =
	| { readonly status: "dispatched"; readonly event: FeedEvent }
	| {
			readonly status: "malformed";
			readonly error: MalformedFrameError;
			/** The malformed-frame threshold was reached with this frame */
			readonly tripped: boolean;
	  };

/** What the session manager needs from a dispatcher. */
export interface FrameSink {
	onFrame(raw: string): FrameOutcome;
}

export interface DispatcherOptions {
	readonly workerCount?: number | undefined;
	readonly queueCapacity?: number | undefined;
	readonly malformedThreshold?: number | undefined;
	readonly malformedWindowMs?: number | undefined;
	readonly fatalErrorCodes?: readonly number[] | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
}

export interface DispatcherStats {
	readonly dispatched: number;
	readonly malformed: number;
	readonly dropped: number;
	readonly queued: number;
	readonly handlerErrors: number;
	readonly breakerTrips: number;
	readonly latency: LatencySummary;
}

class Partition {
	readonly queue: BoundedQueue<FeedEvent>;
	draining = false;
	private waiters: Array<() => void> = [];

	constructor(capacity: number) {
		this.queue = new BoundedQueue(capacity);
	}

	idle(): Promise<void> {
		if (!this.draining && this.queue.isEmpty()) return Promise.resolve();
		return new Promise((resolve) => {
			this.waiters.push(resolve);
		});
	}

	settle(): void {
		this.draining = false;
		const waiters = this.waiters;
		this.waiters = [];
		for (const resolve of waiters) resolve();
	}
}

/** FNV-1a over the instrument id, used only for partition selection. */
function partitionOf(key: string, count: number): number {
	if (count === 1) return 0;
	let hash = 0x811c9dc5;
	for (let i = 0; i < key.length; i++) {
		hash ^= key.charCodeAt(i);
		hash = Math.imul(hash, 0x01000193);
	}
	return (hash >>> 0) % count;
}

export class FeedDispatcher implements FrameSink {
	private readonly handlers: HandlerMap = emptyHandlerMap();
	private readonly anyHandlers: AnyFeedHandler[] = [];
	private readonly partitions: readonly Partition[];
	private readonly breaker: FrameErrorBreaker;
	private readonly latency = LatencyHistogram.create();
	private readonly fatalErrorCodes: ReadonlySet<number>;
	private readonly clock: Clock;
	private readonly log: Logger;

	private dispatched = 0;
	private malformed = 0;
	private handlerErrors = 0;

	constructor(options: DispatcherOptions = {}) {
		const workers = options.workerCount ?? 1;
		if (!Number.isInteger(workers) || workers < 1) {
			throw new RangeError(`workerCount must be a positive integer, got: ${workers}`);
		}
		const capacity = options.queueCapacity ?? 10_000;
		this.partitions = Array.from({ length: workers }, () => new Partition(capacity));
		this.clock = options.clock ?? SystemClock;
		this.breaker = new FrameErrorBreaker(
			options.malformedThreshold ?? 20,
			options.malformedWindowMs ?? 10_000,
			this.clock,
		);
		this.fatalErrorCodes = new Set(options.fatalErrorCodes ?? []);
		this.log = (options.logger ?? silentLogger()).child({ component: "dispatcher" });
	}

	// ── Registration ──────────────────────────────────────────────

	/** Register a handler for one event kind; returns its remover. */
	on<K extends FeedEventKind>(kind: K, handler: FeedHandler<K>): () => void {
		const list: Array<FeedHandler<K>> = this.handlers[kind];
		list.push(handler);
		return () => {
			const idx = list.indexOf(handler);
			if (idx !== -1) list.splice(idx, 1);
		};
	}

	/** Register a handler for every event; runs after the kind handlers. */
	onAny(handler: AnyFeedHandler): () => void {
		this.anyHandlers.push(handler);
		return () => {
			const idx = this.anyHandlers.indexOf(handler);
			if (idx !== -1) this.anyHandlers.splice(idx, 1);
		};
	}

	clear(): void {
		for (const kind of FEED_EVENT_KINDS) this.handlers[kind].length = 0;
		this.anyHandlers.length = 0;
	}

	// ── Intake ────────────────────────────────────────────────────

	onFrame(raw: string): FrameOutcome {
		const parsed = parseFrame(raw, {
			receivedAt: this.clock.now(),
			fatalErrorCodes: this.fatalErrorCodes,
		});
		if (!parsed.ok) {
			this.malformed++;
			const tripped = this.breaker.record();
			this.log.warn({ err: parsed.error, tripped }, "Dropping malformed frame");
			return { status: "malformed", error: parsed.error, tripped };
		}
		this.dispatch(parsed.value);
		return { status: "dispatched", event: parsed.value };
	}

	/** Queue an already-parsed event for its handlers. */
	dispatch(event: FeedEvent): void {
		const key = isMarketEvent(event) ? event.instrumentId : "";
		const partition = this.partitions[partitionOf(key, this.partitions.length)];
		if (partition === undefined) return;

		this.dispatched++;
		const evicted = partition.queue.push(event);
		if (evicted !== undefined) {
			this.log.warn(
				{ evicted: evicted.kind, dropped: partition.queue.dropped },
				"Dispatch queue full, dropped oldest event",
			);
		}
		this.schedule(partition);
	}

	/** Resolves once every queued event has been handled. */
	async flush(): Promise<void> {
		await Promise.all(this.partitions.map((p) => p.idle()));
	}

	stats(): DispatcherStats {
		let dropped = 0;
		let queued = 0;
		for (const p of this.partitions) {
			dropped += p.queue.dropped;
			queued += p.queue.size;
		}
		return {
			dispatched: this.dispatched,
			malformed: this.malformed,
			dropped,
			queued,
			handlerErrors: this.handlerErrors,
			breakerTrips: this.breaker.trips,
			latency: this.latency.summary(),
		};
	}

	// ── Workers ───────────────────────────────────────────────────

	private schedule(partition: Partition): void {
		if (partition.draining) return;
		partition.draining = true;
		queueMicrotask(() => {
			this.drain(partition).catch((error: unknown) => {
				this.log.error({ err: error }, "Dispatch worker failed");
			});
		});
	}

	private async drain(partition: Partition): Promise<void> {
		try {
			for (let event = partition.queue.shift(); event !== undefined; event = partition.queue.shift()) {
				const started = performance.now();
				await this.invoke(event.kind, event);
				await this.invokeAll(this.anyHandlers, event);
				this.latency.recordMs(performance.now() - started);
			}
		} finally {
			partition.settle();
		}
	}

	private async invoke<K extends FeedEventKind>(kind: K, event: FeedEventMap[K]): Promise<void> {
		const list: Array<FeedHandler<K>> = this.handlers[kind];
		await this.invokeAll(list, event);
	}

	private async invokeAll<E extends FeedEvent>(
		handlers: ReadonlyArray<(event: E) => void | Promise<void>>,
		event: E,
	): Promise<void> {
		for (const handler of [...handlers]) {
			try {
				await handler(event);
			} catch (error: unknown) {
				this.handlerErrors++;
				this.log.error({ err: error, kind: event.kind }, "Feed handler failed");
			}
		}
	}
}

function emptyHandlerMap(): HandlerMap {
	return {
		ticker: [],
		orderbook_snapshot: [],
		orderbook_delta: [],
		trade: [],
		fill: [],
		error: [],
		ack: [],
		unknown: [],
	};
}
