/**
 * EventStore — the handlers' write path and the read-only query surface.
 *
 * Writes never block the caller and never throw: they go through a
 * WriteBehindQueue. Latest views are also cached here, so a read issued right
 * after an upsert sees it even before the backend write lands.
 *
 * @example
 * ```ts
 * const store = new EventStore({ backend: FileStorageBackend.create({ dir: "./data" }) });
 * for await (const trade of store.query(id, "trade", { since: Date.now() - 60_000 })) {
 *   console.log(trade.payload.yesPrice);
 * }
 * ```
 */

import { BoundedQueue } from "../events/bounded-queue.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { PublishedOrderbook } from "../market/types.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type {
	LatestKind,
	LatestPayloadMap,
	LatestTicker,
	QueryRange,
	RecordKind,
	StorageBackend,
	StoreStats,
	StoredRecord,
	StoredRecordOf,
} from "./types.js";
import { WriteBehindQueue } from "./write-behind.js";

export interface EventStoreOptions {
	readonly backend: StorageBackend;
	readonly maxAttempts?: number | undefined;
	readonly retryDelayMs?: number | undefined;
	readonly batchSize?: number | undefined;
	readonly logger?: Logger | undefined;
}

type LatestCache = { [K in LatestKind]: Map<InstrumentId, LatestPayloadMap[K]> };

export class EventStore {
	private readonly backend: StorageBackend;
	private readonly queue: WriteBehindQueue;
	private readonly cache: LatestCache = { ticker: new Map(), orderbook: new Map() };

	constructor(options: EventStoreOptions) {
		const log = (options.logger ?? silentLogger()).child({ component: "store" });
		this.backend = options.backend;
		this.queue = new WriteBehindQueue({
			backend: options.backend,
			maxAttempts: options.maxAttempts ?? 3,
			retryDelayMs: options.retryDelayMs ?? 50,
			batchSize: options.batchSize,
			logger: log,
		});
	}

	/** Queue a record for durable append. */
	append(record: StoredRecord): void {
		this.queue.append(record);
	}

	upsertLatest<K extends LatestKind>(
		instrumentId: InstrumentId,
		kind: K,
		payload: LatestPayloadMap[K],
	): void {
		if (!this.queue.isClosed) {
			const table: Map<InstrumentId, LatestPayloadMap[K]> = this.cache[kind];
			table.set(instrumentId, payload);
		}
		this.queue.putLatest(kind, instrumentId, payload);
	}

	/**
	 * Records of one stream in receipt order, filtered to `range`.
	 * Each iteration waits for queued writes and re-reads the backend.
	 */
	query<K extends RecordKind>(
		instrumentId: InstrumentId,
		kind: K,
		range: QueryRange = {},
	): AsyncIterable<StoredRecordOf<K>> {
		return {
			[Symbol.asyncIterator]: () => this.read(instrumentId, kind, range),
		};
	}

	latestTicker(instrumentId: InstrumentId): Promise<LatestTicker | undefined> {
		return this.latest("ticker", instrumentId);
	}

	/** Last published book; a `stale` one must not be treated as current. */
	latestOrderbook(instrumentId: InstrumentId): Promise<PublishedOrderbook | undefined> {
		return this.latest("orderbook", instrumentId);
	}

	/** The most recent `limit` trades, oldest first. */
	tradeHistory(instrumentId: InstrumentId, limit: number): Promise<Array<StoredRecordOf<"trade">>> {
		return this.tail(instrumentId, "trade", limit);
	}

	/** The most recent `limit` fills, oldest first. */
	fillHistory(instrumentId: InstrumentId, limit: number): Promise<Array<StoredRecordOf<"fill">>> {
		return this.tail(instrumentId, "fill", limit);
	}

	stats(): StoreStats {
		return { ...this.queue.stats(), corruptLines: this.backend.corruptLines };
	}

	flush(): Promise<void> {
		return this.queue.flush();
	}

	/** Drain queued writes and release the backend. Later writes are dropped. */
	async close(): Promise<void> {
		await this.queue.close();
		await this.backend.close();
	}

	private async *read<K extends RecordKind>(
		instrumentId: InstrumentId,
		kind: K,
		range: QueryRange,
	): AsyncGenerator<StoredRecordOf<K>> {
		await this.queue.flush();
		for await (const record of this.backend.scan(kind, instrumentId)) {
			if (range.since !== undefined && record.receivedAt < range.since) continue;
			if (range.until !== undefined && record.receivedAt >= range.until) continue;
			yield record;
		}
	}

	private async latest<K extends LatestKind>(
		kind: K,
		instrumentId: InstrumentId,
	): Promise<LatestPayloadMap[K] | undefined> {
		const table: Map<InstrumentId, LatestPayloadMap[K]> = this.cache[kind];
		const cached = table.get(instrumentId);
		if (cached !== undefined) return cached;
		return this.backend.getLatest(kind, instrumentId);
	}

	private async tail<K extends RecordKind>(
		instrumentId: InstrumentId,
		kind: K,
		limit: number,
	): Promise<Array<StoredRecordOf<K>>> {
		if (!Number.isInteger(limit) || limit <= 0) return [];
		const recent = new BoundedQueue<StoredRecordOf<K>>(limit);
		for await (const record of this.query(instrumentId, kind)) recent.push(record);
		return recent.toArray();
	}
}
