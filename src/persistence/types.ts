/**
 * Store types — what gets persisted and how a backend is driven.
 *
 * Records are append-only and kept per (kind, instrument) in receipt order.
 * Latest views hold one row per (kind, instrument) and are replaced wholesale.
 */

import type {
	FillEvent,
	OrderbookDeltaEvent,
	OrderbookSnapshotEvent,
	TickerEvent,
	TradeEvent,
} from "../events/feed-events.js";
import type { PublishedOrderbook } from "../market/types.js";
import type { InstrumentId } from "../shared/identifiers.js";

type EnvelopeKeys = "kind" | "instrumentId" | "sid" | "seq" | "receivedAt";

export type TickerPayload = Omit<TickerEvent, EnvelopeKeys>;
export type SnapshotPayload = Omit<OrderbookSnapshotEvent, EnvelopeKeys>;
export type DeltaPayload = Omit<OrderbookDeltaEvent, EnvelopeKeys>;
export type TradePayload = Omit<TradeEvent, EnvelopeKeys>;
export type FillPayload = Omit<FillEvent, EnvelopeKeys>;

export interface RecordPayloadMap {
	ticker: TickerPayload;
	orderbook_snapshot: SnapshotPayload;
	orderbook_delta: DeltaPayload;
	trade: TradePayload;
	fill: FillPayload;
}

export type RecordKind = keyof RecordPayloadMap;

export const RECORD_KINDS: readonly RecordKind[] = [
	"ticker",
	"orderbook_snapshot",
	"orderbook_delta",
	"trade",
	"fill",
];

export interface StoredRecordOf<K extends RecordKind> {
	readonly kind: K;
	readonly instrumentId: InstrumentId;
	readonly seq: number | null;
	/** Local receipt time (ms since epoch) */
	readonly receivedAt: number;
	readonly payload: RecordPayloadMap[K];
}

export type StoredRecord = { [K in RecordKind]: StoredRecordOf<K> }[RecordKind];

/** Last ticker seen for an instrument. */
export interface LatestTicker extends TickerPayload {
	readonly instrumentId: InstrumentId;
	readonly seq: number | null;
	readonly updatedAt: number;
}

export interface LatestPayloadMap {
	ticker: LatestTicker;
	orderbook: PublishedOrderbook;
}

export type LatestKind = keyof LatestPayloadMap;

export const LATEST_KINDS: readonly LatestKind[] = ["ticker", "orderbook"];

/** Inclusive `since`, exclusive `until`, both on `receivedAt`. */
export interface QueryRange {
	readonly since?: number | undefined;
	readonly until?: number | undefined;
}

export interface StorageBackend {
	/** Append records; each lands at the end of its (kind, instrument) stream. */
	appendBatch(records: readonly StoredRecord[]): Promise<void>;
	putLatest<K extends LatestKind>(
		kind: K,
		instrumentId: InstrumentId,
		payload: LatestPayloadMap[K],
	): Promise<void>;
	getLatest<K extends LatestKind>(
		kind: K,
		instrumentId: InstrumentId,
	): Promise<LatestPayloadMap[K] | undefined>;
	/** Every stored record of one stream, in append order, read when iteration starts. */
	scan<K extends RecordKind>(kind: K, instrumentId: InstrumentId): AsyncIterable<StoredRecordOf<K>>;
	/** Stored lines that could not be decoded and were skipped */
	readonly corruptLines: number;
	close(): Promise<void>;
}

export interface StoreStats {
	readonly written: number;
	readonly dropped: number;
	readonly retries: number;
	readonly pending: number;
	readonly corruptLines: number;
}
