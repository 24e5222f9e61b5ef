/**
 * Event → stored record conversion. The payload is the event minus its
 * envelope; `sid` is connection-scoped and not persisted.
 */

import type {
	FillEvent,
	OrderbookDeltaEvent,
	OrderbookSnapshotEvent,
	TickerEvent,
	TradeEvent,
} from "../events/feed-events.js";
import type { LatestTicker, StoredRecordOf } from "../persistence/types.js";

export function tickerRecord(event: TickerEvent): StoredRecordOf<"ticker"> {
	const { kind, instrumentId, sid, seq, receivedAt, ...payload } = event;
	return { kind, instrumentId, seq, receivedAt, payload };
}

export function snapshotRecord(event: OrderbookSnapshotEvent): StoredRecordOf<"orderbook_snapshot"> {
	const { kind, instrumentId, sid, seq, receivedAt, ...payload } = event;
	return { kind, instrumentId, seq, receivedAt, payload };
}

export function deltaRecord(event: OrderbookDeltaEvent): StoredRecordOf<"orderbook_delta"> {
	const { kind, instrumentId, sid, seq, receivedAt, ...payload } = event;
	return { kind, instrumentId, seq, receivedAt, payload };
}

export function tradeRecord(event: TradeEvent): StoredRecordOf<"trade"> {
	const { kind, instrumentId, sid, seq, receivedAt, ...payload } = event;
	return { kind, instrumentId, seq, receivedAt, payload };
}

export function fillRecord(event: FillEvent): StoredRecordOf<"fill"> {
	const { kind, instrumentId, sid, seq, receivedAt, ...payload } = event;
	return { kind, instrumentId, seq, receivedAt, payload };
}

export function latestTickerOf(event: TickerEvent): LatestTicker {
	const { kind, sid, receivedAt, ...rest } = event;
	return { ...rest, updatedAt: receivedAt };
}
