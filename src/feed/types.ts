import type { Logger } from "../lib/logger/index.js";
import type { LatestKind, LatestPayloadMap, StoredRecord } from "../persistence/types.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { MarketState } from "./market-state.js";

/** Write side of the store as the handlers see it. */
export interface RecordSink {
	append(record: StoredRecord): void;
	upsertLatest<K extends LatestKind>(
		instrumentId: InstrumentId,
		kind: K,
		payload: LatestPayloadMap[K],
	): void;
}

/** The session operations handlers may trigger. */
export interface SessionControl {
	requestSnapshot(instrument: InstrumentId): number;
	forceDegraded(reason: string): void;
}

export interface HandlerContext {
	readonly state: MarketState;
	readonly store: RecordSink;
	readonly session: SessionControl;
	readonly logger: Logger;
}
