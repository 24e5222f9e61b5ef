/**
 * MemoryStorageBackend — in-process backend for tests and short-lived runs.
 * Not persisted across restarts.
 */

import type { InstrumentId } from "../shared/identifiers.js";
import type {
	LatestKind,
	LatestPayloadMap,
	RecordKind,
	StorageBackend,
	StoredRecord,
	StoredRecordOf,
} from "./types.js";

type RecordTables = { [K in RecordKind]: Map<InstrumentId, StoredRecordOf<K>[]> };
type LatestTables = { [K in LatestKind]: Map<InstrumentId, LatestPayloadMap[K]> };

export class MemoryStorageBackend implements StorageBackend {
	private readonly records: RecordTables = {
		ticker: new Map(),
		orderbook_snapshot: new Map(),
		orderbook_delta: new Map(),
		trade: new Map(),
		fill: new Map(),
	};
	private readonly latest: LatestTables = { ticker: new Map(), orderbook: new Map() };

	readonly corruptLines = 0;

	async appendBatch(records: readonly StoredRecord[]): Promise<void> {
		for (const record of records) this.push(record);
	}

	async putLatest<K extends LatestKind>(
		kind: K,
		instrumentId: InstrumentId,
		payload: LatestPayloadMap[K],
	): Promise<void> {
		const table: Map<InstrumentId, LatestPayloadMap[K]> = this.latest[kind];
		table.set(instrumentId, payload);
	}

	async getLatest<K extends LatestKind>(
		kind: K,
		instrumentId: InstrumentId,
	): Promise<LatestPayloadMap[K] | undefined> {
		const table: Map<InstrumentId, LatestPayloadMap[K]> = this.latest[kind];
		return table.get(instrumentId);
	}

	async *scan<K extends RecordKind>(kind: K, instrumentId: InstrumentId): AsyncIterable<StoredRecordOf<K>> {
		const table: Map<InstrumentId, StoredRecordOf<K>[]> = this.records[kind];
		// copy so appends during iteration are not observed
		const rows = [...(table.get(instrumentId) ?? [])];
		yield* rows;
	}

	/** Number of records held for one stream. */
	count(kind: RecordKind, instrumentId: InstrumentId): number {
		return this.records[kind].get(instrumentId)?.length ?? 0;
	}

	async close(): Promise<void> {}

	private push<K extends RecordKind>(record: StoredRecordOf<K>): void {
		const table: Map<InstrumentId, StoredRecordOf<K>[]> = this.records[record.kind];
		const rows = table.get(record.instrumentId);
		if (rows === undefined) table.set(record.instrumentId, [record]);
		else rows.push(record);
	}
}
