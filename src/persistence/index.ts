export { EventStore } from "./event-store.js";
export type { EventStoreOptions } from "./event-store.js";
export { FileStorageBackend } from "./file-backend.js";
export type { FileStorageConfig } from "./file-backend.js";
export { MemoryStorageBackend } from "./memory-backend.js";
export { LATEST_SCHEMAS, RECORD_SCHEMAS } from "./record-schemas.js";
export { WriteBehindQueue } from "./write-behind.js";
export type { WriteBehindOptions, WriteBehindStats } from "./write-behind.js";
export { LATEST_KINDS, RECORD_KINDS } from "./types.js";
export type {
	DeltaPayload,
	FillPayload,
	LatestKind,
	LatestPayloadMap,
	LatestTicker,
	QueryRange,
	RecordKind,
	RecordPayloadMap,
	SnapshotPayload,
	StorageBackend,
	StoreStats,
	StoredRecord,
	StoredRecordOf,
	TickerPayload,
	TradePayload,
} from "./types.js";
