// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type InstrumentId,
	type SubscriptionId,
	instrumentId,
	subscriptionId,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	type Clock,
	SystemClock,
	FakeClock,
	ErrorCategory,
	FeedError,
	CredentialError,
	SigningError,
	HandshakeRejectedError,
	TransportError,
	MalformedFrameError,
	StoreWriteError,
	ConfigError,
	classifyError,
	isCredentialError,
	isHandshakeRejected,
	isTransportError,
	isStoreWriteError,
	type AuthMode,
	type FeedConfig,
	type SubscriptionIdMode,
	DEFAULT_FEED_CONFIG,
	VENUE_URLS,
	configFromEnv,
	resolveFeedConfig,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export { type Logger, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { ValidationError } from "./lib/validation/index.js";

// ── Auth ─────────────────────────────────────────────────────────────
export {
	type Credentials,
	type CredentialSource,
	type SignRequest,
	type SignatureHeaders,
	loadCredentials,
	RequestSigner,
	signatureMessage,
} from "./auth/index.js";

// ── Events ───────────────────────────────────────────────────────────
export {
	type FeedEvent,
	type FeedEventKind,
	type TickerEvent,
	type OrderbookSnapshotEvent,
	type OrderbookDeltaEvent,
	type TradeEvent,
	type FillEvent,
	type ErrorEvent,
	type AckEvent,
	type UnknownEvent,
	type FeedHandler,
	type DispatcherStats,
	parseFrame,
	FeedDispatcher,
} from "./events/index.js";

// ── Market ───────────────────────────────────────────────────────────
export {
	type BookSide,
	type PriceLevel,
	type OrderbookStatus,
	type OrderbookView,
	type StaleOrderbookView,
	type PublishedOrderbook,
	OrderbookState,
	OrderbookRegistry,
	bestBid,
	spread,
} from "./market/index.js";

// ── Session ──────────────────────────────────────────────────────────
export {
	type SessionStats,
	type StateChange,
	type Subscription,
	ChannelKind,
	SessionState,
	SessionManager,
	BackoffPolicy,
} from "./websocket/index.js";

// ── Store ────────────────────────────────────────────────────────────
export {
	type LatestTicker,
	type QueryRange,
	type RecordKind,
	type StorageBackend,
	type StoreStats,
	type StoredRecord,
	type StoredRecordOf,
	EventStore,
	FileStorageBackend,
	MemoryStorageBackend,
} from "./persistence/index.js";

// ── Observability ────────────────────────────────────────────────────
export { LatencyHistogram, type LatencySummary } from "./observability/index.js";

// ── Feed ─────────────────────────────────────────────────────────────
export {
	FeedClient,
	type FeedClientOptions,
	type FeedStatus,
	MarketState,
} from "./feed/index.js";
