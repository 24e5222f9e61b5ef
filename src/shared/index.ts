export {
	type InstrumentId,
	type SubscriptionId,
	instrumentId,
	subscriptionId,
} from "./identifiers.js";

export { type Result, ok, err, isOk, isErr, tryCatch } from "./result.js";

export {
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
	isSigningError,
	isHandshakeRejected,
	isTransportError,
	isMalformedFrame,
	isStoreWriteError,
	isConfigError,
} from "./errors.js";

export { type Clock, SystemClock, FakeClock, sleep } from "./time.js";
export {
	type AuthMode,
	type FeedConfig,
	type SubscriptionIdMode,
	DEFAULT_FEED_CONFIG,
	VENUE_URLS,
	configFromEnv,
	resolveFeedConfig,
} from "./config.js";
