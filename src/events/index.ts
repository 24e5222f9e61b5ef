export type {
	AckEvent,
	AckType,
	ErrorEvent,
	FeedEvent,
	FeedEventKind,
	FeedEventMap,
	FeedEventOf,
	FillEvent,
	MarketEvent,
	OrderbookDeltaEvent,
	OrderbookSnapshotEvent,
	TickerEvent,
	TradeEvent,
	UnknownEvent,
} from "./feed-events.js";
export { FEED_EVENT_KINDS, freezeEvent, isMarketEvent } from "./feed-events.js";

export { parseFrame } from "./frame-parser.js";
export type { ParseOptions } from "./frame-parser.js";

export { BoundedQueue } from "./bounded-queue.js";
export { FrameErrorBreaker } from "./frame-breaker.js";

export { FeedDispatcher } from "./event-dispatcher.js";
export type {
	AnyFeedHandler,
	DispatcherOptions,
	DispatcherStats,
	FeedHandler,
	FrameOutcome,
	FrameSink,
} from "./event-dispatcher.js";
