export { FeedClient } from "./feed-client.js";
export type { FeedClientDeps, FeedClientOptions, FeedStatus } from "./feed-client.js";
export { MarketState } from "./market-state.js";
export type { MarketStateOptions } from "./market-state.js";
export { registerFeedHandlers } from "./handlers.js";
export { createTickerHandler } from "./ticker-handler.js";
export { createDeltaHandler, createSnapshotHandler } from "./orderbook-handler.js";
export { createFillHandler, createTradeHandler } from "./trade-handler.js";
export { createErrorHandler } from "./error-handler.js";
export type { HandlerContext, RecordSink, SessionControl } from "./types.js";
