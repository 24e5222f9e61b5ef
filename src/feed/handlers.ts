import type { FeedDispatcher } from "../events/event-dispatcher.js";
import { createErrorHandler } from "./error-handler.js";
import { createDeltaHandler, createSnapshotHandler } from "./orderbook-handler.js";
import { createTickerHandler } from "./ticker-handler.js";
import { createFillHandler, createTradeHandler } from "./trade-handler.js";
import type { HandlerContext } from "./types.js";

/** Attach the standard handlers; returns a function that detaches them all. */
export function registerFeedHandlers(dispatcher: FeedDispatcher, ctx: HandlerContext): () => void {
	const removers = [
		dispatcher.on("ticker", createTickerHandler(ctx)),
		dispatcher.on("orderbook_snapshot", createSnapshotHandler(ctx)),
		dispatcher.on("orderbook_delta", createDeltaHandler(ctx)),
		dispatcher.on("trade", createTradeHandler(ctx)),
		dispatcher.on("fill", createFillHandler(ctx)),
		dispatcher.on("error", createErrorHandler(ctx)),
	];
	return () => {
		for (const remove of removers) remove();
	};
}
