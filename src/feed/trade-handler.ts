import type { FeedHandler } from "../events/event-dispatcher.js";
import { fillRecord, tradeRecord } from "./records.js";
import type { HandlerContext } from "./types.js";

export function createTradeHandler(ctx: HandlerContext): FeedHandler<"trade"> {
	return (event) => {
		ctx.state.recordTrade(event);
		ctx.store.append(tradeRecord(event));
	};
}

export function createFillHandler(ctx: HandlerContext): FeedHandler<"fill"> {
	return (event) => {
		ctx.state.recordFill(event);
		ctx.store.append(fillRecord(event));
	};
}
