import type { FeedHandler } from "../events/event-dispatcher.js";
import { latestTickerOf, tickerRecord } from "./records.js";
import type { HandlerContext } from "./types.js";

export function createTickerHandler(ctx: HandlerContext): FeedHandler<"ticker"> {
	return (event) => {
		const latest = latestTickerOf(event);
		ctx.state.upsertTicker(latest);
		ctx.store.append(tickerRecord(event));
		ctx.store.upsertLatest(event.instrumentId, "ticker", latest);
	};
}
