import { describe, expect, it } from "vitest";
import { FeedDispatcher } from "../events/event-dispatcher.js";
import type { ErrorEvent, FillEvent, TickerEvent, TradeEvent } from "../events/feed-events.js";
import { instrumentId } from "../shared/identifiers.js";
import { createErrorHandler } from "./error-handler.js";
import { registerFeedHandlers } from "./handlers.js";
import { createTickerHandler } from "./ticker-handler.js";
import { handlerHarness } from "./testing.js";
import { createFillHandler, createTradeHandler } from "./trade-handler.js";

const KX = instrumentId("KXBTC-26FEB");

const TICKER: TickerEvent = {
	kind: "ticker",
	instrumentId: KX,
	sid: 3,
	seq: 12,
	receivedAt: 7_000,
	price: 48,
	yesBid: 47,
	yesAsk: 49,
	spread: 2,
	volume: 1_200,
	openInterest: null,
	ts: 1_700_000_000,
};

function trade(n: number): TradeEvent {
	return {
		kind: "trade",
		instrumentId: KX,
		sid: 4,
		seq: n,
		receivedAt: 8_000 + n,
		tradeId: `tr-${n}`,
		yesPrice: 36,
		noPrice: 64,
		count: n,
		takerSide: "no",
		ts: null,
	};
}

const FILL: FillEvent = {
	kind: "fill",
	instrumentId: KX,
	sid: 5,
	seq: null,
	receivedAt: 9_000,
	tradeId: "tr-9",
	orderId: "ord-1",
	isTaker: false,
	side: "yes",
	action: "sell",
	count: 2,
	yesPrice: 51,
	ts: null,
};

function venueError(fatal: boolean): ErrorEvent {
	return { kind: "error", code: 9, message: "Authentication required", commandId: null, sid: null, fatal, receivedAt: 1 };
}

describe("ticker handler", () => {
	it("updates market state, appends the record and replaces the latest view", async () => {
		const h = handlerHarness();
		await createTickerHandler(h)(TICKER);

		const latest = {
			instrumentId: KX,
			seq: 12,
			updatedAt: 7_000,
			price: 48,
			yesBid: 47,
			yesAsk: 49,
			spread: 2,
			volume: 1_200,
			openInterest: null,
			ts: 1_700_000_000,
		};
		expect(h.state.ticker(KX)).toEqual(latest);
		expect(await h.store.latestTicker(KX)).toEqual(latest);

		const stored: unknown[] = [];
		for await (const record of h.store.query(KX, "ticker")) stored.push(record);
		expect(stored).toEqual([
			{
				kind: "ticker",
				instrumentId: KX,
				seq: 12,
				receivedAt: 7_000,
				payload: { price: 48, yesBid: 47, yesAsk: 49, spread: 2, volume: 1_200, openInterest: null, ts: 1_700_000_000 },
			},
		]);
	});
});

describe("trade and fill handlers", () => {
	it("keeps only the most recent trades in memory but stores all of them", async () => {
		const h = handlerHarness(3);
		const onTrade = createTradeHandler(h);
		for (const n of [1, 2, 3, 4, 5]) await onTrade(trade(n));

		expect(h.state.recentTrades(KX).map((t) => t.tradeId)).toEqual(["tr-3", "tr-4", "tr-5"]);
		expect((await h.store.tradeHistory(KX, 10)).map((r) => r.payload.count)).toEqual([1, 2, 3, 4, 5]);
	});

	it("records fills", async () => {
		const h = handlerHarness();
		await createFillHandler(h)(FILL);

		expect(h.state.recentFills(KX)).toEqual([FILL]);
		const [stored] = await h.store.fillHistory(KX, 1);
		expect(stored?.payload).toEqual({
			tradeId: "tr-9",
			orderId: "ord-1",
			isTaker: false,
			side: "yes",
			action: "sell",
			count: 2,
			yesPrice: 51,
			ts: null,
		});
	});
});

describe("error handler", () => {
	it("only logs a non-fatal error", async () => {
		const h = handlerHarness();
		await createErrorHandler(h)(venueError(false));
		expect(h.session.degradedReasons).toEqual([]);
	});

	it("forces the session degraded on a fatal error", async () => {
		const h = handlerHarness();
		await createErrorHandler(h)(venueError(true));
		expect(h.session.degradedReasons).toEqual(["Venue error 9: Authentication required"]);
	});
});

describe("registerFeedHandlers", () => {
	it("routes dispatched events to the handlers and detaches them", async () => {
		const h = handlerHarness();
		const dispatcher = new FeedDispatcher();
		const detach = registerFeedHandlers(dispatcher, h);

		dispatcher.dispatch(TICKER);
		dispatcher.dispatch(trade(1));
		await dispatcher.flush();
		expect(h.state.ticker(KX)?.price).toBe(48);
		expect(h.state.recentTrades(KX)).toHaveLength(1);

		detach();
		dispatcher.dispatch(trade(2));
		await dispatcher.flush();
		expect(h.state.recentTrades(KX)).toHaveLength(1);
	});
});
