import { bench, describe } from "vitest";
import { parseFrame } from "../src/events/frame-parser.js";

const TICKER = JSON.stringify({
	type: "ticker",
	sid: 1,
	seq: 7,
	msg: { market_ticker: "KXBENCH", price: 48, yes_bid: 47, yes_ask: 49, volume: 1200, ts: 1700000000 },
});

const DELTA = JSON.stringify({
	type: "orderbook_delta",
	sid: 2,
	seq: 101,
	prev_seq: 100,
	msg: { market_ticker: "KXBENCH", price: 45, delta: -20, side: "yes" },
});

const SNAPSHOT = JSON.stringify({
	type: "orderbook_snapshot",
	sid: 2,
	seq: 100,
	msg: {
		market_ticker: "KXBENCH",
		yes: Array.from({ length: 45 }, (_, i) => [49 - i, (i + 1) * 10]),
		no: Array.from({ length: 45 }, (_, i) => [50 - i, (i + 1) * 10]),
	},
});

const options = { receivedAt: 0 };

describe("frame parsing", () => {
	bench("ticker frame", () => {
		parseFrame(TICKER, options);
	});

	bench("orderbook delta frame", () => {
		parseFrame(DELTA, options);
	});

	bench("45-level orderbook snapshot frame", () => {
		parseFrame(SNAPSHOT, options);
	});

	bench("invalid JSON frame", () => {
		parseFrame("{not json", options);
	});
});
