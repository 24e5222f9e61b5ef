/**
 * Stream Markets Example
 *
 * Connects with the key from FEED_API_KEY_ID and FEED_PRIVATE_KEY_PATH (or
 * FEED_PRIVATE_KEY_PEM), subscribes to tickers, trades and orderbooks for the
 * comma-separated FEED_TICKERS, and persists everything under FEED_STORE_DIR
 * when set. Status is logged every FEED_STATUS_INTERVAL_MS; Ctrl-C shuts down.
 *
 *   FEED_ENV=demo FEED_TICKERS=KXCPI-26JAN-T0.3 FEED_STORE_DIR=./data \
 *     npx tsx examples/stream-markets.ts
 */

import { FeedClient, createLogger, instrumentId } from "../src/index.js";

const logger = createLogger({ level: "info", bindings: { service: "marketstream" } });

const tickers = (process.env["FEED_TICKERS"] ?? "")
	.split(",")
	.map((t) => t.trim())
	.filter((t) => t.length > 0)
	.map(instrumentId);

if (tickers.length === 0) {
	logger.error("Set FEED_TICKERS to a comma-separated list of market tickers");
	process.exit(1);
}

const created = await FeedClient.create({ logger });
if (!created.ok) {
	logger.error({ err: created.error, hint: created.error.hint }, "Cannot start feed");
	process.exit(1);
}
const feed = created.value;

feed.onStateChange((change) => {
	if (change.to === "failed") {
		logger.error({ err: change.error }, "Session failed; fix the cause and restart");
	}
});
feed.on("trade", (trade) => {
	logger.info(
		{ instrumentId: trade.instrumentId, yesPrice: trade.yesPrice, count: trade.count },
		"Trade",
	);
});

feed.subscribeTicker(tickers);
feed.subscribeTrades(tickers);
feed.subscribeOrderbook(tickers);
feed.start();

let stopping = false;
const shutdown = (signal: string): void => {
	if (stopping) return;
	stopping = true;
	logger.info({ signal }, "Shutting down");
	feed
		.shutdown()
		.then(() => process.exit(0))
		.catch((error: unknown) => {
			logger.error({ err: error }, "Shutdown failed");
			process.exit(1);
		});
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
