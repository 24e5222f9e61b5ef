/**
 * Orderbook handlers — keep each book in sequence and ask for a new
 * snapshot the moment it falls out of sync.
 *
 * Every delta is appended, applied or not, so the stored stream shows
 * exactly what the venue sent. The latest view follows the book's status:
 * a book that goes stale is republished as stale.
 */

import type { FeedHandler } from "../events/event-dispatcher.js";
import type { OrderbookState } from "../market/orderbook.js";
import { deltaRecord, snapshotRecord } from "./records.js";
import type { HandlerContext, RecordSink } from "./types.js";

/** Replace the latest-orderbook view with the book as it stands now. */
export function publishOrderbook(store: RecordSink, book: OrderbookState): void {
	const latest = book.published();
	if (latest !== null) store.upsertLatest(book.instrumentId, "orderbook", latest);
}

export function createSnapshotHandler(ctx: HandlerContext): FeedHandler<"orderbook_snapshot"> {
	const log = ctx.logger.child({ component: "orderbook" });
	return (event) => {
		const book = ctx.state.book(event.instrumentId);
		const wasStale = book.status === "stale";
		book.applySnapshot(event, event.seq, event.receivedAt);
		ctx.store.append(snapshotRecord(event));
		publishOrderbook(ctx.store, book);
		if (wasStale) log.info({ instrumentId: event.instrumentId, seq: event.seq }, "Orderbook resynced");
	};
}

export function createDeltaHandler(ctx: HandlerContext): FeedHandler<"orderbook_delta"> {
	const log = ctx.logger.child({ component: "orderbook" });
	return (event) => {
		const book = ctx.state.book(event.instrumentId);
		const outcome = book.applyDelta(event, event.prevSeq, event.seq, event.receivedAt);
		ctx.store.append(deltaRecord(event));

		if (outcome.kind === "applied") {
			publishOrderbook(ctx.store, book);
			return;
		}

		const requested = ctx.session.requestSnapshot(event.instrumentId);
		const fields = { instrumentId: event.instrumentId, seq: event.seq, prevSeq: event.prevSeq, requested };
		switch (outcome.kind) {
			case "gap":
				publishOrderbook(ctx.store, book);
				log.warn({ ...fields, expected: outcome.expected }, "Orderbook sequence gap, book marked stale");
				break;
			case "no_snapshot":
				publishOrderbook(ctx.store, book);
				log.warn(fields, "Delta before any snapshot, book marked stale");
				break;
			case "stale":
				log.debug(fields, "Delta for stale book ignored");
				break;
		}
	};
}
