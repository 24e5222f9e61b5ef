/**
 * MarketState — in-memory view of everything the handlers have seen.
 *
 * One instance per FeedClient. Holds the last ticker per instrument, one
 * OrderbookState per instrument and bounded buffers of recent trades and fills.
 */

import { BoundedQueue } from "../events/bounded-queue.js";
import type { FillEvent, TradeEvent } from "../events/feed-events.js";
import { OrderbookRegistry } from "../market/orderbook.js";
import type { OrderbookState } from "../market/orderbook.js";
import type { OrderbookView } from "../market/types.js";
import type { LatestTicker } from "../persistence/types.js";
import type { InstrumentId } from "../shared/identifiers.js";

export interface MarketStateOptions {
	/** Trades and fills kept per instrument */
	readonly recentLimit: number;
}

export class MarketState {
	readonly books = new OrderbookRegistry();
	private readonly tickers = new Map<InstrumentId, LatestTicker>();
	private readonly trades = new Map<InstrumentId, BoundedQueue<TradeEvent>>();
	private readonly fills = new Map<InstrumentId, BoundedQueue<FillEvent>>();
	private readonly recentLimit: number;

	constructor(options: MarketStateOptions) {
		if (!Number.isInteger(options.recentLimit) || options.recentLimit < 1) {
			throw new RangeError(`recentLimit must be a positive integer, got: ${options.recentLimit}`);
		}
		this.recentLimit = options.recentLimit;
	}

	upsertTicker(ticker: LatestTicker): void {
		this.tickers.set(ticker.instrumentId, ticker);
	}

	ticker(instrumentId: InstrumentId): LatestTicker | undefined {
		return this.tickers.get(instrumentId);
	}

	book(instrumentId: InstrumentId): OrderbookState {
		return this.books.ensure(instrumentId);
	}

	/** Current book, or null while it is empty or stale. */
	orderbook(instrumentId: InstrumentId): OrderbookView | null {
		return this.books.get(instrumentId)?.view() ?? null;
	}

	/**
	 * Mark every synced book stale; they stay so until their next snapshot.
	 * Returns the books that changed.
	 */
	invalidateBooks(): OrderbookState[] {
		const invalidated: OrderbookState[] = [];
		for (const id of this.instruments()) {
			const book = this.books.get(id);
			if (book?.status === "synced") {
				book.markStale();
				invalidated.push(book);
			}
		}
		return invalidated;
	}

	staleBooks(): InstrumentId[] {
		return this.books.staleInstruments();
	}

	recordTrade(event: TradeEvent): void {
		this.buffer(this.trades, event.instrumentId).push(event);
	}

	recordFill(event: FillEvent): void {
		this.buffer(this.fills, event.instrumentId).push(event);
	}

	/** Most recent trades, oldest first. */
	recentTrades(instrumentId: InstrumentId): TradeEvent[] {
		return this.trades.get(instrumentId)?.toArray() ?? [];
	}

	/** Most recent fills, oldest first. */
	recentFills(instrumentId: InstrumentId): FillEvent[] {
		return this.fills.get(instrumentId)?.toArray() ?? [];
	}

	/** Every instrument with a book. */
	instruments(): InstrumentId[] {
		return this.books.instruments();
	}

	private buffer<T>(
		buffers: Map<InstrumentId, BoundedQueue<T>>,
		instrumentId: InstrumentId,
	): BoundedQueue<T> {
		let buffer = buffers.get(instrumentId);
		if (buffer === undefined) {
			buffer = new BoundedQueue<T>(this.recentLimit);
			buffers.set(instrumentId, buffer);
		}
		return buffer;
	}
}
