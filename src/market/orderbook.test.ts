import { describe, expect, it } from "vitest";
import { instrumentId } from "../shared/identifiers.js";
import {
	OrderbookRegistry,
	OrderbookState,
	applyLevelChange,
	bestBid,
	impliedYesAsk,
	normalizeLevels,
	spread,
} from "./orderbook.js";

const BTC = instrumentId("KXBTC-26FEB");

function syncedBook(seq = 100): OrderbookState {
	const book = new OrderbookState(BTC);
	book.applySnapshot(
		{
			yes: [
				{ price: 44, quantity: 200 },
				{ price: 45, quantity: 100 },
			],
			no: [{ price: 53, quantity: 150 }],
		},
		seq,
		1_000,
	);
	return book;
}

describe("orderbook ladders", () => {
	describe("normalizeLevels", () => {
		it("sorts best-first and drops empty levels", () => {
			expect(
				normalizeLevels([
					{ price: 40, quantity: 5 },
					{ price: 47, quantity: 0 },
					{ price: 45, quantity: 10 },
				]),
			).toEqual([
				{ price: 45, quantity: 10 },
				{ price: 40, quantity: 5 },
			]);
		});

		it("keeps the last quantity for a repeated price", () => {
			expect(
				normalizeLevels([
					{ price: 45, quantity: 10 },
					{ price: 45, quantity: 30 },
				]),
			).toEqual([{ price: 45, quantity: 30 }]);
		});
	});

	describe("applyLevelChange", () => {
		it("adds a new level in price order", () => {
			const levels = applyLevelChange([{ price: 45, quantity: 100 }], 46, 50);
			expect(levels).toEqual([
				{ price: 46, quantity: 50 },
				{ price: 45, quantity: 100 },
			]);
		});

		it("adds to an existing level", () => {
			expect(applyLevelChange([{ price: 45, quantity: 100 }], 45, 25)).toEqual([
				{ price: 45, quantity: 125 },
			]);
		});

		it("removes a level that reaches zero", () => {
			expect(applyLevelChange([{ price: 45, quantity: 100 }], 45, -100)).toEqual([]);
		});

		it("ignores a removal at an absent price", () => {
			expect(applyLevelChange([{ price: 45, quantity: 100 }], 30, -5)).toEqual([
				{ price: 45, quantity: 100 },
			]);
		});
	});

	describe("derived prices", () => {
		it("reads best bids, implied ask and spread", () => {
			const state = syncedBook().state();
			expect(bestBid(state, "yes")).toBe(45);
			expect(bestBid(state, "no")).toBe(53);
			expect(impliedYesAsk(state)).toBe(47);
			expect(spread(state)).toBe(2);
		});

		it("returns null on an empty side", () => {
			const state = new OrderbookState(BTC).state();
			expect(bestBid(state, "yes")).toBeNull();
			expect(spread(state)).toBeNull();
		});
	});
});

describe("OrderbookState", () => {
	it("starts empty with no view", () => {
		const book = new OrderbookState(BTC);
		expect(book.status).toBe("empty");
		expect(book.view()).toBeNull();
	});

	it("snapshot replaces levels and marks synced", () => {
		const book = syncedBook(100);
		expect(book.status).toBe("synced");
		expect(book.seq).toBe(100);
		expect(book.view()?.yes).toEqual([
			{ price: 45, quantity: 100 },
			{ price: 44, quantity: 200 },
		]);
	});

	it("applies a delta whose prevSeq matches", () => {
		const book = syncedBook(100);
		const outcome = book.applyDelta({ side: "yes", price: 46, delta: 50 }, 100, 101, 2_000);

		expect(outcome).toEqual({ kind: "applied", seq: 101 });
		expect(book.seq).toBe(101);
		expect(book.view()?.yes[0]).toEqual({ price: 46, quantity: 50 });
		expect(book.view()?.updatedAt).toBe(2_000);
	});

	it("goes stale on a gap without touching levels", () => {
		const book = syncedBook(100);
		book.applyDelta({ side: "yes", price: 46, delta: 50 }, 100, 101, 2_000);
		const before = book.state();

		const outcome = book.applyDelta({ side: "no", price: 53, delta: -150 }, 105, 106, 3_000);

		expect(outcome).toEqual({ kind: "gap", expected: 101, received: 105 });
		expect(book.status).toBe("stale");
		expect(book.view()).toBeNull();
		const after = book.state();
		expect(after.yes).toEqual(before.yes);
		expect(after.no).toEqual(before.no);
		expect(after.seq).toBe(101);
	});

	it("treats a delta without prevSeq as a gap", () => {
		const book = syncedBook(100);
		expect(book.applyDelta({ side: "yes", price: 46, delta: 1 }, null, null, 0)).toEqual({
			kind: "gap",
			expected: 100,
			received: null,
		});
	});

	it("marks a delta before any snapshot as stale", () => {
		const book = new OrderbookState(BTC);
		expect(book.applyDelta({ side: "yes", price: 46, delta: 5 }, 1, 2, 0)).toEqual({
			kind: "no_snapshot",
		});
		expect(book.status).toBe("stale");
		expect(book.state().yes).toEqual([]);
	});

	it("ignores further deltas while stale", () => {
		const book = syncedBook(100);
		book.applyDelta({ side: "yes", price: 46, delta: 5 }, 99, 100, 0);
		expect(book.applyDelta({ side: "yes", price: 46, delta: 5 }, 100, 101, 0)).toEqual({
			kind: "stale",
		});
	});

	it("a fresh snapshot resynchronises a stale book", () => {
		const book = syncedBook(100);
		book.markStale();
		expect(book.view()).toBeNull();

		book.applySnapshot({ yes: [{ price: 50, quantity: 1 }], no: [] }, 200, 5_000);

		expect(book.status).toBe("synced");
		expect(book.view()?.yes).toEqual([{ price: 50, quantity: 1 }]);
		expect(book.applyDelta({ side: "no", price: 48, delta: 3 }, 200, 201, 5_001).kind).toBe(
			"applied",
		);
	});
});

describe("OrderbookRegistry", () => {
	it("creates one book per instrument", () => {
		const registry = new OrderbookRegistry();
		const a = registry.ensure(BTC);
		expect(registry.ensure(BTC)).toBe(a);
		expect(registry.get(instrumentId("OTHER"))).toBeUndefined();
		expect(registry.size).toBe(1);
		expect(registry.instruments()).toEqual([BTC]);
	});

	it("lists stale instruments", () => {
		const registry = new OrderbookRegistry();
		const other = instrumentId("KXCPI-26JAN");
		registry.ensure(BTC).applyDelta({ side: "yes", price: 1, delta: 1 }, 1, 2, 0);
		registry.ensure(other).applySnapshot({ yes: [], no: [] }, 1, 0);

		expect(registry.staleInstruments()).toEqual([BTC]);
	});
});
