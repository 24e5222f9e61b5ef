import { bench, describe } from "vitest";
import { OrderbookState } from "../src/market/orderbook.js";
import type { PriceLevel } from "../src/market/types.js";
import { instrumentId } from "../src/shared/identifiers.js";

function ladder(levels: number, top: number): PriceLevel[] {
	const out: PriceLevel[] = [];
	for (let i = 0; i < levels; i++) out.push({ price: top - i, quantity: (i + 1) * 10 });
	return out;
}

function syncedBook(levels: number): OrderbookState {
	const book = new OrderbookState(instrumentId("KXBENCH"));
	book.applySnapshot({ yes: ladder(levels, 49), no: ladder(levels, 50) }, 0, 0);
	return book;
}

const book20 = syncedBook(20);
const book45 = syncedBook(45);
let seq20 = 0;
let seq45 = 0;

describe("orderbook delta", () => {
	bench("apply delta to 20-level book", () => {
		const price = 49 - (seq20 % 20);
		book20.applyDelta({ side: "yes", price, delta: Math.floor(seq20 / 20) % 2 === 0 ? 5 : -5 }, seq20, seq20 + 1, seq20);
		seq20++;
	});

	bench("apply delta to 45-level book", () => {
		const price = 50 - (seq45 % 45);
		book45.applyDelta({ side: "no", price, delta: Math.floor(seq45 / 45) % 2 === 0 ? 5 : -5 }, seq45, seq45 + 1, seq45);
		seq45++;
	});
});

describe("orderbook snapshot", () => {
	const yes = ladder(45, 49);
	const no = ladder(45, 50);
	const book = new OrderbookState(instrumentId("KXSNAP"));

	bench("apply 45-level snapshot", () => {
		book.applySnapshot({ yes, no }, 1, 0);
	});
});
