import { describe, expect, it } from "vitest";
import { instrumentId } from "../shared/identifiers.js";
import { MemoryStorageBackend } from "./memory-backend.js";
import type { LatestTicker, StoredRecordOf } from "./types.js";

const KX = instrumentId("KXCPI-26JAN-T0.3");
const KY = instrumentId("KXFED-26MAR-H0");

function trade(instrument = KX, seq = 1): StoredRecordOf<"trade"> {
	return {
		kind: "trade",
		instrumentId: instrument,
		seq,
		receivedAt: 1_000 * seq,
		payload: { tradeId: `t-${seq}`, yesPrice: 41, noPrice: 59, count: 3, takerSide: "yes", ts: null },
	};
}

function ticker(price: number): LatestTicker {
	return {
		instrumentId: KX,
		seq: null,
		updatedAt: 5_000,
		price,
		yesBid: price - 1,
		yesAsk: price + 1,
		spread: 2,
		volume: 100,
		openInterest: 40,
		ts: 1_700_000_000,
	};
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
	const out: T[] = [];
	for await (const item of source) out.push(item);
	return out;
}

describe("MemoryStorageBackend", () => {
	it("keeps each stream in append order", async () => {
		const backend = new MemoryStorageBackend();
		await backend.appendBatch([trade(KX, 1), trade(KY, 1), trade(KX, 2)]);
		await backend.appendBatch([trade(KX, 3)]);

		const seqs = (await collect(backend.scan("trade", KX))).map((r) => r.seq);
		expect(seqs).toEqual([1, 2, 3]);
		expect(backend.count("trade", KY)).toBe(1);
		expect(backend.count("fill", KX)).toBe(0);
	});

	it("reads the stream afresh on every scan", async () => {
		const backend = new MemoryStorageBackend();
		await backend.appendBatch([trade(KX, 1)]);

		expect(await collect(backend.scan("trade", KX))).toHaveLength(1);
		await backend.appendBatch([trade(KX, 2)]);
		expect(await collect(backend.scan("trade", KX))).toHaveLength(2);
	});

	it("does not expose appends made during an iteration", async () => {
		const backend = new MemoryStorageBackend();
		await backend.appendBatch([trade(KX, 1)]);

		const seen: Array<number | null> = [];
		for await (const record of backend.scan("trade", KX)) {
			seen.push(record.seq);
			await backend.appendBatch([trade(KX, 2)]);
		}
		expect(seen).toEqual([1]);
	});

	it("replaces latest views", async () => {
		const backend = new MemoryStorageBackend();
		expect(await backend.getLatest("ticker", KX)).toBeUndefined();

		await backend.putLatest("ticker", KX, ticker(40));
		await backend.putLatest("ticker", KX, ticker(42));

		expect((await backend.getLatest("ticker", KX))?.price).toBe(42);
		expect(await backend.getLatest("orderbook", KX)).toBeUndefined();
	});
});
