import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../lib/logger/index.js";
import type { InstrumentId } from "../shared/identifiers.js";
import { instrumentId } from "../shared/identifiers.js";
import { MemoryStorageBackend } from "./memory-backend.js";
import type { LatestKind, LatestPayloadMap, LatestTicker, StoredRecord, StoredRecordOf } from "./types.js";
import { WriteBehindQueue } from "./write-behind.js";

const KX = instrumentId("KXCPI-26JAN-T0.3");

class FlakyBackend extends MemoryStorageBackend {
	readonly batches: number[] = [];
	latestWrites = 0;
	failAppends = 0;
	gate: Promise<void> | null = null;
	entered: () => void = () => undefined;

	override async appendBatch(records: readonly StoredRecord[]): Promise<void> {
		this.batches.push(records.length);
		this.entered();
		if (this.gate !== null) await this.gate;
		if (this.failAppends > 0) {
			this.failAppends--;
			throw new Error("disk full");
		}
		await super.appendBatch(records);
	}

	override async putLatest<K extends LatestKind>(
		kind: K,
		instrumentId: InstrumentId,
		payload: LatestPayloadMap[K],
	): Promise<void> {
		this.latestWrites++;
		await super.putLatest(kind, instrumentId, payload);
	}
}

/** Writes every stream but one, then fails while that one is in the batch. */
class PartialBackend extends MemoryStorageBackend {
	readonly batches: InstrumentId[][] = [];

	constructor(
		private readonly failing: InstrumentId,
		private failures: number,
	) {
		super();
	}

	override async appendBatch(records: readonly StoredRecord[]): Promise<void> {
		this.batches.push(records.map((r) => r.instrumentId));
		const failing = this.failures > 0 && records.some((r) => r.instrumentId === this.failing);
		await super.appendBatch(failing ? records.filter((r) => r.instrumentId !== this.failing) : records);
		if (failing) {
			this.failures--;
			throw new Error("disk full");
		}
	}
}

function trade(seq: number, instrument: InstrumentId = KX): StoredRecordOf<"trade"> {
	return {
		kind: "trade",
		instrumentId: instrument,
		seq,
		receivedAt: 1_000 + seq,
		payload: { tradeId: `t-${seq}`, yesPrice: 41, noPrice: 59, count: 1, takerSide: "no", ts: null },
	};
}

function ticker(price: number): LatestTicker {
	return {
		instrumentId: KX,
		seq: null,
		updatedAt: 2_000,
		price,
		yesBid: null,
		yesAsk: null,
		spread: null,
		volume: null,
		openInterest: null,
		ts: null,
	};
}

function capture(): { lines: Array<Record<string, unknown>>; logger: ReturnType<typeof createLogger> } {
	const lines: Array<Record<string, unknown>> = [];
	const logger = createLogger({
		level: "info",
		destination: { write: (msg: string) => lines.push(JSON.parse(msg)) },
	});
	return { lines, logger };
}

async function seqs(backend: MemoryStorageBackend, instrument: InstrumentId = KX): Promise<Array<number | null>> {
	const out: Array<number | null> = [];
	for await (const record of backend.scan("trade", instrument)) out.push(record.seq);
	return out;
}

describe("WriteBehindQueue", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("writes appends made in the same tick as one batch", async () => {
		const backend = new FlakyBackend();
		const queue = new WriteBehindQueue({ backend, maxAttempts: 3, retryDelayMs: 0 });

		queue.append(trade(1));
		queue.append(trade(2));
		queue.append(trade(3));
		expect(queue.pending).toBe(3);
		await queue.flush();

		expect(backend.batches).toEqual([3]);
		expect(await seqs(backend)).toEqual([1, 2, 3]);
		expect(queue.stats()).toEqual({ written: 3, dropped: 0, retries: 0, pending: 0 });
	});

	it("splits large backlogs by batch size", async () => {
		const backend = new FlakyBackend();
		const queue = new WriteBehindQueue({ backend, maxAttempts: 1, retryDelayMs: 0, batchSize: 2 });

		for (let seq = 1; seq <= 5; seq++) queue.append(trade(seq));
		await queue.flush();

		expect(backend.batches).toEqual([2, 2, 1]);
		expect(await seqs(backend)).toEqual([1, 2, 3, 4, 5]);
	});

	it("keeps submission order when appends arrive during a write", async () => {
		const backend = new FlakyBackend();
		let release: () => void = () => undefined;
		backend.gate = new Promise((resolve) => {
			release = resolve;
		});
		const entered = new Promise<void>((resolve) => {
			backend.entered = resolve;
		});
		const queue = new WriteBehindQueue({ backend, maxAttempts: 1, retryDelayMs: 0 });

		queue.append(trade(1));
		await entered;
		queue.append(trade(2));
		queue.append(trade(3));
		backend.gate = null;
		release();
		await queue.flush();

		expect(backend.batches).toEqual([1, 2]);
		expect(await seqs(backend)).toEqual([1, 2, 3]);
	});

	it("coalesces latest writes for the same key", async () => {
		const backend = new FlakyBackend();
		const queue = new WriteBehindQueue({ backend, maxAttempts: 1, retryDelayMs: 0 });

		queue.putLatest("ticker", KX, ticker(40));
		queue.putLatest("ticker", KX, ticker(41));
		queue.putLatest("ticker", KX, ticker(42));
		expect(queue.pending).toBe(1);
		await queue.flush();

		expect(backend.latestWrites).toBe(1);
		expect((await backend.getLatest("ticker", KX))?.price).toBe(42);
		expect(queue.stats().written).toBe(1);
	});

	it("retries a failed write until it succeeds", async () => {
		const backend = new FlakyBackend();
		backend.failAppends = 2;
		const queue = new WriteBehindQueue({ backend, maxAttempts: 3, retryDelayMs: 0 });

		queue.append(trade(1));
		await queue.flush();

		expect(backend.batches).toEqual([1, 1, 1]);
		expect(await seqs(backend)).toEqual([1]);
		expect(queue.stats()).toEqual({ written: 1, dropped: 0, retries: 2, pending: 0 });
	});

	it("retries only the stream that failed", async () => {
		const other = instrumentId("KXOTHER");
		const backend = new PartialBackend(other, 1);
		const queue = new WriteBehindQueue({ backend, maxAttempts: 3, retryDelayMs: 0 });

		queue.append(trade(1));
		queue.append(trade(2, other));
		queue.append(trade(3));
		await queue.flush();

		expect(backend.batches).toEqual([[KX, KX], [other], [other]]);
		expect(await seqs(backend)).toEqual([1, 3]);
		expect(await seqs(backend, other)).toEqual([2]);
		expect(queue.stats()).toEqual({ written: 3, dropped: 0, retries: 1, pending: 0 });
	});

	it("drops and logs a write that keeps failing", async () => {
		const backend = new FlakyBackend();
		backend.failAppends = 10;
		const { lines, logger } = capture();
		const queue = new WriteBehindQueue({ backend, maxAttempts: 2, retryDelayMs: 0, logger });

		queue.append(trade(1));
		queue.append(trade(2));
		await expect(queue.flush()).resolves.toBeUndefined();

		expect(queue.stats()).toEqual({ written: 0, dropped: 2, retries: 1, pending: 0 });
		const dropped = lines.find((line) => line["msg"] === "Store write dropped");
		expect(dropped?.["component"]).toBe("write-behind");
		expect(dropped?.["err"]).toMatchObject({
			type: "StoreWriteError",
			message: "Store append failed after 2 attempts",
		});
	});

	it("doubles the delay between attempts", async () => {
		vi.useFakeTimers();
		const backend = new FlakyBackend();
		backend.failAppends = 2;
		const queue = new WriteBehindQueue({ backend, maxAttempts: 3, retryDelayMs: 100 });

		queue.append(trade(1));
		await vi.advanceTimersByTimeAsync(50);
		expect(backend.batches).toHaveLength(1);

		await vi.advanceTimersByTimeAsync(50);
		expect(backend.batches).toHaveLength(2);

		await vi.advanceTimersByTimeAsync(199);
		expect(backend.batches).toHaveLength(2);

		await vi.advanceTimersByTimeAsync(1);
		expect(backend.batches).toHaveLength(3);
		await queue.flush();
		expect(queue.stats().written).toBe(1);
	});

	it("rejects writes after close", async () => {
		const backend = new FlakyBackend();
		const { lines, logger } = capture();
		const queue = new WriteBehindQueue({ backend, maxAttempts: 1, retryDelayMs: 0, logger });

		queue.append(trade(1));
		await queue.close();
		queue.append(trade(2));
		queue.putLatest("ticker", KX, ticker(40));

		expect(await seqs(backend)).toEqual([1]);
		expect(queue.stats()).toEqual({ written: 1, dropped: 2, retries: 0, pending: 0 });
		expect(lines.filter((line) => line["msg"] === "Store is closed, write dropped")).toHaveLength(2);
	});
});
