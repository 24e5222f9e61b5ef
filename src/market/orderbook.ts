import type { InstrumentId } from "../shared/identifiers.js";
import type {
	BookSide,
	DeltaOutcome,
	LevelChange,
	OrderbookSnapshotState,
	OrderbookStatus,
	OrderbookView,
	PriceLevel,
	PublishedOrderbook,
} from "./types.js";

/**
 * Normalises a raw ladder: drops non-positive quantities, keeps the last entry
 * for a repeated price, sorts best-first (descending price).
 */
export function normalizeLevels(levels: readonly PriceLevel[]): PriceLevel[] {
	const map = new Map<number, number>();
	for (const lvl of levels) {
		if (lvl.quantity > 0) {
			map.set(lvl.price, lvl.quantity);
		} else {
			map.delete(lvl.price);
		}
	}
	return sortedLevels(map);
}

/**
 * Applies one signed change to a ladder, returning a new ladder.
 * A level whose quantity reaches zero or below is removed; a negative change
 * at an absent price is a no-op.
 */
export function applyLevelChange(
	levels: readonly PriceLevel[],
	price: number,
	delta: number,
): PriceLevel[] {
	const map = new Map<number, number>();
	for (const lvl of levels) map.set(lvl.price, lvl.quantity);

	const next = (map.get(price) ?? 0) + delta;
	if (next > 0) {
		map.set(price, next);
	} else {
		map.delete(price);
	}
	return sortedLevels(map);
}

function sortedLevels(map: ReadonlyMap<number, number>): PriceLevel[] {
	const levels = [...map.entries()].map(([price, quantity]) => ({ price, quantity }));
	levels.sort((a, b) => b.price - a.price);
	return levels;
}

/** Highest resting bid on a side, or null for an empty ladder. */
export function bestBid(book: OrderbookSnapshotState, side: BookSide): number | null {
	return book[side][0]?.price ?? null;
}

/**
 * Implied ask for YES: a NO bid at p is a YES offer at 100 - p.
 */
export function impliedYesAsk(book: OrderbookSnapshotState): number | null {
	const noBid = bestBid(book, "no");
	return noBid === null ? null : 100 - noBid;
}

/** YES spread in cents, or null if either side is empty. */
export function spread(book: OrderbookSnapshotState): number | null {
	const bid = bestBid(book, "yes");
	const ask = impliedYesAsk(book);
	if (bid === null || ask === null) return null;
	return ask - bid;
}

/**
 * Per-instrument book kept in sync from a snapshot plus sequence-checked deltas.
 *
 * A delta is applied only when its `prevSeq` equals the sequence of the last
 * applied message. Any mismatch, or a delta before the first snapshot, marks
 * the book stale without touching its levels; only a fresh snapshot
 * resynchronises it.
 */
export class OrderbookState {
	readonly instrumentId: InstrumentId;
	private _status: OrderbookStatus = "empty";
	private _seq: number | null = null;
	private yes: PriceLevel[] = [];
	private no: PriceLevel[] = [];
	private updatedAt = 0;

	constructor(instrumentId: InstrumentId) {
		this.instrumentId = instrumentId;
	}

	get status(): OrderbookStatus {
		return this._status;
	}

	get seq(): number | null {
		return this._seq;
	}

	/** Replace both ladders and mark the book synced. */
	applySnapshot(
		levels: { readonly yes: readonly PriceLevel[]; readonly no: readonly PriceLevel[] },
		seq: number | null,
		receivedAt: number,
	): void {
		this.yes = normalizeLevels(levels.yes);
		this.no = normalizeLevels(levels.no);
		this._seq = seq;
		this._status = "synced";
		this.updatedAt = receivedAt;
	}

	/**
	 * Apply one delta if it continues the sequence.
	 * @param prevSeq - sequence the delta expects to follow
	 * @param seq - sequence carried by the delta itself
	 */
	applyDelta(
		change: LevelChange,
		prevSeq: number | null,
		seq: number | null,
		receivedAt: number,
	): DeltaOutcome {
		switch (this._status) {
			case "empty":
				this._status = "stale";
				return { kind: "no_snapshot" };
			case "stale":
				return { kind: "stale" };
			case "synced":
				break;
		}

		if (prevSeq === null || this._seq === null || prevSeq !== this._seq) {
			this._status = "stale";
			return { kind: "gap", expected: this._seq, received: prevSeq };
		}

		if (change.side === "yes") {
			this.yes = applyLevelChange(this.yes, change.price, change.delta);
		} else {
			this.no = applyLevelChange(this.no, change.price, change.delta);
		}
		this._seq = seq;
		this.updatedAt = receivedAt;
		return { kind: "applied", seq };
	}

	/** Force the book stale, e.g. when its subscription is being resynchronised. */
	markStale(): void {
		if (this._status === "synced") this._status = "stale";
	}

	/** Current book, or null unless synced. */
	view(): OrderbookView | null {
		if (this._status !== "synced") return null;
		return {
			instrumentId: this.instrumentId,
			status: "synced",
			seq: this._seq,
			yes: this.yes,
			no: this.no,
			updatedAt: this.updatedAt,
		};
	}

	/** The book as published to the store: null until it has seen any message. */
	published(): PublishedOrderbook | null {
		const base = {
			instrumentId: this.instrumentId,
			seq: this._seq,
			yes: this.yes,
			no: this.no,
			updatedAt: this.updatedAt,
		};
		switch (this._status) {
			case "empty":
				return null;
			case "synced":
				return { ...base, status: "synced" };
			case "stale":
				return { ...base, status: "stale" };
		}
	}

	/** Full internal state regardless of status. */
	state(): OrderbookSnapshotState {
		return {
			instrumentId: this.instrumentId,
			status: this._status,
			seq: this._seq,
			yes: this.yes,
			no: this.no,
			updatedAt: this.updatedAt,
		};
	}
}

/** Lazily creates one OrderbookState per instrument. */
export class OrderbookRegistry {
	private readonly books = new Map<InstrumentId, OrderbookState>();

	get(instrumentId: InstrumentId): OrderbookState | undefined {
		return this.books.get(instrumentId);
	}

	ensure(instrumentId: InstrumentId): OrderbookState {
		let book = this.books.get(instrumentId);
		if (book === undefined) {
			book = new OrderbookState(instrumentId);
			this.books.set(instrumentId, book);
		}
		return book;
	}

	instruments(): InstrumentId[] {
		return [...this.books.keys()];
	}

	/** Instruments whose book is currently stale. */
	staleInstruments(): InstrumentId[] {
		const stale: InstrumentId[] = [];
		for (const [id, book] of this.books) {
			if (book.status === "stale") stale.push(id);
		}
		return stale;
	}

	get size(): number {
		return this.books.size;
	}
}
