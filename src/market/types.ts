import type { InstrumentId } from "../shared/identifiers.js";

/** Contract side of a binary market's book. Both sides are bid ladders. */
export type BookSide = "yes" | "no";

/** Price in cents (1-99) and resting contract count. */
export interface PriceLevel {
	readonly price: number;
	readonly quantity: number;
}

/**
 * - `empty`: no snapshot received yet
 * - `synced`: snapshot applied and every delta since has matched its sequence
 * - `stale`: a sequence gap was detected; levels are frozen until a new snapshot
 */
export type OrderbookStatus = "empty" | "synced" | "stale";

/** A single signed quantity change at one price on one side. */
export interface LevelChange {
	readonly side: BookSide;
	readonly price: number;
	/** Positive adds contracts, negative removes them */
	readonly delta: number;
}

/** Internal book state, exposed for diagnostics and tests. */
export interface OrderbookSnapshotState {
	readonly instrumentId: InstrumentId;
	readonly status: OrderbookStatus;
	readonly seq: number | null;
	readonly yes: readonly PriceLevel[];
	readonly no: readonly PriceLevel[];
	readonly updatedAt: number;
}

/** A book that is safe to read as current; only produced while `synced`. */
export interface OrderbookView extends OrderbookSnapshotState {
	readonly status: "synced";
}

/** A book that fell out of sequence, with the levels it had when it did. */
export interface StaleOrderbookView extends OrderbookSnapshotState {
	readonly status: "stale";
}

/** What the latest-orderbook surface publishes; consumers must check `status`. */
export type PublishedOrderbook = OrderbookView | StaleOrderbookView;

export type DeltaOutcome =
	| { readonly kind: "applied"; readonly seq: number | null }
	| { readonly kind: "gap"; readonly expected: number | null; readonly received: number | null }
	| { readonly kind: "no_snapshot" }
	| { readonly kind: "stale" };
