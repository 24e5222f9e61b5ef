/**
 * Feed events — the closed set of messages the venue pushes.
 *
 * Every inbound frame becomes exactly one FeedEvent. Market variants carry the
 * instrument, the server subscription id and the sequence number; control
 * variants (`ack`, `error`) drive the session manager; `unknown` keeps frames
 * of a type this client does not model so they can be logged, not rejected.
 */

import type { BookSide, PriceLevel } from "../market/types.js";
import type { InstrumentId } from "../shared/identifiers.js";

interface MarketEventBase {
	readonly instrumentId: InstrumentId;
	/** Server-assigned subscription id */
	readonly sid: number | null;
	readonly seq: number | null;
	/** Local receipt time (ms since epoch) */
	readonly receivedAt: number;
}

export interface TickerEvent extends MarketEventBase {
	readonly kind: "ticker";
	readonly price: number | null;
	readonly yesBid: number | null;
	readonly yesAsk: number | null;
	/** yesAsk − yesBid when both sides are quoted */
	readonly spread: number | null;
	readonly volume: number | null;
	readonly openInterest: number | null;
	/** Venue timestamp (seconds since epoch) */
	readonly ts: number | null;
}

export interface OrderbookSnapshotEvent extends MarketEventBase {
	readonly kind: "orderbook_snapshot";
	readonly yes: readonly PriceLevel[];
	readonly no: readonly PriceLevel[];
}

export interface OrderbookDeltaEvent extends MarketEventBase {
	readonly kind: "orderbook_delta";
	/** Sequence this delta must follow: explicit `prev_seq`, else `seq - 1` */
	readonly prevSeq: number | null;
	readonly side: BookSide;
	readonly price: number;
	readonly delta: number;
	/** Present when the change was caused by one of our own orders */
	readonly clientOrderId: string | null;
}

export interface TradeEvent extends MarketEventBase {
	readonly kind: "trade";
	readonly tradeId: string | null;
	readonly yesPrice: number;
	readonly noPrice: number;
	readonly count: number;
	readonly takerSide: BookSide;
	readonly ts: number | null;
}

export interface FillEvent extends MarketEventBase {
	readonly kind: "fill";
	readonly tradeId: string | null;
	readonly orderId: string;
	readonly isTaker: boolean;
	readonly side: BookSide;
	readonly action: "buy" | "sell";
	readonly count: number;
	readonly yesPrice: number;
	readonly ts: number | null;
}

export interface ErrorEvent {
	readonly kind: "error";
	readonly code: number | null;
	readonly message: string;
	/** Id of the command this error answers, if any */
	readonly commandId: number | null;
	readonly sid: number | null;
	/** Session-fatal: the session must be recycled */
	readonly fatal: boolean;
	readonly receivedAt: number;
}

export type AckType = "subscribed" | "unsubscribed" | "ok" | "authenticated";

export interface AckEvent {
	readonly kind: "ack";
	readonly ackType: AckType;
	readonly commandId: number | null;
	readonly sid: number | null;
	readonly channel: string | null;
	readonly receivedAt: number;
}

export interface UnknownEvent {
	readonly kind: "unknown";
	readonly type: string;
	readonly body: unknown;
	readonly receivedAt: number;
}

export type FeedEvent =
	| TickerEvent
	| OrderbookSnapshotEvent
	| OrderbookDeltaEvent
	| TradeEvent
	| FillEvent
	| ErrorEvent
	| AckEvent
	| UnknownEvent;

export type FeedEventKind = FeedEvent["kind"];

/** Event type by kind, e.g. `FeedEventOf<"trade">` is TradeEvent. */
export type FeedEventMap = { [E in FeedEvent as E["kind"]]: E };
export type FeedEventOf<K extends FeedEventKind> = FeedEventMap[K];

export type MarketEvent = Extract<FeedEvent, { readonly instrumentId: InstrumentId }>;

export const FEED_EVENT_KINDS: readonly FeedEventKind[] = [
	"ticker",
	"orderbook_snapshot",
	"orderbook_delta",
	"trade",
	"fill",
	"error",
	"ack",
	"unknown",
];

export function isMarketEvent(event: FeedEvent): event is MarketEvent {
	return "instrumentId" in event;
}

/** Freeze an event and its level arrays. */
export function freezeEvent<E extends FeedEvent>(event: E): E {
	const e: FeedEvent = event;
	if (e.kind === "orderbook_snapshot") {
		for (const lvl of e.yes) Object.freeze(lvl);
		for (const lvl of e.no) Object.freeze(lvl);
		Object.freeze(e.yes);
		Object.freeze(e.no);
	}
	return Object.freeze(event);
}
