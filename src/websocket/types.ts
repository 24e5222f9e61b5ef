import type { SignRequest, SignatureHeaders } from "../auth/types.js";
import type { WsConfig, WsState } from "../lib/websocket/types.js";
import type { FeedError } from "../shared/errors.js";
import type { InstrumentId, SubscriptionId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";

/**
 * Minimal interface for the underlying WebSocket client.
 * Allows injection of stubs for testing.
 */
export interface WsClientLike {
	connect(): Promise<void>;
	send(data: string): Result<void, FeedError>;
	close(): void;
	getState(): WsState;
	onMessage(handler: (data: string) => void): void;
	onClose(handler: (code: number, reason: string) => void): void;
	onError(handler: (error: Error) => void): void;
	clearHandlers(): void;
}

/** Builds one client per connect attempt. */
export type WsClientFactory = (config: WsConfig) => WsClientLike;

/** Anything that can produce signed auth headers; `RequestSigner` in production. */
export interface HeaderSigner {
	sign(request: SignRequest): SignatureHeaders;
}

// ── Subscriptions ────────────────────────────────────────────────────

export const ChannelKind = {
	Ticker: "ticker",
	OrderbookDelta: "orderbook_delta",
	Trade: "trade",
	Fill: "fill",
} as const;

export type ChannelKind = (typeof ChannelKind)[keyof typeof ChannelKind];

export interface Subscription {
	/** Public id, stable across reconnects and resyncs */
	readonly id: SubscriptionId;
	readonly channel: ChannelKind;
	/** Sorted and de-duplicated; empty means every market the channel allows */
	readonly instruments: readonly InstrumentId[];
}

// ── Session lifecycle ────────────────────────────────────────────────

export const SessionState = {
	/** Constructed, never started */
	Idle: "idle",
	/** Dialing the venue */
	Connecting: "connecting",
	/** Socket open, waiting for the venue to accept the credentials */
	Authenticating: "authenticating",
	/** Authenticated; subscriptions live */
	Ready: "ready",
	/** Connection lost; a reconnect is scheduled */
	Degraded: "degraded",
	/** Stopped by the caller */
	Closed: "closed",
	/** Credentials rejected; nothing happens until `start()` is called again */
	Failed: "failed",
} as const;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

export type SessionTransition =
	| { readonly type: "start" }
	| { readonly type: "socket_open" }
	| { readonly type: "authenticated" }
	| { readonly type: "rejected"; readonly error: FeedError }
	| { readonly type: "connection_lost"; readonly error: FeedError }
	| { readonly type: "retry" }
	| { readonly type: "stop" };

export type SessionTransitionType = SessionTransition["type"];

export interface StateChange {
	readonly from: SessionState;
	readonly to: SessionState;
	readonly transition: SessionTransitionType;
	/** Set for `rejected` and `connection_lost` */
	readonly error: FeedError | null;
	readonly at: number;
}

export const StateErrorKind = {
	InvalidTransition: "invalid_transition",
	AlreadyClosed: "already_closed",
} as const;

export type StateErrorKind = (typeof StateErrorKind)[keyof typeof StateErrorKind];

export interface StateError {
	readonly kind: StateErrorKind;
	readonly message: string;
	readonly from: SessionState;
	readonly transition: SessionTransitionType;
}

export interface SessionEvents {
	state_change: (change: StateChange) => void;
	/** Emitted after every held subscription has been re-sent on a new connection */
	resubscribed: (subscriptions: readonly Subscription[]) => void;
}

export interface SessionStats {
	readonly state: SessionState;
	/** Successful transitions back to `ready` after the first */
	readonly reconnects: number;
	/** Consecutive failed attempts since the last `ready` */
	readonly attempt: number;
	readonly lastError: FeedError | null;
	readonly framesReceived: number;
	readonly subscriptions: number;
	readonly resyncsInFlight: number;
}
