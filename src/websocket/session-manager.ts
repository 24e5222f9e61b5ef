/**
 * SessionManager — owns the one live connection to the venue.
 *
 * It signs every connect attempt, authenticates, re-sends the held
 * subscriptions once the venue accepts us, and reconnects with capped
 * exponential backoff whenever the connection is lost. Inbound frames go
 * straight to the FrameSink; only control replies (acks, errors) are looked
 * at here.
 *
 * Each connect attempt gets a new client and a new generation number.
 * Frames, closes and connect completions from an older generation are
 * ignored, so a late callback can never act on the current connection.
 */

import type { FrameSink } from "../events/event-dispatcher.js";
import type { AckEvent, ErrorEvent } from "../events/feed-events.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { ValidationError } from "../lib/validation/index.js";
import { WsClient } from "../lib/websocket/client.js";
import type { FeedConfig } from "../shared/config.js";
import {
	CredentialError,
	type FeedError,
	HandshakeRejectedError,
	TransportError,
	classifyError,
} from "../shared/errors.js";
import type { InstrumentId, SubscriptionId } from "../shared/identifiers.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { OutboundQueue } from "./outbound-queue.js";
import type { Command } from "./protocol.js";
import { BackoffPolicy } from "./reconnection.js";
import { SessionStateMachine } from "./session-state.js";
import { SubscriptionRegistry } from "./subscriptions.js";
import {
	type ChannelKind,
	type HeaderSigner,
	type SessionEvents,
	SessionState,
	type SessionStats,
	type SessionTransition,
	type Subscription,
	type WsClientFactory,
	type WsClientLike,
} from "./types.js";

export type SessionConfig = Pick<
	FeedConfig,
	| "wsUrl"
	| "signPath"
	| "authMode"
	| "subscriptionIdMode"
	| "baseDelayMs"
	| "maxDelayMs"
	| "jitterFactor"
	| "pingIntervalMs"
	| "pongTimeoutMs"
	| "readTimeoutMs"
	| "handshakeTimeoutMs"
	| "authTimeoutMs"
>;

export interface SessionManagerOptions {
	readonly config: SessionConfig;
	readonly signer: HeaderSigner;
	readonly sink: FrameSink;
	readonly clientFactory?: WsClientFactory | undefined;
	readonly clock?: Clock | undefined;
	readonly logger?: Logger | undefined;
	/** Jitter source for the backoff; Math.random by default */
	readonly random?: (() => number) | undefined;
}

type Timer = ReturnType<typeof setTimeout>;

const defaultClientFactory: WsClientFactory = (config) => new WsClient(config);

export class SessionManager {
	private readonly config: SessionConfig;
	private readonly signer: HeaderSigner;
	private readonly sink: FrameSink;
	private readonly clientFactory: WsClientFactory;
	private readonly log: Logger;

	private readonly events = new TypedEmitter<SessionEvents>();
	private readonly fsm: SessionStateMachine;
	private readonly backoff: BackoffPolicy;
	private readonly registry: SubscriptionRegistry;
	private readonly outbound: OutboundQueue;

	private client: WsClientLike | null = null;
	private generation = 0;
	private retryTimer: Timer | null = null;
	private authTimer: Timer | null = null;
	private readyOnce = false;
	private reconnects = 0;
	private framesReceived = 0;

	constructor(options: SessionManagerOptions) {
		this.config = options.config;
		this.signer = options.signer;
		this.sink = options.sink;
		this.clientFactory = options.clientFactory ?? defaultClientFactory;
		this.log = (options.logger ?? silentLogger()).child({ component: "session" });
		this.fsm = new SessionStateMachine(options.clock ?? SystemClock);
		this.backoff = new BackoffPolicy({
			baseDelayMs: options.config.baseDelayMs,
			maxDelayMs: options.config.maxDelayMs,
			jitterFactor: options.config.jitterFactor,
			random: options.random,
		});
		this.registry = new SubscriptionRegistry(options.config.subscriptionIdMode);
		this.outbound = new OutboundQueue(this.log);
	}

	/** Listen for session events; returns the function that removes the listener. */
	on<K extends keyof SessionEvents & string>(event: K, listener: SessionEvents[K]): () => void {
		return this.events.subscribe(event, listener);
	}

	// ── Queries ────────────────────────────────────────────────────

	get state(): SessionState {
		return this.fsm.state();
	}

	subscriptions(): Subscription[] {
		return this.registry.list();
	}

	stats(): SessionStats {
		return {
			state: this.fsm.state(),
			reconnects: this.reconnects,
			attempt: this.backoff.attempts,
			lastError: this.fsm.error(),
			framesReceived: this.framesReceived,
			subscriptions: this.registry.size,
			resyncsInFlight: this.registry.resyncsInFlight,
		};
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/** Begin connecting. No-op unless idle, closed or failed. */
	start(): void {
		if (!this.transition({ type: "start" })) return;
		this.backoff.reset();
		this.connect();
	}

	/**
	 * Stop for good: cancels any pending reconnect, unsubscribes best-effort
	 * and closes the socket. Idempotent.
	 */
	stop(): void {
		if (this.fsm.state() === SessionState.Closed) return;
		this.clearTimers();

		if (this.fsm.state() === SessionState.Ready) {
			const sids = this.registry.activeSids();
			if (sids.length > 0) {
				const result = this.outbound.send(this.registry.unsubscribeCommand(sids));
				if (!result.ok) this.log.debug({ err: result.error }, "Unsubscribe on stop failed");
			}
		}

		this.generation++;
		this.teardown();
		this.transition({ type: "stop" });
	}

	/** Recycle the connection; used for session-fatal venue errors. */
	forceDegraded(reason: string): void {
		if (!this.fsm.isActive()) return;
		this.connectionLost(new TransportError(reason, { forced: true }));
	}

	// ── Subscriptions ──────────────────────────────────────────────

	/**
	 * Hold a subscription and send it when ready. Subscribing again to the same
	 * channel and instrument set returns the existing id.
	 *
	 * An `orderbook_delta` subscription covers exactly one instrument: the venue
	 * numbers messages per subscription, and books are sequence-checked per
	 * instrument.
	 */
	subscribe(channel: ChannelKind, instruments: readonly InstrumentId[]): SubscriptionId {
		if (channel === "orderbook_delta" && new Set(instruments).size !== 1) {
			throw new ValidationError(
				`orderbook_delta subscriptions take exactly one instrument, got ${new Set(instruments).size}`,
				[],
			);
		}
		const { subscription, created } = this.registry.add(channel, instruments);
		if (created) {
			this.log.info(
				{ id: subscription.id, channel, instruments: subscription.instruments },
				"Subscription added",
			);
			if (this.fsm.state() === SessionState.Ready) this.sendSubscribe(subscription.id);
		}
		return subscription.id;
	}

	/** Returns false when the id is not held. */
	unsubscribe(id: SubscriptionId): boolean {
		const { removed, sid } = this.registry.remove(id);
		if (!removed) return false;
		this.log.info({ id, sid }, "Subscription removed");
		if (sid !== null && this.fsm.state() === SessionState.Ready) {
			this.sendOrLose(this.registry.unsubscribeCommand([sid]));
		}
		return true;
	}

	/**
	 * Ask the venue for a fresh orderbook snapshot by resubscribing every
	 * orderbook subscription that covers the instrument. Returns how many
	 * resyncs were started; subscriptions with one already in flight are skipped.
	 */
	requestSnapshot(instrument: InstrumentId): number {
		if (this.fsm.state() !== SessionState.Ready) return 0;
		const started = this.registry.beginResync(instrument);
		for (const { id, sid } of started) {
			this.log.info({ instrumentId: instrument, id, sid }, "Resyncing orderbook subscription");
			this.outbound.enqueue(this.registry.unsubscribeCommand([sid]));
			const command = this.registry.subscribeCommand(id);
			if (command !== undefined) this.outbound.enqueue(command);
		}
		if (started.length > 0) this.flushOrLose();
		return started.length;
	}

	// ── Connection ─────────────────────────────────────────────────

	private connect(): void {
		const generation = ++this.generation;
		this.openConnection(generation).catch((error: unknown) => {
			this.log.error({ err: error }, "Connect attempt failed unexpectedly");
			if (generation === this.generation) this.connectionLost(classifyError(error));
		});
	}

	private async openConnection(generation: number): Promise<void> {
		const { config } = this;
		let headers: Readonly<Record<string, string>>;
		try {
			headers = this.signer.sign({ method: "GET", path: config.signPath });
		} catch (error: unknown) {
			const feedError = classifyError(error);
			if (feedError instanceof CredentialError) this.reject(feedError);
			else this.connectionLost(feedError);
			return;
		}

		const client = this.clientFactory({
			url: config.wsUrl,
			headers: config.authMode === "handshake" ? headers : undefined,
			pingIntervalMs: config.pingIntervalMs,
			pongTimeoutMs: config.pongTimeoutMs,
			readTimeoutMs: config.readTimeoutMs,
			handshakeTimeoutMs: config.handshakeTimeoutMs,
		});
		this.client = client;
		client.onMessage((data) => this.onFrame(generation, data));
		client.onClose((code, reason) => this.onSocketClosed(generation, code, reason));
		client.onError((error) => {
			if (generation === this.generation) this.log.warn({ err: error }, "Socket error");
		});

		this.log.info({ url: config.wsUrl, generation, authMode: config.authMode }, "Connecting");
		try {
			await client.connect();
		} catch (error: unknown) {
			if (generation !== this.generation) return;
			const feedError = classifyError(error);
			if (feedError instanceof HandshakeRejectedError) this.reject(feedError);
			else this.connectionLost(feedError);
			return;
		}

		if (generation !== this.generation) {
			// stopped or superseded while dialing
			client.clearHandlers();
			client.close();
			return;
		}
		this.onSocketOpen(client, headers);
	}

	private onSocketOpen(client: WsClientLike, headers: Readonly<Record<string, string>>): void {
		if (!this.transition({ type: "socket_open" })) return;
		this.outbound.attach(client);

		if (this.config.authMode === "handshake") {
			this.onAuthenticated();
			return;
		}

		const generation = this.generation;
		this.authTimer = setTimeout(() => {
			this.authTimer = null;
			if (generation !== this.generation) return;
			this.connectionLost(
				new TransportError("Authentication timed out", { timeoutMs: this.config.authTimeoutMs }),
			);
		}, this.config.authTimeoutMs);
		this.sendOrLose(this.registry.authenticateCommand(headers));
	}

	private onAuthenticated(): void {
		this.clearAuthTimer();
		if (!this.transition({ type: "authenticated" })) return;
		if (this.readyOnce) this.reconnects++;
		this.readyOnce = true;
		this.backoff.reset();
		this.resubscribeAll();
	}

	private resubscribeAll(): void {
		const held = this.registry.list();
		for (const sub of held) {
			const command = this.registry.subscribeCommand(sub.id);
			if (command !== undefined) this.outbound.enqueue(command);
		}
		if (!this.flushOrLose()) return;
		this.log.info({ count: held.length }, "Subscriptions sent");
		this.safeEmit("resubscribed", held);
	}

	// ── Inbound ────────────────────────────────────────────────────

	private onFrame(generation: number, data: string): void {
		if (generation !== this.generation) return;
		this.framesReceived++;

		const outcome = this.sink.onFrame(data);
		if (outcome.status === "malformed") {
			if (outcome.tripped) {
				this.connectionLost(
					new TransportError("Malformed frame threshold exceeded", { cause: outcome.error }),
				);
			}
			return;
		}

		const { event } = outcome;
		if (event.kind === "ack") this.onAck(event);
		else if (event.kind === "error") this.onVenueError(event);
	}

	private onAck(ack: AckEvent): void {
		const resolution = this.registry.resolveAck(ack);
		switch (resolution.kind) {
			case "authenticated":
				if (this.fsm.state() === SessionState.Authenticating) this.onAuthenticated();
				break;
			case "subscribed":
				this.log.debug(
					{ id: resolution.subscription.id, sid: resolution.sid },
					"Subscription confirmed",
				);
				break;
			case "orphaned":
				// removed before the venue confirmed it
				if (this.fsm.state() === SessionState.Ready) {
					this.sendOrLose(this.registry.unsubscribeCommand([resolution.sid]));
				}
				break;
			case "unsubscribed":
			case "untracked":
				break;
		}
	}

	private onVenueError(event: ErrorEvent): void {
		const resolution = this.registry.resolveError(event.commandId);
		switch (resolution.kind) {
			case "authenticate_failed":
				this.reject(
					new HandshakeRejectedError(`Authentication rejected: ${event.message}`, null, {
						venueCode: event.code,
					}),
				);
				break;
			case "subscribe_failed":
				this.log.warn(
					{ id: resolution.subscription.id, code: event.code, venueMessage: event.message },
					"Subscribe rejected by venue",
				);
				break;
			case "other":
				break;
		}
	}

	private onSocketClosed(generation: number, code: number, reason: string): void {
		if (generation !== this.generation) return;
		this.connectionLost(new TransportError(`Connection closed (${code})`, { code, reason }));
	}

	// ── Failure handling ───────────────────────────────────────────

	private connectionLost(error: FeedError): void {
		if (!this.fsm.isActive()) return;
		this.clearAuthTimer();
		this.generation++;
		this.teardown();
		if (!this.transition({ type: "connection_lost", error })) return;
		this.scheduleRetry();
	}

	private reject(error: FeedError): void {
		this.clearTimers();
		this.generation++;
		this.teardown();
		this.transition({ type: "rejected", error });
	}

	private scheduleRetry(): void {
		const delayMs = this.backoff.nextDelay();
		this.log.info({ delayMs, attempt: this.backoff.attempts }, "Reconnect scheduled");
		this.retryTimer = setTimeout(() => {
			this.retryTimer = null;
			if (this.transition({ type: "retry" })) this.connect();
		}, delayMs);
	}

	private teardown(): void {
		const discarded = this.outbound.detach();
		if (discarded > 0) this.log.debug({ discarded }, "Unsent commands discarded");
		this.registry.resetConnection();
		const client = this.client;
		this.client = null;
		if (client !== null) {
			client.clearHandlers();
			client.close();
		}
	}

	// ── Helpers ────────────────────────────────────────────────────

	private sendSubscribe(id: SubscriptionId): void {
		const command = this.registry.subscribeCommand(id);
		if (command !== undefined) this.sendOrLose(command);
	}

	private sendOrLose(command: Command): void {
		const result = this.outbound.send(command);
		if (!result.ok) this.connectionLost(result.error);
	}

	/** Returns false when a write failed and the connection was dropped. */
	private flushOrLose(): boolean {
		const result = this.outbound.flush();
		if (result.ok) return true;
		this.connectionLost(result.error);
		return false;
	}

	private transition(t: SessionTransition): boolean {
		const result = this.fsm.transition(t);
		if (!result.ok) {
			this.log.debug({ from: result.error.from, transition: t.type }, result.error.message);
			return false;
		}
		const change = result.value;
		const fields = {
			from: change.from,
			to: change.to,
			transition: change.transition,
			...(change.error !== null && { err: change.error }),
		};
		if (change.to === SessionState.Failed) this.log.error(fields, "Session failed");
		else if (change.to === SessionState.Degraded) this.log.warn(fields, "Session degraded");
		else this.log.info(fields, "Session state changed");
		this.safeEmit("state_change", change);
		return true;
	}

	private safeEmit<K extends keyof SessionEvents & string>(
		event: K,
		...args: Parameters<SessionEvents[K]>
	): void {
		try {
			this.events.emit(event, ...args);
		} catch (error: unknown) {
			this.log.error({ err: error, event }, "Session listener threw");
		}
	}

	private clearAuthTimer(): void {
		if (this.authTimer !== null) {
			clearTimeout(this.authTimer);
			this.authTimer = null;
		}
	}

	private clearTimers(): void {
		this.clearAuthTimer();
		if (this.retryTimer !== null) {
			clearTimeout(this.retryTimer);
			this.retryTimer = null;
		}
	}
}
