/**
 * SubscriptionRegistry — the held subscription set plus its per-connection
 * wire bookkeeping.
 *
 * Public ids and wire command ids come from one counter so they can never
 * collide. In `preserve` mode a subscription is always sent with its public
 * id as the command id; in `fresh` mode every send draws a new one. Server
 * sids are learned from `subscribed` acks and forgotten on reconnect.
 */

import type { SignatureHeaders } from "../auth/types.js";
import type { AckEvent } from "../events/feed-events.js";
import type { SubscriptionIdMode } from "../shared/config.js";
import type { InstrumentId, SubscriptionId } from "../shared/identifiers.js";
import { subscriptionId } from "../shared/identifiers.js";
import {
	type AuthenticateCommand,
	type SubscribeCommand,
	type UnsubscribeCommand,
	authenticateCommand,
	subscribeCommand,
	unsubscribeCommand,
} from "./protocol.js";
import type { ChannelKind, Subscription } from "./types.js";

interface HeldSubscription {
	readonly subscription: Subscription;
	/** Command id of the last subscribe sent on this connection */
	commandId: number | null;
	/** Server sid from the `subscribed` ack on this connection */
	sid: number | null;
	/** A snapshot resync (unsubscribe + subscribe) is in flight */
	resyncing: boolean;
}

type PendingCommand =
	| { readonly kind: "subscribe"; readonly id: SubscriptionId }
	/** Subscribe whose subscription was removed before the ack arrived */
	| { readonly kind: "cancelled" }
	| { readonly kind: "unsubscribe"; readonly sids: readonly number[] }
	| { readonly kind: "authenticate" };

export type AckResolution =
	| { readonly kind: "subscribed"; readonly subscription: Subscription; readonly sid: number | null }
	| { readonly kind: "orphaned"; readonly sid: number }
	| { readonly kind: "unsubscribed" }
	| { readonly kind: "authenticated" }
	| { readonly kind: "untracked" };

export type ErrorResolution =
	| { readonly kind: "subscribe_failed"; readonly subscription: Subscription }
	| { readonly kind: "authenticate_failed" }
	| { readonly kind: "other" };

export interface AddResult {
	readonly subscription: Subscription;
	/** False when an equal subscription was already held */
	readonly created: boolean;
}

function subscriptionKey(channel: ChannelKind, instruments: readonly InstrumentId[]): string {
	return `${channel}:${instruments.join(",")}`;
}

function normalizeInstruments(instruments: readonly InstrumentId[]): InstrumentId[] {
	return [...new Set(instruments)].sort();
}

export class SubscriptionRegistry {
	private readonly held = new Map<SubscriptionId, HeldSubscription>();
	private readonly byKey = new Map<string, SubscriptionId>();
	private readonly pending = new Map<number, PendingCommand>();
	private nextId = 1;

	constructor(private readonly mode: SubscriptionIdMode) {}

	// ── Held set ──────────────────────────────────────────────────

	add(channel: ChannelKind, instruments: readonly InstrumentId[]): AddResult {
		const normalized = normalizeInstruments(instruments);
		const key = subscriptionKey(channel, normalized);
		const existing = this.byKey.get(key);
		const current = existing !== undefined ? this.held.get(existing) : undefined;
		if (current !== undefined) {
			return { subscription: current.subscription, created: false };
		}

		const subscription: Subscription = Object.freeze({
			id: subscriptionId(this.allocate()),
			channel,
			instruments: Object.freeze(normalized),
		});
		this.held.set(subscription.id, { subscription, commandId: null, sid: null, resyncing: false });
		this.byKey.set(key, subscription.id);
		return { subscription, created: true };
	}

	/**
	 * Drop a subscription. Returns the server sid to unsubscribe, if one is
	 * known; a subscribe still awaiting its ack is marked so the ack's sid is
	 * reported as orphaned.
	 */
	remove(id: SubscriptionId): { readonly removed: boolean; readonly sid: number | null } {
		const entry = this.held.get(id);
		if (entry === undefined) return { removed: false, sid: null };

		this.held.delete(id);
		this.byKey.delete(subscriptionKey(entry.subscription.channel, entry.subscription.instruments));
		if (entry.sid === null && entry.commandId !== null && this.pending.has(entry.commandId)) {
			this.pending.set(entry.commandId, { kind: "cancelled" });
		}
		return { removed: true, sid: entry.sid };
	}

	get(id: SubscriptionId): Subscription | undefined {
		return this.held.get(id)?.subscription;
	}

	list(): Subscription[] {
		return [...this.held.values()].map((e) => e.subscription);
	}

	get size(): number {
		return this.held.size;
	}

	sidOf(id: SubscriptionId): number | null {
		return this.held.get(id)?.sid ?? null;
	}

	/** Server sids known on the current connection */
	activeSids(): number[] {
		const sids: number[] = [];
		for (const entry of this.held.values()) {
			if (entry.sid !== null) sids.push(entry.sid);
		}
		return sids;
	}

	get resyncsInFlight(): number {
		let n = 0;
		for (const entry of this.held.values()) if (entry.resyncing) n++;
		return n;
	}

	// ── Commands ──────────────────────────────────────────────────

	/** Build the subscribe command for a held subscription and track it. */
	subscribeCommand(id: SubscriptionId): SubscribeCommand | undefined {
		const entry = this.held.get(id);
		if (entry === undefined) return undefined;
		const commandId = this.mode === "preserve" ? entry.subscription.id : this.allocate();
		entry.commandId = commandId;
		entry.sid = null;
		this.pending.set(commandId, { kind: "subscribe", id });
		return subscribeCommand(commandId, entry.subscription.channel, entry.subscription.instruments);
	}

	unsubscribeCommand(sids: readonly number[]): UnsubscribeCommand {
		const commandId = this.allocate();
		this.pending.set(commandId, { kind: "unsubscribe", sids });
		return unsubscribeCommand(commandId, sids);
	}

	authenticateCommand(headers: SignatureHeaders): AuthenticateCommand {
		const commandId = this.allocate();
		this.pending.set(commandId, { kind: "authenticate" });
		return authenticateCommand(commandId, headers);
	}

	/**
	 * Orderbook subscriptions covering the instrument that can start a resync
	 * now: their sid is known and no resync is already in flight. Each
	 * returned entry is marked as resyncing.
	 */
	beginResync(instrument: InstrumentId): Array<{ readonly id: SubscriptionId; readonly sid: number }> {
		const started: Array<{ readonly id: SubscriptionId; readonly sid: number }> = [];
		for (const entry of this.held.values()) {
			const { subscription } = entry;
			if (subscription.channel !== "orderbook_delta") continue;
			if (!subscription.instruments.includes(instrument)) continue;
			if (entry.resyncing || entry.sid === null) continue;
			entry.resyncing = true;
			started.push({ id: subscription.id, sid: entry.sid });
		}
		return started;
	}

	// ── Replies ───────────────────────────────────────────────────

	resolveAck(ack: AckEvent): AckResolution {
		if (ack.ackType === "authenticated") {
			if (ack.commandId !== null) this.pending.delete(ack.commandId);
			return { kind: "authenticated" };
		}
		if (ack.commandId === null) return { kind: "untracked" };

		const pending = this.pending.get(ack.commandId);
		if (pending === undefined) return { kind: "untracked" };
		this.pending.delete(ack.commandId);

		switch (pending.kind) {
			case "authenticate":
				return { kind: "authenticated" };
			case "unsubscribe":
				return { kind: "unsubscribed" };
			case "cancelled":
				return ack.sid !== null ? { kind: "orphaned", sid: ack.sid } : { kind: "untracked" };
			case "subscribe": {
				const entry = this.held.get(pending.id);
				if (entry === undefined) {
					return ack.sid !== null ? { kind: "orphaned", sid: ack.sid } : { kind: "untracked" };
				}
				entry.sid = ack.sid;
				entry.resyncing = false;
				return { kind: "subscribed", subscription: entry.subscription, sid: ack.sid };
			}
		}
	}

	resolveError(commandId: number | null): ErrorResolution {
		if (commandId === null) return { kind: "other" };
		const pending = this.pending.get(commandId);
		if (pending === undefined) return { kind: "other" };
		this.pending.delete(commandId);

		if (pending.kind === "authenticate") return { kind: "authenticate_failed" };
		if (pending.kind === "subscribe") {
			const entry = this.held.get(pending.id);
			if (entry !== undefined) {
				entry.resyncing = false;
				entry.commandId = null;
				return { kind: "subscribe_failed", subscription: entry.subscription };
			}
		}
		return { kind: "other" };
	}

	/** Forget everything tied to the current connection. The held set survives. */
	resetConnection(): void {
		this.pending.clear();
		for (const entry of this.held.values()) {
			entry.commandId = null;
			entry.sid = null;
			entry.resyncing = false;
		}
	}

	private allocate(): number {
		return this.nextId++;
	}
}
