/**
 * Outbound command shapes for the venue's WebSocket v2 protocol.
 *
 * Every command carries a client-chosen numeric `id`; the venue echoes it on
 * the matching `subscribed` / `unsubscribed` / `ok` / `error` frame.
 */

import type { SignatureHeaders } from "../auth/types.js";
import type { InstrumentId } from "../shared/identifiers.js";
import type { ChannelKind } from "./types.js";

export interface SubscribeCommand {
	readonly id: number;
	readonly cmd: "subscribe";
	readonly params: {
		readonly channels: readonly [ChannelKind];
		readonly market_tickers?: readonly string[];
	};
}

export interface UnsubscribeCommand {
	readonly id: number;
	readonly cmd: "unsubscribe";
	readonly params: { readonly sids: readonly number[] };
}

export interface AuthenticateCommand {
	readonly id: number;
	readonly cmd: "authenticate";
	readonly params: SignatureHeaders;
}

export type Command = SubscribeCommand | UnsubscribeCommand | AuthenticateCommand;

export function subscribeCommand(
	id: number,
	channel: ChannelKind,
	instruments: readonly InstrumentId[],
): SubscribeCommand {
	return {
		id,
		cmd: "subscribe",
		params:
			instruments.length > 0
				? { channels: [channel], market_tickers: [...instruments] }
				: { channels: [channel] },
	};
}

export function unsubscribeCommand(id: number, sids: readonly number[]): UnsubscribeCommand {
	return { id, cmd: "unsubscribe", params: { sids: [...sids] } };
}

export function authenticateCommand(id: number, headers: SignatureHeaders): AuthenticateCommand {
	return { id, cmd: "authenticate", params: { ...headers } };
}

export function encodeCommand(command: Command): string {
	return JSON.stringify(command);
}
