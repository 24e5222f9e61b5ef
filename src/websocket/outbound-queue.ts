/**
 * OutboundQueue — the single writer to the socket.
 *
 * Commands are written in enqueue order. While no client is attached they
 * are held; `detach()` discards them, since sids and command ids belong to
 * the connection they were issued on.
 */

import type { Logger } from "../lib/logger/index.js";
import { type FeedError, TransportError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { type Command, encodeCommand } from "./protocol.js";
import type { WsClientLike } from "./types.js";

export class OutboundQueue {
	private client: WsClientLike | null = null;
	private readonly queued: Command[] = [];
	private _sent = 0;

	constructor(private readonly log: Logger) {}

	get sent(): number {
		return this._sent;
	}

	get pending(): number {
		return this.queued.length;
	}

	attach(client: WsClientLike): void {
		this.client = client;
	}

	/** Detach the client; returns how many unsent commands were discarded. */
	detach(): number {
		this.client = null;
		const discarded = this.queued.length;
		this.queued.length = 0;
		return discarded;
	}

	enqueue(command: Command): void {
		this.queued.push(command);
	}

	/** Write every queued command; stops at the first failed write. */
	flush(): Result<number, FeedError> {
		const client = this.client;
		if (client === null) {
			return err(new TransportError("No connection to write to", { pending: this.queued.length }));
		}
		let written = 0;
		for (let command = this.queued.shift(); command !== undefined; command = this.queued.shift()) {
			const result = client.send(encodeCommand(command));
			if (!result.ok) {
				this.log.warn({ err: result.error, cmd: command.cmd, id: command.id }, "Command write failed");
				return result;
			}
			this._sent++;
			written++;
			this.log.debug({ cmd: command.cmd, id: command.id }, "Command sent");
		}
		return ok(written);
	}

	send(command: Command): Result<void, FeedError> {
		this.enqueue(command);
		const result = this.flush();
		return result.ok ? ok(undefined) : result;
	}
}
