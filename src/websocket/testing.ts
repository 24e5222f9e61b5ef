/**
 * In-process stand-ins for the session manager's collaborators.
 */

import type { SignRequest, SignatureHeaders } from "../auth/types.js";
import type { WsConfig, WsState } from "../lib/websocket/types.js";
import { type FeedError, TransportError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { HeaderSigner, WsClientFactory, WsClientLike } from "./types.js";

type ConnectBehavior = "open" | "pending" | Error;

export class StubWsClient implements WsClientLike {
	readonly sent: string[] = [];
	closed = false;
	private state: WsState = "closed";
	private messageHandlers: Array<(data: string) => void> = [];
	private closeHandlers: Array<(code: number, reason: string) => void> = [];
	private errorHandlers: Array<(error: Error) => void> = [];
	private resolvePending: (() => void) | null = null;

	constructor(
		readonly config: WsConfig,
		private readonly behavior: ConnectBehavior,
	) {}

	connect(): Promise<void> {
		this.state = "connecting";
		if (this.behavior instanceof Error) {
			this.state = "closed";
			return Promise.reject(this.behavior);
		}
		if (this.behavior === "pending") {
			return new Promise((resolve) => {
				this.resolvePending = () => {
					this.state = "open";
					resolve();
				};
			});
		}
		this.state = "open";
		return Promise.resolve();
	}

	/** Complete a `pending` connect. */
	open(): void {
		this.resolvePending?.();
		this.resolvePending = null;
	}

	send(data: string): Result<void, FeedError> {
		if (this.state !== "open") return err(new TransportError("WebSocket is not connected"));
		this.sent.push(data);
		return ok(undefined);
	}

	close(): void {
		this.closed = true;
		this.state = "closed";
	}

	getState(): WsState {
		return this.state;
	}

	onMessage(handler: (data: string) => void): void {
		this.messageHandlers.push(handler);
	}

	onClose(handler: (code: number, reason: string) => void): void {
		this.closeHandlers.push(handler);
	}

	onError(handler: (error: Error) => void): void {
		this.errorHandlers.push(handler);
	}

	clearHandlers(): void {
		this.messageHandlers = [];
		this.closeHandlers = [];
		this.errorHandlers = [];
	}

	// ── Simulation ────────────────────────────────────────────────

	receive(frame: unknown): void {
		const data = typeof frame === "string" ? frame : JSON.stringify(frame);
		for (const h of [...this.messageHandlers]) h(data);
	}

	dropConnection(code = 1006, reason = ""): void {
		this.state = "closed";
		for (const h of [...this.closeHandlers]) h(code, reason);
	}

	/** Parsed commands written to this client */
	commands(): Array<{ id: number; cmd: string; params: Record<string, unknown> }> {
		return this.sent.map((line) => JSON.parse(line));
	}
}

/** Factory that records every client it builds; behaviours are consumed in order, then `open`. */
export class StubClientFactory {
	readonly clients: StubWsClient[] = [];
	private readonly behaviors: ConnectBehavior[];

	constructor(...behaviors: ConnectBehavior[]) {
		this.behaviors = behaviors;
	}

	readonly create: WsClientFactory = (config) => {
		const client = new StubWsClient(config, this.behaviors.shift() ?? "open");
		this.clients.push(client);
		return client;
	};

	/** Queue the connect behaviour of the next client. */
	next(behavior: ConnectBehavior): void {
		this.behaviors.push(behavior);
	}

	latest(): StubWsClient {
		const client = this.clients.at(-1);
		if (client === undefined) throw new Error("No client created yet");
		return client;
	}
}

export class StubSigner implements HeaderSigner {
	readonly requests: SignRequest[] = [];
	failure: Error | null = null;

	sign(request: SignRequest): SignatureHeaders {
		if (this.failure !== null) throw this.failure;
		this.requests.push(request);
		const n = this.requests.length;
		return {
			"KALSHI-ACCESS-KEY": "test-key",
			"KALSHI-ACCESS-SIGNATURE": `test-signature-${n}`,
			"KALSHI-ACCESS-TIMESTAMP": String(1_700_000_000_000 + n),
		};
	}
}
