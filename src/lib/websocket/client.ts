import WebSocket from "ws";
import {
	type FeedError,
	HandshakeRejectedError,
	TransportError,
	classifyError,
} from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type {
	WsCloseHandler,
	WsConfig,
	WsErrorHandler,
	WsMessageHandler,
	WsState,
} from "./types.js";

const REJECTED_STATUSES = new Set([401, 403]);

function rawToString(data: WebSocket.RawData): string {
	if (Buffer.isBuffer(data)) return data.toString("utf8");
	if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
	return Buffer.from(data).toString("utf8");
}

/**
 * One WebSocket connection with ping/pong keepalive and a read timeout.
 *
 * Wraps the ws library behind the small surface the session manager needs.
 * A failed upgrade with 401/403 rejects `connect()` with HandshakeRejectedError;
 * every other failure is a TransportError. Sends return Result, never throw.
 * Instances are single-use: the session manager builds a new one per attempt.
 */
export class WsClient {
	private readonly config: WsConfig;
	private ws: WebSocket | null = null;
	private state: WsState = "closed";
	private readonly messageHandlers: WsMessageHandler[] = [];
	private readonly closeHandlers: WsCloseHandler[] = [];
	private readonly errorHandlers: WsErrorHandler[] = [];
	private pingTimer: ReturnType<typeof setInterval> | null = null;
	private pongTimer: ReturnType<typeof setTimeout> | null = null;
	private readTimer: ReturnType<typeof setTimeout> | null = null;
	private rejectConnect: ((error: FeedError) => void) | null = null;

	constructor(config: WsConfig) {
		this.config = config;
	}

	/** Opens the connection. Rejects if already connecting or open. */
	connect(): Promise<void> {
		if (this.state !== "closed") {
			return Promise.reject(new TransportError("WebSocket is already connecting or open"));
		}
		return new Promise<void>((resolve, reject) => {
			this.state = "connecting";
			this.rejectConnect = reject;
			const ws = new WebSocket(this.config.url, {
				headers: { ...this.config.headers },
				...(this.config.handshakeTimeoutMs !== undefined && {
					handshakeTimeout: this.config.handshakeTimeoutMs,
				}),
			});
			this.ws = ws;

			ws.on("unexpected-response", (_req, res) => {
				const status = res.statusCode ?? 0;
				res.resume();
				const error = REJECTED_STATUSES.has(status)
					? new HandshakeRejectedError(`Handshake rejected with HTTP ${status}`, status, {
							url: this.config.url,
						})
					: new TransportError(`Unexpected server response: ${status}`, {
							status,
							url: this.config.url,
						});
				this.state = "closed";
				this.rejectConnect = null;
				this.clearTimers();
				reject(error);
				ws.terminate();
			});

			ws.on("open", () => {
				this.rejectConnect = null;
				this.state = "open";
				this.startKeepalive();
				this.armReadTimeout();
				resolve();
			});

			ws.on("message", (data) => {
				this.armReadTimeout();
				const message = rawToString(data);
				for (const handler of [...this.messageHandlers]) {
					handler(message);
				}
			});

			ws.on("pong", () => {
				this.clearPongTimeout();
				this.armReadTimeout();
			});

			ws.on("close", (code, reason) => {
				// a connect that never opened was already reported through the rejection
				const established = this.state !== "closed";
				this.state = "closed";
				this.clearTimers();
				if (!established) return;
				for (const handler of [...this.closeHandlers]) {
					handler(code, reason.toString());
				}
			});

			ws.on("error", (error) => {
				for (const handler of [...this.errorHandlers]) {
					handler(error);
				}
				if (this.state === "connecting") {
					this.state = "closed";
					this.rejectConnect = null;
					this.clearTimers();
					reject(classifyError(error));
				}
			});
		});
	}

	send(data: string): Result<void, FeedError> {
		if (this.state !== "open" || this.ws === null) {
			return err(new TransportError("WebSocket is not connected"));
		}
		try {
			this.ws.send(data);
			return ok(undefined);
		} catch (error) {
			return err(new TransportError("WebSocket send failed", { cause: error }));
		}
	}

	/** Closes the connection and clears keepalive timers. Safe to call repeatedly. */
	close(): void {
		if (this.ws === null || this.state === "closed" || this.state === "closing") return;
		this.clearTimers();
		if (this.state === "connecting") {
			this.state = "closed";
			this.rejectConnect?.(new TransportError("Connection closed before it was established"));
			this.rejectConnect = null;
			this.ws.terminate();
			return;
		}
		this.state = "closing";
		this.ws.close();
	}

	getState(): WsState {
		return this.state;
	}

	onMessage(handler: WsMessageHandler): void {
		this.messageHandlers.push(handler);
	}

	onClose(handler: WsCloseHandler): void {
		this.closeHandlers.push(handler);
	}

	onError(handler: WsErrorHandler): void {
		this.errorHandlers.push(handler);
	}

	offMessage(handler: WsMessageHandler): void {
		removeHandler(this.messageHandlers, handler);
	}

	offClose(handler: WsCloseHandler): void {
		removeHandler(this.closeHandlers, handler);
	}

	offError(handler: WsErrorHandler): void {
		removeHandler(this.errorHandlers, handler);
	}

	clearHandlers(): void {
		this.messageHandlers.length = 0;
		this.closeHandlers.length = 0;
		this.errorHandlers.length = 0;
	}

	private startKeepalive(): void {
		this.pingTimer = setInterval(() => {
			if (this.ws === null || this.state !== "open") return;
			this.ws.ping();
			if (this.pongTimer === null) {
				this.pongTimer = setTimeout(() => {
					this.pongTimer = null;
					this.ws?.terminate();
				}, this.config.pongTimeoutMs);
			}
		}, this.config.pingIntervalMs);
	}

	private armReadTimeout(): void {
		const timeout = this.config.readTimeoutMs;
		if (timeout === undefined || timeout <= 0) return;
		if (this.readTimer !== null) clearTimeout(this.readTimer);
		this.readTimer = setTimeout(() => {
			this.readTimer = null;
			if (this.state === "open") this.ws?.terminate();
		}, timeout);
	}

	private clearTimers(): void {
		if (this.pingTimer !== null) {
			clearInterval(this.pingTimer);
			this.pingTimer = null;
		}
		if (this.readTimer !== null) {
			clearTimeout(this.readTimer);
			this.readTimer = null;
		}
		this.clearPongTimeout();
	}

	private clearPongTimeout(): void {
		if (this.pongTimer !== null) {
			clearTimeout(this.pongTimer);
			this.pongTimer = null;
		}
	}
}

function removeHandler<T>(handlers: T[], handler: T): void {
	const index = handlers.indexOf(handler);
	if (index !== -1) {
		handlers.splice(index, 1);
	}
}
