/**
 * Configuration for one WebSocket connection.
 */
export interface WsConfig {
	/** WebSocket server URL (ws:// or wss://) */
	readonly url: string;
	/** Extra HTTP headers sent with the upgrade request (e.g. signed auth headers) */
	readonly headers?: Readonly<Record<string, string>> | undefined;
	/** Interval between ping frames in milliseconds. */
	readonly pingIntervalMs: number;
	/** Timeout waiting for pong response before terminating connection. */
	readonly pongTimeoutMs: number;
	/** Terminate when neither a frame nor a pong arrives for this long. Disabled when absent. */
	readonly readTimeoutMs?: number | undefined;
	/** Abort the opening handshake after this long. */
	readonly handshakeTimeoutMs?: number | undefined;
}

/**
 * WebSocket connection lifecycle state.
 * - `connecting`: Connection in progress
 * - `open`: Connected and ready
 * - `closing`: Close initiated
 * - `closed`: Connection terminated
 */
export type WsState = "connecting" | "open" | "closing" | "closed";

export type WsMessageHandler = (data: string) => void;

export type WsCloseHandler = (code: number, reason: string) => void;

export type WsErrorHandler = (error: Error) => void;
