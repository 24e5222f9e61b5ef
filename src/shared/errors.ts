/**
 * FeedError hierarchy — structured error classification for the ingestion path.
 *
 * Every error has a category (retryable, non-retryable, fatal). The session
 * manager reads the category to decide between backoff-and-reconnect and the
 * terminal `failed` state; the store reads it to decide whether to retry a write.
 */

/** Error severity categories that drive reconnect and retry behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing FeedError subclasses with an optional cause chain. */
interface FeedErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & FeedErrorOptions;

/** Base error class for all feed operations, with category-based retry semantics. */
export class FeedError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "FeedError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Fatal: the key id or private key is missing, unreadable or malformed. */
export class CredentialError extends FeedError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"CREDENTIAL_ERROR",
			ErrorCategory.Fatal,
			rest,
			"Supply a valid key id and PEM-encoded RSA private key",
		);
		this.name = "CredentialError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable: the signing operation failed; headers are regenerated on the next attempt. */
export class SigningError extends FeedError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "SIGNING_ERROR", ErrorCategory.Retryable, rest);
		this.name = "SigningError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal: the venue refused the handshake (unauthorized, forbidden, protocol mismatch). */
export class HandshakeRejectedError extends FeedError {
	readonly status: number | null;

	constructor(message: string, status: number | null, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"HANDSHAKE_REJECTED",
			ErrorCategory.Fatal,
			{ ...rest, status },
			"Check credentials and restart the session",
		);
		this.name = "HandshakeRejectedError";
		this.status = status;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable: socket closed, dial failed, read timeout or malformed-frame breaker tripped. */
export class TransportError extends FeedError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "TRANSPORT_ERROR", ErrorCategory.Retryable, rest);
		this.name = "TransportError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Non-retryable: an inbound frame could not be parsed. Dropped and counted. */
export class MalformedFrameError extends FeedError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "MALFORMED_FRAME", ErrorCategory.NonRetryable, rest);
		this.name = "MalformedFrameError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Retryable: a durable write failed. Retried a bounded number of times, then dropped. */
export class StoreWriteError extends FeedError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "STORE_WRITE_ERROR", ErrorCategory.Retryable, rest);
		this.name = "StoreWriteError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends FeedError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

const TRANSPORT_ERRNOS = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ENOTFOUND",
	"ETIMEDOUT",
	"EPIPE",
	"EAI_AGAIN",
	"EHOSTUNREACH",
]);

function errnoCode(error: Error): string | undefined {
	if ("code" in error && typeof error.code === "string") return error.code;
	return undefined;
}

/**
 * Classify an unknown thrown value into a FeedError.
 * Socket-level failures become TransportError; anything unrecognised is
 * treated as a transient transport failure so the session keeps retrying.
 */
export function classifyError(error: unknown): FeedError {
	if (error instanceof FeedError) return error;
	if (error instanceof Error) {
		const code = errnoCode(error);
		if (code !== undefined && TRANSPORT_ERRNOS.has(code)) {
			return new TransportError(error.message, { errno: code, cause: error });
		}
		const msg = error.message.toLowerCase();
		if (msg.includes("401") || msg.includes("403") || msg.includes("unauthorized")) {
			return new HandshakeRejectedError(error.message, null, { cause: error });
		}
		return new TransportError(error.message, { cause: error });
	}
	return new TransportError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isCredentialError(e: unknown): e is CredentialError {
	return e instanceof CredentialError;
}

export function isSigningError(e: unknown): e is SigningError {
	return e instanceof SigningError;
}

export function isHandshakeRejected(e: unknown): e is HandshakeRejectedError {
	return e instanceof HandshakeRejectedError;
}

export function isTransportError(e: unknown): e is TransportError {
	return e instanceof TransportError;
}

export function isMalformedFrame(e: unknown): e is MalformedFrameError {
	return e instanceof MalformedFrameError;
}

export function isStoreWriteError(e: unknown): e is StoreWriteError {
	return e instanceof StoreWriteError;
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
