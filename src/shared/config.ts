/**
 * Feed configuration.
 *
 * Defaults live in DEFAULT_FEED_CONFIG; `configFromEnv()` reads FEED_* variables
 * through a zod schema; `resolveFeedConfig()` merges defaults, env and explicit
 * overrides and rejects inconsistent combinations with ConfigError.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

/** `handshake`: signed headers at dial time. `message`: plain dial, then an `authenticate` command. */
export type AuthMode = "handshake" | "message";
/** `preserve`: subscription id doubles as the wire command id. `fresh`: a new command id per send. */
export type SubscriptionIdMode = "preserve" | "fresh";

export const VENUE_URLS = {
	prod: "wss://api.elections.kalshi.com/trade-api/ws/v2",
	demo: "wss://demo-api.kalshi.co/trade-api/ws/v2",
} as const;

export interface FeedConfig {
	readonly wsUrl: string;
	/** Path component included in the signed message */
	readonly signPath: string;
	readonly authMode: AuthMode;
	readonly subscriptionIdMode: SubscriptionIdMode;
	/** Header name prefix, e.g. `KALSHI-ACCESS` → `KALSHI-ACCESS-KEY` */
	readonly headerPrefix: string;
	readonly keyId?: string | undefined;
	readonly privateKeyPath?: string | undefined;
	readonly privateKeyPem?: string | undefined;

	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** Fraction of the computed delay added as uniform jitter, in [0, 1] */
	readonly jitterFactor: number;

	readonly pingIntervalMs: number;
	readonly pongTimeoutMs: number;
	/** No frame or pong for this long terminates the socket */
	readonly readTimeoutMs: number;
	readonly handshakeTimeoutMs: number;
	readonly authTimeoutMs: number;

	/** Malformed frames tolerated within `malformedWindowMs` before the connection is recycled */
	readonly malformedThreshold: number;
	readonly malformedWindowMs: number;
	readonly queueCapacity: number;
	readonly workerCount: number;

	/** Directory for the JSONL store; in-memory store when absent */
	readonly storeDir?: string | undefined;
	readonly storeMaxAttempts: number;
	readonly storeRetryDelayMs: number;

	readonly statusIntervalMs: number;
	readonly logLevel: string;
	/** Venue error codes that force the session into `degraded` */
	readonly sessionFatalErrorCodes: readonly number[];
	/** Trades and fills kept in memory per instrument */
	readonly recentTradesLimit: number;
}

export const DEFAULT_FEED_CONFIG: FeedConfig = {
	wsUrl: VENUE_URLS.prod,
	signPath: "/trade-api/ws/v2",
	authMode: "handshake",
	subscriptionIdMode: "preserve",
	headerPrefix: "KALSHI-ACCESS",
	baseDelayMs: 1_000,
	maxDelayMs: 60_000,
	jitterFactor: 0.2,
	pingIntervalMs: 20_000,
	pongTimeoutMs: 10_000,
	readTimeoutMs: 60_000,
	handshakeTimeoutMs: 10_000,
	authTimeoutMs: 10_000,
	malformedThreshold: 20,
	malformedWindowMs: 10_000,
	queueCapacity: 10_000,
	workerCount: 1,
	storeMaxAttempts: 3,
	storeRetryDelayMs: 50,
	statusIntervalMs: 30_000,
	logLevel: "info",
	sessionFatalErrorCodes: [9],
	recentTradesLimit: 500,
};

// ── Environment ──────────────────────────────────────────────────────

const positiveInt = z
	.string()
	.trim()
	.regex(/^\d+$/, "must be a positive integer")
	.transform(Number)
	.refine((n) => n > 0, "must be a positive integer");

const fraction = z
	.string()
	.trim()
	.regex(/^\d+(\.\d+)?$/, "must be a number in [0, 1]")
	.transform(Number)
	.refine((n) => n >= 0 && n <= 1, "must be a number in [0, 1]");

const codeList = z
	.string()
	.trim()
	.regex(/^\d+(\s*,\s*\d+)*$/, "must be a comma-separated list of integers")
	.transform((raw) => raw.split(",").map((part) => Number(part.trim())));

const FeedEnvSchema = z.object({
	FEED_ENV: z.enum(["prod", "demo"]).optional(),
	FEED_WS_URL: z.string().url().optional(),
	FEED_SIGN_PATH: z.string().startsWith("/").optional(),
	FEED_AUTH_MODE: z.enum(["handshake", "message"]).optional(),
	FEED_SUBSCRIPTION_ID_MODE: z.enum(["preserve", "fresh"]).optional(),
	FEED_API_KEY_ID: z.string().optional(),
	FEED_PRIVATE_KEY_PATH: z.string().optional(),
	FEED_PRIVATE_KEY_PEM: z.string().optional(),
	FEED_BACKOFF_BASE_MS: positiveInt.optional(),
	FEED_BACKOFF_MAX_MS: positiveInt.optional(),
	FEED_BACKOFF_JITTER: fraction.optional(),
	FEED_PING_INTERVAL_MS: positiveInt.optional(),
	FEED_READ_TIMEOUT_MS: positiveInt.optional(),
	FEED_AUTH_TIMEOUT_MS: positiveInt.optional(),
	FEED_QUEUE_CAPACITY: positiveInt.optional(),
	FEED_WORKERS: positiveInt.optional(),
	FEED_STORE_DIR: z.string().optional(),
	FEED_STATUS_INTERVAL_MS: positiveInt.optional(),
	FEED_LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
	FEED_FATAL_ERROR_CODES: codeList.optional(),
});

type MutableFeedConfig = { -readonly [K in keyof FeedConfig]?: FeedConfig[K] };

/** FEED_* entries with a non-empty value. Empty variables count as unset. */
function feedEnvEntries(env: NodeJS.ProcessEnv): Record<string, string> {
	const entries: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (key.startsWith("FEED_") && value !== undefined && value.trim() !== "") {
			entries[key] = value;
		}
	}
	return entries;
}

/**
 * Reads feed config values from environment variables.
 * Supported: FEED_ENV (prod|demo), FEED_WS_URL, FEED_SIGN_PATH, FEED_AUTH_MODE,
 * FEED_SUBSCRIPTION_ID_MODE, FEED_API_KEY_ID, FEED_PRIVATE_KEY_PATH,
 * FEED_PRIVATE_KEY_PEM, FEED_BACKOFF_BASE_MS, FEED_BACKOFF_MAX_MS,
 * FEED_BACKOFF_JITTER, FEED_PING_INTERVAL_MS, FEED_READ_TIMEOUT_MS,
 * FEED_AUTH_TIMEOUT_MS, FEED_QUEUE_CAPACITY, FEED_WORKERS, FEED_STORE_DIR,
 * FEED_STATUS_INTERVAL_MS, FEED_LOG_LEVEL, FEED_FATAL_ERROR_CODES.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<FeedConfig> {
	const raw = feedEnvEntries(env);
	const parsed = FeedEnvSchema.safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const key = issue !== undefined ? String(issue.path[0] ?? "FEED_*") : "FEED_*";
		const message = issue?.message ?? "invalid value";
		throw new ConfigError(`Invalid ${key}: "${raw[key] ?? ""}" ${message}`, { variable: key });
	}

	const e = parsed.data;
	const result: MutableFeedConfig = {};

	if (e.FEED_ENV !== undefined) result.wsUrl = VENUE_URLS[e.FEED_ENV];
	if (e.FEED_WS_URL !== undefined) result.wsUrl = e.FEED_WS_URL;
	if (e.FEED_SIGN_PATH !== undefined) result.signPath = e.FEED_SIGN_PATH;
	if (e.FEED_AUTH_MODE !== undefined) result.authMode = e.FEED_AUTH_MODE;
	if (e.FEED_SUBSCRIPTION_ID_MODE !== undefined) {
		result.subscriptionIdMode = e.FEED_SUBSCRIPTION_ID_MODE;
	}
	if (e.FEED_API_KEY_ID !== undefined) result.keyId = e.FEED_API_KEY_ID;
	if (e.FEED_PRIVATE_KEY_PATH !== undefined) result.privateKeyPath = e.FEED_PRIVATE_KEY_PATH;
	if (e.FEED_PRIVATE_KEY_PEM !== undefined) result.privateKeyPem = e.FEED_PRIVATE_KEY_PEM;
	if (e.FEED_BACKOFF_BASE_MS !== undefined) result.baseDelayMs = e.FEED_BACKOFF_BASE_MS;
	if (e.FEED_BACKOFF_MAX_MS !== undefined) result.maxDelayMs = e.FEED_BACKOFF_MAX_MS;
	if (e.FEED_BACKOFF_JITTER !== undefined) result.jitterFactor = e.FEED_BACKOFF_JITTER;
	if (e.FEED_PING_INTERVAL_MS !== undefined) result.pingIntervalMs = e.FEED_PING_INTERVAL_MS;
	if (e.FEED_READ_TIMEOUT_MS !== undefined) result.readTimeoutMs = e.FEED_READ_TIMEOUT_MS;
	if (e.FEED_AUTH_TIMEOUT_MS !== undefined) result.authTimeoutMs = e.FEED_AUTH_TIMEOUT_MS;
	if (e.FEED_QUEUE_CAPACITY !== undefined) result.queueCapacity = e.FEED_QUEUE_CAPACITY;
	if (e.FEED_WORKERS !== undefined) result.workerCount = e.FEED_WORKERS;
	if (e.FEED_STORE_DIR !== undefined) result.storeDir = e.FEED_STORE_DIR;
	if (e.FEED_STATUS_INTERVAL_MS !== undefined) result.statusIntervalMs = e.FEED_STATUS_INTERVAL_MS;
	if (e.FEED_LOG_LEVEL !== undefined) result.logLevel = e.FEED_LOG_LEVEL;
	if (e.FEED_FATAL_ERROR_CODES !== undefined) {
		result.sessionFatalErrorCodes = e.FEED_FATAL_ERROR_CODES;
	}

	return result;
}

/**
 * Merge defaults, environment and explicit overrides (later wins).
 * @throws ConfigError when the merged values are inconsistent
 */
export function resolveFeedConfig(
	overrides: Partial<FeedConfig> = {},
	env: Partial<FeedConfig> = configFromEnv(),
): FeedConfig {
	const config: FeedConfig = { ...DEFAULT_FEED_CONFIG, ...env, ...overrides };

	if (config.baseDelayMs <= 0 || config.maxDelayMs < config.baseDelayMs) {
		throw new ConfigError("Backoff requires 0 < baseDelayMs <= maxDelayMs", {
			baseDelayMs: config.baseDelayMs,
			maxDelayMs: config.maxDelayMs,
		});
	}
	if (config.jitterFactor < 0 || config.jitterFactor > 1) {
		throw new ConfigError("jitterFactor must be within [0, 1]", {
			jitterFactor: config.jitterFactor,
		});
	}
	if (!Number.isInteger(config.workerCount) || config.workerCount < 1) {
		throw new ConfigError("workerCount must be a positive integer", {
			workerCount: config.workerCount,
		});
	}
	if (!Number.isInteger(config.queueCapacity) || config.queueCapacity < 1) {
		throw new ConfigError("queueCapacity must be a positive integer", {
			queueCapacity: config.queueCapacity,
		});
	}
	if (config.storeMaxAttempts < 1) {
		throw new ConfigError("storeMaxAttempts must be at least 1", {
			storeMaxAttempts: config.storeMaxAttempts,
		});
	}

	return config;
}
