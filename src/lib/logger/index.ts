/**
 * Structured logging backed by pino.
 *
 * Every component receives a child logger bound to `{ component }`. Opaque
 * credential objects (`__opaque: true`) are replaced before serialization and
 * signature headers / key material are censored by path.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe, plus `silent`. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

type EmittingLevel = Exclude<LogLevel, "silent">;

/** Paths censored on every logger unless replaced through `redactPaths`. */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
	"privateKeyPem",
	"*.privateKeyPem",
	'headers["KALSHI-ACCESS-SIGNATURE"]',
	'*.headers["KALSHI-ACCESS-SIGNATURE"]',
];

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[] | undefined;
	readonly destination?: { write(msg: string): void } | undefined;
	/** Fields attached to every line, e.g. `{ service: "marketstream" }` */
	readonly bindings?: Record<string, unknown> | undefined;
}

export interface Logger {
	trace(msg: string): void;
	trace(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Credential scrubbing ────────────────────────────────────────────

function isOpaqueCredential(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		"__opaque" in value &&
		value.__opaque === true
	);
}

/** Replaces opaque credentials at the top level and one level down. */
function scrubCredentials(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		if (isOpaqueCredential(value)) {
			result[key] = "[REDACTED]";
		} else if (
			typeof value === "object" &&
			value !== null &&
			!Array.isArray(value) &&
			!(value instanceof Error)
		) {
			const nested: Record<string, unknown> = {};
			for (const [k, v] of Object.entries(value)) {
				nested[k] = isOpaqueCredential(v) ? "[REDACTED]" : v;
			}
			result[key] = nested;
		} else {
			result[key] = value;
		}
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

function wrapPino(pinoLogger: pino.Logger): Logger {
	const at =
		(level: EmittingLevel) =>
		(msgOrObj: string | Record<string, unknown>, msg?: string): void => {
			if (typeof msgOrObj === "string") {
				pinoLogger[level](msgOrObj);
			} else {
				pinoLogger[level](msgOrObj, msg ?? "");
			}
		};

	return {
		trace: at("trace"),
		debug: at("debug"),
		info: at("info"),
		warn: at("warn"),
		error: at("error"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a pino-backed Logger with credential scrubbing.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.child({ component: "session" }).info({ attempt: 2 }, "reconnecting");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const paths = config.redactPaths ?? DEFAULT_REDACT_PATHS;
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
		formatters: {
			log: scrubCredentials,
		},
	};

	if (paths.length > 0) {
		pinoOptions.redact = { paths: [...paths], censor: "[REDACTED]" };
	}
	if (config.bindings !== undefined) {
		pinoOptions.base = config.bindings;
	}

	const pinoLogger =
		config.destination !== undefined ? pino(pinoOptions, config.destination) : pino(pinoOptions);
	return wrapPino(pinoLogger);
}

/** Logger that discards everything; the default for components built without one. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent", redactPaths: [] });
}

/** Parse a configured level string, falling back to `info` for unknown values. */
export function toLogLevel(value: string): LogLevel {
	switch (value) {
		case "trace":
		case "debug":
		case "info":
		case "warn":
		case "error":
		case "fatal":
		case "silent":
			return value;
		default:
			return "info";
	}
}
