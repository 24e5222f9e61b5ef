/**
 * Frame parser — raw text frame → FeedEvent.
 *
 * Envelope: `{ type, sid?, seq?, id?, prev_seq?, msg }`. The `type` selects a
 * message schema; a known type whose body fails validation is malformed, an
 * unrecognised type becomes an `unknown` event.
 */

import { type ValidationError, validate, z } from "../lib/validation/index.js";
import type { PriceLevel } from "../market/types.js";
import { MalformedFrameError } from "../shared/errors.js";
import { instrumentId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type AckType, type FeedEvent, freezeEvent } from "./feed-events.js";

export interface ParseOptions {
	readonly receivedAt: number;
	/** Venue error codes that mark an `error` frame session-fatal */
	readonly fatalErrorCodes?: ReadonlySet<number> | undefined;
}

// ── Schemas ──────────────────────────────────────────────────────────

const optionalInt = z
	.number()
	.int()
	.nullish()
	.transform((v) => v ?? null);

const optionalNumber = z
	.number()
	.nullish()
	.transform((v) => v ?? null);

const optionalString = z
	.string()
	.nullish()
	.transform((v) => v ?? null);

const ticker = z.string().min(1);
const side = z.enum(["yes", "no"]);

const EnvelopeSchema = z.object({
	type: z.string().min(1),
	sid: optionalInt,
	seq: optionalInt,
	id: optionalInt,
	prev_seq: optionalInt,
	msg: z.unknown(),
});

type Envelope = z.infer<typeof EnvelopeSchema>;

const LevelsSchema = z
	.array(z.tuple([z.number(), z.number()]))
	.nullish()
	.transform((levels): PriceLevel[] =>
		(levels ?? []).map(([price, quantity]) => ({ price, quantity })),
	);

const TickerMsg = z.object({
	market_ticker: ticker,
	price: optionalNumber,
	last_price: optionalNumber,
	yes_bid: optionalNumber,
	yes_ask: optionalNumber,
	volume: optionalNumber,
	open_interest: optionalNumber,
	ts: optionalNumber,
});

const SnapshotMsg = z.object({
	market_ticker: ticker,
	yes: LevelsSchema,
	no: LevelsSchema,
});

const DeltaMsg = z.object({
	market_ticker: ticker,
	price: z.number(),
	delta: z.number(),
	side,
	client_order_id: optionalString,
});

const TradeMsg = z.object({
	market_ticker: ticker,
	trade_id: optionalString,
	yes_price: z.number(),
	no_price: z.number(),
	count: z.number(),
	taker_side: side,
	ts: optionalNumber,
});

const FillMsg = z.object({
	market_ticker: ticker,
	trade_id: optionalString,
	order_id: z.string(),
	is_taker: z.boolean(),
	side,
	action: z.enum(["buy", "sell"]),
	count: z.number(),
	yes_price: z.number(),
	ts: optionalNumber,
});

const ErrorMsg = z.object({
	code: optionalInt,
	msg: z.string().default("unknown error"),
	fatal: z.boolean().optional(),
});

const AckMsg = z
	.object({
		channel: optionalString,
		sid: optionalInt,
	})
	.nullish()
	.transform((v) => ({ channel: v?.channel ?? null, sid: v?.sid ?? null }));

// ── Parser ───────────────────────────────────────────────────────────

function malformed(type: string, error: ValidationError): MalformedFrameError {
	return new MalformedFrameError(`Malformed ${type} frame: ${error.summary}`, {
		type,
		issues: error.issues,
	});
}

function parseBody(
	env: Envelope,
	options: ParseOptions,
): Result<FeedEvent, MalformedFrameError> {
	const { receivedAt } = options;
	const base = { sid: env.sid, seq: env.seq, receivedAt };

	switch (env.type) {
		case "ticker": {
			const r = validate(TickerMsg, env.msg);
			if (!r.ok) return err(malformed(env.type, r.error));
			const m = r.value;
			return ok({
				kind: "ticker",
				instrumentId: instrumentId(m.market_ticker),
				...base,
				price: m.price ?? m.last_price,
				yesBid: m.yes_bid,
				yesAsk: m.yes_ask,
				spread: m.yes_bid !== null && m.yes_ask !== null ? m.yes_ask - m.yes_bid : null,
				volume: m.volume,
				openInterest: m.open_interest,
				ts: m.ts,
			});
		}
		case "orderbook_snapshot": {
			const r = validate(SnapshotMsg, env.msg);
			if (!r.ok) return err(malformed(env.type, r.error));
			return ok({
				kind: "orderbook_snapshot",
				instrumentId: instrumentId(r.value.market_ticker),
				...base,
				yes: r.value.yes,
				no: r.value.no,
			});
		}
		case "orderbook_delta": {
			const r = validate(DeltaMsg, env.msg);
			if (!r.ok) return err(malformed(env.type, r.error));
			const m = r.value;
			const prevSeq = env.prev_seq ?? (env.seq !== null ? env.seq - 1 : null);
			return ok({
				kind: "orderbook_delta",
				instrumentId: instrumentId(m.market_ticker),
				...base,
				prevSeq,
				side: m.side,
				price: m.price,
				delta: m.delta,
				clientOrderId: m.client_order_id,
			});
		}
		case "trade": {
			const r = validate(TradeMsg, env.msg);
			if (!r.ok) return err(malformed(env.type, r.error));
			const m = r.value;
			return ok({
				kind: "trade",
				instrumentId: instrumentId(m.market_ticker),
				...base,
				tradeId: m.trade_id,
				yesPrice: m.yes_price,
				noPrice: m.no_price,
				count: m.count,
				takerSide: m.taker_side,
				ts: m.ts,
			});
		}
		case "fill": {
			const r = validate(FillMsg, env.msg);
			if (!r.ok) return err(malformed(env.type, r.error));
			const m = r.value;
			return ok({
				kind: "fill",
				instrumentId: instrumentId(m.market_ticker),
				...base,
				tradeId: m.trade_id,
				orderId: m.order_id,
				isTaker: m.is_taker,
				side: m.side,
				action: m.action,
				count: m.count,
				yesPrice: m.yes_price,
				ts: m.ts,
			});
		}
		case "error": {
			const r = validate(ErrorMsg, env.msg);
			if (!r.ok) return err(malformed(env.type, r.error));
			const m = r.value;
			const fatalByCode = m.code !== null && (options.fatalErrorCodes?.has(m.code) ?? false);
			return ok({
				kind: "error",
				code: m.code,
				message: m.msg,
				commandId: env.id,
				sid: env.sid,
				fatal: m.fatal === true || fatalByCode,
				receivedAt,
			});
		}
		default: {
			const ackType = toAckType(env.type);
			if (ackType === null) {
				return ok({ kind: "unknown", type: env.type, body: env.msg, receivedAt });
			}
			const r = validate(AckMsg, env.msg);
			if (!r.ok) return err(malformed(env.type, r.error));
			return ok({
				kind: "ack",
				ackType,
				commandId: env.id,
				sid: r.value.sid ?? env.sid,
				channel: r.value.channel,
				receivedAt,
			});
		}
	}
}

function toAckType(type: string): AckType | null {
	switch (type) {
		case "subscribed":
			return "subscribed";
		case "unsubscribed":
			return "unsubscribed";
		case "ok":
			return "ok";
		case "authenticated":
			return "authenticated";
		default:
			return null;
	}
}

/**
 * Parse one raw frame into a frozen FeedEvent.
 *
 * @example
 * ```ts
 * const r = parseFrame('{"type":"ticker","sid":1,"seq":7,"msg":{"market_ticker":"KXBTC"}}', {
 *   receivedAt: Date.now(),
 * });
 * ```
 */
export function parseFrame(
	raw: string,
	options: ParseOptions,
): Result<FeedEvent, MalformedFrameError> {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (cause) {
		return err(new MalformedFrameError("Frame is not valid JSON", { length: raw.length, cause }));
	}

	const env = validate(EnvelopeSchema, json);
	if (!env.ok) {
		return err(
			new MalformedFrameError(`Malformed frame envelope: ${env.error.summary}`, {
				issues: env.error.issues,
			}),
		);
	}

	const event = parseBody(env.value, options);
	return event.ok ? ok(freezeEvent(event.value)) : event;
}
