/**
 * Decoders for stored JSON. Anything read back from disk goes through these,
 * so a hand-edited or truncated line is rejected instead of typed blindly.
 */

import { z } from "../lib/validation/index.js";
import { instrumentId } from "../shared/identifiers.js";
import type { LatestKind, LatestPayloadMap, RecordKind, StoredRecordOf } from "./types.js";

const id = z.string().trim().min(1).transform(instrumentId);
const nullableNumber = z.number().nullable();
const nullableString = z.string().nullable();
const side = z.enum(["yes", "no"]);
const levels = z.array(z.object({ price: z.number(), quantity: z.number() }));

const book = z.object({
	instrumentId: id,
	seq: z.number().int().nullable(),
	yes: levels,
	no: levels,
	updatedAt: z.number(),
});

function record<K extends RecordKind, P extends z.ZodTypeAny>(kind: K, payload: P) {
	return z.object({
		kind: z.literal(kind),
		instrumentId: id,
		seq: z.number().int().nullable(),
		receivedAt: z.number(),
		payload,
	});
}

export const RECORD_SCHEMAS: {
	readonly [K in RecordKind]: z.ZodType<StoredRecordOf<K>, z.ZodTypeDef, unknown>;
} = {
	ticker: record(
		"ticker",
		z.object({
			price: nullableNumber,
			yesBid: nullableNumber,
			yesAsk: nullableNumber,
			spread: nullableNumber,
			volume: nullableNumber,
			openInterest: nullableNumber,
			ts: nullableNumber,
		}),
	),
	orderbook_snapshot: record("orderbook_snapshot", z.object({ yes: levels, no: levels })),
	orderbook_delta: record(
		"orderbook_delta",
		z.object({
			prevSeq: z.number().int().nullable(),
			side,
			price: z.number(),
			delta: z.number(),
			clientOrderId: nullableString,
		}),
	),
	trade: record(
		"trade",
		z.object({
			tradeId: nullableString,
			yesPrice: z.number(),
			noPrice: z.number(),
			count: z.number(),
			takerSide: side,
			ts: nullableNumber,
		}),
	),
	fill: record(
		"fill",
		z.object({
			tradeId: nullableString,
			orderId: z.string(),
			isTaker: z.boolean(),
			side,
			action: z.enum(["buy", "sell"]),
			count: z.number(),
			yesPrice: z.number(),
			ts: nullableNumber,
		}),
	),
};

export const LATEST_SCHEMAS: {
	readonly [K in LatestKind]: z.ZodType<LatestPayloadMap[K], z.ZodTypeDef, unknown>;
} = {
	ticker: z.object({
		instrumentId: id,
		seq: z.number().int().nullable(),
		updatedAt: z.number(),
		price: nullableNumber,
		yesBid: nullableNumber,
		yesAsk: nullableNumber,
		spread: nullableNumber,
		volume: nullableNumber,
		openInterest: nullableNumber,
		ts: nullableNumber,
	}),
	orderbook: z.discriminatedUnion("status", [
		book.extend({ status: z.literal("synced") }),
		book.extend({ status: z.literal("stale") }),
	]),
};
