/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * Keeps venue instrument tickers and locally assigned subscription ids from
 * being mixed up with arbitrary strings and numbers.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Tradable market / contract ticker as the venue names it (e.g. `KXCPI-26JAN-T0.0`). */
export type InstrumentId = Brand<string, "InstrumentId">;
/** Stable, locally assigned handle for a held subscription. */
export type SubscriptionId = Brand<number, "SubscriptionId">;

/** Create a validated InstrumentId from a raw string. Throws if empty. */
export function instrumentId(value: string): InstrumentId {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error("InstrumentId cannot be empty");
	}
	return trimmed as InstrumentId;
}

/** Create a SubscriptionId. Throws unless the value is a positive integer. */
export function subscriptionId(value: number): SubscriptionId {
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`SubscriptionId must be a positive integer, got: ${value}`);
	}
	return value as SubscriptionId;
}
