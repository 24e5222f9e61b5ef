export interface BackoffConfig {
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	/** Fraction of the computed delay added as uniform jitter, in [0, 1] */
	readonly jitterFactor: number;
	/** Uniform source in [0, 1); Math.random by default */
	readonly random?: (() => number) | undefined;
}

/**
 * Capped exponential backoff with additive jitter.
 *
 * delay(n) = min(max, base × 2^n) plus up to `jitterFactor` of itself, clamped
 * at max. Since jitter never exceeds the delay itself, delay(n) + jitter stays
 * at or below delay(n + 1), so successive delays never shrink. Attempts are
 * unbounded; `reset()` after a successful connect.
 */
export class BackoffPolicy {
	private readonly config: BackoffConfig;
	private readonly random: () => number;
	private _attempts = 0;

	constructor(config: BackoffConfig) {
		if (config.baseDelayMs <= 0 || config.maxDelayMs < config.baseDelayMs) {
			throw new RangeError("Backoff requires 0 < baseDelayMs <= maxDelayMs");
		}
		if (config.jitterFactor < 0 || config.jitterFactor > 1) {
			throw new RangeError("Backoff jitterFactor must be within [0, 1]");
		}
		this.config = config;
		this.random = config.random ?? Math.random;
	}

	/** Delay before the next attempt; advances the attempt counter. */
	nextDelay(): number {
		const { baseDelayMs, maxDelayMs, jitterFactor } = this.config;
		const capped = Math.min(maxDelayMs, baseDelayMs * 2 ** this._attempts);
		this._attempts += 1;
		if (jitterFactor === 0) return capped;
		const jitter = capped * jitterFactor * this.random();
		return Math.min(maxDelayMs, capped + jitter);
	}

	get attempts(): number {
		return this._attempts;
	}

	reset(): void {
		this._attempts = 0;
	}
}
