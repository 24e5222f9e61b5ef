/**
 * Log-scale latency histogram for handler dispatch timing.
 *
 * 20 buckets on a log2 scale from 1μs up to ~0.5s, plus an overflow bucket.
 * Percentiles report the upper bound of the bucket that contains them, so
 * they over-estimate by at most a factor of two.
 */

const NUM_BUCKETS = 20;
const BUCKET_BOUNDARIES_US: readonly number[] = Array.from(
	{ length: NUM_BUCKETS },
	(_, i) => 2 ** i,
);

export interface LatencySummary {
	readonly count: number;
	readonly p50Ms: number;
	readonly p95Ms: number;
	readonly p99Ms: number;
	readonly maxMs: number;
}

export class LatencyHistogram {
	private readonly buckets: number[];
	private _count = 0;
	private _maxUs = 0;

	private constructor() {
		this.buckets = new Array<number>(NUM_BUCKETS + 1).fill(0);
	}

	static create(): LatencyHistogram {
		return new LatencyHistogram();
	}

	/** Record a sample in milliseconds (fractions allowed). */
	recordMs(latencyMs: number): void {
		const us = Math.max(0, latencyMs * 1000);
		const idx = bucketIndex(us);
		this.buckets[idx] = (this.buckets[idx] ?? 0) + 1;
		this._count++;
		if (us > this._maxUs) this._maxUs = us;
	}

	get count(): number {
		return this._count;
	}

	/** Upper bound of the bucket holding the p-th percentile, in ms. 0 without samples. */
	percentileMs(p: number): number {
		if (this._count === 0) return 0;
		const target = Math.max(1, Math.ceil(this._count * (p / 100)));
		let cumulative = 0;
		for (let i = 0; i <= NUM_BUCKETS; i++) {
			cumulative += this.buckets[i] ?? 0;
			if (cumulative >= target) {
				return upperBoundUs(i) / 1000;
			}
		}
		return upperBoundUs(NUM_BUCKETS) / 1000;
	}

	summary(): LatencySummary {
		return {
			count: this._count,
			p50Ms: this.percentileMs(50),
			p95Ms: this.percentileMs(95),
			p99Ms: this.percentileMs(99),
			maxMs: this._maxUs / 1000,
		};
	}

	reset(): void {
		this.buckets.fill(0);
		this._count = 0;
		this._maxUs = 0;
	}
}

function bucketIndex(latencyUs: number): number {
	for (let i = 0; i < NUM_BUCKETS; i++) {
		const boundary = BUCKET_BOUNDARIES_US[i];
		if (boundary !== undefined && latencyUs < boundary) return i;
	}
	return NUM_BUCKETS;
}

function upperBoundUs(index: number): number {
	if (index >= NUM_BUCKETS) return 2 ** NUM_BUCKETS;
	return BUCKET_BOUNDARIES_US[index] ?? 2 ** index;
}
