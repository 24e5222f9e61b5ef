import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

/**
 * Sliding-window counter for malformed frames.
 *
 * `record()` returns true when the count inside the window reaches the
 * threshold; the window is then cleared so the next trip needs a fresh run.
 */
export class FrameErrorBreaker {
	private readonly hits: number[] = [];
	private _trips = 0;

	constructor(
		private readonly threshold: number,
		private readonly windowMs: number,
		private readonly clock: Clock = SystemClock,
	) {}

	record(): boolean {
		const now = this.clock.now();
		this.evict(now);
		this.hits.push(now);
		if (this.hits.length >= this.threshold) {
			this.hits.length = 0;
			this._trips++;
			return true;
		}
		return false;
	}

	/** Malformed frames currently inside the window */
	count(): number {
		this.evict(this.clock.now());
		return this.hits.length;
	}

	get trips(): number {
		return this._trips;
	}

	reset(): void {
		this.hits.length = 0;
	}

	private evict(now: number): void {
		const cutoff = now - this.windowMs;
		while (this.hits.length > 0 && (this.hits[0] ?? now) <= cutoff) {
			this.hits.shift();
		}
	}
}
