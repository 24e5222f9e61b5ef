import { describe, expect, it } from "vitest";
import { FakeClock } from "../shared/time.js";
import { FrameErrorBreaker } from "./frame-breaker.js";

describe("FrameErrorBreaker", () => {
	it("trips when the threshold is reached inside the window", () => {
		const clock = new FakeClock(0);
		const breaker = new FrameErrorBreaker(3, 1_000, clock);

		expect(breaker.record()).toBe(false);
		clock.advance(100);
		expect(breaker.record()).toBe(false);
		clock.advance(100);
		expect(breaker.record()).toBe(true);
		expect(breaker.trips).toBe(1);
		expect(breaker.count()).toBe(0);
	});

	it("forgets hits older than the window", () => {
		const clock = new FakeClock(0);
		const breaker = new FrameErrorBreaker(3, 1_000, clock);

		breaker.record();
		breaker.record();
		clock.advance(1_000);
		expect(breaker.count()).toBe(0);
		expect(breaker.record()).toBe(false);
		expect(breaker.trips).toBe(0);
	});

	it("needs a fresh run of hits after tripping", () => {
		const clock = new FakeClock(0);
		const breaker = new FrameErrorBreaker(2, 1_000, clock);

		breaker.record();
		expect(breaker.record()).toBe(true);
		expect(breaker.record()).toBe(false);
		expect(breaker.record()).toBe(true);
		expect(breaker.trips).toBe(2);
	});

	it("reset clears the window", () => {
		const breaker = new FrameErrorBreaker(2, 1_000, new FakeClock(0));
		breaker.record();
		breaker.reset();
		expect(breaker.record()).toBe(false);
	});
});
