import { describe, expect, it } from "vitest";
import { FakeClock, SystemClock } from "./time.js";

describe("Clock", () => {
	it("SystemClock reads the wall clock", () => {
		const before = Date.now();
		const now = SystemClock.now();
		expect(now).toBeGreaterThanOrEqual(before);
		expect(now).toBeLessThanOrEqual(Date.now());
	});

	it("FakeClock starts at the given time and moves on demand", () => {
		const clock = new FakeClock(1_000);
		expect(clock.now()).toBe(1_000);
		clock.advance(500);
		expect(clock.now()).toBe(1_500);
		clock.set(10);
		expect(clock.now()).toBe(10);
	});
});
