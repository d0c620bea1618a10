import { describe, expect, it } from "vitest";
import {
	DEFAULT_TRADING_TIME_ZONE,
	FakeClock,
	SystemClock,
	isValidTimeZone,
	tradeDateOf,
} from "./time.js";

describe("Clock", () => {
	describe("SystemClock", () => {
		it("returns current time", () => {
			const before = Date.now();
			const now = SystemClock.now();
			const after = Date.now();
			expect(now).toBeGreaterThanOrEqual(before);
			expect(now).toBeLessThanOrEqual(after);
		});
	});

	describe("FakeClock", () => {
		it("starts at the given time, or 0", () => {
			expect(new FakeClock(1000).now()).toBe(1000);
			expect(new FakeClock().now()).toBe(0);
		});

		it("advance and set move time", () => {
			const clock = new FakeClock(100);
			clock.advance(50);
			expect(clock.now()).toBe(150);
			clock.set(10);
			expect(clock.now()).toBe(10);
		});
	});
});

describe("tradeDateOf", () => {
	it("defaults to the exchange time zone", () => {
		expect(DEFAULT_TRADING_TIME_ZONE).toBe("America/New_York");
		// 03:00 UTC on the 16th is still the evening of the 15th in New York
		expect(tradeDateOf(Date.UTC(2024, 0, 16, 3, 0))).toBe("2024-01-15");
	});

	it("uses the requested zone", () => {
		expect(tradeDateOf(Date.UTC(2024, 0, 16, 3, 0), "UTC")).toBe("2024-01-16");
	});

	it("pads month and day", () => {
		expect(tradeDateOf(Date.UTC(2024, 2, 5, 15, 0), "UTC")).toBe("2024-03-05");
	});

	it("throws for unknown zones", () => {
		expect(() => tradeDateOf(0, "Mars/Olympus_Mons")).toThrow(RangeError);
	});
});

describe("isValidTimeZone", () => {
	it("accepts IANA zones and rejects unknown ones", () => {
		expect(isValidTimeZone("Europe/London")).toBe(true);
		expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
	});
});
