import { describe, expect, it } from "vitest";
import { LibDecimal } from "./index.js";

describe("LibDecimal", () => {
	describe("factories", () => {
		it("creates from strings and numbers", () => {
			expect(LibDecimal.from("440.5").toString()).toBe("440.5");
			expect(LibDecimal.from(" 435 ").toString()).toBe("435");
			expect(LibDecimal.from(2.15).toString()).toBe("2.15");
			expect(LibDecimal.from(0).toString()).toBe("0");
		});

		it("creates zero", () => {
			expect(LibDecimal.zero().toString()).toBe("0");
			expect(LibDecimal.zero().eq(LibDecimal.from("0.00"))).toBe(true);
		});

		it("rejects empty strings", () => {
			expect(() => LibDecimal.from("  ")).toThrow("empty string");
		});

		it("rejects non-finite numbers", () => {
			expect(() => LibDecimal.from(Number.NaN)).toThrow("invalid");
			expect(() => LibDecimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid");
		});
	});

	describe("arithmetic", () => {
		it("adds premiums without float drift", () => {
			expect(LibDecimal.from("0.1").add(LibDecimal.from("0.2")).toString()).toBe("0.3");
		});

		it("computes spread width times multiplier", () => {
			const width = LibDecimal.from("440").sub(LibDecimal.from("435"));
			expect(width.mul(LibDecimal.from(100)).toString()).toBe("500");
		});

		it("divides exposure by a limit", () => {
			expect(LibDecimal.from("290").div(LibDecimal.from("5000")).toString()).toBe("0.058");
			expect(LibDecimal.from("2.5").div(LibDecimal.from("2")).toString()).toBe("1.25");
		});

		it("throws on division by zero", () => {
			expect(() => LibDecimal.from("1").div(LibDecimal.zero())).toThrow("division by zero");
		});

		it("takes absolute values", () => {
			expect(LibDecimal.from("-120.5").abs().toString()).toBe("120.5");
			expect(LibDecimal.from("3").abs().toString()).toBe("3");
		});

		it("sums lists", () => {
			const total = LibDecimal.sum([LibDecimal.from("1.25"), LibDecimal.from("2.75")]);
			expect(total.toString()).toBe("4");
			expect(LibDecimal.sum([]).isZero()).toBe(true);
		});
	});

	describe("comparison", () => {
		it("treats equal values with different scale as equal", () => {
			expect(LibDecimal.from("440").eq(LibDecimal.from("440.0"))).toBe(true);
			expect(LibDecimal.from("440").gt(LibDecimal.from("440.0"))).toBe(false);
		});

		it("ordering helpers agree", () => {
			const a = LibDecimal.from("1000");
			const b = LibDecimal.from("1500");
			expect(a.lt(b)).toBe(true);
			expect(b.gt(a)).toBe(true);
			expect(a.lte(LibDecimal.from("1000"))).toBe(true);
			expect(b.gte(a)).toBe(true);
			expect(a.eq(b)).toBe(false);
		});

		it("min and max pick the right operand", () => {
			const a = LibDecimal.from("2");
			const b = LibDecimal.from("7");
			expect(LibDecimal.min(a, b)).toBe(a);
			expect(LibDecimal.max(a, b)).toBe(b);
		});

		it("sign predicates", () => {
			expect(LibDecimal.zero().isZero()).toBe(true);
			expect(LibDecimal.from("5").isPositive()).toBe(true);
			expect(LibDecimal.from("-5").isNegative()).toBe(true);
			expect(LibDecimal.zero().isPositive()).toBe(false);
		});
	});

	describe("conversion", () => {
		it("strips trailing zeros", () => {
			expect(LibDecimal.from("2.50").toString()).toBe("2.5");
			expect(LibDecimal.from("3.00").toString()).toBe("3");
		});

		it("converts to number", () => {
			expect(LibDecimal.from("-42.5").toNumber()).toBe(-42.5);
		});

		it("serializes to a JSON string", () => {
			expect(JSON.stringify({ strike: LibDecimal.from("440.50") })).toBe('{"strike":"440.5"}');
		});
	});
});
