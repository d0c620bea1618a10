import { describe, expect, it } from "vitest";
import {
	err,
	flatMap,
	isErr,
	isOk,
	map,
	mapErr,
	ok,
	tryCatchAsync,
	unwrap,
	unwrapOr,
} from "./result.js";

describe("Result", () => {
	describe("factories and guards", () => {
		it("ok wraps a value and narrows with isOk", () => {
			const r = ok("STRAT-1");
			expect(isOk(r)).toBe(true);
			expect(isErr(r)).toBe(false);
			if (r.ok) expect(r.value).toBe("STRAT-1");
		});

		it("err wraps an error and narrows with isErr", () => {
			const r = err({ kind: "not_found", message: "strategy STRAT-9 not found" });
			expect(isErr(r)).toBe(true);
			if (!r.ok) expect(r.error.kind).toBe("not_found");
		});
	});

	describe("combinators", () => {
		it("map transforms only the success value", () => {
			expect(map(ok(4), (n) => n * 100)).toEqual(ok(400));
			expect(map(err("conflict"), (n: number) => n * 100)).toEqual(err("conflict"));
		});

		it("mapErr transforms only the error value", () => {
			expect(mapErr(err("conflict"), (e) => `retry: ${e}`)).toEqual(err("retry: conflict"));
			expect(mapErr(ok(1), (e: string) => `retry: ${e}`)).toEqual(ok(1));
		});

		it("flatMap chains and short-circuits", () => {
			expect(flatMap(ok(2), (n) => ok(n + 1))).toEqual(ok(3));
			expect(flatMap(err("first"), (_n: number) => ok(9))).toEqual(err("first"));
			expect(flatMap(ok(2), (_n) => err("second"))).toEqual(err("second"));
		});
	});

	describe("unwrap / unwrapOr", () => {
		it("unwrap returns the value", () => {
			expect(unwrap(ok(42))).toBe(42);
		});

		it("unwrap rethrows Error instances", () => {
			expect(() => unwrap(err(new Error("ledger offline")))).toThrow("ledger offline");
		});

		it("unwrap uses the message of structured errors", () => {
			expect(() => unwrap(err({ kind: "staging_conflict", message: "order moved" }))).toThrow(
				"order moved",
			);
		});

		it("unwrap stringifies other errors", () => {
			expect(() => unwrap(err("plain failure"))).toThrow("plain failure");
		});

		it("unwrapOr falls back on error", () => {
			expect(unwrapOr(ok(42), 0)).toBe(42);
			expect(unwrapOr(err("fail"), 0)).toBe(0);
		});
	});

	describe("tryCatchAsync", () => {
		it("wraps a resolved promise in ok", async () => {
			expect(await tryCatchAsync(async () => 42)).toEqual(ok(42));
		});

		it("wraps a rejected promise in err", async () => {
			const r = await tryCatchAsync(async () => {
				throw new Error("disk full");
			});
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error.message).toBe("disk full");
		});

		it("wraps a non-Error rejection in an Error", async () => {
			const r = await tryCatchAsync(() => Promise.reject("socket closed"));
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error.message).toBe("socket closed");
		});
	});
});
