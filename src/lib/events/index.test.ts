import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type TestEvents = {
	staged: { strategyId: string; legs: number };
	failed: Error;
};

describe("TypedEmitter", () => {
	it("emit() passes the payload to on() handlers", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("staged", handler);
		emitter.emit("staged", { strategyId: "STRAT-1", legs: 4 });

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith({ strategyId: "STRAT-1", legs: 4 });
	});

	it("off() removes a listener", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("staged", handler);
		emitter.off("staged", handler);
		emitter.emit("staged", { strategyId: "STRAT-1", legs: 1 });

		expect(handler).not.toHaveBeenCalled();
	});

	it("once() fires exactly once", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.once("failed", handler);
		emitter.emit("failed", new Error("first"));
		emitter.emit("failed", new Error("second"));

		expect(handler).toHaveBeenCalledTimes(1);
	});

	it("emit() reports whether anyone was listening", () => {
		const emitter = new TypedEmitter<TestEvents>();
		expect(emitter.emit("failed", new Error("nobody"))).toBe(false);

		emitter.on("failed", () => {});
		expect(emitter.emit("failed", new Error("somebody"))).toBe(true);
	});

	it("removeAllListeners() clears one event or all", () => {
		const emitter = new TypedEmitter<TestEvents>();
		emitter.on("staged", () => {});
		emitter.on("failed", () => {});

		emitter.removeAllListeners("staged");
		expect(emitter.listenerCount("staged")).toBe(0);
		expect(emitter.listenerCount("failed")).toBe(1);

		emitter.removeAllListeners();
		expect(emitter.listenerCount("failed")).toBe(0);
	});

	it("on() is chainable", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const result = emitter.on("staged", () => {}).on("failed", () => {});
		expect(result).toBe(emitter);
	});
});
