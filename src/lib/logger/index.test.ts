import { describe, expect, it } from "vitest";
import { createLogger, silentLogger } from "./index.js";

function capture(level: "info" | "warn" | "debug" = "info", redactPaths?: readonly string[]) {
	const lines: string[] = [];
	const logger = createLogger({
		level,
		redactPaths,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	});
	return { logger, lines };
}

function parsed(lines: readonly string[]): Array<Record<string, unknown>> {
	return lines.map((l) => {
		const entry: Record<string, unknown> = JSON.parse(l);
		return entry;
	});
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("writes structured JSON with the message and fields", () => {
			const { logger, lines } = capture();
			logger.info({ strategyId: "STRAT-1", legs: 4 }, "strategy staged");

			const [entry] = parsed(lines);
			expect(entry?.["msg"]).toBe("strategy staged");
			expect(entry?.["strategyId"]).toBe("STRAT-1");
			expect(entry?.["legs"]).toBe(4);
		});

		it("accepts a bare message", () => {
			const { logger, lines } = capture();
			logger.warn("ledger slow");

			const [entry] = parsed(lines);
			expect(entry?.["msg"]).toBe("ledger slow");
			expect(entry?.["level"]).toBe(40);
		});

		it("child loggers carry their bindings", () => {
			const { logger, lines } = capture();
			logger.child({ module: "lifecycle" }).child({ op: "approve" }).info("done");

			const [entry] = parsed(lines);
			expect(entry?.["module"]).toBe("lifecycle");
			expect(entry?.["op"]).toBe("approve");
		});
	});

	describe("redact paths", () => {
		it("censors configured paths", () => {
			const { logger, lines } = capture("info", ["metadata.note"]);
			logger.info({ metadata: { note: "call the desk", source: "nlu" } }, "candidate");

			const [entry] = parsed(lines);
			expect(entry?.["metadata"]).toEqual({ note: "[REDACTED]", source: "nlu" });
		});
	});

	describe("log levels", () => {
		it("respects the configured level", () => {
			const { logger, lines } = capture("warn");
			logger.debug("hidden");
			logger.info("hidden too");
			logger.warn("shown");
			logger.error({ code: "X" }, "also shown");

			expect(parsed(lines).map((e) => e["msg"])).toEqual(["shown", "also shown"]);
		});
	});

	describe("silentLogger", () => {
		it("accepts every call without throwing", () => {
			const logger = silentLogger();
			expect(() => {
				logger.error({ err: "boom" }, "ignored");
				logger.child({ a: 1 }).info("ignored");
			}).not.toThrow();
		});
	});
});
