/**
 * Logger wrapper — structured logging backed by pino.
 *
 * The lifecycle controller logs every staging decision through this
 * interface. Candidate metadata comes from an upstream collaborator and may
 * carry free-form text, so callers can censor paths with `redactPaths`.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[] | undefined;
	readonly destination?: { write(msg: string): void } | undefined;
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

type Level = "info" | "warn" | "error" | "debug";

// ── Factory ─────────────────────────────────────────────────────────

function emit(
	pinoLogger: pino.Logger,
	level: Level,
	msgOrObj: string | Record<string, unknown>,
	msg?: string,
): void {
	if (typeof msgOrObj === "string") {
		pinoLogger[level](msgOrObj);
	} else {
		pinoLogger[level](msgOrObj, msg ?? "");
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info: (msgOrObj: string | Record<string, unknown>, msg?: string) =>
			emit(pinoLogger, "info", msgOrObj, msg),
		warn: (msgOrObj: string | Record<string, unknown>, msg?: string) =>
			emit(pinoLogger, "warn", msgOrObj, msg),
		error: (msgOrObj: string | Record<string, unknown>, msg?: string) =>
			emit(pinoLogger, "error", msgOrObj, msg),
		debug: (msgOrObj: string | Record<string, unknown>, msg?: string) =>
			emit(pinoLogger, "debug", msgOrObj, msg),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional path redaction and a custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ strategyId: "STRAT-1" }, "strategy staged");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	const pinoLogger = destination
		? pino(pinoOptions, {
				write(chunk: string): void {
					destination.write(chunk);
				},
			})
		: pino(pinoOptions);

	return wrapPino(pinoLogger);
}

/** Logger that drops everything; the default when no logger is injected. */
export function silentLogger(): Logger {
	return createLogger({ level: "fatal", destination: { write: () => {} } });
}
