/**
 * TradingError hierarchy — thrown faults at the edges of the staging core.
 *
 * Expected outcomes (structural failures, risk rejections, conflicts) are
 * returned as Result values. These classes cover what cannot be: broken
 * configuration, malformed collaborator input and an unreachable ledger.
 * The category tells a caller whether retrying can help.
 */

/** Error severity categories that drive caller retry behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing TradingError subclasses with optional cause chain. */
interface TradingErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for the staging core, with category-based retry semantics. */
export class TradingError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "TradingError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Retryable error raised when the staging ledger cannot complete a read or write. */
export class BackendUnavailableError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"BACKEND_UNAVAILABLE",
			ErrorCategory.Retryable,
			rest,
			"Nothing was staged or approved; retry once the ledger is reachable",
		);
		this.name = "BackendUnavailableError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends TradingError {
	constructor(message: string, context: Record<string, unknown> & TradingErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/**
 * Wrap a fault thrown by a ledger backend. Existing TradingErrors pass
 * through untouched; anything else becomes a BackendUnavailableError that
 * keeps the original as its cause.
 */
export function classifyBackendFault(error: unknown, operation: string): TradingError {
	if (error instanceof TradingError) return error;
	const detail = error instanceof Error ? error.message : String(error);
	return new BackendUnavailableError(`ledger ${operation} failed: ${detail}`, {
		operation,
		cause: error,
	});
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for BackendUnavailableError. */
export function isBackendUnavailable(e: unknown): e is BackendUnavailableError {
	return e instanceof BackendUnavailableError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

/** Type guard for SystemError. */
export function isSystemError(e: unknown): e is SystemError {
	return e instanceof SystemError;
}
