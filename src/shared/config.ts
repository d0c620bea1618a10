/**
 * Stager configuration — risk limits, trade-date zone and log level.
 *
 * Limits are plain numbers read from configuration. A limit of zero or
 * below is accepted but makes its check fail every time, so a missing or
 * mistyped limit blocks trading instead of lifting the cap.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { formatIssue, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_TRADING_TIME_ZONE, isValidTimeZone } from "./time.js";

export interface RiskLimits {
	/** Largest declared max risk a single strategy may carry */
	readonly maxPositionSize: number;
	/** Cap on existing positions plus the new strategy's risk */
	readonly maxPortfolioExposure: number;
	/** Cap on the declared max loss of one trade */
	readonly maxLossPerTrade: number;
	/** Cap on realized loss so far today plus the new trade's max loss */
	readonly maxLossPerDay: number;
	/** Shares per contract, 100 for standard equity options */
	readonly contractMultiplier: number;
	/** When false every candidate is approved with a warning */
	readonly enableRiskChecks: boolean;
}

export interface StagerConfig {
	readonly limits: RiskLimits;
	/** IANA zone that defines where one trade date ends */
	readonly tradingTimeZone: string;
	readonly logLevel: LogLevel;
}

export interface StagerConfigOverrides {
	readonly limits?: Partial<RiskLimits> | undefined;
	readonly tradingTimeZone?: string | undefined;
	readonly logLevel?: LogLevel | undefined;
}

export const DEFAULT_RISK_LIMITS: RiskLimits = {
	maxPositionSize: 10_000,
	maxPortfolioExposure: 50_000,
	maxLossPerTrade: 1_000,
	maxLossPerDay: 5_000,
	contractMultiplier: 100,
	enableRiskChecks: true,
};

export const DEFAULT_STAGER_CONFIG: StagerConfig = {
	limits: DEFAULT_RISK_LIMITS,
	tradingTimeZone: DEFAULT_TRADING_TIME_ZONE,
	logLevel: "info",
};

const finiteLimit = z.number().finite();

const stagerConfigSchema = z.object({
	limits: z.object({
		maxPositionSize: finiteLimit,
		maxPortfolioExposure: finiteLimit,
		maxLossPerTrade: finiteLimit,
		maxLossPerDay: finiteLimit,
		contractMultiplier: z.number().finite().positive(),
		enableRiskChecks: z.boolean(),
	}),
	tradingTimeZone: z.string().refine(isValidTimeZone, { message: "unknown time zone" }),
	logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]),
});

/**
 * Merges overrides onto the defaults and validates the result.
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(overrides: StagerConfigOverrides = {}): StagerConfig {
	const merged = {
		limits: { ...DEFAULT_RISK_LIMITS, ...overrides.limits },
		tradingTimeZone: overrides.tradingTimeZone ?? DEFAULT_STAGER_CONFIG.tradingTimeZone,
		logLevel: overrides.logLevel ?? DEFAULT_STAGER_CONFIG.logLevel,
	};
	const result = validate(stagerConfigSchema, merged, "stager config");
	if (!result.ok) {
		const fields = result.error.issues.map(formatIssue);
		throw new ConfigError(`Invalid stager config: ${fields.join("; ")}`, { issues: fields });
	}
	return result.value;
}

/** Defaults, overlaid with environment variables. */
export function loadConfig(): StagerConfig {
	return resolveConfig(configFromEnv());
}

// ── Environment ──────────────────────────────────────────────────────

type NumericLimit = Exclude<keyof RiskLimits, "enableRiskChecks">;
type MutableLimits = { -readonly [K in keyof RiskLimits]?: RiskLimits[K] };

const LIMIT_ENV_KEYS: ReadonlyArray<readonly [NumericLimit, string]> = [
	["maxPositionSize", "STAGER_MAX_POSITION_SIZE"],
	["maxPortfolioExposure", "STAGER_MAX_PORTFOLIO_EXPOSURE"],
	["maxLossPerTrade", "STAGER_MAX_LOSS_PER_TRADE"],
	["maxLossPerDay", "STAGER_MAX_LOSS_PER_DAY"],
	["contractMultiplier", "STAGER_CONTRACT_MULTIPLIER"],
];

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/**
 * Reads overrides from environment variables.
 * Supported: STAGER_MAX_POSITION_SIZE, STAGER_MAX_PORTFOLIO_EXPOSURE,
 * STAGER_MAX_LOSS_PER_TRADE, STAGER_MAX_LOSS_PER_DAY, STAGER_CONTRACT_MULTIPLIER,
 * STAGER_ENABLE_RISK_CHECKS, STAGER_TIME_ZONE, STAGER_LOG_LEVEL.
 * @throws ConfigError if a variable holds an unparseable value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): StagerConfigOverrides {
	const limits: MutableLimits = {};
	for (const [field, envKey] of LIMIT_ENV_KEYS) {
		const parsed = parseFiniteEnv(env, envKey);
		if (parsed !== undefined) limits[field] = parsed;
	}

	const enable = parseBooleanEnv(env, "STAGER_ENABLE_RISK_CHECKS");
	if (enable !== undefined) limits.enableRiskChecks = enable;

	const timeZone = env["STAGER_TIME_ZONE"];
	const logLevel = parseLogLevelEnv(env, "STAGER_LOG_LEVEL");

	return {
		...(Object.keys(limits).length > 0 && { limits }),
		...(timeZone !== undefined && timeZone.length > 0 && { tradingTimeZone: timeZone }),
		...(logLevel !== undefined && { logLevel }),
	};
}

function parseFiniteEnv(env: NodeJS.ProcessEnv, envKey: string): number | undefined {
	const raw = env[envKey];
	if (!raw) return undefined;
	const parsed = Number(raw.trim());
	if (raw.trim().length === 0 || !Number.isFinite(parsed)) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a finite number`);
	}
	return parsed;
}

function parseBooleanEnv(env: NodeJS.ProcessEnv, envKey: string): boolean | undefined {
	const raw = env[envKey];
	if (raw === undefined) return undefined;
	if (raw === "true") return true;
	if (raw === "false") return false;
	throw new ConfigError(`Invalid ${envKey}: "${raw}" must be "true" or "false"`);
}

function parseLogLevelEnv(env: NodeJS.ProcessEnv, envKey: string): LogLevel | undefined {
	const raw = env[envKey];
	if (!raw) return undefined;
	const level = LOG_LEVELS.find((l) => l === raw);
	if (level === undefined) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" is not a log level`);
	}
	return level;
}
