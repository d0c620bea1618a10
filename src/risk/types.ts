/**
 * Risk assessment types.
 *
 * A limit check is a small pure function over an {@link ExposureContext};
 * the assessor runs every check and collects the breaches as violations.
 */

import type { PortfolioSnapshot, StrategyCandidate } from "../candidate/types.js";
import type { RiskLimits } from "../shared/config.js";
import type { Decimal } from "../shared/decimal.js";

// ── Assessment ──────────────────────────────────────────────────────

/** Outcome of assessing one candidate. Non-empty `violations` implies `approved === false`. */
export interface RiskAssessment {
	readonly approved: boolean;
	/** Weighted score in [0, 100] */
	readonly riskScore: number;
	readonly violations: readonly string[];
	readonly warnings: readonly string[];
	readonly maxLoss: Decimal;
	readonly positionExposure: Decimal;
	readonly portfolioExposure: Decimal;
}

/** Cash on hand against the capital the candidate puts at risk. */
export interface MarginCheck {
	readonly sufficient: boolean;
	readonly required: Decimal;
	readonly available: Decimal;
}

// ── Limit checks ────────────────────────────────────────────────────

/** Everything a limit check may look at, computed once per assessment. */
export interface ExposureContext {
	readonly candidate: StrategyCandidate;
	readonly portfolio: PortfolioSnapshot;
	readonly limits: RiskLimits;
	readonly positionExposure: Decimal;
	readonly portfolioExposure: Decimal;
	readonly dailyLossSoFar: Decimal;
}

/** Result of one limit check: within bounds, or breached with a readable reason. */
export type LimitVerdict =
	| { readonly type: "within" }
	| {
			readonly type: "breach";
			readonly check: string;
			readonly reason: string;
			readonly currentValue: number;
			readonly threshold: number;
	  };

export function within(): LimitVerdict {
	return { type: "within" };
}

export function breach(
	check: string,
	reason: string,
	currentValue: number,
	threshold: number,
): LimitVerdict {
	return { type: "breach", check, reason, currentValue, threshold };
}

export function isBreach(
	verdict: LimitVerdict,
): verdict is LimitVerdict & { readonly type: "breach" } {
	return verdict.type === "breach";
}

export interface LimitCheck {
	readonly name: string;
	check(ctx: ExposureContext): LimitVerdict;
}
