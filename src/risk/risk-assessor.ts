import type { PortfolioSnapshot, StrategyCandidate } from "../candidate/types.js";
import type { RiskLimits } from "../shared/config.js";
import { DEFAULT_RISK_LIMITS } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { LIMIT_CHECKS } from "./limit-checks.js";
import type { ExposureContext, MarginCheck, RiskAssessment } from "./types.js";
import { isBreach } from "./types.js";

export const RiskWarning = {
	High: "High risk score: proceed with caution",
	Moderate: "Moderate risk score",
	ChecksDisabled: "Risk checks are disabled",
} as const;

export type RiskWarning = (typeof RiskWarning)[keyof typeof RiskWarning];

const POSITION_WEIGHT = 40;
const PORTFOLIO_WEIGHT = 30;
const DAILY_LOSS_WEIGHT = 30;
const MAX_SCORE = 100;

// ── Exposure & score ────────────────────────────────────────────────

/** Capital already committed in open positions plus the candidate's own risk. */
export function portfolioExposureOf(
	portfolio: PortfolioSnapshot,
	positionExposure: Decimal,
	contractMultiplier: number,
): Decimal {
	const multiplier = Decimal.from(contractMultiplier);
	const held = Decimal.sum(
		portfolio.positions.map((p) =>
			Decimal.from(Math.abs(p.quantity)).mul(p.averageCost).mul(multiplier),
		),
	);
	return held.add(positionExposure);
}

/** `min(weight, weight * value / limit)`, or nothing when the limit is not positive. */
function scoreTerm(weight: number, value: Decimal, limit: number): Decimal {
	if (limit <= 0) return Decimal.zero();
	const cap = Decimal.from(weight);
	return Decimal.min(cap, value.mul(cap).div(Decimal.from(limit)));
}

/** Weighted 40/30/30 score over position, portfolio and daily-loss usage, in [0, 100]. */
export function riskScoreOf(
	positionExposure: Decimal,
	portfolioExposure: Decimal,
	dailyLossSoFar: Decimal,
	limits: RiskLimits,
): number {
	const total = Decimal.sum([
		scoreTerm(POSITION_WEIGHT, positionExposure, limits.maxPositionSize),
		scoreTerm(PORTFOLIO_WEIGHT, portfolioExposure, limits.maxPortfolioExposure),
		scoreTerm(DAILY_LOSS_WEIGHT, dailyLossSoFar.add(positionExposure), limits.maxLossPerDay),
	]);
	const clamped = Decimal.max(Decimal.zero(), Decimal.min(Decimal.from(MAX_SCORE), total));
	return clamped.toNumber();
}

function scoreWarnings(score: number): readonly string[] {
	if (score > 75) return [RiskWarning.High];
	if (score > 50) return [RiskWarning.Moderate];
	return [];
}

// ── Assessment ──────────────────────────────────────────────────────

/**
 * Scores a candidate against the portfolio and limits.
 *
 * Every limit check runs; each breach adds one violation. Pure: the same
 * inputs always give the same assessment, and nothing is cached.
 */
export function assess(
	candidate: StrategyCandidate,
	portfolio: PortfolioSnapshot,
	dailyLossSoFar: Decimal,
	limits: RiskLimits,
): RiskAssessment {
	const positionExposure = candidate.declaredMaxRisk;
	const portfolioExposure = portfolioExposureOf(
		portfolio,
		positionExposure,
		limits.contractMultiplier,
	);
	const riskScore = riskScoreOf(positionExposure, portfolioExposure, dailyLossSoFar, limits);
	const base = { riskScore, maxLoss: positionExposure, positionExposure, portfolioExposure };

	if (!limits.enableRiskChecks) {
		return { ...base, approved: true, violations: [], warnings: [RiskWarning.ChecksDisabled] };
	}

	const ctx: ExposureContext = {
		candidate,
		portfolio,
		limits,
		positionExposure,
		portfolioExposure,
		dailyLossSoFar,
	};
	const violations = LIMIT_CHECKS.map((c) => c.check(ctx))
		.filter(isBreach)
		.map((v) => v.reason);

	return {
		...base,
		approved: violations.length === 0,
		violations,
		warnings: scoreWarnings(riskScore),
	};
}

/**
 * Risk assessor bound to one set of limits.
 *
 * @example
 * ```ts
 * const assessor = RiskAssessor.create(config.limits);
 * const assessment = assessor.assess(candidate, portfolio, dailyLoss);
 * if (!assessment.approved) console.log(assessment.violations);
 * ```
 */
export class RiskAssessor {
	private readonly limits: RiskLimits;

	private constructor(limits: RiskLimits) {
		this.limits = limits;
	}

	static create(limits: RiskLimits = DEFAULT_RISK_LIMITS): RiskAssessor {
		return new RiskAssessor(limits);
	}

	get riskLimits(): RiskLimits {
		return this.limits;
	}

	assess(
		candidate: StrategyCandidate,
		portfolio: PortfolioSnapshot,
		dailyLossSoFar: Decimal = Decimal.zero(),
	): RiskAssessment {
		return assess(candidate, portfolio, dailyLossSoFar, this.limits);
	}

	/** Declared max risk must be covered by cash. */
	checkMarginRequirements(candidate: StrategyCandidate, portfolio: PortfolioSnapshot): MarginCheck {
		const required = candidate.declaredMaxRisk;
		const available = portfolio.cash;
		return { sufficient: available.gte(required), required, available };
	}
}
