/**
 * Risk assessment: limit checks, weighted score, margin and daily loss.
 *
 * @module
 */
export type {
	RiskAssessment,
	MarginCheck,
	ExposureContext,
	LimitCheck,
	LimitVerdict,
} from "./types.js";
export { within, breach, isBreach } from "./types.js";
export {
	LIMIT_CHECKS,
	positionSizeCheck,
	perTradeLossCheck,
	portfolioExposureCheck,
	dailyLossCheck,
	coveredCallSharesCheck,
} from "./limit-checks.js";
export {
	RiskAssessor,
	RiskWarning,
	assess,
	portfolioExposureOf,
	riskScoreOf,
} from "./risk-assessor.js";
export { DailyLossTracker } from "./daily-loss-tracker.js";
