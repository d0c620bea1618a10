import { netQuantity } from "../candidate/portfolio.js";
import { Decimal } from "../shared/decimal.js";
import type { ExposureContext, LimitCheck, LimitVerdict } from "./types.js";
import { breach, within } from "./types.js";

/** A limit of zero or below is always breached. */
function exceeds(value: Decimal, limit: number): boolean {
	return limit <= 0 || value.gt(Decimal.from(limit));
}

export const positionSizeCheck: LimitCheck = {
	name: "PositionSize",
	check(ctx: ExposureContext): LimitVerdict {
		const limit = ctx.limits.maxPositionSize;
		if (!exceeds(ctx.positionExposure, limit)) return within();
		return breach(
			"PositionSize",
			`Position size ${ctx.positionExposure.toString()} exceeds limit ${limit}`,
			ctx.positionExposure.toNumber(),
			limit,
		);
	},
};

export const perTradeLossCheck: LimitCheck = {
	name: "PerTradeLoss",
	check(ctx: ExposureContext): LimitVerdict {
		const limit = ctx.limits.maxLossPerTrade;
		const maxLoss = ctx.candidate.declaredMaxRisk;
		if (!exceeds(maxLoss, limit)) return within();
		return breach(
			"PerTradeLoss",
			`Max loss ${maxLoss.toString()} exceeds per-trade limit ${limit}`,
			maxLoss.toNumber(),
			limit,
		);
	},
};

export const portfolioExposureCheck: LimitCheck = {
	name: "PortfolioExposure",
	check(ctx: ExposureContext): LimitVerdict {
		const limit = ctx.limits.maxPortfolioExposure;
		if (!exceeds(ctx.portfolioExposure, limit)) return within();
		return breach(
			"PortfolioExposure",
			`Portfolio exposure ${ctx.portfolioExposure.toString()} exceeds limit ${limit}`,
			ctx.portfolioExposure.toNumber(),
			limit,
		);
	},
};

export const dailyLossCheck: LimitCheck = {
	name: "DailyLoss",
	check(ctx: ExposureContext): LimitVerdict {
		const limit = ctx.limits.maxLossPerDay;
		const potential = ctx.dailyLossSoFar.add(ctx.positionExposure);
		if (!exceeds(potential, limit)) return within();
		return breach(
			"DailyLoss",
			`Potential daily loss ${potential.toString()} exceeds limit ${limit}`,
			potential.toNumber(),
			limit,
		);
	},
};

/** Short calls must be covered by shares of the underlying, one multiplier per contract. */
export const coveredCallSharesCheck: LimitCheck = {
	name: "CoveredCallShares",
	check(ctx: ExposureContext): LimitVerdict {
		if (ctx.candidate.archetype !== "covered_call") return within();
		const contracts = ctx.candidate.legs.reduce((acc, l) => acc + l.quantity, 0);
		const required = contracts * ctx.limits.contractMultiplier;
		const held = netQuantity(ctx.portfolio, ctx.candidate.symbol);
		if (held >= required) return within();
		return breach(
			"CoveredCallShares",
			`Covered call needs ${required} shares of ${ctx.candidate.symbol}, holding ${held}`,
			held,
			required,
		);
	},
};

/** Checks in the order their violations are reported. */
export const LIMIT_CHECKS: readonly LimitCheck[] = [
	positionSizeCheck,
	perTradeLossCheck,
	portfolioExposureCheck,
	dailyLossCheck,
	coveredCallSharesCheck,
];
