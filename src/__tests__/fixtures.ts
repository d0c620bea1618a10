/**
 * Shared candidate, portfolio and ledger-record builders for tests.
 */

import { createPortfolioSnapshot } from "../candidate/portfolio.js";
import type {
	Archetype,
	Leg,
	LegSide,
	Instrument,
	PortfolioPosition,
	PortfolioSnapshot,
	StrategyCandidate,
} from "../candidate/types.js";
import { PositionKind } from "../candidate/types.js";
import type { RiskAssessment } from "../risk/types.js";
import type { RiskLimits } from "../shared/config.js";
import { DEFAULT_RISK_LIMITS } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { orderId, strategyId } from "../shared/identifiers.js";
import type { OrderRecord, StatusChange, StrategyRecord } from "../staging/types.js";
import { OrderStatus } from "../staging/types.js";

export function leg(side: LegSide, instrument: Instrument, strike: number, quantity = 1): Leg {
	return { side, instrument, strike: Decimal.from(strike), quantity };
}

export function candidate(
	archetype: Archetype,
	legs: readonly Leg[],
	overrides: Partial<Omit<StrategyCandidate, "archetype" | "legs">> = {},
): StrategyCandidate {
	return {
		id: "cand-1",
		symbol: "SPY",
		archetype,
		legs,
		declaredMaxRisk: Decimal.from(290),
		metadata: {},
		...overrides,
	};
}

/** SPY iron condor: puts 435/440, calls 460/465, max risk 290. */
export function ironCondor(
	overrides: Partial<Omit<StrategyCandidate, "archetype" | "legs">> = {},
): StrategyCandidate {
	return candidate(
		"iron_condor",
		[
			leg("sell", "put", 440),
			leg("buy", "put", 435),
			leg("sell", "call", 460),
			leg("buy", "call", 465),
		],
		overrides,
	);
}

export function putCreditSpread(
	overrides: Partial<Omit<StrategyCandidate, "archetype" | "legs">> = {},
): StrategyCandidate {
	return candidate(
		"put_credit_spread",
		[leg("sell", "put", 440), leg("buy", "put", 435)],
		overrides,
	);
}

export function emptyPortfolio(
	opts: {
		cash?: number;
		positions?: readonly PortfolioPosition[];
		losses?: Readonly<Record<string, number>>;
	} = {},
): PortfolioSnapshot {
	const losses: Record<string, Decimal> = {};
	for (const [date, amount] of Object.entries(opts.losses ?? {})) {
		losses[date] = Decimal.from(amount);
	}
	return createPortfolioSnapshot({
		equity: Decimal.from(100_000),
		cash: Decimal.from(opts.cash ?? 100_000),
		positions: opts.positions ?? [],
		dailyRealizedLosses: losses,
	});
}

export function position(
	symbol: string,
	quantity: number,
	averageCost: number,
	kind: PositionKind = PositionKind.Equity,
): PortfolioPosition {
	return { symbol, kind, quantity, averageCost: Decimal.from(averageCost) };
}

/** Limits used by the worked iron-condor scenario. */
export const SCENARIO_LIMITS: RiskLimits = {
	...DEFAULT_RISK_LIMITS,
	maxPositionSize: 5000,
	maxPortfolioExposure: 20_000,
	maxLossPerTrade: 1000,
	maxLossPerDay: 2000,
};

// ── Ledger records ──────────────────────────────────────────────────

export function approvedAssessment(): RiskAssessment {
	return {
		approved: true,
		riskScore: 7.105,
		violations: [],
		warnings: [],
		maxLoss: Decimal.from(290),
		positionExposure: Decimal.from(290),
		portfolioExposure: Decimal.from(290),
	};
}

/** A strategy record with one STAGED order per leg of an iron condor. */
export function stagedRecords(
	id: string,
	at = 1_000,
): { strategy: StrategyRecord; orders: OrderRecord[] } {
	const c = ironCondor();
	const orders = c.legs.map(
		(l, index): OrderRecord => ({
			id: orderId(`${id}-ORD-${index + 1}`),
			strategyId: strategyId(id),
			legRef: { index, leg: l },
			status: OrderStatus.Staged,
			createdAt: at,
			updatedAt: at,
			filledQuantity: 0,
			version: 1,
			auditTrail: [{ timestamp: at, event: "staged", actor: "system", note: "" }],
		}),
	);
	return {
		strategy: {
			id: strategyId(id),
			candidate: c,
			assessment: approvedAssessment(),
			orderIds: orders.map((o) => o.id),
			createdAt: at,
		},
		orders,
	};
}

export function change(at: number, event: string, note = ""): StatusChange {
	return { at, event, actor: "tester", note };
}
