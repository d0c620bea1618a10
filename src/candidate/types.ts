/**
 * Candidate domain types — what the strategy-synthesis collaborator hands in.
 *
 * Candidates and portfolio snapshots are read-only inputs. Nothing in the
 * staging core mutates them; legs are frozen when parsed.
 */

import type { Decimal } from "../shared/decimal.js";
import type { TradeDate } from "../shared/time.js";

// ── Leg ─────────────────────────────────────────────────────────────

export const LegSide = {
	Buy: "buy",
	Sell: "sell",
} as const;

export type LegSide = (typeof LegSide)[keyof typeof LegSide];

export const Instrument = {
	Call: "call",
	Put: "put",
} as const;

export type Instrument = (typeof Instrument)[keyof typeof Instrument];

/** One option contract line of a multi-leg strategy. */
export interface Leg {
	readonly side: LegSide;
	readonly instrument: Instrument;
	/** Strike price, strictly positive */
	readonly strike: Decimal;
	/** Contracts, a positive integer */
	readonly quantity: number;
}

// ── Archetype ───────────────────────────────────────────────────────

/** Fixed-shape strategies the structural validator knows how to check. */
export const Archetype = {
	IronCondor: "iron_condor",
	PutCreditSpread: "put_credit_spread",
	CallCreditSpread: "call_credit_spread",
	CoveredCall: "covered_call",
	LongStraddle: "long_straddle",
	Custom: "custom",
} as const;

export type Archetype = (typeof Archetype)[keyof typeof Archetype];

export const ARCHETYPES: readonly Archetype[] = Object.values(Archetype);

// ── Candidate ───────────────────────────────────────────────────────

/** A proposed multi-leg strategy awaiting validation, assessment and staging. */
export interface StrategyCandidate {
	readonly id: string;
	readonly symbol: string;
	readonly archetype: Archetype;
	readonly legs: readonly Leg[];
	/** Worst-case loss the proposer committed to */
	readonly declaredMaxRisk: Decimal;
	readonly declaredMaxProfit?: Decimal | undefined;
	readonly metadata: Readonly<Record<string, unknown>>;
}

// ── Portfolio ───────────────────────────────────────────────────────

export const PositionKind = {
	Equity: "equity",
	Option: "option",
} as const;

export type PositionKind = (typeof PositionKind)[keyof typeof PositionKind];

/** A holding in the account; options and shares alike, keyed by symbol. */
export interface PortfolioPosition {
	readonly symbol: string;
	/** Absent reads as equity */
	readonly kind?: PositionKind | undefined;
	/** Signed; negative for short positions */
	readonly quantity: number;
	readonly averageCost: Decimal;
}

/** Point-in-time view of the account, supplied fresh for every assessment. */
export interface PortfolioSnapshot {
	readonly equity: Decimal;
	readonly cash: Decimal;
	readonly positions: readonly PortfolioPosition[];
	/** Realized loss booked on the given trade date, as a non-negative amount */
	dailyRealizedLoss(date: TradeDate): Decimal;
}
