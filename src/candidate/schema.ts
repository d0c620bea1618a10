/**
 * Boundary schemas for collaborator payloads.
 *
 * Candidates and portfolios arrive as untyped JSON-ish objects. These
 * schemas turn them into the typed, frozen domain values, with decimal
 * amounts accepted as numbers or numeric strings.
 */

import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { createPortfolioSnapshot } from "./portfolio.js";
import type { Leg, PortfolioSnapshot, StrategyCandidate } from "./types.js";
import { ARCHETYPES, Instrument, LegSide, PositionKind } from "./types.js";

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

const decimalSchema = z
	.union([z.number().finite(), z.string().trim().regex(DECIMAL_PATTERN, "not a decimal")])
	.transform((value) => Decimal.from(value));

const positiveDecimal = decimalSchema.refine((d) => d.isPositive(), "must be positive");
const nonNegativeDecimal = decimalSchema.refine((d) => !d.isNegative(), "must not be negative");

const legSchema = z.object({
	side: z.enum([LegSide.Buy, LegSide.Sell]),
	instrument: z.enum([Instrument.Call, Instrument.Put]),
	strike: positiveDecimal,
	quantity: z.number().int().positive(),
});

const archetypeSchema = z
	.string()
	.refine((s): s is StrategyCandidate["archetype"] => ARCHETYPES.some((a) => a === s), {
		message: "unsupported archetype",
	});

const candidateSchema = z.object({
	id: z.string().trim().min(1),
	symbol: z.string().trim().min(1).toUpperCase(),
	archetype: archetypeSchema,
	legs: z.array(legSchema),
	declaredMaxRisk: nonNegativeDecimal,
	declaredMaxProfit: nonNegativeDecimal.optional(),
	metadata: z.record(z.unknown()).default({}),
});

const positionSchema = z.object({
	symbol: z.string().trim().min(1).toUpperCase(),
	kind: z.enum([PositionKind.Equity, PositionKind.Option]).default(PositionKind.Equity),
	quantity: z.number().int(),
	averageCost: nonNegativeDecimal,
});

const portfolioSchema = z.object({
	equity: decimalSchema,
	cash: decimalSchema,
	positions: z.array(positionSchema).default([]),
	dailyRealizedLosses: z.record(nonNegativeDecimal).default({}),
});

/**
 * Parses an untyped candidate payload into a frozen StrategyCandidate.
 * Structural rules are not checked here; see `validateStructure`.
 */
export function parseStrategyCandidate(raw: unknown): Result<StrategyCandidate, ValidationError> {
	const parsed = validate(candidateSchema, raw, "strategy candidate");
	if (!parsed.ok) return parsed;

	const { declaredMaxProfit, ...rest } = parsed.value;
	const legs: readonly Leg[] = Object.freeze(parsed.value.legs.map((leg) => Object.freeze(leg)));
	const candidate: StrategyCandidate = {
		...rest,
		legs,
		...(declaredMaxProfit !== undefined && { declaredMaxProfit }),
		metadata: Object.freeze({ ...rest.metadata }),
	};
	return ok(Object.freeze(candidate));
}

/** Parses an untyped portfolio payload into a PortfolioSnapshot. */
export function parsePortfolioSnapshot(raw: unknown): Result<PortfolioSnapshot, ValidationError> {
	const parsed = validate(portfolioSchema, raw, "portfolio snapshot");
	if (!parsed.ok) return parsed;
	return ok(createPortfolioSnapshot(parsed.value));
}
