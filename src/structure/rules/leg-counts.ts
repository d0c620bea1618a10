import type { Instrument, Leg, LegSide } from "../../candidate/types.js";
import { Decimal } from "../../shared/decimal.js";

export function countInstrument(legs: readonly Leg[], instrument: Instrument): number {
	return legs.filter((l) => l.instrument === instrument).length;
}

export function countSide(legs: readonly Leg[], side: LegSide): number {
	return legs.filter((l) => l.side === side).length;
}

/** Returns the mismatch description, or null when the count is right. */
export function legCountMismatch(legs: readonly Leg[], expected: number): string | null {
	if (legs.length === expected) return null;
	const noun = expected === 1 ? "leg" : "legs";
	return `expected ${expected} ${noun}, found ${legs.length}`;
}

/** True for a group of exactly one buy and one sell. */
export function isOneBuyOneSell(legs: readonly Leg[]): boolean {
	return legs.length === 2 && countSide(legs, "buy") === 1 && countSide(legs, "sell") === 1;
}

export function highestStrike(legs: readonly Leg[]): Decimal | null {
	const [first, ...rest] = legs;
	if (first === undefined) return null;
	return rest.reduce((acc, l) => Decimal.max(acc, l.strike), first.strike);
}

export function lowestStrike(legs: readonly Leg[]): Decimal | null {
	const [first, ...rest] = legs;
	if (first === undefined) return null;
	return rest.reduce((acc, l) => Decimal.min(acc, l.strike), first.strike);
}
