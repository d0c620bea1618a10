import type { Leg } from "../../candidate/types.js";
import type { StructureRule } from "../types.js";
import { legCountMismatch } from "./leg-counts.js";

/** One short call. Share coverage is a risk check, not a structural one. */
export const coveredCallRule: StructureRule = (legs: readonly Leg[]) => {
	const countError = legCountMismatch(legs, 1);
	if (countError !== null) return [countError];

	const errors: string[] = [];
	for (const l of legs) {
		if (l.instrument !== "call") errors.push(`leg must be a call, found ${l.instrument}`);
		if (l.side !== "sell") errors.push(`leg must be a sell, found ${l.side}`);
	}
	return errors;
};
