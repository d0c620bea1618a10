import type { Leg } from "../../candidate/types.js";
import type { StructureRule } from "../types.js";
import { countInstrument, countSide, legCountMismatch } from "./leg-counts.js";

export const longStraddleRule: StructureRule = (legs: readonly Leg[]) => {
	const countError = legCountMismatch(legs, 2);
	if (countError !== null) return [countError];

	const errors: string[] = [];
	if (countInstrument(legs, "call") !== 1 || countInstrument(legs, "put") !== 1) {
		errors.push("expected one call and one put");
	}
	if (countSide(legs, "buy") !== 2) {
		errors.push("both legs must be buys");
	}
	const [first, second] = legs;
	if (first !== undefined && second !== undefined && !first.strike.eq(second.strike)) {
		errors.push(
			`strikes must match, found ${first.strike.toString()} and ${second.strike.toString()}`,
		);
	}
	return errors;
};
