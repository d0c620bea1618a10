import type { Leg } from "../../candidate/types.js";
import type { StructureRule } from "../types.js";
import { highestStrike, isOneBuyOneSell, legCountMismatch, lowestStrike } from "./leg-counts.js";

/**
 * Short put spread below a short call spread: four legs, two per
 * instrument, each pair one buy and one sell, every put strike under
 * every call strike.
 */
export const ironCondorRule: StructureRule = (legs: readonly Leg[]) => {
	const countError = legCountMismatch(legs, 4);
	if (countError !== null) return [countError];

	const calls = legs.filter((l) => l.instrument === "call");
	const puts = legs.filter((l) => l.instrument === "put");
	if (calls.length !== 2 || puts.length !== 2) {
		return [
			`expected 2 calls and 2 puts, found ${calls.length} call(s) and ${puts.length} put(s)`,
		];
	}

	const errors: string[] = [];
	if (!isOneBuyOneSell(puts)) errors.push("put legs must be one buy and one sell");
	if (!isOneBuyOneSell(calls)) errors.push("call legs must be one buy and one sell");

	const topPut = highestStrike(puts);
	const bottomCall = lowestStrike(calls);
	if (topPut !== null && bottomCall !== null && !topPut.lt(bottomCall)) {
		errors.push(
			`put strikes must be below call strikes, highest put ${topPut.toString()} >= lowest call ${bottomCall.toString()}`,
		);
	}
	return errors;
};
