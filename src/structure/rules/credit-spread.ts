import type { Instrument, Leg } from "../../candidate/types.js";
import type { StructureRule } from "../types.js";
import { isOneBuyOneSell, legCountMismatch } from "./leg-counts.js";

/**
 * Two legs of one instrument, one sold and one bought, with the sold
 * strike nearer the money. For puts that is the higher strike, for
 * calls the lower one.
 */
function creditSpreadRule(instrument: Instrument): StructureRule {
	return (legs: readonly Leg[]) => {
		const countError = legCountMismatch(legs, 2);
		if (countError !== null) return [countError];

		const errors: string[] = [];
		const strays = legs.filter((l) => l.instrument !== instrument);
		if (strays.length > 0) {
			errors.push(`both legs must be ${instrument}s, found ${strays.length} other`);
		}
		if (!isOneBuyOneSell(legs)) {
			errors.push("expected one buy and one sell leg");
		}
		if (errors.length > 0) return errors;

		const sold = legs.find((l) => l.side === "sell");
		const bought = legs.find((l) => l.side === "buy");
		if (sold === undefined || bought === undefined) return errors;

		if (instrument === "put" && !sold.strike.gt(bought.strike)) {
			errors.push(
				`sold strike ${sold.strike.toString()} must be above bought strike ${bought.strike.toString()}`,
			);
		}
		if (instrument === "call" && !sold.strike.lt(bought.strike)) {
			errors.push(
				`sold strike ${sold.strike.toString()} must be below bought strike ${bought.strike.toString()}`,
			);
		}
		return errors;
	};
}

export const putCreditSpreadRule: StructureRule = creditSpreadRule("put");
export const callCreditSpreadRule: StructureRule = creditSpreadRule("call");
