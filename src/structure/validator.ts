import type { Archetype, StrategyCandidate } from "../candidate/types.js";
import { callCreditSpreadRule, putCreditSpreadRule } from "./rules/credit-spread.js";
import { coveredCallRule } from "./rules/covered-call.js";
import { customRule } from "./rules/custom.js";
import { ironCondorRule } from "./rules/iron-condor.js";
import { longStraddleRule } from "./rules/long-straddle.js";
import type { StructureRule } from "./types.js";

export const UNSUPPORTED_ARCHETYPE = "unsupported archetype";

/** One rule per archetype. Adding an archetype without a rule fails to compile. */
const RULES: Readonly<Record<Archetype, StructureRule>> = {
	iron_condor: ironCondorRule,
	put_credit_spread: putCreditSpreadRule,
	call_credit_spread: callCreditSpreadRule,
	covered_call: coveredCallRule,
	long_straddle: longStraddleRule,
	custom: customRule,
};

function ruleFor(archetype: string): StructureRule | undefined {
	for (const [name, rule] of Object.entries(RULES)) {
		if (name === archetype) return rule;
	}
	return undefined;
}

/**
 * Checks a candidate's legs against its archetype.
 *
 * Returns one `"<archetype>: <rule>"` message per violated rule, or an empty
 * list when the shape is valid. A leg-count mismatch is reported alone since
 * the remaining rules presuppose the count. Pure and idempotent.
 *
 * @example
 * validateStructure(onePutSpreadLeg) // ["put_credit_spread: expected 2 legs, found 1"]
 */
export function validateStructure(candidate: StrategyCandidate): readonly string[] {
	const rule = ruleFor(candidate.archetype);
	if (rule === undefined) return [UNSUPPORTED_ARCHETYPE];
	return rule(candidate.legs).map((description) => `${candidate.archetype}: ${description}`);
}
