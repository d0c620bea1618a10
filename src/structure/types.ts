import type { Leg } from "../candidate/types.js";

/**
 * Checks the legs of one archetype and describes each violated rule.
 * Descriptions carry no archetype prefix; the validator adds it.
 */
export type StructureRule = (legs: readonly Leg[]) => readonly string[];
