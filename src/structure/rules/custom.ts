import type { StructureRule } from "../types.js";

/** Free-form strategies have no shape to check; risk assessment is the only gate. */
export const customRule: StructureRule = () => [];
