export type { StructureRule } from "./types.js";
export { validateStructure, UNSUPPORTED_ARCHETYPE } from "./validator.js";
