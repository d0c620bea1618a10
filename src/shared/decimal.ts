/**
 * Decimal — the money type of the staging core.
 *
 * Strikes, declared risk, exposures, fill prices and daily losses are all
 * Decimal. Raw `number` is reserved for quantities, limits read from
 * configuration and the 0–100 risk score.
 */
export { LibDecimal as Decimal } from "../lib/decimal/index.js";
