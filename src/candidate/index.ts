export {
	LegSide,
	Instrument,
	Archetype,
	ARCHETYPES,
	PositionKind,
	type Leg,
	type StrategyCandidate,
	type PortfolioPosition,
	type PortfolioSnapshot,
} from "./types.js";
export {
	type PortfolioSnapshotInit,
	createPortfolioSnapshot,
	netQuantity,
} from "./portfolio.js";
export { parseStrategyCandidate, parsePortfolioSnapshot } from "./schema.js";
