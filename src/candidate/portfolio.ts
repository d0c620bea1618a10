import { Decimal } from "../shared/decimal.js";
import type { TradeDate } from "../shared/time.js";
import type { PortfolioPosition, PortfolioSnapshot } from "./types.js";
import { PositionKind } from "./types.js";

/** Plain-data form of a portfolio snapshot. */
export interface PortfolioSnapshotInit {
	readonly equity: Decimal;
	readonly cash: Decimal;
	readonly positions?: readonly PortfolioPosition[] | undefined;
	/** Realized loss per trade date; dates not listed read as zero */
	readonly dailyRealizedLosses?: Readonly<Record<TradeDate, Decimal>> | undefined;
}

/**
 * Builds an immutable PortfolioSnapshot from plain data.
 * Negative loss figures read as zero so a bad feed cannot credit the daily budget.
 */
export function createPortfolioSnapshot(init: PortfolioSnapshotInit): PortfolioSnapshot {
	const positions = Object.freeze([...(init.positions ?? [])]);
	const losses = new Map(Object.entries(init.dailyRealizedLosses ?? {}));
	return Object.freeze({
		equity: init.equity,
		cash: init.cash,
		positions,
		dailyRealizedLoss(date: TradeDate): Decimal {
			const loss = losses.get(date);
			return loss === undefined || loss.isNegative() ? Decimal.zero() : loss;
		},
	});
}

/** Net shares held in one symbol; option positions are not counted. */
export function netQuantity(snapshot: PortfolioSnapshot, symbol: string): number {
	return snapshot.positions
		.filter((p) => p.symbol === symbol && isEquity(p))
		.reduce((acc, p) => acc + p.quantity, 0);
}

function isEquity(position: PortfolioPosition): boolean {
	return (position.kind ?? PositionKind.Equity) === PositionKind.Equity;
}
