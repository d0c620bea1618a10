import { Decimal } from "../shared/decimal.js";
import type { TradeDate } from "../shared/time.js";

/**
 * Realized loss per trade date.
 *
 * Only losses count: a negative P&L adds its magnitude, a gain adds
 * nothing. Totals only grow. Updates are synchronous, so concurrent
 * callers cannot interleave a read and a write of the same date.
 */
export class DailyLossTracker {
	private readonly totals = new Map<TradeDate, Decimal>();

	/** Books one realized trade result and returns the date's new total. */
	recordResult(date: TradeDate, pnl: Decimal): Decimal {
		const current = this.lossFor(date);
		if (!pnl.isNegative()) return current;
		const next = current.add(pnl.abs());
		this.totals.set(date, next);
		return next;
	}

	lossFor(date: TradeDate): Decimal {
		return this.totals.get(date) ?? Decimal.zero();
	}

	/** Dates with a recorded loss, oldest first. */
	dates(): readonly TradeDate[] {
		return [...this.totals.keys()].sort();
	}
}
