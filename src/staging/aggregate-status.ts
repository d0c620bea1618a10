import { isTerminal } from "./order-state-machine.js";
import { AggregateStatus, OrderStatus } from "./types.js";

const PROGRESSED: ReadonlySet<OrderStatus> = new Set([
	OrderStatus.Submitted,
	OrderStatus.PartiallyFilled,
	OrderStatus.Filled,
]);

/**
 * Derives a strategy's status from its orders.
 *
 * FILLED when every order filled; REJECTED (or CANCELLED) when any order
 * was rejected (or cancelled) and none reached the broker; IN_PROGRESS
 * otherwise.
 */
export function aggregateStatusOf(statuses: readonly OrderStatus[]): AggregateStatus {
	if (statuses.length > 0 && statuses.every((s) => s === OrderStatus.Filled)) {
		return AggregateStatus.Filled;
	}
	const progressed = statuses.some((s) => PROGRESSED.has(s));
	if (!progressed && statuses.includes(OrderStatus.Rejected)) return AggregateStatus.Rejected;
	if (!progressed && statuses.includes(OrderStatus.Cancelled)) return AggregateStatus.Cancelled;
	return AggregateStatus.InProgress;
}

/** A strategy is settled once none of its orders can change again. */
export function allTerminal(statuses: readonly OrderStatus[]): boolean {
	return statuses.every(isTerminal);
}
