/**
 * Order status machine — validated transitions.
 *
 * PENDING → STAGED → APPROVED → SUBMITTED → PARTIALLY_FILLED → FILLED,
 * with REJECTED and CANCELLED reachable from STAGED or APPROVED.
 *
 * Rollbacks issued to undo half-finished strategy operations are not
 * transitions; they are listed separately as compensations.
 */

import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import { OrderStatus } from "./types.js";

const VALID_TRANSITIONS: ReadonlyMap<OrderStatus, readonly OrderStatus[]> = new Map([
	[OrderStatus.Pending, [OrderStatus.Staged]],
	[OrderStatus.Staged, [OrderStatus.Approved, OrderStatus.Rejected, OrderStatus.Cancelled]],
	[OrderStatus.Approved, [OrderStatus.Submitted, OrderStatus.Rejected, OrderStatus.Cancelled]],
	[OrderStatus.Submitted, [OrderStatus.PartiallyFilled, OrderStatus.Filled]],
	[OrderStatus.PartiallyFilled, [OrderStatus.PartiallyFilled, OrderStatus.Filled]],
	[OrderStatus.Filled, []],
	[OrderStatus.Rejected, []],
	[OrderStatus.Cancelled, []],
]);

const COMPENSATIONS: ReadonlyMap<OrderStatus, readonly OrderStatus[]> = new Map([
	[OrderStatus.Approved, [OrderStatus.Staged]],
	[OrderStatus.Rejected, [OrderStatus.Staged, OrderStatus.Approved]],
	[OrderStatus.Cancelled, [OrderStatus.Staged, OrderStatus.Approved]],
]);

const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set([
	OrderStatus.Filled,
	OrderStatus.Rejected,
	OrderStatus.Cancelled,
]);

/**
 * @example
 * ```ts
 * isTerminal(OrderStatus.Filled); // true
 * isTerminal(OrderStatus.Submitted); // false
 * ```
 */
export function isTerminal(status: OrderStatus): boolean {
	return TERMINAL_STATUSES.has(status);
}

export function isActive(status: OrderStatus): boolean {
	return !TERMINAL_STATUSES.has(status);
}

export function canTransitionTo(from: OrderStatus, to: OrderStatus): boolean {
	const valid = VALID_TRANSITIONS.get(from);
	if (!valid) return false;
	return valid.includes(to);
}

/** True when `to` undoes a move into `from` during a strategy-level rollback. */
export function isCompensation(from: OrderStatus, to: OrderStatus): boolean {
	return COMPENSATIONS.get(from)?.includes(to) ?? false;
}

/**
 * Attempts a transition.
 * @returns Ok(to) if the machine allows it, Err with a message otherwise
 *
 * @example
 * ```ts
 * tryTransition(OrderStatus.Staged, OrderStatus.Approved); // ok("APPROVED")
 * tryTransition(OrderStatus.Filled, OrderStatus.Cancelled); // err("Invalid transition: FILLED → CANCELLED")
 * ```
 */
export function tryTransition(from: OrderStatus, to: OrderStatus): Result<OrderStatus, string> {
	if (canTransitionTo(from, to)) {
		return ok(to);
	}
	return err(`Invalid transition: ${from} → ${to}`);
}
