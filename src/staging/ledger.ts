/**
 * StagingLedger — the store behind the lifecycle controller.
 *
 * Expected failures come back as `Result` errors. A rejected promise means
 * the backend itself failed; callers must treat that as "nothing happened
 * that can be relied on" and fail closed.
 */

import type { OrderId, StrategyId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type {
	LedgerSummary,
	OrderFilter,
	OrderRecord,
	OrderStatus,
	StatusChange,
	StrategyFilter,
	StrategyRecord,
	StrategySnapshot,
} from "./types.js";

export type LedgerError =
	| { readonly kind: "not_found"; readonly message: string; readonly id: string }
	| { readonly kind: "duplicate"; readonly message: string; readonly id: string }
	| {
			readonly kind: "conflict";
			readonly message: string;
			readonly orderId: OrderId;
			readonly expected: OrderStatus;
			readonly actual: OrderStatus;
			readonly expectedVersion?: number | undefined;
			readonly actualVersion?: number | undefined;
	  }
	| { readonly kind: "read_only"; readonly message: string; readonly id: string }
	| {
			readonly kind: "not_terminal";
			readonly message: string;
			readonly strategyId: StrategyId;
			readonly openOrders: readonly OrderId[];
	  };

export interface StagingLedger {
	/** Stores a strategy and all its orders, or nothing. */
	insert(
		strategy: StrategyRecord,
		orders: readonly OrderRecord[],
	): Promise<Result<void, LedgerError>>;

	getOrder(id: OrderId): Promise<Result<OrderRecord, LedgerError>>;

	getStrategy(id: StrategyId): Promise<Result<StrategySnapshot, LedgerError>>;

	/**
	 * Sets `next` only if the order's stored status equals `expected` (and its
	 * version equals `change.expectedVersion`, when given), appending the
	 * change's audit entry in the same step. Atomic per order id.
	 */
	compareAndSetStatus(
		orderId: OrderId,
		expected: OrderStatus,
		next: OrderStatus,
		change: StatusChange,
	): Promise<Result<OrderRecord, LedgerError>>;

	/** Moves a settled strategy and its orders to the read-only history partition. */
	moveToHistory(strategyId: StrategyId): Promise<Result<StrategySnapshot, LedgerError>>;

	list(filter?: StrategyFilter): Promise<readonly StrategySnapshot[]>;

	listOrders(filter?: OrderFilter): Promise<readonly OrderRecord[]>;

	summary(): Promise<LedgerSummary>;
}

// ── Error constructors ──────────────────────────────────────────────

export function notFound(label: string, id: string): LedgerError {
	return { kind: "not_found", message: `${label} ${id} not found`, id };
}

export function duplicate(label: string, id: string): LedgerError {
	return { kind: "duplicate", message: `${label} ${id} already exists`, id };
}

export function conflict(orderId: OrderId, expected: OrderStatus, actual: OrderStatus): LedgerError {
	return {
		kind: "conflict",
		message: `order ${orderId} is ${actual}, expected ${expected}`,
		orderId,
		expected,
		actual,
	};
}

export function staleVersion(
	orderId: OrderId,
	status: OrderStatus,
	expectedVersion: number,
	actualVersion: number,
): LedgerError {
	return {
		kind: "conflict",
		message: `order ${orderId} is at version ${actualVersion}, expected version ${expectedVersion}`,
		orderId,
		expected: status,
		actual: status,
		expectedVersion,
		actualVersion,
	};
}

export function readOnly(label: string, id: string): LedgerError {
	return { kind: "read_only", message: `${label} ${id} is archived and read-only`, id };
}

export function notTerminal(strategyId: StrategyId, openOrders: readonly OrderId[]): LedgerError {
	return {
		kind: "not_terminal",
		message: `strategy ${strategyId} has ${openOrders.length} order(s) still open`,
		strategyId,
		openOrders,
	};
}
