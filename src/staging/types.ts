/**
 * Staging ledger record types.
 *
 * Records are immutable values; every status change produces a new frozen
 * record with a bumped `version` and one more audit entry.
 */

import type { Leg, StrategyCandidate } from "../candidate/types.js";
import type { RiskAssessment } from "../risk/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { BrokerRef, OrderId, StrategyId } from "../shared/identifiers.js";

// ── Status ──────────────────────────────────────────────────────────

export const OrderStatus = {
	Pending: "PENDING",
	Staged: "STAGED",
	Approved: "APPROVED",
	Submitted: "SUBMITTED",
	PartiallyFilled: "PARTIALLY_FILLED",
	Filled: "FILLED",
	Rejected: "REJECTED",
	Cancelled: "CANCELLED",
} as const;

export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus];

export const ORDER_STATUSES: readonly OrderStatus[] = Object.values(OrderStatus);

/** Strategy status derived from its orders; never stored. */
export const AggregateStatus = {
	InProgress: "IN_PROGRESS",
	Filled: "FILLED",
	Rejected: "REJECTED",
	Cancelled: "CANCELLED",
} as const;

export type AggregateStatus = (typeof AggregateStatus)[keyof typeof AggregateStatus];

export const Partition = {
	Active: "active",
	History: "history",
} as const;

export type Partition = (typeof Partition)[keyof typeof Partition];

// ── Records ─────────────────────────────────────────────────────────

export interface AuditEntry {
	/** Epoch milliseconds */
	readonly timestamp: number;
	readonly event: string;
	readonly actor: string;
	readonly note: string;
}

/** Which leg of the parent candidate an order carries. */
export interface LegRef {
	readonly index: number;
	readonly leg: Leg;
}

export interface OrderRecord {
	readonly id: OrderId;
	readonly strategyId: StrategyId;
	readonly legRef: LegRef;
	readonly status: OrderStatus;
	readonly createdAt: number;
	readonly updatedAt: number;
	/** Volume-weighted price across fills */
	readonly filledPrice?: Decimal | undefined;
	readonly filledQuantity: number;
	readonly brokerRef?: BrokerRef | undefined;
	/** Incremented by every successful compare-and-set */
	readonly version: number;
	readonly auditTrail: readonly AuditEntry[];
}

export interface StrategyRecord {
	readonly id: StrategyId;
	readonly candidate: StrategyCandidate;
	readonly assessment: RiskAssessment;
	readonly orderIds: readonly OrderId[];
	readonly createdAt: number;
}

/** Read projection of a strategy with its orders and derived status. */
export interface StrategySnapshot {
	readonly record: StrategyRecord;
	readonly orders: readonly OrderRecord[];
	readonly aggregateStatus: AggregateStatus;
	readonly partition: Partition;
}

/** Audit entry and field updates applied together with a status change. */
export interface StatusChange {
	readonly at: number;
	readonly event: string;
	readonly actor: string;
	readonly note: string;
	/** When set, the order's stored version must match as well as its status */
	readonly expectedVersion?: number | undefined;
	readonly filledPrice?: Decimal | undefined;
	readonly filledQuantity?: number | undefined;
	readonly brokerRef?: BrokerRef | undefined;
}

// ── Queries ─────────────────────────────────────────────────────────

export interface StrategyFilter {
	readonly partition?: Partition | undefined;
	readonly symbol?: string | undefined;
	readonly status?: AggregateStatus | undefined;
}

export interface OrderFilter {
	readonly partition?: Partition | undefined;
	readonly strategyId?: StrategyId | undefined;
	readonly status?: OrderStatus | undefined;
}

export interface LedgerSummary {
	readonly activeStrategies: number;
	readonly historyStrategies: number;
	readonly totalOrders: number;
	readonly ordersByStatus: Readonly<Record<OrderStatus, number>>;
}
