/**
 * MemoryStagingLedger — in-process StagingLedger.
 *
 * No method awaits anything, so each call runs to completion before another
 * can start: compare-and-set is atomic per key without any lock, and
 * unrelated strategies never wait on each other.
 */

import type { OrderId, StrategyId } from "../shared/identifiers.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { aggregateStatusOf } from "./aggregate-status.js";
import type { LedgerError, StagingLedger } from "./ledger.js";
import { conflict, duplicate, notFound, notTerminal, readOnly, staleVersion } from "./ledger.js";
import { isTerminal } from "./order-state-machine.js";
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
import { Partition } from "./types.js";

interface Stored<T> {
	readonly record: T;
	readonly partition: Partition;
}

export class MemoryStagingLedger implements StagingLedger {
	private readonly strategies = new Map<StrategyId, Stored<StrategyRecord>>();
	private readonly orders = new Map<OrderId, Stored<OrderRecord>>();

	async insert(
		strategy: StrategyRecord,
		orders: readonly OrderRecord[],
	): Promise<Result<void, LedgerError>> {
		if (this.strategies.has(strategy.id)) return err(duplicate("strategy", strategy.id));
		const seen = new Set<OrderId>();
		for (const order of orders) {
			if (this.orders.has(order.id) || seen.has(order.id)) {
				return err(duplicate("order", order.id));
			}
			seen.add(order.id);
		}

		this.strategies.set(strategy.id, {
			record: Object.freeze(strategy),
			partition: Partition.Active,
		});
		for (const order of orders) {
			this.orders.set(order.id, { record: Object.freeze(order), partition: Partition.Active });
		}
		return ok(undefined);
	}

	async getOrder(id: OrderId): Promise<Result<OrderRecord, LedgerError>> {
		const stored = this.orders.get(id);
		return stored ? ok(stored.record) : err(notFound("order", id));
	}

	async getStrategy(id: StrategyId): Promise<Result<StrategySnapshot, LedgerError>> {
		const stored = this.strategies.get(id);
		return stored ? ok(this.snapshot(stored)) : err(notFound("strategy", id));
	}

	async compareAndSetStatus(
		orderId: OrderId,
		expected: OrderStatus,
		next: OrderStatus,
		change: StatusChange,
	): Promise<Result<OrderRecord, LedgerError>> {
		const stored = this.orders.get(orderId);
		if (!stored) return err(notFound("order", orderId));
		if (stored.partition === Partition.History) return err(readOnly("order", orderId));

		const current = stored.record;
		if (current.status !== expected) return err(conflict(orderId, expected, current.status));
		if (change.expectedVersion !== undefined && current.version !== change.expectedVersion) {
			return err(staleVersion(orderId, current.status, change.expectedVersion, current.version));
		}

		const updated: OrderRecord = Object.freeze({
			...current,
			status: next,
			updatedAt: change.at,
			version: current.version + 1,
			auditTrail: Object.freeze([
				...current.auditTrail,
				{ timestamp: change.at, event: change.event, actor: change.actor, note: change.note },
			]),
			...(change.filledPrice !== undefined && { filledPrice: change.filledPrice }),
			...(change.filledQuantity !== undefined && { filledQuantity: change.filledQuantity }),
			...(change.brokerRef !== undefined && { brokerRef: change.brokerRef }),
		});
		this.orders.set(orderId, { record: updated, partition: Partition.Active });
		return ok(updated);
	}

	async moveToHistory(strategyId: StrategyId): Promise<Result<StrategySnapshot, LedgerError>> {
		const stored = this.strategies.get(strategyId);
		if (!stored) return err(notFound("strategy", strategyId));
		if (stored.partition === Partition.History) return err(readOnly("strategy", strategyId));

		const orders = this.ordersOf(stored.record);
		const open = orders.filter((o) => !isTerminal(o.status)).map((o) => o.id);
		if (open.length > 0) {
			return err(notTerminal(strategyId, open));
		}

		const archived = { record: stored.record, partition: Partition.History };
		this.strategies.set(strategyId, archived);
		for (const order of orders) {
			this.orders.set(order.id, { record: order, partition: Partition.History });
		}
		return ok(this.snapshot(archived));
	}

	async list(filter: StrategyFilter = {}): Promise<readonly StrategySnapshot[]> {
		return [...this.strategies.values()]
			.map((stored) => this.snapshot(stored))
			.filter(
				(s) =>
					(filter.partition === undefined || s.partition === filter.partition) &&
					(filter.symbol === undefined || s.record.candidate.symbol === filter.symbol) &&
					(filter.status === undefined || s.aggregateStatus === filter.status),
			);
	}

	async listOrders(filter: OrderFilter = {}): Promise<readonly OrderRecord[]> {
		return [...this.orders.values()]
			.filter(
				(stored) =>
					(filter.partition === undefined || stored.partition === filter.partition) &&
					(filter.strategyId === undefined || stored.record.strategyId === filter.strategyId) &&
					(filter.status === undefined || stored.record.status === filter.status),
			)
			.map((stored) => stored.record);
	}

	async summary(): Promise<LedgerSummary> {
		const ordersByStatus: Record<OrderStatus, number> = {
			PENDING: 0,
			STAGED: 0,
			APPROVED: 0,
			SUBMITTED: 0,
			PARTIALLY_FILLED: 0,
			FILLED: 0,
			REJECTED: 0,
			CANCELLED: 0,
		};
		for (const { record } of this.orders.values()) {
			ordersByStatus[record.status] += 1;
		}
		let activeStrategies = 0;
		for (const { partition } of this.strategies.values()) {
			if (partition === Partition.Active) activeStrategies++;
		}
		return {
			activeStrategies,
			historyStrategies: this.strategies.size - activeStrategies,
			totalOrders: this.orders.size,
			ordersByStatus,
		};
	}

	// ── Private ──────────────────────────────────────────────────────

	private ordersOf(strategy: StrategyRecord): readonly OrderRecord[] {
		const orders: OrderRecord[] = [];
		for (const id of strategy.orderIds) {
			const stored = this.orders.get(id);
			if (stored) orders.push(stored.record);
		}
		return orders;
	}

	private snapshot(stored: Stored<StrategyRecord>): StrategySnapshot {
		const orders = this.ordersOf(stored.record);
		return {
			record: stored.record,
			orders,
			aggregateStatus: aggregateStatusOf(orders.map((o) => o.status)),
			partition: stored.partition,
		};
	}
}
