/**
 * LifecycleController — the public face of the staging core.
 *
 * Runs structure validation, then risk assessment, then writes to the
 * ledger, and drives orders through the status machine. Strategy-wide
 * moves (approve, reject, cancel) are all-or-nothing: a conflict part way
 * through rolls back the orders already moved before the error is
 * returned. The controller never retries on its own.
 *
 * Any ledger call that rejects is reported as `backend_unavailable`; no
 * operation reports success unless every ledger write it made resolved.
 */

import type { PortfolioSnapshot, StrategyCandidate } from "../candidate/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { createLogger, silentLogger } from "../lib/logger/index.js";
import type { AuditJournal, AuditRecord } from "../persistence/journal.js";
import { DailyLossTracker } from "../risk/daily-loss-tracker.js";
import { RiskAssessor } from "../risk/risk-assessor.js";
import type { RiskAssessment } from "../risk/types.js";
import type { StagerConfig } from "../shared/config.js";
import { DEFAULT_STAGER_CONFIG } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { classifyBackendFault } from "../shared/errors.js";
import type { BrokerRef, IdSource, OrderId, StrategyId } from "../shared/identifiers.js";
import { RandomIdSource } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, ok, tryCatchAsync } from "../shared/result.js";
import type { Clock, TradeDate } from "../shared/time.js";
import { SystemClock, tradeDateOf } from "../shared/time.js";
import { validateStructure } from "../structure/validator.js";
import { allTerminal } from "../staging/aggregate-status.js";
import type { LedgerError, StagingLedger } from "../staging/ledger.js";
import { MemoryStagingLedger } from "../staging/memory-ledger.js";
import { canTransitionTo, isCompensation } from "../staging/order-state-machine.js";
import type {
	AuditEntry,
	LedgerSummary,
	OrderFilter,
	OrderRecord,
	StatusChange,
	StrategyFilter,
	StrategyRecord,
	StrategySnapshot,
} from "../staging/types.js";
import { OrderStatus, Partition } from "../staging/types.js";
import type { LifecycleEvents, OperationOptions, OrderConflict, StagingError } from "./types.js";
import { DEFAULT_ACTOR } from "./types.js";

type Outcome<T> = Promise<Result<T, StagingError>>;

/** Terminal statuses a whole strategy can be settled into by a caller. */
type SettleStatus = typeof OrderStatus.Rejected | typeof OrderStatus.Cancelled;

/** An order's audit entry tagged with the order it belongs to. */
export interface StrategyAuditEntry extends AuditEntry {
	readonly orderId: OrderId;
}

/** Structure and risk verdicts for a candidate, without staging it. */
export interface CandidatePreview {
	readonly structuralErrors: readonly string[];
	readonly assessment: RiskAssessment | null;
	readonly tradeDate: TradeDate;
	readonly dailyLossSoFar: Decimal;
}

export interface LifecycleControllerDeps {
	readonly ledger: StagingLedger;
	readonly assessor: RiskAssessor;
	readonly dailyLoss?: DailyLossTracker | undefined;
	readonly clock?: Clock | undefined;
	readonly ids?: IdSource | undefined;
	readonly logger?: Logger | undefined;
	readonly journal?: AuditJournal | null | undefined;
	/** IANA zone whose calendar day is one trade date */
	readonly tradingTimeZone?: string | undefined;
}

/** Collaborators that `fromConfig` does not derive from configuration. */
export type LifecycleControllerOverrides = Omit<
	LifecycleControllerDeps,
	"assessor" | "tradingTimeZone" | "ledger"
> & { readonly ledger?: StagingLedger | undefined };

export class LifecycleController {
	readonly events = new TypedEmitter<LifecycleEvents>();
	private readonly ledger: StagingLedger;
	private readonly assessor: RiskAssessor;
	private readonly dailyLoss: DailyLossTracker;
	private readonly clock: Clock;
	private readonly ids: IdSource;
	private readonly log: Logger;
	private readonly journal: AuditJournal | null;
	private readonly tradingTimeZone: string;

	private constructor(deps: LifecycleControllerDeps) {
		this.ledger = deps.ledger;
		this.assessor = deps.assessor;
		this.dailyLoss = deps.dailyLoss ?? new DailyLossTracker();
		this.clock = deps.clock ?? SystemClock;
		this.ids = deps.ids ?? RandomIdSource;
		this.log = (deps.logger ?? silentLogger()).child({ module: "lifecycle" });
		this.journal = deps.journal ?? null;
		this.tradingTimeZone = deps.tradingTimeZone ?? DEFAULT_STAGER_CONFIG.tradingTimeZone;
	}

	static create(deps: LifecycleControllerDeps): LifecycleController {
		return new LifecycleController(deps);
	}

	/**
	 * Builds a controller from resolved configuration. Without a ledger an
	 * in-memory one is used; without a logger pino logs at the configured level.
	 *
	 * @example
	 * ```ts
	 * const controller = LifecycleController.fromConfig(loadConfig());
	 * const staged = await controller.stageStrategy(candidate, portfolio);
	 * ```
	 */
	static fromConfig(
		config: StagerConfig,
		overrides: LifecycleControllerOverrides = {},
	): LifecycleController {
		return new LifecycleController({
			...overrides,
			ledger: overrides.ledger ?? new MemoryStagingLedger(),
			assessor: RiskAssessor.create(config.limits),
			logger: overrides.logger ?? createLogger({ level: config.logLevel }),
			tradingTimeZone: config.tradingTimeZone,
		});
	}

	// ── Staging ──────────────────────────────────────────────────────

	/** Runs the structure and risk gates without writing anything. */
	preview(candidate: StrategyCandidate, portfolio: PortfolioSnapshot): CandidatePreview {
		const tradeDate = tradeDateOf(this.clock.now(), this.tradingTimeZone);
		const dailyLossSoFar = this.dailyLossFor(tradeDate, portfolio);
		const structuralErrors = validateStructure(candidate);
		const assessment =
			structuralErrors.length > 0
				? null
				: this.assessor.assess(candidate, portfolio, dailyLossSoFar);
		return { structuralErrors, assessment, tradeDate, dailyLossSoFar };
	}

	/**
	 * Validates, assesses and stages a candidate as one STAGED order per leg.
	 * Nothing is written unless both gates pass; the strategy and all its
	 * orders are inserted together.
	 */
	async stageStrategy(
		candidate: StrategyCandidate,
		portfolio: PortfolioSnapshot,
		opts: OperationOptions = {},
	): Outcome<StrategyId> {
		const actor = opts.actor ?? DEFAULT_ACTOR;
		const { structuralErrors, assessment } = this.preview(candidate, portfolio);

		if (structuralErrors.length > 0 || assessment === null) {
			this.log.info(
				{ candidateId: candidate.id, archetype: candidate.archetype, errors: structuralErrors },
				"candidate failed structural validation",
			);
			await this.journalRecord({
				type: "strategy_refused",
				candidateId: candidate.id,
				symbol: candidate.symbol,
				stage: "structure",
				reasons: [...structuralErrors],
				actor,
				timestamp: this.clock.now(),
			});
			return err({
				kind: "structural_error",
				message: `candidate ${candidate.id} failed structural validation: ${structuralErrors.join("; ")}`,
				errors: structuralErrors,
			});
		}

		if (!assessment.approved) {
			this.log.info(
				{
					candidateId: candidate.id,
					riskScore: assessment.riskScore,
					violations: assessment.violations,
				},
				"candidate rejected by risk checks",
			);
			await this.journalRecord({
				type: "strategy_refused",
				candidateId: candidate.id,
				symbol: candidate.symbol,
				stage: "risk",
				reasons: [...assessment.violations],
				actor,
				timestamp: this.clock.now(),
			});
			return err({
				kind: "risk_rejected",
				message: `candidate ${candidate.id} rejected by risk checks: ${assessment.violations.join("; ")}`,
				assessment,
			});
		}

		const now = this.clock.now();
		const id = this.ids.nextStrategyId();
		const legCount = candidate.legs.length;
		const orders: OrderRecord[] = candidate.legs.map((leg, index) => ({
			id: this.ids.nextOrderId(),
			strategyId: id,
			legRef: { index, leg },
			status: OrderStatus.Staged,
			createdAt: now,
			updatedAt: now,
			filledQuantity: 0,
			version: 1,
			auditTrail: [{ timestamp: now, event: "staged", actor, note: `leg ${index + 1} of ${legCount}` }],
		}));
		const strategy: StrategyRecord = {
			id,
			candidate,
			assessment,
			orderIds: orders.map((o) => o.id),
			createdAt: now,
		};

		const inserted = await this.backend("insert", () => this.ledger.insert(strategy, orders));
		if (!inserted.ok) return inserted;
		if (!inserted.value.ok) return err(fromLedgerError(inserted.value.error));

		this.log.info(
			{ strategyId: id, candidateId: candidate.id, riskScore: assessment.riskScore, legs: legCount },
			"strategy staged",
		);
		await this.journalRecord({
			type: "strategy_staged",
			strategyId: id,
			candidateId: candidate.id,
			symbol: candidate.symbol,
			archetype: candidate.archetype,
			orderIds: [...strategy.orderIds],
			riskScore: assessment.riskScore,
			actor,
			timestamp: now,
		});
		this.emit("strategy_staged", {
			strategyId: id,
			candidateId: candidate.id,
			symbol: candidate.symbol,
			orderIds: strategy.orderIds,
			riskScore: assessment.riskScore,
			timestamp: now,
		});
		return ok(id);
	}

	// ── Strategy-wide transitions ────────────────────────────────────

	/**
	 * Moves every order of a strategy from STAGED to APPROVED, or none.
	 * A concurrent change to any order rolls back the ones already approved
	 * and returns `partial_approval_conflict`.
	 */
	async approveStrategy(strategyId: StrategyId, opts: OperationOptions = {}): Outcome<void> {
		const actor = opts.actor ?? DEFAULT_ACTOR;
		const loaded = await this.loadActiveStrategy(strategyId);
		if (!loaded.ok) return loaded;

		const blocked = loaded.value.orders.find((o) => o.status !== OrderStatus.Staged);
		if (blocked) return err(cannotMove(blocked, OrderStatus.Approved));

		const approved: OrderRecord[] = [];
		for (const order of loaded.value.orders) {
			const moved = await this.backend("compareAndSetStatus", () =>
				this.ledger.compareAndSetStatus(
					order.id,
					OrderStatus.Staged,
					OrderStatus.Approved,
					this.change(order, "approved", actor, ""),
				),
			);
			if (!moved.ok) {
				const unresolved = await this.rollback(approved, OrderStatus.Staged, actor);
				return err(withUnresolved(moved.error, unresolved));
			}
			if (!moved.value.ok) {
				const unresolved = await this.rollback(approved, OrderStatus.Staged, actor);
				const ledgerError = moved.value.error;
				if (ledgerError.kind !== "conflict") return err(fromLedgerError(ledgerError));
				const conflict = conflictOf(ledgerError);
				this.log.warn(
					{ strategyId, orderId: order.id, actual: conflict.actual, unresolved },
					"approval conflict, rolled back",
				);
				return err({
					kind: "partial_approval_conflict",
					message: `strategy ${strategyId} not approved: ${ledgerError.message}`,
					strategyId,
					conflict,
					rolledBack: approved.map((o) => o.id).filter((id) => !unresolved.includes(id)),
					unresolved,
				});
			}
			approved.push(moved.value.value);
		}

		const timestamp = this.clock.now();
		for (const order of approved) {
			await this.journalTransition(order, OrderStatus.Staged);
		}
		this.log.info({ strategyId, actor, orders: approved.length }, "strategy approved");
		this.emit("strategy_approved", { strategyId, actor, timestamp });
		return ok(undefined);
	}

	/** Rejects every order of a staged or approved strategy and archives it. */
	async rejectStrategy(
		strategyId: StrategyId,
		reason: string,
		opts: OperationOptions = {},
	): Outcome<void> {
		return this.settle(strategyId, OrderStatus.Rejected, reason, opts.actor ?? DEFAULT_ACTOR);
	}

	/** Cancels every order of a staged or approved strategy and archives it. */
	async cancelStrategy(
		strategyId: StrategyId,
		reason: string,
		opts: OperationOptions = {},
	): Outcome<void> {
		return this.settle(strategyId, OrderStatus.Cancelled, reason, opts.actor ?? DEFAULT_ACTOR);
	}

	// ── Single-order transitions ─────────────────────────────────────

	/** APPROVED → SUBMITTED, recording the broker's reference. */
	async markSubmitted(
		orderId: OrderId,
		ref: BrokerRef,
		opts: OperationOptions = {},
	): Outcome<OrderRecord> {
		const actor = opts.actor ?? DEFAULT_ACTOR;
		const loaded = await this.loadOrder(orderId);
		if (!loaded.ok) return loaded;
		const order = loaded.value;
		if (order.status !== OrderStatus.Approved) {
			return err(cannotMove(order, OrderStatus.Submitted));
		}

		const moved = await this.backend("compareAndSetStatus", () =>
			this.ledger.compareAndSetStatus(order.id, OrderStatus.Approved, OrderStatus.Submitted, {
				...this.change(order, "submitted", actor, `broker ref ${ref}`),
				brokerRef: ref,
			}),
		);
		if (!moved.ok) return moved;
		if (!moved.value.ok) return err(fromLedgerError(moved.value.error));

		const updated = moved.value.value;
		await this.journalTransition(updated, OrderStatus.Approved);
		this.log.info({ orderId, strategyId: updated.strategyId, brokerRef: ref }, "order submitted");
		this.emit("order_submitted", {
			orderId,
			strategyId: updated.strategyId,
			brokerRef: ref,
			timestamp: updated.updatedAt,
		});
		return ok(updated);
	}

	/**
	 * Books a fill against a submitted order.
	 *
	 * Quantities accumulate and the price is volume-weighted. The order is
	 * FILLED once the leg's full quantity is in, PARTIALLY_FILLED before.
	 * A fill that would exceed the leg quantity is refused. When the fill
	 * settles the last open order, the strategy moves to history.
	 */
	async markFilled(
		orderId: OrderId,
		price: Decimal,
		quantity: number,
		opts: OperationOptions = {},
	): Outcome<OrderRecord> {
		const actor = opts.actor ?? DEFAULT_ACTOR;
		if (!Number.isInteger(quantity) || quantity <= 0) {
			return err(invalidFill(orderId, `fill quantity must be a positive integer, got ${quantity}`));
		}
		if (!price.isPositive()) {
			return err(invalidFill(orderId, `fill price must be positive, got ${price.toString()}`));
		}

		const loaded = await this.loadOrder(orderId);
		if (!loaded.ok) return loaded;
		const order = loaded.value;
		if (order.status !== OrderStatus.Submitted && order.status !== OrderStatus.PartiallyFilled) {
			return err(cannotMove(order, OrderStatus.Filled));
		}

		const target = order.legRef.leg.quantity;
		const cumulative = order.filledQuantity + quantity;
		if (cumulative > target) {
			return err(
				invalidFill(
					orderId,
					`fill of ${quantity} would bring order ${orderId} to ${cumulative} of ${target} contracts`,
				),
			);
		}

		const filledPrice = volumeWeighted(order, price, quantity, cumulative);
		const next = cumulative === target ? OrderStatus.Filled : OrderStatus.PartiallyFilled;
		const moved = await this.backend("compareAndSetStatus", () =>
			this.ledger.compareAndSetStatus(order.id, order.status, next, {
				...this.change(
					order,
					next === OrderStatus.Filled ? "filled" : "partially_filled",
					actor,
					`${quantity} @ ${price.toString()}, ${cumulative}/${target}`,
				),
				filledPrice,
				filledQuantity: cumulative,
			}),
		);
		if (!moved.ok) return moved;
		if (!moved.value.ok) return err(fromLedgerError(moved.value.error));

		const updated = moved.value.value;
		await this.journalTransition(updated, order.status);
		this.log.info(
			{ orderId, status: next, filledQuantity: cumulative, filledPrice: filledPrice.toString() },
			"order fill booked",
		);
		this.emit("order_filled", {
			orderId,
			strategyId: updated.strategyId,
			status: next,
			filledQuantity: cumulative,
			filledPrice,
			timestamp: updated.updatedAt,
		});

		if (next === OrderStatus.Filled) {
			const archived = await this.archiveIfSettled(updated.strategyId);
			if (!archived.ok) return archived;
		}
		return ok(updated);
	}

	// ── Daily loss ───────────────────────────────────────────────────

	/**
	 * Books a realized trade result against its trade date (today in the
	 * trading time zone unless given). Gains leave the total unchanged.
	 * @returns The date's loss total after booking
	 */
	async recordTradeResult(pnl: Decimal, tradeDate?: TradeDate): Promise<Decimal> {
		const now = this.clock.now();
		const date = tradeDate ?? tradeDateOf(now, this.tradingTimeZone);
		const total = this.dailyLoss.recordResult(date, pnl);
		this.log.info(
			{ tradeDate: date, pnl: pnl.toString(), dailyLoss: total.toString() },
			"trade result recorded",
		);
		await this.journalRecord({
			type: "trade_result",
			tradeDate: date,
			pnl: pnl.toString(),
			dailyLoss: total.toString(),
			timestamp: now,
		});
		return total;
	}

	// ── Reads ────────────────────────────────────────────────────────

	async getStrategy(strategyId: StrategyId): Outcome<StrategySnapshot> {
		const found = await this.backend("getStrategy", () => this.ledger.getStrategy(strategyId));
		if (!found.ok) return found;
		return found.value.ok ? ok(found.value.value) : err(fromLedgerError(found.value.error));
	}

	async getOrder(orderId: OrderId): Outcome<OrderRecord> {
		return this.loadOrder(orderId);
	}

	async listStrategies(filter: StrategyFilter = {}): Outcome<readonly StrategySnapshot[]> {
		return this.backend("list", () => this.ledger.list(filter));
	}

	/** Orders matching the filter, e.g. `{ status: "APPROVED" }` for orders ready to send. */
	async listOrders(filter: OrderFilter = {}): Outcome<readonly OrderRecord[]> {
		return this.backend("listOrders", () => this.ledger.listOrders(filter));
	}

	/** Every audit entry of a strategy's orders, merged in time order. */
	async auditTrail(strategyId: StrategyId): Outcome<readonly StrategyAuditEntry[]> {
		const found = await this.getStrategy(strategyId);
		if (!found.ok) return found;
		const entries = found.value.orders.flatMap((order) =>
			order.auditTrail.map((entry) => ({ ...entry, orderId: order.id })),
		);
		return ok(entries.sort((a, b) => a.timestamp - b.timestamp));
	}

	async summary(): Outcome<LedgerSummary> {
		return this.backend("summary", () => this.ledger.summary());
	}

	// ── Private ──────────────────────────────────────────────────────

	private dailyLossFor(tradeDate: TradeDate, portfolio: PortfolioSnapshot): Decimal {
		return Decimal.max(portfolio.dailyRealizedLoss(tradeDate), this.dailyLoss.lossFor(tradeDate));
	}

	/** A status change guarded by the version of the record it was computed from. */
	private change(order: OrderRecord, event: string, actor: string, note: string): StatusChange {
		return { at: this.clock.now(), event, actor, note, expectedVersion: order.version };
	}

	/** Runs a ledger call, turning a rejected promise into `backend_unavailable`. */
	private async backend<T>(operation: string, call: () => Promise<T>): Outcome<T> {
		const result = await tryCatchAsync(call);
		if (result.ok) return ok(result.value);
		const fault = classifyBackendFault(result.error, operation);
		this.log.error({ operation, code: fault.code, err: fault.message }, "ledger call failed");
		return err({ kind: "backend_unavailable", message: fault.message, cause: fault });
	}

	private async loadOrder(orderId: OrderId): Outcome<OrderRecord> {
		const found = await this.backend("getOrder", () => this.ledger.getOrder(orderId));
		if (!found.ok) return found;
		return found.value.ok ? ok(found.value.value) : err(fromLedgerError(found.value.error));
	}

	private async loadActiveStrategy(strategyId: StrategyId): Outcome<StrategySnapshot> {
		const found = await this.getStrategy(strategyId);
		if (!found.ok) return found;
		if (found.value.partition === Partition.History) {
			return err({
				kind: "invalid_transition",
				message: `strategy ${strategyId} is archived as ${found.value.aggregateStatus}`,
				id: strategyId,
			});
		}
		return found;
	}

	/** Shared path of reject and cancel: settle every order, then archive. */
	private async settle(
		strategyId: StrategyId,
		target: SettleStatus,
		reason: string,
		actor: string,
	): Outcome<void> {
		const loaded = await this.loadActiveStrategy(strategyId);
		if (!loaded.ok) return loaded;

		const blocked = loaded.value.orders.find((o) => !canTransitionTo(o.status, target));
		if (blocked) return err(cannotMove(blocked, target));

		const event = target === OrderStatus.Rejected ? "rejected" : "cancelled";
		const settled: { readonly order: OrderRecord; readonly prior: OrderRecord["status"] }[] = [];
		for (const order of loaded.value.orders) {
			const moved = await this.backend("compareAndSetStatus", () =>
				this.ledger.compareAndSetStatus(
					order.id,
					order.status,
					target,
					this.change(order, event, actor, reason),
				),
			);
			if (!moved.ok) {
				const unresolved = await this.restore(settled, actor);
				return err(withUnresolved(moved.error, unresolved));
			}
			if (!moved.value.ok) {
				const unresolved = await this.restore(settled, actor);
				this.log.warn(
					{ strategyId, orderId: order.id, target, unresolved },
					`strategy not ${event}, rolled back`,
				);
				const mapped = fromLedgerError(moved.value.error);
				return err(
					mapped.kind === "staging_conflict"
						? { ...mapped, message: `strategy ${strategyId} not ${event}: ${mapped.message}`, unresolved }
						: mapped,
				);
			}
			settled.push({ order: moved.value.value, prior: order.status });
		}

		for (const { order, prior } of settled) {
			await this.journalTransition(order, prior);
		}
		const timestamp = this.clock.now();
		this.log.info({ strategyId, actor, reason, status: target }, `strategy ${event}`);
		if (target === OrderStatus.Rejected) {
			this.emit("strategy_rejected", { strategyId, reason, actor, timestamp });
		} else {
			this.emit("strategy_cancelled", { strategyId, reason, actor, timestamp });
		}
		const archived = await this.archiveIfSettled(strategyId);
		return archived.ok ? ok(undefined) : archived;
	}

	/** Undoes approvals; returns the orders that could not be restored. */
	private async rollback(
		moved: readonly OrderRecord[],
		to: OrderRecord["status"],
		actor: string,
	): Promise<readonly OrderId[]> {
		return this.restore(
			moved.map((order) => ({ order, prior: to })),
			actor,
		);
	}

	/** Compensates each order back to its prior status; returns the ones that failed. */
	private async restore(
		moved: readonly { readonly order: OrderRecord; readonly prior: OrderRecord["status"] }[],
		actor: string,
	): Promise<readonly OrderId[]> {
		const unresolved: OrderId[] = [];
		for (const { order, prior } of moved) {
			if (!isCompensation(order.status, prior)) {
				unresolved.push(order.id);
				continue;
			}
			const undone = await this.backend("compareAndSetStatus", () =>
				this.ledger.compareAndSetStatus(
					order.id,
					order.status,
					prior,
					this.change(order, "rolled_back", actor, `restored to ${prior}`),
				),
			);
			if (!undone.ok || !undone.value.ok) {
				this.log.error(
					{ orderId: order.id, from: order.status, to: prior },
					"compensating rollback failed",
				);
				unresolved.push(order.id);
			}
		}
		return unresolved;
	}

	/** Moves a strategy to history once none of its orders can change again. */
	private async archiveIfSettled(strategyId: StrategyId): Outcome<void> {
		const found = await this.getStrategy(strategyId);
		if (!found.ok) return found;
		const snapshot = found.value;
		if (snapshot.partition === Partition.History) return ok(undefined);
		if (!allTerminal(snapshot.orders.map((o) => o.status))) return ok(undefined);

		const moved = await this.backend("moveToHistory", () => this.ledger.moveToHistory(strategyId));
		if (!moved.ok) return moved;
		if (!moved.value.ok) {
			// already archived by a concurrent call
			this.log.debug({ strategyId, reason: moved.value.error.kind }, "archive skipped");
			return ok(undefined);
		}

		const archived = moved.value.value;
		const timestamp = this.clock.now();
		await this.journalRecord({
			type: "strategy_archived",
			strategyId,
			aggregateStatus: archived.aggregateStatus,
			timestamp,
		});
		this.log.info({ strategyId, aggregateStatus: archived.aggregateStatus }, "strategy archived");
		this.emit("strategy_archived", {
			strategyId,
			aggregateStatus: archived.aggregateStatus,
			timestamp,
		});
		return ok(undefined);
	}

	private async journalTransition(order: OrderRecord, from: OrderRecord["status"]): Promise<void> {
		const last = order.auditTrail.at(-1);
		await this.journalRecord({
			type: "order_transition",
			orderId: order.id,
			strategyId: order.strategyId,
			from,
			to: order.status,
			event: last?.event ?? "",
			actor: last?.actor ?? DEFAULT_ACTOR,
			note: last?.note ?? "",
			timestamp: order.updatedAt,
		});
	}

	/** Listener errors are logged and dropped: the ledger write already stands. */
	private emit<K extends keyof LifecycleEvents & string>(
		event: K,
		payload: LifecycleEvents[K],
	): void {
		try {
			this.events.emit(event, payload);
		} catch (e: unknown) {
			const detail = e instanceof Error ? e.message : String(e);
			this.log.error({ code: "LISTENER_FAILED", event }, detail);
		}
	}

	/** Journal failures are reported, not propagated: the ledger write already stands. */
	private async journalRecord(entry: AuditRecord): Promise<void> {
		if (!this.journal) return;
		try {
			await this.journal.record(entry);
		} catch (e: unknown) {
			const detail = e instanceof Error ? e.message : String(e);
			this.log.error({ code: "JOURNAL_WRITE_FAILED", recordType: entry.type }, detail);
			this.emit("journal_write_failed", {
				recordType: entry.type,
				message: `Journal write failed for ${entry.type}: ${detail}`,
				timestamp: this.clock.now(),
			});
		}
	}
}

// ── Helpers ──────────────────────────────────────────────────────────

function conflictOf(error: Extract<LedgerError, { kind: "conflict" }>): OrderConflict {
	return {
		orderId: error.orderId,
		expected: error.expected,
		actual: error.actual,
		...(error.expectedVersion !== undefined && { expectedVersion: error.expectedVersion }),
		...(error.actualVersion !== undefined && { actualVersion: error.actualVersion }),
	};
}

/** Attaches the orders a failed rollback left behind to a backend fault. */
function withUnresolved(error: StagingError, unresolved: readonly OrderId[]): StagingError {
	return error.kind === "backend_unavailable" ? { ...error, unresolved } : error;
}

function fromLedgerError(error: LedgerError): StagingError {
	switch (error.kind) {
		case "not_found":
			return { kind: "not_found", message: error.message, id: error.id };
		case "conflict":
			return {
				kind: "staging_conflict",
				message: error.message,
				id: error.orderId,
				conflict: conflictOf(error),
			};
		case "duplicate":
			return { kind: "staging_conflict", message: error.message, id: error.id };
		case "read_only":
			return { kind: "invalid_transition", message: error.message, id: error.id };
		case "not_terminal":
			return { kind: "invalid_transition", message: error.message, id: error.strategyId };
	}
}

function cannotMove(order: OrderRecord, to: OrderRecord["status"]): StagingError {
	return {
		kind: "invalid_transition",
		message: `order ${order.id} is ${order.status}, cannot move to ${to}`,
		id: order.id,
		from: order.status,
		to,
	};
}

function invalidFill(orderId: OrderId, message: string): StagingError {
	return { kind: "invalid_fill", message, orderId };
}

function volumeWeighted(
	order: OrderRecord,
	price: Decimal,
	quantity: number,
	cumulative: number,
): Decimal {
	if (order.filledPrice === undefined || order.filledQuantity === 0) return price;
	const previous = order.filledPrice.mul(Decimal.from(order.filledQuantity));
	return previous.add(price.mul(Decimal.from(quantity))).div(Decimal.from(cumulative));
}
