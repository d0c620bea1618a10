/**
 * Lifecycle controller types — errors, events and options.
 *
 * Every public operation returns `Result<T, StagingError>`. Only the
 * `backend_unavailable` variant wraps a thrown fault; the rest are
 * ordinary outcomes a caller is expected to handle.
 */

import type { RiskAssessment } from "../risk/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { BrokerRef, OrderId, StrategyId } from "../shared/identifiers.js";
import type { AggregateStatus, OrderStatus } from "../staging/types.js";

// ── Errors ───────────────────────────────────────────────────────────

export const StagingErrorKind = {
	StructuralError: "structural_error",
	RiskRejected: "risk_rejected",
	InvalidTransition: "invalid_transition",
	StagingConflict: "staging_conflict",
	PartialApprovalConflict: "partial_approval_conflict",
	NotFound: "not_found",
	InvalidFill: "invalid_fill",
	BackendUnavailable: "backend_unavailable",
} as const;

export type StagingErrorKind = (typeof StagingErrorKind)[keyof typeof StagingErrorKind];

/** An order whose stored status was not the one an operation expected. */
export interface OrderConflict {
	readonly orderId: OrderId;
	readonly expected: OrderStatus;
	readonly actual: OrderStatus;
	/** Set when the status matched but the record changed since it was read */
	readonly expectedVersion?: number | undefined;
	readonly actualVersion?: number | undefined;
}

export type StagingError =
	| {
			readonly kind: "structural_error";
			readonly message: string;
			readonly errors: readonly string[];
	  }
	| {
			readonly kind: "risk_rejected";
			readonly message: string;
			readonly assessment: RiskAssessment;
	  }
	| {
			readonly kind: "invalid_transition";
			readonly message: string;
			readonly id: string;
			readonly from?: OrderStatus | undefined;
			readonly to?: OrderStatus | undefined;
	  }
	| {
			readonly kind: "staging_conflict";
			readonly message: string;
			readonly id: string;
			readonly conflict?: OrderConflict | undefined;
			/** Orders whose rollback could not be applied and need attention */
			readonly unresolved?: readonly OrderId[] | undefined;
	  }
	| {
			readonly kind: "partial_approval_conflict";
			readonly message: string;
			readonly strategyId: StrategyId;
			readonly conflict: OrderConflict;
			readonly rolledBack: readonly OrderId[];
			readonly unresolved: readonly OrderId[];
	  }
	| { readonly kind: "not_found"; readonly message: string; readonly id: string }
	| { readonly kind: "invalid_fill"; readonly message: string; readonly orderId: OrderId }
	| {
			readonly kind: "backend_unavailable";
			readonly message: string;
			readonly cause: TradingError;
			/** Orders a strategy-wide move left changed after its rollback also failed */
			readonly unresolved?: readonly OrderId[] | undefined;
	  };

const RETRYABLE: ReadonlySet<StagingErrorKind> = new Set([
	StagingErrorKind.StagingConflict,
	StagingErrorKind.PartialApprovalConflict,
	StagingErrorKind.BackendUnavailable,
]);

/** Conflicts and backend outages may succeed on a later attempt; nothing else will. */
export function isRetryable(error: StagingError): boolean {
	return RETRYABLE.has(error.kind);
}

// ── Events ───────────────────────────────────────────────────────────

export interface LifecycleEvents {
	strategy_staged: {
		readonly strategyId: StrategyId;
		readonly candidateId: string;
		readonly symbol: string;
		readonly orderIds: readonly OrderId[];
		readonly riskScore: number;
		readonly timestamp: number;
	};
	strategy_approved: {
		readonly strategyId: StrategyId;
		readonly actor: string;
		readonly timestamp: number;
	};
	strategy_rejected: {
		readonly strategyId: StrategyId;
		readonly reason: string;
		readonly actor: string;
		readonly timestamp: number;
	};
	strategy_cancelled: {
		readonly strategyId: StrategyId;
		readonly reason: string;
		readonly actor: string;
		readonly timestamp: number;
	};
	order_submitted: {
		readonly orderId: OrderId;
		readonly strategyId: StrategyId;
		readonly brokerRef: BrokerRef;
		readonly timestamp: number;
	};
	order_filled: {
		readonly orderId: OrderId;
		readonly strategyId: StrategyId;
		readonly status: OrderStatus;
		readonly filledQuantity: number;
		readonly filledPrice: Decimal;
		readonly timestamp: number;
	};
	strategy_archived: {
		readonly strategyId: StrategyId;
		readonly aggregateStatus: AggregateStatus;
		readonly timestamp: number;
	};
	journal_write_failed: {
		readonly recordType: string;
		readonly message: string;
		readonly timestamp: number;
	};
}

// ── Options ──────────────────────────────────────────────────────────

export interface OperationOptions {
	/** Recorded in the audit trail; defaults to "system" */
	readonly actor?: string | undefined;
}

export const DEFAULT_ACTOR = "system";
