/**
 * Staging ledger: order records, the status machine and the store.
 *
 * @module
 */
export {
	OrderStatus,
	ORDER_STATUSES,
	AggregateStatus,
	Partition,
	type AuditEntry,
	type LegRef,
	type OrderRecord,
	type StrategyRecord,
	type StrategySnapshot,
	type StatusChange,
	type StrategyFilter,
	type OrderFilter,
	type LedgerSummary,
} from "./types.js";
export {
	isTerminal,
	isActive,
	canTransitionTo,
	isCompensation,
	tryTransition,
} from "./order-state-machine.js";
export { aggregateStatusOf, allTerminal } from "./aggregate-status.js";
export {
	type StagingLedger,
	type LedgerError,
	notFound,
	duplicate,
	conflict,
	readOnly,
	notTerminal,
	staleVersion,
} from "./ledger.js";
export { MemoryStagingLedger } from "./memory-ledger.js";
