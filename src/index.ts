// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type StrategyId,
	type OrderId,
	type BrokerRef,
	type IdSource,
	strategyId,
	orderId,
	brokerRef,
	idToString,
	RandomIdSource,
	SequentialIdSource,
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	tryCatchAsync,
	Decimal,
	type Clock,
	type TradeDate,
	SystemClock,
	FakeClock,
	DEFAULT_TRADING_TIME_ZONE,
	tradeDateOf,
	isValidTimeZone,
	type RiskLimits,
	type StagerConfig,
	type StagerConfigOverrides,
	DEFAULT_RISK_LIMITS,
	DEFAULT_STAGER_CONFIG,
	configFromEnv,
	loadConfig,
	resolveConfig,
	TradingError,
	ErrorCategory,
	BackendUnavailableError,
	ConfigError,
	SystemError,
	classifyBackendFault,
	isBackendUnavailable,
	isConfigError,
	isSystemError,
} from "./shared/index.js";

// ── Candidate Model ─────────────────────────────────────────────────
export {
	LegSide,
	Instrument,
	Archetype,
	ARCHETYPES,
	PositionKind,
	type Leg,
	type StrategyCandidate,
	type PortfolioPosition,
	type PortfolioSnapshot,
	type PortfolioSnapshotInit,
	createPortfolioSnapshot,
	netQuantity,
	parseStrategyCandidate,
	parsePortfolioSnapshot,
} from "./candidate/index.js";

// ── Structure ───────────────────────────────────────────────────────
export { type StructureRule, validateStructure, UNSUPPORTED_ARCHETYPE } from "./structure/index.js";

// ── Risk ────────────────────────────────────────────────────────────
export {
	type RiskAssessment,
	type MarginCheck,
	type ExposureContext,
	type LimitCheck,
	type LimitVerdict,
	within,
	breach,
	isBreach,
	LIMIT_CHECKS,
	RiskAssessor,
	RiskWarning,
	assess,
	portfolioExposureOf,
	riskScoreOf,
	DailyLossTracker,
} from "./risk/index.js";

// ── Staging Ledger ──────────────────────────────────────────────────
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
	isTerminal,
	isActive,
	canTransitionTo,
	isCompensation,
	tryTransition,
	aggregateStatusOf,
	allTerminal,
	type StagingLedger,
	type LedgerError,
	MemoryStagingLedger,
} from "./staging/index.js";

// ── Lifecycle ───────────────────────────────────────────────────────
export {
	StagingErrorKind,
	DEFAULT_ACTOR,
	isRetryable,
	type OrderConflict,
	type StagingError,
	type LifecycleEvents,
	type OperationOptions,
	LifecycleController,
	type CandidatePreview,
	type LifecycleControllerDeps,
	type LifecycleControllerOverrides,
	type StrategyAuditEntry,
} from "./lifecycle/index.js";

// ── Persistence ─────────────────────────────────────────────────────
export {
	type AuditJournal,
	type AuditRecord,
	parseAuditRecord,
	MemoryAuditJournal,
	type MemoryAuditJournalConfig,
	FileAuditJournal,
	type FileAuditJournalConfig,
	type CorruptLine,
	type RestoreResult,
} from "./persistence/index.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export { createLogger, silentLogger } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { validate, ValidationError, formatIssue, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";

// ── Lib: Events ─────────────────────────────────────────────────────
export { TypedEmitter } from "./lib/events/index.js";
