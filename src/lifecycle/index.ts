export {
	StagingErrorKind,
	DEFAULT_ACTOR,
	isRetryable,
	type OrderConflict,
	type StagingError,
	type LifecycleEvents,
	type OperationOptions,
} from "./types.js";

export {
	LifecycleController,
	type CandidatePreview,
	type LifecycleControllerDeps,
	type LifecycleControllerOverrides,
	type StrategyAuditEntry,
} from "./lifecycle-controller.js";
