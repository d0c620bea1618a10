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
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	TradingError,
	BackendUnavailableError,
	ConfigError,
	SystemError,
	classifyBackendFault,
	isBackendUnavailable,
	isConfigError,
	isSystemError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export {
	type Clock,
	type TradeDate,
	SystemClock,
	FakeClock,
	DEFAULT_TRADING_TIME_ZONE,
	tradeDateOf,
	isValidTimeZone,
} from "./time.js";
export {
	type RiskLimits,
	type StagerConfig,
	type StagerConfigOverrides,
	DEFAULT_RISK_LIMITS,
	DEFAULT_STAGER_CONFIG,
	configFromEnv,
	loadConfig,
	resolveConfig,
} from "./config.js";
