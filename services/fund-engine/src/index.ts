// Configuration & logging
export { loadConfig, getConfig, LOG_LEVELS } from "./config.js";
export type { EngineConfig, LogLevel } from "./config.js";
export { createLogger } from "./core/logger.js";
export type { Logger } from "./core/logger.js";

// Core primitives
export { QuarterTimeline } from "./core/timeline.js";
export type { TimelineConfig } from "./core/timeline.js";
export { Series } from "./core/series.js";
export { parseDate, toDateTime, toIsoDate, yearFraction, addMonths } from "./core/date-utils.js";
export type { DateInput } from "./core/date-utils.js";
export {
  calculateXirr,
  solveXirr,
  xnpv,
  guardedRatio,
  XIRR_DEFAULTS,
  MIN_RATE,
  MAX_RATE,
} from "./core/math-utils.js";
export type { XirrOptions, XirrSolution } from "./core/math-utils.js";
export { TERMINAL_MARK_CONVENTION, sortChronologically, withTerminalMark, xirr } from "./core/irr.js";
export type { DatedAmount } from "./core/irr.js";
export { AGGREGATION_PERIODS, ALL_TIME_KEY, periodKey } from "./core/rollup.js";
export type { AggregationPeriod } from "./core/rollup.js";

// Records
export {
  CASH_FLOW_TYPES,
  isCall,
  isCashMovement,
  isDistribution,
  isFee,
} from "./types/records.js";
export type {
  AggregatedMetrics,
  CashFlow,
  CashFlowType,
  FailureReason,
  Fund,
  FundState,
  MetricDiagnostic,
  MetricName,
  MetricsResult,
  ModelingAssumption,
  ProjectionPeriod,
} from "./types/records.js";

// Runtime
export { FundEngineRuntime } from "./runtime/fundEngine.js";
export { AnalysisContext } from "./runtime/context.js";
export type {
  AllocationOutputs,
  AllocationRequest,
  CashFlowOutputs,
  CashFlowRequest,
  EngineModule,
  FundEngineOutputs,
  FundEngineRequestV1,
  FundEngineResult,
  FundEngineValidation,
  ProjectionRequest,
} from "./runtime/types.js";
export { validateRequest, parseRequest } from "./validate/validate.js";
export type { ParsedRequest, ValidationResult } from "./validate/validate.js";

// Modules
export * from "./modules/index.js";
