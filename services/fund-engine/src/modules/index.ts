export { CashFlowModule } from "./CashFlowModule.js";
export { MetricsModule } from "./MetricsModule.js";
export { ProjectionModule } from "./ProjectionModule.js";
export { AllocationModule } from "./AllocationModule.js";

export {
  sortCashFlows,
  aggregateByPeriod,
  calculateCumulativeCashFlows,
  separateCallsAndDistributions,
  calculateNetCashFlow,
  filterByDateRange,
  filterByFund,
  calculateJCurve,
  calculateYtdMetrics,
  generateCashFlowSummary,
} from "./cashflow/cash-flow-processor.js";
export type {
  CashFlowSummary,
  CashFlowSummaryOptions,
  CumulativePoint,
  JCurvePoint,
  YtdMetrics,
} from "./cashflow/cash-flow-processor.js";
export { deriveFundState, latestNavMark } from "./cashflow/fund-state.js";

export {
  calculateTvpi,
  calculateDpi,
  calculateRvpi,
  calculateMoic,
  calculateCalledPercent,
  calculateDistributedPercent,
  calculateAllMetrics,
  aggregateIrr,
  aggregateMetrics,
} from "./metrics/metrics-engine.js";
export type { AllMetricsOptions } from "./metrics/metrics-engine.js";
export {
  computeFundMetrics,
  computeHierarchyMetrics,
  HIERARCHY_LEVELS,
  PORTFOLIO_ENTITY_ID,
} from "./metrics/hierarchy.js";
export type { EntityMetrics, HierarchyLevel, HierarchyMetrics } from "./metrics/hierarchy.js";

export { generateSCurve, generateJCurve } from "./projection/shapes.js";
export {
  STRATEGY_SHAPE_TABLE,
  DEFAULT_STRATEGY_KEY,
  resolveStrategyShape,
} from "./projection/strategy-table.js";
export type { StrategyShape, StrategyShapeRow } from "./projection/strategy-table.js";
export {
  DEFAULT_MODELING_ASSUMPTIONS,
  FALLBACK_EXPECTED_MOIC,
  FALLBACK_TARGET_IRR,
  fallbackAssumption,
  indexAssumptions,
} from "./projection/assumptions.js";
export {
  DEFAULT_MANAGEMENT_FEE_RATE,
  FEE_STEP_DOWN_AFTER_YEARS,
  projectFundCashFlows,
  quarterlyFeeRate,
} from "./projection/projection-engine.js";
export type { FundProjectionInput } from "./projection/projection-engine.js";
export { projectYaleModel, resolveYaleShape, YALE_SHAPE_TABLE } from "./projection/yale-model.js";
export type { Ramp, YaleProjectionInput, YaleShape, YaleShapeRow } from "./projection/yale-model.js";
export {
  PROJECTION_MODELS,
  projectFund,
  projectPortfolioCashFlows,
} from "./projection/portfolio-projection.js";
export type {
  FundProjection,
  PortfolioProjection,
  PortfolioProjectionOptions,
  ProjectionModel,
  ProjectionTotals,
} from "./projection/portfolio-projection.js";

export { calculateOptimalAllocation } from "./allocation/allocation-optimizer.js";
export type { AllocationConstraints, StrategyAmounts } from "./allocation/allocation-optimizer.js";
