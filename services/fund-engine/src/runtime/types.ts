import type { AggregationPeriod } from "../core/rollup.js";
import type { AllocationConstraints } from "../modules/allocation/allocation-optimizer.js";
import type { CashFlowSummary } from "../modules/cashflow/cash-flow-processor.js";
import type { HierarchyMetrics } from "../modules/metrics/hierarchy.js";
import type { PortfolioProjection, ProjectionModel } from "../modules/projection/portfolio-projection.js";
import type { CashFlow, Fund, FundState, ModelingAssumption } from "../types/records.js";
import type { AnalysisContext } from "./context.js";

export interface CashFlowRequest {
  period?: AggregationPeriod;
  include_fees?: boolean;
}

export interface ProjectionRequest {
  num_periods?: number;
  model?: ProjectionModel;
  management_fee_rate?: number;
}

export interface AllocationRequest {
  target_fractions: Record<string, number>;
  available_capital: number;
  constraints?: AllocationConstraints;
  // Quarters of projected distributions netted out of current exposure
  horizon_quarters?: number;
}

export interface FundEngineRequestV1 {
  as_of_date: string;
  funds: Fund[];
  cash_flows: CashFlow[];
  modeling_assumptions?: ModelingAssumption[];
  cash_flow?: CashFlowRequest;
  projection?: ProjectionRequest;
  allocation?: AllocationRequest;
}

export interface FundEngineValidation {
  valid: boolean;
  errors: string[];
}

export interface CashFlowOutputs {
  portfolio: CashFlowSummary;
  by_fund: Record<string, CashFlowSummary>;
}

export interface AllocationOutputs {
  current_exposures: Record<string, number>;
  projected_distributions: Record<string, number>;
  recommended: Record<string, number>;
  total_recommended: number;
}

export interface FundEngineOutputs {
  fund_states: FundState[];
  cash_flow?: CashFlowOutputs;
  metrics?: HierarchyMetrics;
  projection?: PortfolioProjection;
  allocation?: AllocationOutputs;
}

export interface FundEngineResult {
  validation: FundEngineValidation;
  warnings: string[];
  outputs: FundEngineOutputs | null;
}

export interface EngineModule {
  name: string;
  run(ctx: AnalysisContext, request: FundEngineRequestV1): void;
}
