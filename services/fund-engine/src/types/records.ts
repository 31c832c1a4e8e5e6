// Record contracts exchanged with the data-access and presentation layers.
// Amounts are signed: negative = capital leaving the investor, positive = returned.

export const CASH_FLOW_TYPES = [
  "call_investment",
  "call_fees",
  "distribution_return_of_capital",
  "distribution_profit",
  "nav_update",
] as const;

export type CashFlowType = (typeof CASH_FLOW_TYPES)[number];

export interface CashFlow {
  transaction_id: number;
  fund_id: number;
  date: string; // ISO date, e.g. '2021-03-31'
  type: CashFlowType;
  amount: number;
  description?: string;
}

export interface Fund {
  fund_id: number;
  fund_name?: string;
  vintage_year: number;
  primary_strategy: string;
  sub_strategy: string;
  total_commitment: number;
}

export interface ModelingAssumption {
  strategy: string;
  expected_moic: number;
  target_irr: number;
  investment_period_years: number;
  fund_life_years: number;
  nav_initial_qtr_depreciation: number;
  nav_initial_depreciation_qtrs: number;
}

export type FailureReason =
  | "insufficient_data"
  | "non_convergence"
  | "division_guard"
  | "numeric_instability"
  | "combined_flows_required";

export type MetricName =
  | "irr"
  | "tvpi"
  | "dpi"
  | "rvpi"
  | "moic"
  | "called_percent"
  | "distributed_percent";

export interface MetricDiagnostic {
  metric: MetricName;
  reason: FailureReason;
  message: string;
}

export interface MetricsResult {
  readonly paid_in: number;
  // MOIC denominator: paid-in unless the caller excludes fees
  readonly invested_capital: number;
  readonly distributions: number;
  readonly current_nav: number;
  readonly total_value: number;
  readonly total_commitment: number;
  readonly unfunded_commitment: number;
  readonly irr: number | null;
  readonly tvpi: number | null;
  readonly dpi: number | null;
  readonly rvpi: number | null;
  readonly moic: number | null;
  readonly called_percent: number | null;
  readonly distributed_percent: number | null;
  readonly diagnostics: readonly MetricDiagnostic[];
}

export interface AggregatedMetrics extends MetricsResult {
  readonly fund_count: number;
}

export interface ProjectionPeriod {
  period_index: number;
  date: string;
  call_investment: number;
  management_fees: number;
  distribution: number;
  nav: number;
  nav_change: number;
}

export interface FundState {
  fund_id: number;
  fund_name?: string;
  primary_strategy: string;
  sub_strategy: string;
  vintage_year: number;
  total_commitment: number;
  paid_in: number;
  distributions: number;
  unfunded_commitment: number;
  current_nav: number;
  nav_date: string | null;
}

export function isCashMovement(cf: CashFlow): boolean {
  return cf.type !== "nav_update";
}

export function isCall(cf: CashFlow): boolean {
  return isCashMovement(cf) && cf.amount < 0;
}

export function isDistribution(cf: CashFlow): boolean {
  return isCashMovement(cf) && cf.amount > 0;
}

export function isFee(cf: CashFlow): boolean {
  return cf.type.toLowerCase().includes("fee");
}
