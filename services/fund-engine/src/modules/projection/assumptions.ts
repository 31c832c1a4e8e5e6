import type { ModelingAssumption } from "../../types/records.js";

// Used when a fund's strategy has no modeling assumption at all
export const FALLBACK_EXPECTED_MOIC = 2.0;
export const FALLBACK_TARGET_IRR = 0.15;

function rule(
  strategy: string,
  expected_moic: number,
  target_irr: number,
  investment_period_years: number,
  fund_life_years: number,
  nav_initial_qtr_depreciation: number,
  nav_initial_depreciation_qtrs: number,
): ModelingAssumption {
  return Object.freeze({
    strategy,
    expected_moic,
    target_irr,
    investment_period_years,
    fund_life_years,
    nav_initial_qtr_depreciation,
    nav_initial_depreciation_qtrs,
  });
}

export const DEFAULT_MODELING_ASSUMPTIONS: readonly ModelingAssumption[] = Object.freeze([
  rule("Venture Capital", 2.75, 0.22, 5, 12, -0.015, 8),
  rule("Private Equity", 1.85, 0.16, 6, 10, -0.005, 6),
  rule("Real Estate", 1.6, 0.13, 5, 10, -0.001, 4),
  rule("Infrastructure", 1.5, 0.1, 7, 15, -0.0001, 2),
  rule("Private Credit", 1.35, 0.09, 4, 7, 0, 0),
  rule("Secondaries", 1.7, 0.14, 2, 8, -0.003, 3),
  rule("Fund of Funds (FoF)", 1.65, 0.13, 5, 12, -0.004, 5),
  rule("Co-Investment", 1.8, 0.15, 4, 9, -0.006, 7),
  rule("Real Assets", 1.65, 0.11, 5, 15, -0.0015, 4),
]);

export function indexAssumptions(
  assumptions: readonly ModelingAssumption[],
): Map<string, ModelingAssumption> {
  return new Map(assumptions.map((assumption) => [assumption.strategy, assumption]));
}

// Lifecycle fields borrow the Private Equity defaults
export function fallbackAssumption(strategy: string): ModelingAssumption {
  return rule(strategy, FALLBACK_EXPECTED_MOIC, FALLBACK_TARGET_IRR, 6, 10, -0.005, 6);
}
