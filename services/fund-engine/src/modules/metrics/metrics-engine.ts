import { createLogger } from "../../core/logger.js";
import type { DateInput } from "../../core/date-utils.js";
import { sortChronologically, withTerminalMark, xirr, type DatedAmount } from "../../core/irr.js";
import { guardedRatio, type XirrOptions } from "../../core/math-utils.js";
import { isCashMovement } from "../../types/records.js";
import type {
  AggregatedMetrics,
  CashFlow,
  MetricDiagnostic,
  MetricName,
  MetricsResult,
} from "../../types/records.js";

const log = createLogger("metrics");

export function calculateTvpi(totalValue: number, paidIn: number): number | null {
  return guardedRatio(totalValue, paidIn);
}

export function calculateDpi(distributions: number, paidIn: number): number | null {
  return guardedRatio(distributions, paidIn);
}

export function calculateRvpi(nav: number, paidIn: number): number | null {
  return guardedRatio(nav, paidIn);
}

export function calculateMoic(totalValue: number, investedCapital: number): number | null {
  return guardedRatio(totalValue, investedCapital);
}

export function calculateCalledPercent(paidIn: number, commitment: number): number | null {
  return guardedRatio(paidIn, commitment, 100);
}

export function calculateDistributedPercent(distributions: number, commitment: number): number | null {
  return guardedRatio(distributions, commitment, 100);
}

interface Totals {
  paidIn: number;
  distributions: number;
  currentNav: number;
  totalCommitment: number;
  investedCapital: number;
}

type RatioFields = Pick<
  MetricsResult,
  "tvpi" | "dpi" | "rvpi" | "moic" | "called_percent" | "distributed_percent"
>;

function ratioMetrics(totals: Totals, diagnostics: MetricDiagnostic[]): RatioFields {
  const totalValue = totals.distributions + totals.currentNav;
  const guard = (metric: MetricName, value: number | null, denominator: string): number | null => {
    if (value === null) {
      diagnostics.push({
        metric,
        reason: "division_guard",
        message: `${denominator} must be positive`,
      });
    }
    return value;
  };

  return {
    tvpi: guard("tvpi", calculateTvpi(totalValue, totals.paidIn), "paid_in"),
    dpi: guard("dpi", calculateDpi(totals.distributions, totals.paidIn), "paid_in"),
    rvpi: guard("rvpi", calculateRvpi(totals.currentNav, totals.paidIn), "paid_in"),
    moic: guard("moic", calculateMoic(totalValue, totals.investedCapital), "invested capital"),
    called_percent: guard(
      "called_percent",
      calculateCalledPercent(totals.paidIn, totals.totalCommitment),
      "total_commitment",
    ),
    distributed_percent: guard(
      "distributed_percent",
      calculateDistributedPercent(totals.distributions, totals.totalCommitment),
      "total_commitment",
    ),
  };
}

function solveIrr(
  flows: readonly DatedAmount[],
  terminalNav: number,
  diagnostics: MetricDiagnostic[],
  options?: XirrOptions,
): number | null {
  const solution = xirr(withTerminalMark(sortChronologically(flows), terminalNav), options);
  if (solution.failure) {
    diagnostics.push({ metric: "irr", ...solution.failure });
    log.debug("IRR unavailable", { reason: solution.failure.reason, flows: flows.length });
  }
  return solution.rate;
}

export interface AllMetricsOptions {
  // MOIC denominator; defaults to paid-in capital
  investedCapital?: number;
  irr?: XirrOptions;
}

/**
 * Performance metrics for one entity. IRR follows the terminal-mark
 * convention (see TERMINAL_MARK_CONVENTION): current NAV is appended as a
 * flow on the latest transaction date.
 */
export function calculateAllMetrics(
  cashFlows: readonly number[],
  dates: readonly DateInput[],
  totalCommitment: number,
  currentNav: number,
  options: AllMetricsOptions = {},
): MetricsResult {
  const diagnostics: MetricDiagnostic[] = [];

  let paidIn = 0;
  let distributions = 0;
  for (const cf of cashFlows) {
    if (cf < 0) {
      paidIn += Math.abs(cf);
    } else if (cf > 0) {
      distributions += cf;
    }
  }

  let irr: number | null = null;
  if (cashFlows.length === 0) {
    diagnostics.push({ metric: "irr", reason: "insufficient_data", message: "No cash flows" });
  } else if (cashFlows.length !== dates.length) {
    diagnostics.push({
      metric: "irr",
      reason: "insufficient_data",
      message: "Cash flows and dates must have the same length",
    });
  } else {
    const flows = dates.map((date, index) => ({ date, amount: cashFlows[index] ?? 0 }));
    irr = solveIrr(flows, currentNav, diagnostics, options.irr);
  }

  const investedCapital = options.investedCapital ?? paidIn;
  const ratios = ratioMetrics(
    { paidIn, distributions, currentNav, totalCommitment, investedCapital },
    diagnostics,
  );

  return Object.freeze({
    paid_in: paidIn,
    invested_capital: investedCapital,
    distributions,
    current_nav: currentNav,
    total_value: distributions + currentNav,
    total_commitment: totalCommitment,
    unfunded_commitment: totalCommitment - paidIn,
    irr,
    ...ratios,
    diagnostics: Object.freeze(diagnostics),
  });
}

// IRR over the union of underlying dated flows; NAV marks are not cash
export function aggregateIrr(
  combinedFlows: readonly CashFlow[],
  terminalNav = 0,
  options?: XirrOptions,
): number | null {
  return calculateAggregateIrr(combinedFlows, terminalNav, [], options);
}

function calculateAggregateIrr(
  combinedFlows: readonly CashFlow[],
  terminalNav: number,
  diagnostics: MetricDiagnostic[],
  options?: XirrOptions,
): number | null {
  const movements = combinedFlows.filter(isCashMovement);
  if (movements.length === 0) {
    diagnostics.push({ metric: "irr", reason: "insufficient_data", message: "No cash flows" });
    return null;
  }
  return solveIrr(movements, terminalNav, diagnostics, options);
}

/**
 * Pool dollar totals across entities and recompute ratios from the pooled
 * figures; MOIC pools each child's own invested capital. IRR cannot be
 * pooled from child IRRs; it is solved over `combinedFlows` when given and
 * otherwise left null with a diagnostic.
 */
export function aggregateMetrics(
  results: readonly MetricsResult[],
  combinedFlows?: readonly CashFlow[],
  options?: XirrOptions,
): AggregatedMetrics | null {
  if (results.length === 0) {
    log.debug("No metrics provided for aggregation");
    return null;
  }

  const totals: Totals = {
    paidIn: 0,
    distributions: 0,
    currentNav: 0,
    totalCommitment: 0,
    investedCapital: 0,
  };
  for (const result of results) {
    totals.paidIn += result.paid_in;
    totals.distributions += result.distributions;
    totals.currentNav += result.current_nav;
    totals.totalCommitment += result.total_commitment;
    totals.investedCapital += result.invested_capital;
  }

  const diagnostics: MetricDiagnostic[] = [];
  let irr: number | null = null;
  if (combinedFlows) {
    irr = calculateAggregateIrr(combinedFlows, totals.currentNav, diagnostics, options);
  } else {
    diagnostics.push({
      metric: "irr",
      reason: "combined_flows_required",
      message: "Aggregate IRR needs the combined dated cash flows of all entities",
    });
  }

  const ratios = ratioMetrics(totals, diagnostics);

  return Object.freeze({
    paid_in: totals.paidIn,
    invested_capital: totals.investedCapital,
    distributions: totals.distributions,
    current_nav: totals.currentNav,
    total_value: totals.distributions + totals.currentNav,
    total_commitment: totals.totalCommitment,
    unfunded_commitment: totals.totalCommitment - totals.paidIn,
    irr,
    ...ratios,
    diagnostics: Object.freeze(diagnostics),
    fund_count: results.length,
  });
}
