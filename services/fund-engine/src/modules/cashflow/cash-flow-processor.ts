import type { DateTime } from "luxon";

import { compareDates, startOfYear, toDateTime, toIsoDate, type DateInput } from "../../core/date-utils.js";
import { createLogger } from "../../core/logger.js";
import { rollup, type AggregationPeriod } from "../../core/rollup.js";
import { Series } from "../../core/series.js";
import { isCall, isCashMovement, isDistribution, isFee, type CashFlow } from "../../types/records.js";

const log = createLogger("cash-flow");

export interface CumulativePoint {
  date: string;
  cumulative: number;
}

export interface JCurvePoint {
  period: string;
  net_flow: number;
  cumulative_flow: number;
}

export interface YtdMetrics {
  ytd_calls: number;
  ytd_distributions: number;
  ytd_net_flow: number;
  ytd_transaction_count: number;
  reference_year: number;
}

export interface CashFlowSummary {
  total_calls: number;
  total_distributions: number;
  net_cash_flow: number;
  call_count: number;
  distribution_count: number;
  total_transactions: number;
  nav_update_count: number;
  earliest_date: string | null;
  latest_date: string | null;
  aggregated_by_period: Record<string, number>;
  j_curve: JCurvePoint[];
  ytd_metrics: YtdMetrics;
}

export interface CashFlowSummaryOptions {
  referenceDate: DateInput;
  includeFees?: boolean;
  period?: AggregationPeriod;
}

function dateOf(cf: CashFlow): DateTime {
  return toDateTime(cf.date, `cash flow ${cf.transaction_id} date`);
}

// Ascending by date, then by transaction_id
export function sortCashFlows(flows: readonly CashFlow[]): CashFlow[] {
  return flows
    .map((cf) => ({ cf, at: dateOf(cf) }))
    .sort((a, b) => compareDates(a.at, b.at) || a.cf.transaction_id - b.cf.transaction_id)
    .map((entry) => entry.cf);
}

function sumAmounts(flows: readonly CashFlow[]): number {
  let total = 0;
  for (const cf of flows) {
    total += cf.amount;
  }
  return total;
}

function sumMagnitudes(flows: readonly CashFlow[]): number {
  let total = 0;
  for (const cf of flows) {
    total += Math.abs(cf.amount);
  }
  return total;
}

/**
 * Bucket signed amounts by calendar period. NAV marks are not cash and
 * never land in a bucket.
 */
export function aggregateByPeriod(
  flows: readonly CashFlow[],
  period: AggregationPeriod,
): Map<string, number> {
  const movements = flows.filter(isCashMovement);
  const totals = rollup(movements, period, dateOf, (cf) => cf.amount);
  log.debug("Aggregated cash flows", { flows: movements.length, periods: totals.size, period });
  return totals;
}

export function calculateCumulativeCashFlows(flows: readonly CashFlow[]): CumulativePoint[] {
  const sorted = sortCashFlows(flows.filter(isCashMovement));
  const running = Series.fromArray(sorted.map((cf) => cf.amount)).cumulative();
  return sorted.map((cf, index) => ({ date: cf.date, cumulative: running.get(index) }));
}

export function separateCallsAndDistributions(
  flows: readonly CashFlow[],
  includeFees = true,
): { calls: CashFlow[]; distributions: CashFlow[] } {
  const calls: CashFlow[] = [];
  const distributions: CashFlow[] = [];

  for (const cf of flows) {
    if (isCall(cf)) {
      if (includeFees || !isFee(cf)) {
        calls.push(cf);
      }
    } else if (isDistribution(cf)) {
      distributions.push(cf);
    }
  }

  return { calls, distributions };
}

// Positive when distributions exceed calls
export function calculateNetCashFlow(
  calls: readonly CashFlow[],
  distributions: readonly CashFlow[],
): number {
  return sumAmounts(distributions) - sumMagnitudes(calls);
}

export function filterByDateRange(
  flows: readonly CashFlow[],
  startDate?: DateInput,
  endDate?: DateInput,
): CashFlow[] {
  const start = startDate === undefined ? undefined : toDateTime(startDate, "startDate");
  const end = endDate === undefined ? undefined : toDateTime(endDate, "endDate");

  return flows.filter((cf) => {
    const at = dateOf(cf);
    if (start && compareDates(at, start) < 0) {
      return false;
    }
    if (end && compareDates(at, end) > 0) {
      return false;
    }
    return true;
  });
}

export function filterByFund(flows: readonly CashFlow[], fundIds: readonly number[]): CashFlow[] {
  const wanted = new Set(fundIds);
  return flows.filter((cf) => wanted.has(cf.fund_id));
}

/**
 * Per-period net flow with its running total. Period keys are ordered
 * lexicographically, which is chronological for four-digit years.
 */
export function calculateJCurve(
  flows: readonly CashFlow[],
  period: AggregationPeriod = "yearly",
): JCurvePoint[] {
  const aggregated = aggregateByPeriod(flows, period);
  const keys = Array.from(aggregated.keys()).sort();
  const net = Series.fromArray(keys.map((key) => aggregated.get(key) ?? 0));
  const cumulative = net.cumulative();

  return keys.map((key, index) => ({
    period: key,
    net_flow: net.get(index),
    cumulative_flow: cumulative.get(index),
  }));
}

export function calculateYtdMetrics(flows: readonly CashFlow[], referenceDate: DateInput): YtdMetrics {
  const reference = toDateTime(referenceDate, "referenceDate");
  const window = filterByDateRange(flows, startOfYear(reference), reference).filter(isCashMovement);
  const { calls, distributions } = separateCallsAndDistributions(window);

  const ytdCalls = sumMagnitudes(calls);
  const ytdDistributions = sumAmounts(distributions);

  return {
    ytd_calls: ytdCalls,
    ytd_distributions: ytdDistributions,
    ytd_net_flow: ytdDistributions - ytdCalls,
    ytd_transaction_count: window.length,
    reference_year: reference.year,
  };
}

export function generateCashFlowSummary(
  flows: readonly CashFlow[],
  options: CashFlowSummaryOptions,
): CashFlowSummary {
  const includeFees = options.includeFees ?? true;
  const period = options.period ?? "yearly";

  const movements = sortCashFlows(flows.filter(isCashMovement));
  const { calls, distributions } = separateCallsAndDistributions(movements, includeFees);
  const totalCalls = sumMagnitudes(calls);
  const totalDistributions = sumAmounts(distributions);

  const first = movements[0];
  const last = movements[movements.length - 1];

  const summary: CashFlowSummary = {
    total_calls: totalCalls,
    total_distributions: totalDistributions,
    net_cash_flow: totalDistributions - totalCalls,
    call_count: calls.length,
    distribution_count: distributions.length,
    total_transactions: movements.length,
    nav_update_count: flows.length - movements.length,
    earliest_date: first ? toIsoDate(dateOf(first)) : null,
    latest_date: last ? toIsoDate(dateOf(last)) : null,
    aggregated_by_period: Object.fromEntries(aggregateByPeriod(movements, period)),
    j_curve: calculateJCurve(movements, period),
    ytd_metrics: calculateYtdMetrics(movements, options.referenceDate),
  };

  log.debug("Generated cash flow summary", { transactions: movements.length });
  return summary;
}
