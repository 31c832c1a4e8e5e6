import type { DateInput } from "../../core/date-utils.js";
import { createLogger } from "../../core/logger.js";
import { Series } from "../../core/series.js";
import { QuarterTimeline } from "../../core/timeline.js";
import type { FundState, ModelingAssumption, ProjectionPeriod } from "../../types/records.js";
import { fallbackAssumption } from "./assumptions.js";
import { projectFundCashFlows } from "./projection-engine.js";
import { resolveStrategyShape } from "./strategy-table.js";
import { projectYaleModel, resolveYaleShape } from "./yale-model.js";

const log = createLogger("projection");

export const PROJECTION_MODELS = ["takahashi_alexander", "yale"] as const;
export type ProjectionModel = (typeof PROJECTION_MODELS)[number];

export interface PortfolioProjectionOptions {
  asOfDate: DateInput;
  model?: ProjectionModel;
  managementFeeRate?: number;
}

export interface ProjectionTotals {
  calls: number[];
  distributions: number[];
  fees: number[];
  nav: number[];
}

export interface FundProjection {
  fund_id: number;
  fund_name?: string;
  strategy: string;
  model: ProjectionModel;
  assumption_source: "provided" | "fallback";
  shape_source: string;
  projection: ProjectionPeriod[];
}

export interface PortfolioProjection {
  num_periods: number;
  dates: string[];
  total_calls: number[];
  total_distributions: number[];
  total_fees: number[];
  total_nav: number[];
  by_strategy: Record<string, ProjectionTotals>;
  by_fund: FundProjection[];
  warnings: string[];
}

interface Accumulator {
  calls: Series;
  distributions: Series;
  fees: Series;
  nav: Series;
}

function emptyAccumulator(numPeriods: number): Accumulator {
  return {
    calls: Series.zeros(numPeriods),
    distributions: Series.zeros(numPeriods),
    fees: Series.zeros(numPeriods),
    nav: Series.zeros(numPeriods),
  };
}

// Calls and fees accumulate as positive magnitudes
function accumulate(acc: Accumulator, projection: readonly ProjectionPeriod[]): Accumulator {
  return {
    calls: acc.calls.add(Series.fromArray(projection.map((p) => Math.abs(p.call_investment)))),
    distributions: acc.distributions.add(Series.fromArray(projection.map((p) => p.distribution))),
    fees: acc.fees.add(Series.fromArray(projection.map((p) => Math.abs(p.management_fees)))),
    nav: acc.nav.add(Series.fromArray(projection.map((p) => p.nav))),
  };
}

function toTotals(acc: Accumulator): ProjectionTotals {
  return {
    calls: acc.calls.toArray(),
    distributions: acc.distributions.toArray(),
    fees: acc.fees.toArray(),
    nav: acc.nav.toArray(),
  };
}

export function projectFund(
  fund: FundState,
  assumption: ModelingAssumption,
  numPeriods: number,
  options: PortfolioProjectionOptions,
): ProjectionPeriod[] {
  if ((options.model ?? "takahashi_alexander") === "yale") {
    return projectYaleModel({
      strategy: fund.primary_strategy,
      totalCommitment: fund.total_commitment,
      paidIn: fund.paid_in,
      distributions: fund.distributions,
      unfundedCommitment: fund.unfunded_commitment,
      currentNav: fund.current_nav,
      assumption,
      numPeriods,
      asOfDate: options.asOfDate,
      vintageYear: fund.vintage_year,
      managementFeeRate: options.managementFeeRate,
    });
  }

  return projectFundCashFlows({
    unfundedCommitment: fund.unfunded_commitment,
    currentNav: fund.current_nav,
    expectedMoic: assumption.expected_moic,
    targetIrr: assumption.target_irr,
    strategy: fund.primary_strategy,
    numPeriods,
    asOfDate: options.asOfDate,
    managementFeeRate: options.managementFeeRate,
    vintageYear: fund.vintage_year,
  });
}

/**
 * Run every fund through the selected model and roll the periods up to
 * portfolio and strategy totals. Strategies without an assumption use the
 * fallback MOIC/IRR and are reported in `warnings`.
 */
export function projectPortfolioCashFlows(
  funds: readonly FundState[],
  assumptionsByStrategy: ReadonlyMap<string, ModelingAssumption>,
  numPeriods: number,
  options: PortfolioProjectionOptions,
): PortfolioProjection {
  const model = options.model ?? "takahashi_alexander";
  const timeline = new QuarterTimeline({ asOfDate: options.asOfDate, numPeriods });
  const warnings: string[] = [];

  let portfolio = emptyAccumulator(numPeriods);
  const byStrategy = new Map<string, Accumulator>();
  const byFund: FundProjection[] = [];

  for (const fund of funds) {
    const strategy = fund.primary_strategy;
    const provided = assumptionsByStrategy.get(strategy);
    if (!provided) {
      warnings.push(`No modeling assumption for strategy "${strategy}" (fund ${fund.fund_id}); using fallback`);
    }
    const assumption = provided ?? fallbackAssumption(strategy);

    const projection = projectFund(fund, assumption, numPeriods, { ...options, model });

    portfolio = accumulate(portfolio, projection);
    byStrategy.set(
      strategy,
      accumulate(byStrategy.get(strategy) ?? emptyAccumulator(numPeriods), projection),
    );
    byFund.push({
      fund_id: fund.fund_id,
      fund_name: fund.fund_name,
      strategy,
      model,
      assumption_source: provided ? "provided" : "fallback",
      shape_source:
        model === "yale"
          ? resolveYaleShape(strategy, numPeriods).resolved_from
          : resolveStrategyShape(strategy, numPeriods).resolved_from,
      projection,
    });
  }

  for (const warning of warnings) {
    log.warn(warning);
  }
  log.info("Projected portfolio cash flows", { funds: funds.length, periods: numPeriods, model });

  const totals = toTotals(portfolio);
  return {
    num_periods: numPeriods,
    dates: Array.from(timeline.quarters(), (q) => timeline.isoDateAt(q)),
    total_calls: totals.calls,
    total_distributions: totals.distributions,
    total_fees: totals.fees,
    total_nav: totals.nav,
    by_strategy: Object.fromEntries(
      Array.from(byStrategy.entries(), ([strategy, acc]) => [strategy, toTotals(acc)]),
    ),
    by_fund: byFund,
    warnings,
  };
}
