import type { DateInput } from "../../core/date-utils.js";
import { createLogger } from "../../core/logger.js";
import { QuarterTimeline } from "../../core/timeline.js";
import type { ModelingAssumption, ProjectionPeriod } from "../../types/records.js";
import { DEFAULT_MANAGEMENT_FEE_RATE, outflow, quarterlyFeeRate } from "./projection-engine.js";
import { normalize } from "./shapes.js";
import { DEFAULT_STRATEGY_KEY } from "./strategy-table.js";

const log = createLogger("yale-model");

// Linear ramp of `count` weights from `from` to `to`, placed at quarter `start`
export interface Ramp {
  start: number;
  count: number;
  from: number;
  to: number;
}

export interface YaleShapeRow {
  contributions: Ramp;
  distributions: Ramp | "uniform";
}

export interface YaleShape {
  strategy: string;
  resolved_from: string;
  contributions: number[];
  distributions: number[];
}

const DEFAULT_ROW: YaleShapeRow = Object.freeze({
  contributions: { start: 0, count: 10, from: 0.02, to: 0.04 },
  distributions: { start: 6, count: 10, from: 0.03, to: 0.07 },
});

export const YALE_SHAPE_TABLE: Readonly<Record<string, YaleShapeRow>> = Object.freeze({
  "Venture Capital": Object.freeze({
    contributions: { start: 0, count: 8, from: 0.01, to: 0.05 },
    distributions: { start: 12, count: 8, from: 0.01, to: 0.1 },
  }),
  "Private Equity": Object.freeze({
    contributions: { start: 0, count: 12, from: 0.01, to: 0.03 },
    distributions: { start: 8, count: 10, from: 0.02, to: 0.08 },
  }),
  // Steady yield from the first quarter
  Infrastructure: Object.freeze({
    contributions: { start: 0, count: 20, from: 0.01, to: 0.02 },
    distributions: "uniform",
  }),
  [DEFAULT_STRATEGY_KEY]: DEFAULT_ROW,
});

function rampWeights(numPeriods: number, ramp: Ramp): number[] {
  const weights = Array.from({ length: numPeriods }, () => 0);
  const step = ramp.count > 1 ? (ramp.to - ramp.from) / (ramp.count - 1) : 0;
  for (let i = 0; i < ramp.count; i += 1) {
    const index = ramp.start + i;
    if (index < numPeriods) {
      weights[index] = ramp.from + step * i;
    }
  }
  return normalize(weights);
}

// Ramps past the horizon are cut off and the remainder rescaled to sum to 1
export function resolveYaleShape(strategy: string, numPeriods: number): YaleShape {
  if (!Number.isInteger(numPeriods) || numPeriods < 0) {
    throw new RangeError("numPeriods must be a non-negative integer");
  }
  const own = Object.prototype.hasOwnProperty.call(YALE_SHAPE_TABLE, strategy)
    ? YALE_SHAPE_TABLE[strategy]
    : undefined;
  const row = own ?? DEFAULT_ROW;

  return {
    strategy,
    resolved_from: own === undefined ? DEFAULT_STRATEGY_KEY : strategy,
    contributions: rampWeights(numPeriods, row.contributions),
    distributions:
      row.distributions === "uniform"
        ? normalize(Array.from({ length: numPeriods }, () => 1))
        : rampWeights(numPeriods, row.distributions),
  };
}

export interface YaleProjectionInput {
  strategy: string;
  totalCommitment: number;
  paidIn: number; // Cumulative calls to date
  distributions: number; // Cumulative distributions to date
  unfundedCommitment: number;
  currentNav: number;
  assumption: ModelingAssumption;
  numPeriods: number;
  asOfDate: DateInput;
  vintageYear?: number;
  managementFeeRate?: number; // Annual, defaults to 2%
}

/**
 * Yale-style projection. Calls draw the unfunded balance along the
 * strategy's contribution ramp. Distributions pay out what is still owed to
 * reach the expected MOIC on total invested capital. Fees are charged on
 * total commitment, halving once the period's calendar year is more than
 * five years past vintage. NAV takes the initial quarterly markdown for the
 * first depreciation quarters and then grows at half the target IRR.
 */
export function projectYaleModel(input: YaleProjectionInput): ProjectionPeriod[] {
  const { assumption } = input;
  const timeline = new QuarterTimeline({
    asOfDate: input.asOfDate,
    numPeriods: input.numPeriods,
    vintageYear: input.vintageYear,
  });
  const shape = resolveYaleShape(input.strategy, timeline.numPeriods);

  const annualFeeRate = input.managementFeeRate ?? DEFAULT_MANAGEMENT_FEE_RATE;
  const growth = Math.pow(1 + 0.5 * assumption.target_irr, 0.25) - 1;

  let unfunded = Math.max(0, input.unfundedCommitment);
  let remainingDistributions = Math.max(
    0,
    (input.paidIn + unfunded) * assumption.expected_moic - input.distributions,
  );
  let nav = Math.max(0, input.currentNav);

  const periods: ProjectionPeriod[] = [];
  for (const q of timeline.quarters()) {
    const date = timeline.dateAt(q);

    const call = unfunded * (shape.contributions[q] ?? 0);
    unfunded -= call;

    const fee =
      input.totalCommitment * quarterlyFeeRate(annualFeeRate, date.year - timeline.vintageYear);

    const distribution = remainingDistributions * (shape.distributions[q] ?? 0);
    remainingDistributions -= distribution;

    const rate =
      q + 1 <= assumption.nav_initial_depreciation_qtrs
        ? assumption.nav_initial_qtr_depreciation
        : growth;
    const navChange = nav * rate;
    nav = Math.max(0, nav + navChange + call - fee - distribution);

    periods.push({
      period_index: q + 1,
      date: timeline.isoDateAt(q),
      call_investment: outflow(call),
      management_fees: outflow(fee),
      distribution,
      nav,
      nav_change: navChange,
    });
  }

  log.debug("Projected yale model", {
    strategy: input.strategy,
    resolved_from: shape.resolved_from,
    periods: timeline.numPeriods,
  });

  return periods;
}
