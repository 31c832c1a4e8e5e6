import type { DateInput } from "../../core/date-utils.js";
import { createLogger } from "../../core/logger.js";
import { QuarterTimeline } from "../../core/timeline.js";
import type { ProjectionPeriod } from "../../types/records.js";
import { generateJCurve, generateSCurve } from "./shapes.js";
import { resolveStrategyShape } from "./strategy-table.js";

const log = createLogger("projection");

export const DEFAULT_MANAGEMENT_FEE_RATE = 0.02;
// Fees step down to half rate once the fund is more than this many years past vintage
export const FEE_STEP_DOWN_AFTER_YEARS = 5;

export interface FundProjectionInput {
  unfundedCommitment: number;
  currentNav: number;
  expectedMoic: number;
  targetIrr: number;
  strategy: string;
  numPeriods: number;
  asOfDate: DateInput;
  managementFeeRate?: number; // Annual, defaults to 2%
  vintageYear?: number; // Defaults to the as-of year
}

// Outflows are reported as negatives; keep a zero outflow at +0
export function outflow(amount: number): number {
  return amount === 0 ? 0 : -amount;
}

export function quarterlyFeeRate(annualRate: number, yearsSinceVintage: number): number {
  const base = annualRate / 4;
  return yearsSinceVintage > FEE_STEP_DOWN_AFTER_YEARS ? base / 2 : base;
}

function assertProjectionInput(input: FundProjectionInput): void {
  const numbers: [string, number][] = [
    ["unfundedCommitment", input.unfundedCommitment],
    ["currentNav", input.currentNav],
    ["expectedMoic", input.expectedMoic],
    ["targetIrr", input.targetIrr],
  ];
  for (const [name, value] of numbers) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new TypeError(`${name} must be a finite number`);
    }
  }
  if (input.targetIrr <= -1) {
    throw new RangeError("targetIrr must be greater than -1");
  }
}

/**
 * Takahashi/Alexander style quarterly simulation. Calls follow the
 * strategy's S-curve over the unfunded balance, distributions follow its
 * J-curve over the pool implied by the expected MOIC, and NAV is marked
 * down before the distribution trough and compounded at the target IRR
 * afterwards. NAV never goes below zero.
 */
export function projectFundCashFlows(input: FundProjectionInput): ProjectionPeriod[] {
  assertProjectionInput(input);

  const timeline = new QuarterTimeline({
    asOfDate: input.asOfDate,
    numPeriods: input.numPeriods,
    vintageYear: input.vintageYear,
  });
  const numPeriods = timeline.numPeriods;
  const shape = resolveStrategyShape(input.strategy, numPeriods);
  const callShape = generateSCurve(numPeriods, shape.call_peak, shape.call_steepness);
  const distShape = generateJCurve(numPeriods, shape.dist_trough, shape.dist_steepness);

  const unfunded = Math.max(0, input.unfundedCommitment);
  const annualFeeRate = input.managementFeeRate ?? DEFAULT_MANAGEMENT_FEE_RATE;
  const feeBase = unfunded + input.currentNav;
  const quarterlyGrowth = Math.pow(1 + input.targetIrr, 0.25) - 1;
  const quarterlyMarkdown = -shape.j_curve_depth / 4;

  let remainingCommitment = unfunded;
  let remainingDistributions = Math.max(0, unfunded * input.expectedMoic - input.currentNav);
  let nav = input.currentNav;

  const periods: ProjectionPeriod[] = [];
  for (const q of timeline.quarters()) {
    const call = remainingCommitment * (callShape[q] ?? 0);
    remainingCommitment -= call;

    const fee = feeBase * quarterlyFeeRate(annualFeeRate, timeline.yearsSinceVintage(q));

    const distribution = remainingDistributions * (distShape[q] ?? 0);
    remainingDistributions -= distribution;

    const navChange = q < shape.dist_trough ? nav * quarterlyMarkdown : nav * quarterlyGrowth;
    nav = Math.max(0, nav + call - fee - distribution + navChange);

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

  log.debug("Projected fund cash flows", {
    strategy: input.strategy,
    resolved_from: shape.resolved_from,
    periods: numPeriods,
  });
  return periods;
}
