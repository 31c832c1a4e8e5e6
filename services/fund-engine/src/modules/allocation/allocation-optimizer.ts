import { createLogger } from "../../core/logger.js";

const log = createLogger("allocation");

export type StrategyAmounts = Readonly<Record<string, number>>;

export interface AllocationConstraints {
  min?: StrategyAmounts;
  max?: StrategyAmounts;
}

function assertBudget(availableCapital: number): void {
  if (typeof availableCapital !== "number" || !Number.isFinite(availableCapital)) {
    throw new TypeError("availableCapital must be a finite number");
  }
  if (availableCapital < 0) {
    throw new RangeError("availableCapital must be >= 0");
  }
}

function amountFor(amounts: StrategyAmounts | undefined, strategy: string, fallback: number): number {
  if (!amounts || !Object.prototype.hasOwnProperty.call(amounts, strategy)) {
    return fallback;
  }
  return amounts[strategy] ?? fallback;
}

function total(amounts: StrategyAmounts): number {
  return Object.values(amounts).reduce((sum, value) => sum + value, 0);
}

/**
 * Recommend new commitments per strategy so that, after the projected
 * distributions leave the portfolio, exposures move toward the target
 * fractions. Each gap is clamped into its [min, max] constraint and at 0,
 * then scaled pro rata when the sum exceeds the available capital.
 * Only strategies named in `targetFractions` receive an allocation.
 */
export function calculateOptimalAllocation(
  currentExposures: StrategyAmounts,
  targetFractions: StrategyAmounts,
  availableCapital: number,
  projectedDistributions: StrategyAmounts,
  constraints: AllocationConstraints = {},
): Record<string, number> {
  assertBudget(availableCapital);

  const projectedTotal = total(currentExposures) - total(projectedDistributions) + availableCapital;

  const allocations: Record<string, number> = {};
  let allocated = 0;
  for (const [strategy, fraction] of Object.entries(targetFractions)) {
    const targetValue = projectedTotal * fraction;
    const projectedValue =
      amountFor(currentExposures, strategy, 0) - amountFor(projectedDistributions, strategy, 0);
    const gap = targetValue - projectedValue;

    const min = amountFor(constraints.min, strategy, 0);
    const max = amountFor(constraints.max, strategy, availableCapital);
    const allocation = Math.max(0, Math.max(min, Math.min(gap, max)));

    allocations[strategy] = allocation;
    allocated += allocation;
  }

  if (allocated > availableCapital) {
    const scale = availableCapital / allocated;
    for (const strategy of Object.keys(allocations)) {
      allocations[strategy] = (allocations[strategy] ?? 0) * scale;
    }
  }

  log.debug("Calculated allocation", { strategies: Object.keys(allocations).length, allocated });
  return allocations;
}
