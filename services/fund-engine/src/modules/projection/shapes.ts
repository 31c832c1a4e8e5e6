function assertPeriodCount(numPeriods: number): void {
  if (!Number.isInteger(numPeriods) || numPeriods < 0) {
    throw new RangeError("numPeriods must be a non-negative integer");
  }
}

function assertPositive(value: number, name: string): void {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive finite number`);
  }
}

// Scale to sum to 1.0; all zeros when there is nothing to scale
export function normalize(values: number[]): number[] {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  if (!(total > 0)) {
    return values.map(() => 0);
  }
  return values.map((value) => value / total);
}

/**
 * Logistic pacing centred on `peakPeriod`, used for capital calls.
 * Weights sum to 1.
 */
export function generateSCurve(numPeriods: number, peakPeriod: number, steepness = 2.0): number[] {
  assertPeriodCount(numPeriods);
  assertPositive(steepness, "steepness");

  const width = numPeriods / steepness;
  const values = Array.from({ length: numPeriods }, (_, i) => {
    const x = (i - peakPeriod) / width;
    return 1 / (1 + Math.exp(-x));
  });
  return normalize(values);
}

/**
 * Back-loaded distribution pacing: a token weight before `troughPeriod`,
 * exponential growth from the trough on. Weights sum to 1.
 */
export function generateJCurve(
  numPeriods: number,
  troughPeriod: number,
  recoverySteepness = 1.5,
): number[] {
  assertPeriodCount(numPeriods);
  assertPositive(recoverySteepness, "recoverySteepness");

  const values = Array.from({ length: numPeriods }, (_, i) => {
    if (i < troughPeriod) {
      return 0.01;
    }
    const x = (i - troughPeriod) / recoverySteepness;
    return Math.exp(x / numPeriods);
  });
  return normalize(values);
}
