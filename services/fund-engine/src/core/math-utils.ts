import { toDateTime, yearFraction, type DateInput } from "./date-utils.js";
import type { FailureReason } from "../types/records.js";

export interface XirrOptions {
  initialGuess?: number;
  maxIterations?: number;
  tolerance?: number;
}

export interface XirrSolution {
  rate: number | null;
  iterations: number;
  failure?: { reason: FailureReason; message: string };
}

export const XIRR_DEFAULTS = Object.freeze({
  initialGuess: 0.1,
  maxIterations: 100,
  tolerance: 1e-6,
});

// Rates outside this band are treated as a diverging solve
export const MIN_RATE = -0.99;
export const MAX_RATE = 10;

function assertFiniteNumber(value: number, name: string): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TypeError(`${name} must be a finite number`);
  }
}

function failed(reason: FailureReason, message: string, iterations: number): XirrSolution {
  return { rate: null, iterations, failure: { reason, message } };
}

// Net present value of irregularly dated flows
export function xnpv(rate: number, cashflows: readonly number[], years: readonly number[]): number {
  const r1 = 1 + rate;
  let total = 0;
  for (let i = 0; i < cashflows.length; i += 1) {
    total += (cashflows[i] ?? 0) / Math.pow(r1, years[i] ?? 0);
  }
  return total;
}

// d(xnpv)/d(rate)
export function xnpvDerivative(
  rate: number,
  cashflows: readonly number[],
  years: readonly number[],
): number {
  const r1 = 1 + rate;
  let total = 0;
  for (let i = 0; i < cashflows.length; i += 1) {
    const t = years[i] ?? 0;
    total += (-t * (cashflows[i] ?? 0)) / Math.pow(r1, t + 1);
  }
  return total;
}

/**
 * Newton-Raphson XIRR. Year fractions are Actual/365.25 from `dates[0]`.
 * Data problems (too few flows, flat derivative, divergence, overflow)
 * come back as a null rate with a reason; malformed arguments throw.
 */
export function solveXirr(
  cashflows: readonly number[],
  dates: readonly DateInput[],
  options: XirrOptions = {},
): XirrSolution {
  const initialGuess = options.initialGuess ?? XIRR_DEFAULTS.initialGuess;
  const maxIterations = options.maxIterations ?? XIRR_DEFAULTS.maxIterations;
  const tolerance = options.tolerance ?? XIRR_DEFAULTS.tolerance;
  assertFiniteNumber(initialGuess, "initialGuess");
  assertFiniteNumber(tolerance, "tolerance");
  if (!Number.isInteger(maxIterations) || maxIterations <= 0) {
    throw new RangeError("maxIterations must be a positive integer");
  }

  if (cashflows.length < 2) {
    return failed("insufficient_data", "At least 2 cash flows are required for IRR", 0);
  }
  if (cashflows.length !== dates.length) {
    return failed("insufficient_data", "Cash flows and dates must have the same length", 0);
  }

  cashflows.forEach((value, index) => assertFiniteNumber(value, `cashflows[${index}]`));
  const parsed = dates.map((date, index) => toDateTime(date, `dates[${index}]`));
  const start = parsed[0];
  if (!start) {
    return failed("insufficient_data", "At least 2 dates are required for IRR", 0);
  }
  const years = parsed.map((date) => yearFraction(start, date));

  let rate = initialGuess;
  for (let iteration = 0; iteration < maxIterations; iteration += 1) {
    const value = xnpv(rate, cashflows, years);
    const derivative = xnpvDerivative(rate, cashflows, years);
    if (!Number.isFinite(value) || !Number.isFinite(derivative)) {
      return failed("numeric_instability", `Non-finite NPV at rate ${rate}`, iteration + 1);
    }

    if (Math.abs(value) < tolerance) {
      return { rate, iterations: iteration + 1 };
    }

    if (Math.abs(derivative) < tolerance) {
      return failed(
        "non_convergence",
        "Derivative too small, IRR calculation is unstable",
        iteration + 1,
      );
    }

    rate -= value / derivative;
    if (!Number.isFinite(rate) || rate < MIN_RATE || rate > MAX_RATE) {
      return failed("numeric_instability", `IRR calculation diverging (rate=${rate})`, iteration + 1);
    }
  }

  return failed(
    "non_convergence",
    `IRR did not converge after ${maxIterations} iterations`,
    maxIterations,
  );
}

export function calculateXirr(
  cashFlows: readonly number[],
  dates: readonly DateInput[],
  initialGuess: number = XIRR_DEFAULTS.initialGuess,
  maxIterations: number = XIRR_DEFAULTS.maxIterations,
  tolerance: number = XIRR_DEFAULTS.tolerance,
): number | null {
  return solveXirr(cashFlows, dates, { initialGuess, maxIterations, tolerance }).rate;
}

// numerator / denominator, or null when the denominator is not positive
export function guardedRatio(numerator: number, denominator: number, scale = 1): number | null {
  if (!(denominator > 0)) {
    return null;
  }
  return (numerator / denominator) * scale;
}
