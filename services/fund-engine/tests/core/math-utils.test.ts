import { describe, expect, it } from "vitest";

import { calculateXirr, guardedRatio, solveXirr, xnpv } from "../../src/core/math-utils.js";

describe("math-utils", () => {
  it("solves XIRR for an exact four-year 10% return", () => {
    // 2020-01-01 to 2024-01-01 is 1461 days, exactly 4 years at 365.25
    expect(calculateXirr([-100_000, 146_410], ["2020-01-01", "2024-01-01"])).toBeCloseTo(0.1, 10);
  });

  it("solves XIRR across a leap-year span", () => {
    expect(calculateXirr([-100_000, 121_000], ["2020-01-01", "2022-01-01"])).toBeCloseTo(0.1, 3);
  });

  it("computes XNPV on year fractions", () => {
    expect(xnpv(0.1, [-100, 110], [0, 1])).toBeCloseTo(0, 10);
    expect(xnpv(0, [-100, 40, 70], [0, 1, 2])).toBeCloseTo(10, 10);
  });

  it("reports insufficient data for fewer than two flows", () => {
    const solution = solveXirr([-100], ["2020-01-01"]);

    expect(solution.rate).toBeNull();
    expect(solution.failure?.reason).toBe("insufficient_data");
    expect(calculateXirr([], [])).toBeNull();
  });

  it("reports insufficient data when flows and dates differ in length", () => {
    const solution = solveXirr([-100, 110], ["2020-01-01"]);

    expect(solution.rate).toBeNull();
    expect(solution.failure?.reason).toBe("insufficient_data");
  });

  it("fails with non_convergence when the derivative is flat", () => {
    const solution = solveXirr([-100, 50], ["2020-01-01", "2020-01-01"]);

    expect(solution.rate).toBeNull();
    expect(solution.failure?.reason).toBe("non_convergence");
    expect(solution.failure?.message).toBe("Derivative too small, IRR calculation is unstable");
  });

  it("fails with numeric_instability when the rate leaves its band", () => {
    const solution = solveXirr([-100, -100], ["2020-01-01", "2021-01-01"]);

    expect(solution.rate).toBeNull();
    expect(solution.failure?.reason).toBe("numeric_instability");
  });

  it("fails with non_convergence when iterations run out", () => {
    const solution = solveXirr([-100_000, 121_000], ["2020-01-01", "2022-01-01"], {
      maxIterations: 1,
    });

    expect(solution).toEqual({
      rate: null,
      iterations: 1,
      failure: { reason: "non_convergence", message: "IRR did not converge after 1 iterations" },
    });
  });

  it("throws on malformed dates", () => {
    expect(() => calculateXirr([-100, 110], ["2020-01-01", "not-a-date"])).toThrow(
      "Invalid ISO date: not-a-date",
    );
  });

  it("guards ratios against non-positive denominators", () => {
    expect(guardedRatio(150_000, 100_000)).toBe(1.5);
    expect(guardedRatio(50, 200, 100)).toBe(25);
    expect(guardedRatio(1, 0)).toBeNull();
    expect(guardedRatio(1, -5)).toBeNull();
  });
});
