import { describe, expect, it } from "vitest";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { FundEngineRuntime } from "../src/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturesDir = join(__dirname, "../../../testcases/fund_engine_v1/fixtures");
const expectedDir = join(__dirname, "../../../testcases/fund_engine_v1/expected");

const TOLERANCE = 8;

function loadJson(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf8"));
}

interface ExpectedOutputs {
  cash_flow: {
    total_calls: number;
    total_distributions: number;
    net_cash_flow: number;
    aggregated_by_period: Record<string, number>;
  };
  metrics: {
    portfolio: { paid_in: number; distributions: number; tvpi: number; irr: number };
    funds: Record<string, { irr: number; moic: number }>;
  };
  projection: { dates: string[]; total_fees: number[] };
}

function loadExpected(name: string): ExpectedOutputs {
  const expected: ExpectedOutputs = JSON.parse(readFileSync(join(expectedDir, name), "utf8"));
  return expected;
}

describe("Fund Engine V1 Regression Tests", () => {
  it("TWO_STRATEGY_PORTFOLIO produces expected outputs", () => {
    const request = loadJson(join(fixturesDir, "two_strategy_portfolio.json"));
    const expected = loadExpected("two_strategy_portfolio.expected.json");

    const engine = new FundEngineRuntime(request);
    const result = engine.run();

    expect(result.validation).toEqual({ valid: true, errors: [] });
    expect(result.warnings).toEqual([]);

    const summary = result.outputs?.cash_flow?.portfolio;
    expect(summary?.total_calls).toBe(expected.cash_flow.total_calls);
    expect(summary?.total_distributions).toBe(expected.cash_flow.total_distributions);
    expect(summary?.net_cash_flow).toBe(expected.cash_flow.net_cash_flow);
    expect(summary?.aggregated_by_period).toEqual(expected.cash_flow.aggregated_by_period);

    const portfolio = result.outputs?.metrics?.portfolio.metrics;
    expect(portfolio?.paid_in).toBe(expected.metrics.portfolio.paid_in);
    expect(portfolio?.distributions).toBe(expected.metrics.portfolio.distributions);
    expect(portfolio?.tvpi).toBeCloseTo(expected.metrics.portfolio.tvpi, TOLERANCE);
    expect(portfolio?.irr).toBeCloseTo(expected.metrics.portfolio.irr, TOLERANCE);

    for (const [fundId, metrics] of Object.entries(expected.metrics.funds)) {
      const fund = result.outputs?.metrics?.funds.find((entity) => entity.entity_id === fundId);
      expect(fund?.metrics?.irr).toBeCloseTo(metrics.irr, TOLERANCE);
      expect(fund?.metrics?.moic).toBeCloseTo(metrics.moic, TOLERANCE);
    }

    const projection = result.outputs?.projection;
    expect(projection?.dates).toEqual(expected.projection.dates);
    expected.projection.total_fees.forEach((fee, q) => {
      expect(projection?.total_fees[q]).toBeCloseTo(fee, TOLERANCE);
    });
  });
});
