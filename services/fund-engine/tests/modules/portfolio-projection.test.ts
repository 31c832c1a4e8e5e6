import { describe, expect, it } from "vitest";

import {
  DEFAULT_MODELING_ASSUMPTIONS,
  fallbackAssumption,
  indexAssumptions,
} from "../../src/modules/projection/assumptions.js";
import { projectFund, projectPortfolioCashFlows } from "../../src/modules/projection/portfolio-projection.js";
import type { FundState, ModelingAssumption } from "../../src/types/records.js";

const BUYOUT: FundState = {
  fund_id: 1,
  fund_name: "Buyout I",
  primary_strategy: "Private Equity",
  sub_strategy: "Buyout",
  vintage_year: 2019,
  total_commitment: 150_000,
  paid_in: 50_000,
  distributions: 10_000,
  unfunded_commitment: 100_000,
  current_nav: 50_000,
  nav_date: "2024-03-31",
};

const MACRO: FundState = {
  fund_id: 2,
  primary_strategy: "Hedge Fund",
  sub_strategy: "Macro",
  vintage_year: 2023,
  total_commitment: 20_000,
  paid_in: 0,
  distributions: 0,
  unfunded_commitment: 20_000,
  current_nav: 0,
  nav_date: null,
};

const ASSUMPTIONS = indexAssumptions(DEFAULT_MODELING_ASSUMPTIONS);
const OPTIONS = { asOfDate: "2024-03-31" };

function assumptionFor(strategy: string): ModelingAssumption {
  return ASSUMPTIONS.get(strategy) ?? fallbackAssumption(strategy);
}

describe("projectPortfolioCashFlows", () => {
  const result = projectPortfolioCashFlows([BUYOUT, MACRO], ASSUMPTIONS, 8, OPTIONS);
  const buyout = projectFund(BUYOUT, assumptionFor("Private Equity"), 8, OPTIONS);
  const macro = projectFund(MACRO, assumptionFor("Hedge Fund"), 8, OPTIONS);

  it("sums fund periods into portfolio totals", () => {
    expect(result.num_periods).toBe(8);
    expect(result.dates[0]).toBe("2024-06-30");
    expect(result.dates).toHaveLength(8);

    for (let q = 0; q < 8; q += 1) {
      const a = buyout[q];
      const b = macro[q];
      expect(result.total_calls[q]).toBeCloseTo(-(a?.call_investment ?? 0) - (b?.call_investment ?? 0), 8);
      expect(result.total_distributions[q]).toBeCloseTo((a?.distribution ?? 0) + (b?.distribution ?? 0), 8);
      expect(result.total_nav[q]).toBeCloseTo((a?.nav ?? 0) + (b?.nav ?? 0), 8);
    }
  });

  it("reports fees as positive magnitudes", () => {
    // 100,000 + 50,000 at 0.5% plus 20,000 at 0.5%
    expect(result.total_fees[0]).toBeCloseTo(850, 8);
  });

  it("keeps per-strategy totals", () => {
    expect(Object.keys(result.by_strategy)).toEqual(["Private Equity", "Hedge Fund"]);
    expect(result.by_strategy["Hedge Fund"]?.distributions[0]).toBeCloseTo(macro[0]?.distribution ?? 0, 10);
  });

  it("falls back for a strategy without assumptions and says so", () => {
    expect(result.warnings).toEqual([
      'No modeling assumption for strategy "Hedge Fund" (fund 2); using fallback',
    ]);
    expect(result.by_fund.map((f) => [f.fund_id, f.assumption_source, f.shape_source])).toEqual([
      [1, "provided", "Private Equity"],
      [2, "fallback", "default"],
    ]);
    expect(fallbackAssumption("Hedge Fund")).toMatchObject({ expected_moic: 2, target_irr: 0.15 });
  });

  it("zero-fills totals for an empty portfolio", () => {
    const empty = projectPortfolioCashFlows([], ASSUMPTIONS, 4, OPTIONS);

    expect(empty.total_calls).toEqual([0, 0, 0, 0]);
    expect(empty.total_nav).toEqual([0, 0, 0, 0]);
    expect(empty.by_fund).toEqual([]);
    expect(empty.by_strategy).toEqual({});
  });

  it("runs the yale model with fees on total commitment", () => {
    const yale = projectPortfolioCashFlows([BUYOUT, MACRO], ASSUMPTIONS, 4, { ...OPTIONS, model: "yale" });

    expect(yale.by_fund.map((f) => [f.fund_id, f.model, f.shape_source])).toEqual([
      [1, "yale", "Private Equity"],
      [2, "yale", "default"],
    ]);
    // 150,000 at 0.5% while 2024 - 2019 <= 5, then 0.25%; plus 20,000 at 0.5%
    expect(yale.total_fees[0]).toBeCloseTo(850, 8);
    expect(yale.total_fees[3]).toBeCloseTo(475, 8);
  });

  it("passes the management fee rate through", () => {
    const feeFree = projectPortfolioCashFlows([BUYOUT], ASSUMPTIONS, 4, {
      ...OPTIONS,
      managementFeeRate: 0,
    });

    expect(feeFree.total_fees).toEqual([0, 0, 0, 0]);
  });
});
