import type { CashFlow, Fund, FundState } from "../../types/records.js";
import { isCall, isDistribution } from "../../types/records.js";
import { sortCashFlows } from "./cash-flow-processor.js";

// Latest nav_update by date; same-day marks resolve to the highest transaction_id
export function latestNavMark(flows: readonly CashFlow[]): CashFlow | undefined {
  const marks = sortCashFlows(flows.filter((cf) => cf.type === "nav_update"));
  return marks[marks.length - 1];
}

export function deriveFundState(fund: Fund, flows: readonly CashFlow[]): FundState {
  const own = flows.filter((cf) => cf.fund_id === fund.fund_id);

  let paidIn = 0;
  let distributions = 0;
  for (const cf of own) {
    if (isCall(cf)) {
      paidIn += Math.abs(cf.amount);
    } else if (isDistribution(cf)) {
      distributions += cf.amount;
    }
  }

  const mark = latestNavMark(own);

  return {
    fund_id: fund.fund_id,
    fund_name: fund.fund_name,
    primary_strategy: fund.primary_strategy,
    sub_strategy: fund.sub_strategy,
    vintage_year: fund.vintage_year,
    total_commitment: fund.total_commitment,
    paid_in: paidIn,
    distributions,
    unfunded_commitment: fund.total_commitment - paidIn,
    current_nav: mark?.amount ?? 0,
    nav_date: mark?.date ?? null,
  };
}
