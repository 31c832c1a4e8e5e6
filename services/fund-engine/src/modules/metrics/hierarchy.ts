import { createLogger } from "../../core/logger.js";
import type { XirrOptions } from "../../core/math-utils.js";
import { isCashMovement } from "../../types/records.js";
import type { AggregatedMetrics, CashFlow, Fund, MetricsResult } from "../../types/records.js";
import { sortCashFlows } from "../cashflow/cash-flow-processor.js";
import { deriveFundState } from "../cashflow/fund-state.js";
import { aggregateMetrics, calculateAllMetrics } from "./metrics-engine.js";

const log = createLogger("hierarchy");

// Hierarchy levels, leaves last
export const HIERARCHY_LEVELS = ["PORTFOLIO", "STRATEGY", "SUB_STRATEGY", "FUND"] as const;
export type HierarchyLevel = (typeof HIERARCHY_LEVELS)[number];

export interface EntityMetrics {
  level: HierarchyLevel;
  entity_id: string;
  label: string;
  parent_id: string | null;
  fund_ids: number[];
  metrics: MetricsResult | AggregatedMetrics | null;
  // Funds whose own metrics failed and were left out of this roll-up
  excluded_fund_ids: number[];
  error?: string;
}

export interface HierarchyMetrics {
  portfolio: EntityMetrics;
  strategies: EntityMetrics[];
  sub_strategies: EntityMetrics[];
  funds: EntityMetrics[];
}

export const PORTFOLIO_ENTITY_ID = "portfolio";

export function computeFundMetrics(
  fund: Fund,
  flows: readonly CashFlow[],
  options?: XirrOptions,
): MetricsResult {
  const own = flows.filter((cf) => cf.fund_id === fund.fund_id);
  const state = deriveFundState(fund, own);
  const movements = sortCashFlows(own.filter(isCashMovement));
  // MOIC is measured on invested capital, fees excluded
  const investedCapital = movements
    .filter((cf) => cf.type === "call_investment")
    .reduce((sum, cf) => sum + Math.abs(cf.amount), 0);

  return calculateAllMetrics(
    movements.map((cf) => cf.amount),
    movements.map((cf) => cf.date),
    fund.total_commitment,
    state.current_nav,
    { investedCapital, irr: options },
  );
}

interface FundOutcome {
  fund: Fund;
  entity: EntityMetrics;
  flows: CashFlow[];
}

function strategyId(fund: Fund): string {
  return fund.primary_strategy;
}

function subStrategyId(fund: Fund): string {
  return `${fund.primary_strategy}/${fund.sub_strategy}`;
}

function rollUp(
  level: HierarchyLevel,
  entityId: string,
  label: string,
  parentId: string | null,
  members: readonly FundOutcome[],
  options?: XirrOptions,
): EntityMetrics {
  const healthy = members.filter((member) => member.entity.metrics !== null);
  const childMetrics = healthy.flatMap((member) => (member.entity.metrics ? [member.entity.metrics] : []));

  return {
    level,
    entity_id: entityId,
    label,
    parent_id: parentId,
    fund_ids: members.map((member) => member.fund.fund_id),
    metrics: aggregateMetrics(
      childMetrics,
      healthy.flatMap((member) => member.flows),
      options,
    ),
    excluded_fund_ids: members
      .filter((member) => member.entity.metrics === null)
      .map((member) => member.fund.fund_id),
  };
}

function groupBy(outcomes: readonly FundOutcome[], keyOf: (fund: Fund) => string): Map<string, FundOutcome[]> {
  const groups = new Map<string, FundOutcome[]>();
  for (const outcome of outcomes) {
    const key = keyOf(outcome.fund);
    const group = groups.get(key);
    if (group) {
      group.push(outcome);
    } else {
      groups.set(key, [outcome]);
    }
  }
  return groups;
}

/**
 * Metrics at fund, sub-strategy, strategy and portfolio level. Parents pool
 * their children's dollar totals and solve IRR over the union of the
 * children's flows. A fund that fails is reported on its own entry and left
 * out of its parents; it never aborts the batch.
 */
export function computeHierarchyMetrics(
  funds: readonly Fund[],
  flows: readonly CashFlow[],
  options?: XirrOptions,
): HierarchyMetrics {
  const outcomes: FundOutcome[] = funds.map((fund) => {
    const own = flows.filter((cf) => cf.fund_id === fund.fund_id);
    const entity: EntityMetrics = {
      level: "FUND",
      entity_id: String(fund.fund_id),
      label: fund.fund_name ?? `Fund ${fund.fund_id}`,
      parent_id: subStrategyId(fund),
      fund_ids: [fund.fund_id],
      metrics: null,
      excluded_fund_ids: [],
    };

    try {
      entity.metrics = computeFundMetrics(fund, own, options);
    } catch (e) {
      entity.error = e instanceof Error ? e.message : String(e);
      log.warn("Fund metrics failed; excluded from roll-ups", {
        fund_id: fund.fund_id,
        error: entity.error,
      });
    }

    return { fund, entity, flows: own };
  });

  const subStrategies = Array.from(groupBy(outcomes, subStrategyId).entries()).map(
    ([id, members]) => {
      const first = members[0]?.fund;
      return rollUp(
        "SUB_STRATEGY",
        id,
        first?.sub_strategy ?? id,
        first ? strategyId(first) : null,
        members,
        options,
      );
    },
  );

  const strategies = Array.from(groupBy(outcomes, strategyId).entries()).map(([id, members]) =>
    rollUp("STRATEGY", id, id, PORTFOLIO_ENTITY_ID, members, options),
  );

  const portfolio = rollUp("PORTFOLIO", PORTFOLIO_ENTITY_ID, "Portfolio", null, outcomes, options);

  log.debug("Computed hierarchy metrics", {
    funds: outcomes.length,
    strategies: strategies.length,
    sub_strategies: subStrategies.length,
  });

  return {
    portfolio,
    strategies,
    sub_strategies: subStrategies,
    funds: outcomes.map((outcome) => outcome.entity),
  };
}
