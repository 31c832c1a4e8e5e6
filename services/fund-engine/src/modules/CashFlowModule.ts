import type { AnalysisContext } from "../runtime/context.js";
import type { EngineModule, FundEngineRequestV1 } from "../runtime/types.js";
import { generateCashFlowSummary, type CashFlowSummary } from "./cashflow/cash-flow-processor.js";

export class CashFlowModule implements EngineModule {
  name = "cash_flow";

  run(ctx: AnalysisContext, request: FundEngineRequestV1): void {
    const options = {
      referenceDate: ctx.asOfDate,
      includeFees: request.cash_flow?.include_fees ?? true,
      period: request.cash_flow?.period ?? "yearly",
    } as const;

    const funds = ctx.listFunds();
    const byFund: Record<string, CashFlowSummary> = {};
    for (const fund of funds) {
      const own = request.cash_flows.filter((cf) => cf.fund_id === fund.fund_id);
      try {
        byFund[String(fund.fund_id)] = generateCashFlowSummary(own, options);
      } catch (e) {
        ctx.addWarning(`Cash flow summary failed for fund ${fund.fund_id}: ${messageOf(e)}`);
      }
    }

    const known = new Set(funds.map((fund) => fund.fund_id));
    const orphaned = request.cash_flows.filter((cf) => !known.has(cf.fund_id));
    if (orphaned.length > 0) {
      ctx.addWarning(`${orphaned.length} cash flows reference unknown funds`);
    }

    ctx.setOutput("cash_flow", {
      portfolio: generateCashFlowSummary(request.cash_flows, options),
      by_fund: byFund,
    });
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
