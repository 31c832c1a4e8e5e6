import { Series } from "../core/series.js";
import type { AnalysisContext } from "../runtime/context.js";
import type { EngineModule, FundEngineRequestV1 } from "../runtime/types.js";
import { calculateOptimalAllocation } from "./allocation/allocation-optimizer.js";

const DEFAULT_HORIZON_QUARTERS = 4;

export class AllocationModule implements EngineModule {
  name = "allocation";

  run(ctx: AnalysisContext, request: FundEngineRequestV1): void {
    const allocation = request.allocation;
    if (!allocation) {
      return;
    }

    const projection = ctx.getOutput("projection");
    if (!projection) {
      ctx.addWarning("Allocation skipped: projection output unavailable");
      return;
    }

    // Current exposure is NAV by strategy
    const currentExposures: Record<string, number> = {};
    for (const state of ctx.listFundStates()) {
      const strategy = state.primary_strategy;
      currentExposures[strategy] = (currentExposures[strategy] ?? 0) + state.current_nav;
    }

    const horizon = Math.min(
      allocation.horizon_quarters ?? DEFAULT_HORIZON_QUARTERS,
      projection.num_periods,
    );
    const projectedDistributions: Record<string, number> = {};
    for (const [strategy, totals] of Object.entries(projection.by_strategy)) {
      projectedDistributions[strategy] = Series.fromArray(totals.distributions).sumRange(0, horizon);
    }

    const recommended = calculateOptimalAllocation(
      currentExposures,
      allocation.target_fractions,
      allocation.available_capital,
      projectedDistributions,
      allocation.constraints,
    );

    ctx.setOutput("allocation", {
      current_exposures: currentExposures,
      projected_distributions: projectedDistributions,
      recommended,
      total_recommended: Object.values(recommended).reduce((sum, value) => sum + value, 0),
    });
  }
}
