import type { AnalysisContext } from "../runtime/context.js";
import type { EngineModule, FundEngineRequestV1 } from "../runtime/types.js";
import { computeHierarchyMetrics } from "./metrics/hierarchy.js";

export class MetricsModule implements EngineModule {
  name = "metrics";

  run(ctx: AnalysisContext, request: FundEngineRequestV1): void {
    const metrics = computeHierarchyMetrics(ctx.listFunds(), request.cash_flows, ctx.config.irr);

    for (const entity of metrics.funds) {
      if (entity.error) {
        ctx.addWarning(`Metrics failed for fund ${entity.entity_id}: ${entity.error}`);
      }
    }

    ctx.setOutput("metrics", metrics);
  }
}
