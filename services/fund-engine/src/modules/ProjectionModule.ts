import type { AnalysisContext } from "../runtime/context.js";
import type { EngineModule, FundEngineRequestV1 } from "../runtime/types.js";
import { DEFAULT_MODELING_ASSUMPTIONS, indexAssumptions } from "./projection/assumptions.js";
import { projectPortfolioCashFlows } from "./projection/portfolio-projection.js";

export class ProjectionModule implements EngineModule {
  name = "projection";

  run(ctx: AnalysisContext, request: FundEngineRequestV1): void {
    const settings = request.projection ?? {};
    const assumptions = indexAssumptions(
      request.modeling_assumptions ?? DEFAULT_MODELING_ASSUMPTIONS,
    );

    const projection = projectPortfolioCashFlows(
      ctx.listFundStates(),
      assumptions,
      settings.num_periods ?? ctx.config.defaultProjectionQuarters,
      {
        asOfDate: ctx.asOfDate,
        model: settings.model ?? "takahashi_alexander",
        managementFeeRate: settings.management_fee_rate ?? ctx.config.managementFeeRate,
      },
    );

    projection.warnings.forEach((warning) => ctx.addWarning(warning));
    ctx.setOutput("projection", projection);
  }
}
