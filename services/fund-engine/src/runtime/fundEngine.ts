import { getConfig, type EngineConfig } from "../config.js";
import { toDateTime } from "../core/date-utils.js";
import { createLogger } from "../core/logger.js";
import { AllocationModule } from "../modules/AllocationModule.js";
import { CashFlowModule } from "../modules/CashFlowModule.js";
import { deriveFundState } from "../modules/cashflow/fund-state.js";
import { MetricsModule } from "../modules/MetricsModule.js";
import { ProjectionModule } from "../modules/ProjectionModule.js";
import { parseRequest, validateRequest } from "../validate/validate.js";
import { AnalysisContext } from "./context.js";
import type { EngineModule, FundEngineRequestV1, FundEngineResult, FundEngineValidation } from "./types.js";

const log = createLogger("fund-engine");

// Modules that read another module's output
const DEPENDS_ON: Record<string, string | undefined> = {
  allocation: "projection",
};

export class FundEngineRuntime {
  private readonly request: unknown;
  private readonly config: EngineConfig;
  private readonly modules: EngineModule[];

  constructor(request: unknown, config: EngineConfig = getConfig()) {
    this.request = request;
    this.config = config;
    this.modules = [
      new CashFlowModule(),
      new MetricsModule(),
      new ProjectionModule(),
      new AllocationModule(),
    ];
  }

  validate(): FundEngineValidation {
    return validateRequest(this.request);
  }

  run(): FundEngineResult {
    const parsed = parseRequest(this.request);
    const validation: FundEngineValidation = { valid: parsed.valid, errors: parsed.errors };
    if (!parsed.valid) {
      log.warn("Rejected invalid request", { errors: parsed.errors.length });
      return { validation, warnings: [], outputs: null };
    }

    const request = parsed.request;
    const context = this.buildContext(request);
    const failed = new Set<string>();

    for (const module of this.modules) {
      const dependency = DEPENDS_ON[module.name];
      if (dependency && failed.has(dependency)) {
        context.addWarning(`${module.name} module skipped: ${dependency} module failed`);
        failed.add(module.name);
        continue;
      }

      try {
        module.run(context, request);
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        failed.add(module.name);
        context.addWarning(`${module.name} module failed: ${message}`);
        log.error("Module failed", { module: module.name, error: message });
      }
    }

    log.info("Fund engine run complete", {
      funds: context.listFunds().length,
      cash_flows: request.cash_flows.length,
      warnings: context.warnings.length,
    });

    return {
      validation,
      warnings: context.warnings,
      outputs: context.toOutputs(),
    };
  }

  private buildContext(request: FundEngineRequestV1): AnalysisContext {
    const context = new AnalysisContext(toDateTime(request.as_of_date, "as_of_date"), this.config);

    for (const fund of request.funds) {
      if (!context.addFund(fund)) {
        context.addWarning(`Duplicate fund_id ${fund.fund_id}; later records ignored`);
        continue;
      }
      try {
        context.setFundState(deriveFundState(fund, request.cash_flows));
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        context.addWarning(`Fund state unavailable for fund ${fund.fund_id}: ${message}`);
      }
    }

    return context;
  }
}
