import type { DateTime } from "luxon";

import type { EngineConfig } from "../config.js";
import type { Fund, FundState } from "../types/records.js";
import type { FundEngineOutputs } from "./types.js";

type ModuleOutputs = Omit<FundEngineOutputs, "fund_states">;

export class AnalysisContext {
  readonly asOfDate: DateTime;
  readonly config: EngineConfig;
  // Unique by fund_id, first record wins
  private readonly funds: Map<number, Fund>;
  private readonly fundStates: Map<number, FundState>;
  private readonly outputs: ModuleOutputs;
  readonly warnings: string[];

  constructor(asOfDate: DateTime, config: EngineConfig) {
    this.asOfDate = asOfDate;
    this.config = config;
    this.funds = new Map();
    this.fundStates = new Map();
    this.outputs = {};
    this.warnings = [];
  }

  // false when a fund with the same id is already registered
  addFund(fund: Fund): boolean {
    if (this.funds.has(fund.fund_id)) {
      return false;
    }
    this.funds.set(fund.fund_id, fund);
    return true;
  }

  listFunds(): Fund[] {
    return Array.from(this.funds.values());
  }

  getFundState(fundId: number): FundState | undefined {
    return this.fundStates.get(fundId);
  }

  setFundState(state: FundState): void {
    this.fundStates.set(state.fund_id, state);
  }

  listFundStates(): FundState[] {
    return Array.from(this.fundStates.values());
  }

  getOutput<K extends keyof ModuleOutputs>(name: K): ModuleOutputs[K] {
    return this.outputs[name];
  }

  setOutput<K extends keyof ModuleOutputs>(name: K, value: ModuleOutputs[K]): void {
    this.outputs[name] = value;
  }

  addWarning(message: string): void {
    this.warnings.push(message);
  }

  toOutputs(): FundEngineOutputs {
    return { fund_states: this.listFundStates(), ...this.outputs };
  }
}
