import { compareDates, toDateTime, type DateInput } from "./date-utils.js";
import { solveXirr, type XirrOptions, type XirrSolution } from "./math-utils.js";

export interface DatedAmount {
  date: DateInput;
  amount: number;
}

/**
 * Terminal-mark convention: unrealized NAV is treated as one extra inflow
 * dated at the last transaction date, as if it were realized then.
 */
export const TERMINAL_MARK_CONVENTION = "nav_as_terminal_flow_at_last_transaction_date";

// Stable ascending sort; equal dates keep their input order
export function sortChronologically<T extends DatedAmount>(flows: readonly T[]): T[] {
  return flows
    .map((flow, index) => ({ flow, index, at: toDateTime(flow.date, `flows[${index}].date`) }))
    .sort((a, b) => compareDates(a.at, b.at) || a.index - b.index)
    .map((entry) => entry.flow);
}

export function withTerminalMark(
  flows: readonly DatedAmount[],
  terminalNav: number,
): DatedAmount[] {
  const last = flows[flows.length - 1];
  if (!last) {
    return [];
  }
  return [...flows, { date: last.date, amount: terminalNav }];
}

export function xirr(flows: readonly DatedAmount[], options?: XirrOptions): XirrSolution {
  return solveXirr(
    flows.map((entry) => entry.amount),
    flows.map((entry) => entry.date),
    options,
  );
}
