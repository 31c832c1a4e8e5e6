export interface StrategyShapeRow {
  call_peak_fraction: number;
  call_steepness: number;
  dist_trough_fraction: number;
  dist_steepness: number;
  j_curve_depth: number; // Annual NAV markdown before the distribution trough
}

export interface StrategyShape {
  strategy: string;
  resolved_from: string;
  is_fallback: boolean;
  call_peak: number;
  call_steepness: number;
  dist_trough: number;
  dist_steepness: number;
  j_curve_depth: number;
}

export const DEFAULT_STRATEGY_KEY = "default";

const PRIVATE_EQUITY: StrategyShapeRow = Object.freeze({
  call_peak_fraction: 0.4,
  call_steepness: 2.0,
  dist_trough_fraction: 0.4,
  dist_steepness: 1.5,
  j_curve_depth: 0.08,
});

// Unrecognized strategies resolve to the `default` row
export const STRATEGY_SHAPE_TABLE: Readonly<Record<string, StrategyShapeRow>> = Object.freeze({
  "Venture Capital": Object.freeze({
    call_peak_fraction: 0.3,
    call_steepness: 2.5,
    dist_trough_fraction: 0.5,
    dist_steepness: 1.2,
    j_curve_depth: 0.15,
  }),
  "Private Equity": PRIVATE_EQUITY,
  "Real Estate": Object.freeze({
    call_peak_fraction: 0.2,
    call_steepness: 3.0,
    dist_trough_fraction: 0.1,
    dist_steepness: 2.0,
    j_curve_depth: 0.02,
  }),
  Infrastructure: Object.freeze({
    call_peak_fraction: 0.5,
    call_steepness: 1.5,
    dist_trough_fraction: 0.2,
    dist_steepness: 3.0,
    j_curve_depth: 0.01,
  }),
  [DEFAULT_STRATEGY_KEY]: PRIVATE_EQUITY,
});

export function resolveStrategyShape(strategy: string, numPeriods: number): StrategyShape {
  const own = Object.prototype.hasOwnProperty.call(STRATEGY_SHAPE_TABLE, strategy)
    ? STRATEGY_SHAPE_TABLE[strategy]
    : undefined;
  const isFallback = own === undefined || strategy === DEFAULT_STRATEGY_KEY;
  const row = own ?? PRIVATE_EQUITY;

  return {
    strategy,
    resolved_from: isFallback ? DEFAULT_STRATEGY_KEY : strategy,
    is_fallback: isFallback,
    call_peak: Math.trunc(numPeriods * row.call_peak_fraction),
    call_steepness: row.call_steepness,
    dist_trough: Math.trunc(numPeriods * row.dist_trough_fraction),
    dist_steepness: row.dist_steepness,
    j_curve_depth: row.j_curve_depth,
  };
}
