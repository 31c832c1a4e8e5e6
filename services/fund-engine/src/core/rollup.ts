import type { DateTime } from "luxon";

export const AGGREGATION_PERIODS = ["monthly", "quarterly", "yearly", "all_time"] as const;
export type AggregationPeriod = (typeof AGGREGATION_PERIODS)[number];

export const ALL_TIME_KEY = "all_time";

export function assertAggregationPeriod(period: unknown): asserts period is AggregationPeriod {
  if (!AGGREGATION_PERIODS.some((candidate) => candidate === period)) {
    throw new RangeError(`period must be one of ${AGGREGATION_PERIODS.join(", ")}`);
  }
}

// 'YYYY', 'YYYY-Qn', 'YYYY-MM' or 'all_time'
export function periodKey(date: DateTime, period: AggregationPeriod): string {
  switch (period) {
    case "yearly":
      return String(date.year);
    case "quarterly":
      return `${date.year}-Q${date.quarter}`;
    case "monthly":
      return `${date.year}-${String(date.month).padStart(2, "0")}`;
    case "all_time":
      return ALL_TIME_KEY;
  }
}

// Sum values into period buckets, keeping first-seen key order
export function rollup<T>(
  items: readonly T[],
  period: AggregationPeriod,
  dateOf: (item: T) => DateTime,
  valueOf: (item: T) => number,
): Map<string, number> {
  assertAggregationPeriod(period);

  const totals = new Map<string, number>();
  for (const item of items) {
    const key = periodKey(dateOf(item), period);
    totals.set(key, (totals.get(key) ?? 0) + valueOf(item));
  }
  return totals;
}
