import { describe, expect, it } from "vitest";

import { parseDate } from "../../src/core/date-utils.js";
import { assertAggregationPeriod, periodKey, rollup } from "../../src/core/rollup.js";

describe("rollup", () => {
  it("formats period keys", () => {
    const date = parseDate("2023-05-17");

    expect(periodKey(date, "yearly")).toBe("2023");
    expect(periodKey(date, "quarterly")).toBe("2023-Q2");
    expect(periodKey(date, "monthly")).toBe("2023-05");
    expect(periodKey(date, "all_time")).toBe("all_time");
  });

  it("sums values per bucket in first-seen order", () => {
    const items = [
      { date: "2023-11-02", value: 5 },
      { date: "2022-01-15", value: 1 },
      { date: "2023-02-01", value: 2 },
    ];

    const totals = rollup(items, "yearly", (item) => parseDate(item.date), (item) => item.value);

    expect(Array.from(totals.entries())).toEqual([
      ["2023", 7],
      ["2022", 1],
    ]);
  });

  it("rejects unknown periods", () => {
    expect(() => assertAggregationPeriod("weekly")).toThrow(
      "period must be one of monthly, quarterly, yearly, all_time",
    );
  });
});
