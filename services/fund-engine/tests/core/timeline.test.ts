import { describe, expect, it } from "vitest";

import { QuarterTimeline } from "../../src/core/timeline.js";

describe("QuarterTimeline", () => {
  const timeline = new QuarterTimeline({ asOfDate: "2024-03-31", numPeriods: 8, vintageYear: 2019 });

  it("dates each quarter from the as-of date without drift", () => {
    expect(timeline.isoDateAt(0)).toBe("2024-06-30");
    expect(timeline.isoDateAt(1)).toBe("2024-09-30");
    expect(timeline.isoDateAt(3)).toBe("2025-03-31");
    expect(timeline.isoDateAt(7)).toBe("2026-03-31");
  });

  it("counts calendar years since vintage per quarter", () => {
    expect(timeline.yearsSinceVintage(0)).toBe(5);
    expect(timeline.yearsSinceVintage(3)).toBe(5);
    expect(timeline.yearsSinceVintage(4)).toBe(6);
  });

  it("defaults the vintage to the as-of year", () => {
    const fresh = new QuarterTimeline({ asOfDate: "2024-03-31", numPeriods: 1 });

    expect(fresh.vintageYear).toBe(2024);
    expect(fresh.yearsSinceVintage(0)).toBe(0);
  });

  it("yields every quarter index", () => {
    expect(Array.from(timeline.quarters())).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
  });

  it("rejects out-of-range quarters and bad period counts", () => {
    expect(() => timeline.dateAt(8)).toThrow(RangeError);
    expect(() => timeline.dateAt(0.5)).toThrow(TypeError);
    expect(() => new QuarterTimeline({ asOfDate: "2024-03-31", numPeriods: -1 })).toThrow(RangeError);
    expect(() => new QuarterTimeline({ asOfDate: "2024-13-01", numPeriods: 4 })).toThrow(
      "Invalid ISO date: 2024-13-01",
    );
  });
});
