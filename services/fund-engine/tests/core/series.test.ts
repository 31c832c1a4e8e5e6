import { describe, expect, it } from "vitest";

import { Series } from "../../src/core/series.js";

describe("Series", () => {
  it("constructs an immutable series", () => {
    const input = [1, 2, 3];
    const series = new Series(input);

    expect(series.length).toBe(3);
    expect(series.toArray()).toEqual([1, 2, 3]);

    input[0] = 999;
    expect(series.get(0)).toBe(1);

    expect(Object.isFrozen(series.values)).toBe(true);
    expect(Reflect.set(series.values, 0, 123)).toBe(false);
    expect(series.get(0)).toBe(1);
  });

  it("rejects non-finite values", () => {
    expect(() => new Series([1, Number.NaN])).toThrow("values[1] must be a finite number");
  });

  it("adds element-wise and keeps operands intact", () => {
    const a = Series.fromArray([1, 2, 3]);
    const b = Series.fromArray([4, 5, 6]);

    expect(a.add(b).toArray()).toEqual([5, 7, 9]);
    expect(a.toArray()).toEqual([1, 2, 3]);
    expect(() => a.add(new Series([1, 2]))).toThrow(/length mismatch/i);
  });

  it("supports range sums and running totals", () => {
    const series = new Series([1, 2, 3, 4]);

    expect(Series.zeros(3).toArray()).toEqual([0, 0, 0]);
    expect(series.sumRange(0, 4)).toBe(10);
    expect(series.sumRange(1, 3)).toBe(5);
    expect(series.sumRange(0, 0)).toBe(0);
    expect(series.cumulative().toArray()).toEqual([1, 3, 6, 10]);
  });

  it("validates indices and ranges", () => {
    const series = new Series([1, 2]);

    expect(() => series.get(2)).toThrow(RangeError);
    expect(() => series.sumRange(1, 3)).toThrow(RangeError);
    expect(() => Series.zeros(-1)).toThrow(RangeError);
  });
});
