// Immutable per-period value series used for projection roll-ups
export class Series {
  readonly values: readonly number[];
  readonly length: number;

  constructor(values: number[] | readonly number[]) {
    const copied = Array.from(values, (value, index) => {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new TypeError(`values[${index}] must be a finite number`);
      }
      return value;
    });

    this.values = Object.freeze(copied);
    this.length = copied.length;
  }

  static zeros(length: number): Series {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError("length must be a non-negative integer");
    }
    return new Series(Array.from({ length }, () => 0));
  }

  static fromArray(arr: readonly number[]): Series {
    return new Series(arr);
  }

  get(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new RangeError(`index must be between 0 and ${Math.max(0, this.length - 1)}`);
    }
    return this.values[index] ?? 0;
  }

  add(other: Series): Series {
    if (other.length !== this.length) {
      throw new Error(`Series length mismatch: ${this.length} vs ${other.length}`);
    }
    return new Series(this.values.map((value, index) => value + other.get(index)));
  }

  sumRange(start: number, end: number): number {
    if (!Number.isInteger(start) || !Number.isInteger(end)) {
      throw new TypeError("start and end must be integers");
    }
    if (start < 0 || start > end || end > this.length) {
      throw new RangeError(`Range must satisfy 0 <= start <= end <= ${this.length}`);
    }

    let total = 0;
    for (let i = start; i < end; i += 1) {
      total += this.values[i] ?? 0;
    }
    return total;
  }

  cumulative(): Series {
    let runningTotal = 0;
    return new Series(
      this.values.map((value) => {
        runningTotal += value;
        return runningTotal;
      }),
    );
  }

  toArray(): number[] {
    return Array.from(this.values);
  }
}
