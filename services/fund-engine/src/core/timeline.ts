import type { DateTime } from "luxon";

import { addMonths, toDateTime, toIsoDate, type DateInput } from "./date-utils.js";

export interface TimelineConfig {
  asOfDate: DateInput; // Projection starts the quarter after this date
  numPeriods: number; // Quarters to simulate
  vintageYear?: number; // Optional, defaults to the as-of year
}

export class QuarterTimeline {
  readonly asOfDate: DateTime;
  readonly numPeriods: number;
  readonly vintageYear: number;

  constructor(config: TimelineConfig) {
    if (!Number.isInteger(config.numPeriods) || config.numPeriods < 0) {
      throw new RangeError("numPeriods must be a non-negative integer");
    }

    const asOfDate = toDateTime(config.asOfDate, "asOfDate").startOf("day");
    const vintageYear = config.vintageYear ?? asOfDate.year;
    if (!Number.isInteger(vintageYear)) {
      throw new TypeError("vintageYear must be an integer");
    }

    this.asOfDate = asOfDate;
    this.numPeriods = config.numPeriods;
    this.vintageYear = vintageYear;
  }

  dateAt(quarterIndex: number): DateTime {
    this.assertQuarter(quarterIndex);
    return addMonths(this.asOfDate, 3 * (quarterIndex + 1));
  }

  isoDateAt(quarterIndex: number): string {
    return toIsoDate(this.dateAt(quarterIndex));
  }

  // Whole calendar years between the vintage and the simulated quarter
  yearsSinceVintage(quarterIndex: number): number {
    this.assertQuarter(quarterIndex);
    return this.asOfDate.year + Math.floor(quarterIndex / 4) - this.vintageYear;
  }

  *quarters(): Generator<number> {
    for (let i = 0; i < this.numPeriods; i += 1) {
      yield i;
    }
  }

  private assertQuarter(quarterIndex: number): void {
    if (!Number.isInteger(quarterIndex)) {
      throw new TypeError("quarterIndex must be an integer");
    }
    if (quarterIndex < 0 || quarterIndex >= this.numPeriods) {
      throw new RangeError(`quarterIndex must be between 0 and ${this.numPeriods - 1}`);
    }
  }
}
