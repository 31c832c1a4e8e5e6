import { DateTime } from "luxon";

export type DateInput = DateTime | string;

const DAYS_PER_YEAR = 365.25;

// Parse ISO date string to DateTime
export function parseDate(date: string): DateTime {
  if (typeof date !== "string") {
    throw new TypeError("date must be a string");
  }

  const parsed = DateTime.fromISO(date, { zone: "utc" });
  if (!parsed.isValid) {
    throw new Error(`Invalid ISO date: ${date}`);
  }

  return parsed;
}

export function toDateTime(date: DateInput, name = "date"): DateTime {
  if (typeof date === "string") {
    return parseDate(date);
  }
  assertValidDateTime(date, name);
  return date;
}

export function toIsoDate(date: DateTime): string {
  assertValidDateTime(date, "date");
  return date.toISODate() ?? "";
}

// Actual/365.25 year fraction between two dates
export function yearFraction(start: DateTime, end: DateTime): number {
  assertValidDateTime(start, "start");
  assertValidDateTime(end, "end");
  return end.diff(start, "days").days / DAYS_PER_YEAR;
}

// Add months to a date
export function addMonths(date: DateTime, months: number): DateTime {
  assertValidDateTime(date, "date");
  if (!Number.isInteger(months)) {
    throw new TypeError("months must be an integer");
  }
  return date.plus({ months });
}

export function startOfYear(date: DateTime): DateTime {
  assertValidDateTime(date, "date");
  return date.startOf("year");
}

// Negative when a is earlier than b
export function compareDates(a: DateTime, b: DateTime): number {
  return a.toMillis() - b.toMillis();
}

function assertValidDateTime(value: DateTime, name: string): void {
  if (!(value instanceof DateTime)) {
    throw new TypeError(`${name} must be a DateTime`);
  }
  if (!value.isValid) {
    throw new Error(`${name} must be a valid DateTime`);
  }
}
