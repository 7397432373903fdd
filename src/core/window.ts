/**
 * Backfill window derivation and validation.
 */
import { toSqlTimestamp } from "../db/timestamps.js";
import { WindowValidationError } from "./exceptions.js";
import type { Window } from "./types.js";

/** Oldest last-modified year the site has data for. */
export const EARLIEST_YEAR = 2021;

export interface WindowArgs {
  startYear: number;
  startMonth: number;
  /** Defaults to the current year. */
  endYear?: number;
  /** Defaults to the current month. */
  endMonth?: number;
}

function isMonth(m: number): boolean {
  return Number.isInteger(m) && m >= 1 && m <= 12;
}

/**
 * Turn year/month bounds into an inclusive UTC window running from the
 * first second of the start month to the last second of the end month.
 * Throws WindowValidationError; nothing else happens before validation.
 */
export function resolveWindow(
  args: WindowArgs,
  now: Date = new Date(),
  earliestYear: number = EARLIEST_YEAR,
): Window {
  const currentYear = now.getUTCFullYear();
  const currentMonth = now.getUTCMonth() + 1;
  const endYear = args.endYear ?? currentYear;
  const endMonth = args.endMonth ?? currentMonth;
  const { startYear, startMonth } = args;

  if (!Number.isInteger(startYear) || !Number.isInteger(endYear)) {
    throw new WindowValidationError(
      `Years must be integers, got start ${startYear} and end ${endYear}`,
    );
  }
  if (startYear < earliestYear) {
    throw new WindowValidationError(
      `Invalid start year ${startYear}. The oldest last modified date is ${earliestYear}`,
    );
  }
  if (!isMonth(startMonth) || !isMonth(endMonth)) {
    throw new WindowValidationError(
      `Invalid start month ${startMonth} and/or end month ${endMonth}. Valid range [1-12] inclusive`,
    );
  }
  if (endYear > currentYear) {
    throw new WindowValidationError(
      `Invalid end year ${endYear}. It cannot be greater than current year`,
    );
  }
  if (startYear > endYear) {
    throw new WindowValidationError(
      `start year ${startYear} cannot be greater than end year ${endYear}`,
    );
  }
  if (startYear === endYear && startMonth > endMonth) {
    throw new WindowValidationError(
      `start month ${startMonth} cannot be greater than end month ${endMonth} for the same year ${startYear}`,
    );
  }
  if (endYear === currentYear && endMonth > currentMonth) {
    throw new WindowValidationError(
      `No data available for future month ${endYear}-${String(endMonth).padStart(2, "0")}`,
    );
  }

  return {
    start: new Date(Date.UTC(startYear, startMonth - 1, 1, 0, 0, 0)),
    end: new Date(Date.UTC(endYear, endMonth, 0, 23, 59, 59)),
  };
}

/** Every (year, month) the window touches, oldest first. */
export function monthsInWindow(window: Window): { year: number; month: number }[] {
  const months: { year: number; month: number }[] = [];
  let year = window.start.getUTCFullYear();
  let month = window.start.getUTCMonth() + 1;
  const endYear = window.end.getUTCFullYear();
  const endMonth = window.end.getUTCMonth() + 1;
  while (year < endYear || (year === endYear && month <= endMonth)) {
    months.push({ year, month });
    month++;
    if (month > 12) {
      month = 1;
      year++;
    }
  }
  return months;
}

export function windowBounds(window: Window): [string, string] {
  return [toSqlTimestamp(window.start), toSqlTimestamp(window.end)];
}

export function describeWindow(window: Window): string {
  const [start, end] = windowBounds(window);
  return `${start} .. ${end}`;
}
