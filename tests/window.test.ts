/**
 * Tests for backfill window validation.
 */
import { describe, expect, test } from "vitest";
import { WindowValidationError } from "../src/core/exceptions.js";
import { describeWindow, monthsInWindow, resolveWindow } from "../src/core/window.js";

const now = new Date(Date.UTC(2024, 4, 15, 12, 0, 0)); // 2024-05-15

describe("resolveWindow", () => {
  test("spans first second of start month to last second of end month", () => {
    const w = resolveWindow({ startYear: 2021, startMonth: 1, endYear: 2021, endMonth: 2 }, now);
    expect(describeWindow(w)).toBe("2021-01-01 00:00:00 .. 2021-02-28 23:59:59");
  });

  test("handles leap years and December", () => {
    const leap = resolveWindow({ startYear: 2024, startMonth: 2, endYear: 2024, endMonth: 2 }, now);
    expect(describeWindow(leap)).toBe("2024-02-01 00:00:00 .. 2024-02-29 23:59:59");
    const dec = resolveWindow({ startYear: 2023, startMonth: 12, endYear: 2023, endMonth: 12 }, now);
    expect(describeWindow(dec)).toBe("2023-12-01 00:00:00 .. 2023-12-31 23:59:59");
  });

  test("end defaults to the current month", () => {
    const w = resolveWindow({ startYear: 2024, startMonth: 3 }, now);
    expect(describeWindow(w)).toBe("2024-03-01 00:00:00 .. 2024-05-31 23:59:59");
  });

  test.each([
    [{ startYear: 2020, startMonth: 1 }, "Invalid start year 2020"],
    [{ startYear: 2021, startMonth: 13 }, "Invalid start month 13"],
    [{ startYear: 2021, startMonth: 0 }, "Invalid start month 0"],
    [{ startYear: 2021, startMonth: 1, endYear: 2025, endMonth: 1 }, "Invalid end year 2025"],
    [{ startYear: 2023, startMonth: 1, endYear: 2022, endMonth: 1 }, "start year 2023 cannot be greater"],
    [{ startYear: 2022, startMonth: 6, endYear: 2022, endMonth: 5 }, "start month 6 cannot be greater"],
    [{ startYear: 2024, startMonth: 1, endYear: 2024, endMonth: 6 }, "future month 2024-06"],
  ])("rejects %o", (args, message) => {
    expect(() => resolveWindow(args, now)).toThrow(WindowValidationError);
    expect(() => resolveWindow(args, now)).toThrow(message);
  });
});

describe("monthsInWindow", () => {
  test("crosses year boundaries", () => {
    const w = resolveWindow({ startYear: 2022, startMonth: 11, endYear: 2023, endMonth: 2 }, now);
    expect(monthsInWindow(w)).toEqual([
      { year: 2022, month: 11 },
      { year: 2022, month: 12 },
      { year: 2023, month: 1 },
      { year: 2023, month: 2 },
    ]);
  });
});
