import { describe, expect, it } from "vitest";
import { calculateDateRange } from "../src/reports/date-range.js";

describe("calculateDateRange", () => {
  it("ends yesterday and spans the requested number of days", () => {
    expect(calculateDateRange(30, new Date("2026-03-15T10:00:00.000Z"))).toEqual({
      startDate: "2026-02-12",
      endDate: "2026-03-14",
    });
  });

  it("crosses year boundaries", () => {
    expect(calculateDateRange(7, new Date("2026-01-03T00:30:00.000Z"))).toEqual({
      startDate: "2025-12-26",
      endDate: "2026-01-02",
    });
  });

  it("rejects non-positive windows", () => {
    expect(() => calculateDateRange(0)).toThrow(RangeError);
  });
});
