import { describe, expect, it } from "vitest";
import { formatDisplayDate, isoDate, parseCanonicalDate, parseDisplayDate } from "../src";

describe("formatDisplayDate", () => {
  it("spells out the month", () => {
    expect(formatDisplayDate("2024-01-05")).toBe("January 05, 2024");
    expect(formatDisplayDate("1999-12-31")).toBe("December 31, 1999");
  });

  it("pads single-digit months and days", () => {
    expect(formatDisplayDate("2024-6-1")).toBe("June 01, 2024");
  });

  it("returns anything else unchanged", () => {
    expect(formatDisplayDate("next week")).toBe("next week");
    expect(formatDisplayDate("2024-02-30")).toBe("2024-02-30");
  });
});

describe("parseDisplayDate", () => {
  it("reads the display format back", () => {
    expect(parseDisplayDate("January 05, 2024")).toBe("2024-01-05");
    expect(parseDisplayDate("  march 7, 2023 ")).toBe("2023-03-07");
  });

  it("accepts canonical dates", () => {
    expect(parseDisplayDate("2024-12-31")).toBe("2024-12-31");
  });

  it("rejects unknown months and impossible days", () => {
    expect(parseDisplayDate("Smarch 01, 2024")).toBeUndefined();
    expect(parseDisplayDate("February 30, 2024")).toBeUndefined();
    expect(parseDisplayDate("")).toBeUndefined();
  });
});

describe("parseCanonicalDate", () => {
  it("checks the calendar", () => {
    expect(parseCanonicalDate("2024-02-29")).toBe("2024-02-29");
    expect(parseCanonicalDate("2023-02-29")).toBeUndefined();
    expect(parseCanonicalDate("2024-1-5")).toBe("2024-01-05");
    expect(parseCanonicalDate("2024-13-1")).toBeUndefined();
    expect(parseCanonicalDate("2024-001-05")).toBeUndefined();
  });
});

describe("isoDate", () => {
  it("uses the local calendar day", () => {
    expect(isoDate(new Date(2024, 0, 5, 23, 59))).toBe("2024-01-05");
  });
});
