/**
 * Unit tests for DateKey helpers
 */

import { describe, it, expect } from "vitest";
import {
  addDays,
  countDaysInclusive,
  dateKeyInTimeZone,
  enumerateDateRange,
  monthNameOf,
  normalizeDateKey,
  uniqueDateKeys,
} from "@/utils";
import { InvalidDateError } from "@/errors";

describe("normalizeDateKey", () => {
  it("pads single-digit month and day", () => {
    expect(normalizeDateKey("2024-1-5")).toBe("2024-01-05");
  });

  it("trims surrounding whitespace", () => {
    expect(normalizeDateKey(" 2024-03-09 ")).toBe("2024-03-09");
  });

  it("rejects impossible calendar dates", () => {
    expect(() => normalizeDateKey("2023-02-29")).toThrow(InvalidDateError);
    expect(() => normalizeDateKey("2024-13-01")).toThrow(InvalidDateError);
  });

  it("accepts leap days", () => {
    expect(normalizeDateKey("2024-02-29")).toBe("2024-02-29");
  });

  it("rejects other formats", () => {
    expect(() => normalizeDateKey("01/02/2024")).toThrow(InvalidDateError);
    expect(() => normalizeDateKey("")).toThrow(InvalidDateError);
  });
});

describe("date arithmetic", () => {
  it("adds days across month and year boundaries", () => {
    expect(addDays("2023-12-31", 1)).toBe("2024-01-01");
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
  });

  it("counts days inclusively", () => {
    expect(countDaysInclusive("2024-01-01", "2024-01-01")).toBe(1);
    expect(countDaysInclusive("2024-01-01", "2024-12-31")).toBe(366);
  });

  it("enumerates a range in order", () => {
    expect(enumerateDateRange("2024-02-27", "2024-03-01")).toEqual([
      "2024-02-27",
      "2024-02-28",
      "2024-02-29",
      "2024-03-01",
    ]);
  });

  it("returns an empty range when start is after end", () => {
    expect(enumerateDateRange("2024-01-02", "2024-01-01")).toEqual([]);
  });

  it("names months in English", () => {
    expect(monthNameOf("2024-01-15")).toBe("January");
    expect(monthNameOf("2024-12-01")).toBe("December");
  });

  it("drops duplicates keeping first-seen order", () => {
    expect(uniqueDateKeys(["2024-01-02", "2024-01-01", "2024-01-02"])).toEqual([
      "2024-01-02",
      "2024-01-01",
    ]);
  });
});

describe("dateKeyInTimeZone", () => {
  it("uses the calendar date of the given zone", () => {
    // 20:00 UTC is already the next day in India (UTC+05:30)
    const instant = new Date("2024-01-01T20:00:00.000Z");
    expect(dateKeyInTimeZone(instant, "Asia/Kolkata")).toBe("2024-01-02");
    expect(dateKeyInTimeZone(instant, "UTC")).toBe("2024-01-01");
  });
});
