import { describe, expect, it } from "vitest";
import {
  addDays,
  dateRange,
  dayOfYear,
  daysBetween,
  isoWeek,
  isWithin,
  periodKey,
  periodsFromRange,
  toFrameRow,
} from "../calendar";
import { buildYearFrame } from "../yearFrame";

describe("calendar", () => {
  it("adds days across month and year boundaries", () => {
    expect(addDays("2025-01-31", 1)).toBe("2025-02-01");
    expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
  });

  it("counts whole days between dates", () => {
    expect(daysBetween("2025-03-01", "2025-03-10")).toBe(9);
    expect(daysBetween("2025-03-10", "2025-03-01")).toBe(-9);
  });

  it("builds inclusive date ranges", () => {
    expect(dateRange("2025-02-27", "2025-03-02")).toEqual([
      "2025-02-27",
      "2025-02-28",
      "2025-03-01",
      "2025-03-02",
    ]);
    expect(dateRange("2025-03-02", "2025-03-01")).toEqual([]);
  });

  it("numbers days of the year including leap days", () => {
    expect(dayOfYear("2025-01-01")).toBe(1);
    expect(dayOfYear("2024-12-31")).toBe(366);
    expect(dayOfYear("2025-12-31")).toBe(365);
  });

  it("uses ISO-8601 week numbers", () => {
    expect(isoWeek("2025-01-01")).toBe(1);
    expect(isoWeek("2024-12-30")).toBe(1);
    expect(isoWeek("2021-01-03")).toBe(53);
    expect(isoWeek("2024-02-01")).toBe(5);
  });

  it("keys a day by granularity", () => {
    const row = toFrameRow("2025-03-15");
    expect(periodKey(row, "Monthly")).toBe(3);
    expect(periodKey(row, "Weekly")).toBe(11);
    expect(periodKey(row, "Daily")).toBe(74);
  });

  it("lists the sorted periods a range touches", () => {
    expect(periodsFromRange("2025-01-30", "2025-02-02", "Monthly")).toEqual([1, 2]);
    expect(periodsFromRange("2025-03-01", "2025-03-03", "Daily")).toEqual([60, 61, 62]);
  });

  it("compares ISO dates inclusively", () => {
    expect(isWithin("2025-01-01", "2025-01-01", "2025-01-31")).toBe(true);
    expect(isWithin("2025-02-01", "2025-01-01", "2025-01-31")).toBe(false);
  });

  it("builds a full-year frame", () => {
    expect(buildYearFrame(2025)).toHaveLength(365);
    const leap = buildYearFrame(2024);
    expect(leap).toHaveLength(366);
    expect(leap[59]).toEqual({ date: "2024-02-29", month: 2, week: 9, dayOfYear: 60 });
  });
});
