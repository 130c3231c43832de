// Calendar helpers over ISO (YYYY-MM-DD) date strings.
// Every computation runs in UTC so that day arithmetic never crosses a DST edge.

import type { Granularity } from "@shared/schema";
import type { FrameRow } from "@shared/forecastTypes";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function parseIsoDate(value: string): Date {
  const [year, month, day] = value.split("-").map(Number);
  return new Date(Date.UTC(year, month - 1, day));
}

export function normalizeDate(date: Date): string {
  return date.toISOString().split("T")[0];
}

export function addDays(value: string, days: number): string {
  const result = parseIsoDate(value);
  result.setUTCDate(result.getUTCDate() + days);
  return normalizeDate(result);
}

// Whole days from `from` to `to` (negative when `to` is earlier)
export function daysBetween(from: string, to: string): number {
  return Math.round((parseIsoDate(to).getTime() - parseIsoDate(from).getTime()) / MS_PER_DAY);
}

export function dateRange(start: string, end: string): string[] {
  const days = daysBetween(start, end);
  const dates: string[] = [];
  for (let i = 0; i <= days; i++) {
    dates.push(addDays(start, i));
  }
  return dates;
}

export function yearOf(value: string): number {
  return Number(value.slice(0, 4));
}

export function monthOf(value: string): number {
  return Number(value.slice(5, 7));
}

export function dayOfYear(value: string): number {
  return daysBetween(`${value.slice(0, 4)}-01-01`, value) + 1;
}

// ISO-8601 week number (weeks start Monday, week 1 holds the first Thursday)
export function isoWeek(value: string): number {
  const date = parseIsoDate(value);
  const weekday = date.getUTCDay() || 7;
  date.setUTCDate(date.getUTCDate() + 4 - weekday);
  const yearStart = Date.UTC(date.getUTCFullYear(), 0, 1);
  return Math.ceil(((date.getTime() - yearStart) / MS_PER_DAY + 1) / 7);
}

export function periodKey(row: FrameRow, granularity: Granularity): number {
  switch (granularity) {
    case "Monthly":
      return row.month;
    case "Weekly":
      return row.week;
    case "Daily":
      return row.dayOfYear;
  }
}

// Sorted unique period indices touched by [start, end]
export function periodsFromRange(start: string, end: string, granularity: Granularity): number[] {
  const keys = new Set<number>();
  for (const date of dateRange(start, end)) {
    keys.add(periodKey(toFrameRow(date), granularity));
  }
  return Array.from(keys).sort((a, b) => a - b);
}

export function toFrameRow(date: string): FrameRow {
  return {
    date,
    month: monthOf(date),
    week: isoWeek(date),
    dayOfYear: dayOfYear(date),
  };
}

export function isWithin(date: string, start: string, end: string): boolean {
  return date >= start && date <= end;
}
