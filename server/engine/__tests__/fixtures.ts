import type { DailyTransaction, HistoricalIndexRecord } from "@shared/schema";
import type { PureDnaRow } from "@shared/forecastTypes";
import { dateRange } from "../calendar";
import type { ForecastInput } from "../pipeline";

export function monthlyRecord(
  entity: string,
  year: string,
  period: number,
  sessionsIndex: number,
  conversionRateIndex = 1,
  orderValueIndex = 1,
): HistoricalIndexRecord {
  return {
    entity,
    year,
    granularity: "Monthly",
    period,
    sessions: 0,
    conversions: 0,
    revenue: 0,
    conversionRate: 0,
    orderValue: 0,
    sessionsIndex,
    conversionRateIndex,
    orderValueIndex,
  };
}

export function dailyRecord(
  entity: string,
  year: string,
  period: number,
  sessions: number,
  conversions: number,
  revenue: number,
): HistoricalIndexRecord {
  return {
    entity,
    year,
    granularity: "Daily",
    period,
    sessions,
    conversions,
    revenue,
    conversionRate: sessions > 0 ? conversions / sessions : 0,
    orderValue: conversions > 0 ? revenue / conversions : 0,
    sessionsIndex: 1,
    conversionRateIndex: 1,
    orderValueIndex: 1,
  };
}

export function pureDna(overrides: Partial<Record<number, Partial<Omit<PureDnaRow, "month">>>> = {}): PureDnaRow[] {
  return Array.from({ length: 12 }, (_, i) => ({
    month: i + 1,
    sessions: 1,
    conversionRate: 1,
    orderValue: 1,
    ...overrides[i + 1],
  }));
}

// Flat DNA calibrated on January 2025: 100 sessions, CR 0.02 and AOV 100 per day
export function flatInput(dna: PureDnaRow[] = pureDna()): ForecastInput {
  return {
    projectionYear: 2025,
    pureDna: dna,
    trialStart: "2025-01-01",
    trialEnd: "2025-01-31",
    observed: { sessions: 3100, conversions: 62, revenue: 6200 },
  };
}

export function dailyTransactions(
  entity: string,
  start: string,
  end: string,
  values: { sessions: number; conversions: number; revenue: number },
): DailyTransaction[] {
  return dateRange(start, end).map((date) => ({ date, entity, ...values }));
}
