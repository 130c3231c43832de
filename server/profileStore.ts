import { promises as fs } from "fs";
import Papa from "papaparse";
import { median } from "simple-statistics";
import {
  DailyTransactionSchema,
  Granularity,
  HistoricalIndexRecordSchema,
  OVERALL_YEAR,
  type DailyTransaction,
  type HistoricalIndexRecord,
  type YearlyKpi,
} from "@shared/schema";
import { periodKey, toFrameRow, yearOf } from "./engine/calendar";
import { NEUTRAL_INDEX } from "./engine/constants";
import { ForecastError } from "./errors";
import { log } from "./logger";

type CsvRow = Record<string, string | undefined>;

export interface CatalogueSummary {
  entities: string[];
  dataYears: number[];
  transactionRange: { start: string; end: string } | null;
  profileRecords: number;
  transactions: number;
}

export function normalizeEntity(entity: string): string {
  return entity.trim().toLowerCase();
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === null || value === "" || value === "-") {
    return fallback;
  }
  const num = parseFloat(value.replace(/[^0-9eE.+-]/g, ""));
  return isNaN(num) ? fallback : num;
}

// First non-empty value among alternative column names
function pick(row: CsvRow, ...columns: string[]): string | undefined {
  for (const column of columns) {
    const value = row[column];
    if (value !== undefined && value !== "") {
      return value;
    }
  }
  return undefined;
}

function parseCsv(csvText: string, label: string): CsvRow[] {
  const results = Papa.parse<CsvRow>(csvText, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header: string) => header.trim(),
  });
  if (results.errors.length > 0) {
    console.warn(`[Profiles] Found ${results.errors.length} parsing issues in ${label} CSV:`, results.errors);
  }
  return results.data;
}

export function parseTransactionsCsv(csvText: string): DailyTransaction[] {
  return parseCsv(csvText, "transactions").map((row) =>
    DailyTransactionSchema.parse({
      date: (pick(row, "Date", "date") ?? "").trim().slice(0, 10),
      entity: normalizeEntity(pick(row, "brand", "entity") ?? ""),
      sessions: parseNumber(pick(row, "sessions", "Sessions"), 0),
      conversions: parseNumber(pick(row, "conversions", "Conversions"), 0),
      revenue: parseNumber(pick(row, "revenue", "Revenue"), 0),
    }),
  );
}

export function parseProfilesCsv(csvText: string): HistoricalIndexRecord[] {
  return parseCsv(csvText, "profiles").map((row) =>
    HistoricalIndexRecordSchema.parse({
      entity: normalizeEntity(pick(row, "brand", "entity") ?? ""),
      year: (pick(row, "Year", "year") ?? "").trim(),
      granularity: (pick(row, "Level", "granularity") ?? "").trim(),
      period: parseNumber(pick(row, "TimeIdx", "period"), 0),
      sessions: parseNumber(pick(row, "sessions"), 0),
      conversions: parseNumber(pick(row, "conversions"), 0),
      revenue: parseNumber(pick(row, "revenue"), 0),
      conversionRate: parseNumber(pick(row, "cr", "conversionRate"), 0),
      orderValue: parseNumber(pick(row, "aov", "orderValue"), 0),
      sessionsIndex: parseNumber(pick(row, "idx_sessions", "sessionsIndex"), NEUTRAL_INDEX),
      conversionRateIndex: parseNumber(pick(row, "idx_cr", "conversionRateIndex"), NEUTRAL_INDEX),
      orderValueIndex: parseNumber(pick(row, "idx_aov", "orderValueIndex"), NEUTRAL_INDEX),
    }),
  );
}

// Series divided by its median; flat 1.0 when the median is not positive
function normalizeByMedian(values: number[]): number[] {
  const mid = median(values);
  return mid > 0 ? values.map((value) => value / mid) : values.map(() => NEUTRAL_INDEX);
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

interface PeriodSums {
  period: number;
  sessions: number;
  conversions: number;
  revenue: number;
}

function aggregateByPeriod(rows: DailyTransaction[], granularity: Granularity): PeriodSums[] {
  const sums = new Map<number, PeriodSums>();
  for (const row of rows) {
    const period = periodKey(toFrameRow(row.date), granularity);
    const bucket = sums.get(period) ?? { period, sessions: 0, conversions: 0, revenue: 0 };
    bucket.sessions += row.sessions;
    bucket.conversions += row.conversions;
    bucket.revenue += row.revenue;
    sums.set(period, bucket);
  }
  return Array.from(sums.values()).sort((a, b) => a.period - b.period);
}

function groupBy<T>(rows: T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const k = key(row);
    const bucket = groups.get(k);
    if (bucket) {
      bucket.push(row);
    } else {
      groups.set(k, [row]);
    }
  }
  return groups;
}

/**
 * Historical profile table from daily transactions: for every entity, the
 * "Overall" profile and one per calendar year, at each granularity, with period
 * sums, CR, AOV and their median-normalized indices.
 */
export function buildProfiles(transactions: DailyTransaction[]): HistoricalIndexRecord[] {
  const records: HistoricalIndexRecord[] = [];
  const byEntity = groupBy(transactions, (row) => row.entity);

  for (const entity of Array.from(byEntity.keys()).sort()) {
    const entityRows = byEntity.get(entity) ?? [];
    const byYear = groupBy(entityRows, (row) => String(yearOf(row.date)));
    const slices: Array<[string, DailyTransaction[]]> = [
      [OVERALL_YEAR, entityRows],
      ...Array.from(byYear.keys())
        .sort()
        .map((year): [string, DailyTransaction[]] => [year, byYear.get(year) ?? []]),
    ];

    for (const [year, rows] of slices) {
      if (rows.length === 0) continue;
      for (const granularity of Granularity.options) {
        const periods = aggregateByPeriod(rows, granularity);
        const conversionRates = periods.map((p) => ratio(p.conversions, p.sessions));
        const orderValues = periods.map((p) => ratio(p.revenue, p.conversions));
        const sessionsIndex = normalizeByMedian(periods.map((p) => p.sessions));
        const conversionRateIndex = normalizeByMedian(conversionRates);
        const orderValueIndex = normalizeByMedian(orderValues);

        periods.forEach((p, i) => {
          records.push({
            entity,
            year,
            granularity,
            period: p.period,
            sessions: p.sessions,
            conversions: p.conversions,
            revenue: p.revenue,
            conversionRate: conversionRates[i],
            orderValue: orderValues[i],
            sessionsIndex: sessionsIndex[i],
            conversionRateIndex: conversionRateIndex[i],
            orderValueIndex: orderValueIndex[i],
          });
        });
      }
    }
  }

  return records;
}

export function buildYearlyKpis(transactions: DailyTransaction[]): YearlyKpi[] {
  const totals = new Map<string, YearlyKpi>();
  for (const row of transactions) {
    const year = yearOf(row.date);
    const key = `${row.entity}|${year}`;
    const kpi = totals.get(key) ?? {
      entity: row.entity,
      year,
      sessions: 0,
      conversions: 0,
      revenue: 0,
      conversionRate: 0,
      orderValue: 0,
    };
    kpi.sessions += row.sessions;
    kpi.conversions += row.conversions;
    kpi.revenue += row.revenue;
    totals.set(key, kpi);
  }

  return Array.from(totals.values())
    .map((kpi) => ({
      ...kpi,
      conversionRate: ratio(kpi.conversions, kpi.sessions),
      orderValue: ratio(kpi.revenue, kpi.conversions),
    }))
    .sort((a, b) => a.entity.localeCompare(b.entity) || a.year - b.year);
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * In-memory catalogue shared by every session: historical profile records,
 * daily transactions and the yearly KPIs derived from them.
 */
export class ProfileStore {
  private records: HistoricalIndexRecord[] = [];
  private transactions: DailyTransaction[] = [];
  private kpis: YearlyKpi[] = [];

  async loadFromDisk(profilesPath: string, transactionsPath: string): Promise<void> {
    const transactionsCsv = await readOptional(transactionsPath);
    if (transactionsCsv) {
      this.setTransactions(parseTransactionsCsv(transactionsCsv), false);
      log(`Loaded ${this.transactions.length} transactions from ${transactionsPath}`, "Profiles");
    } else {
      log(`No transactions file at ${transactionsPath}`, "Profiles");
    }

    const profilesCsv = await readOptional(profilesPath);
    if (profilesCsv) {
      this.setProfiles(parseProfilesCsv(profilesCsv));
      log(`Loaded ${this.records.length} profile records from ${profilesPath}`, "Profiles");
    } else if (this.transactions.length > 0) {
      this.records = buildProfiles(this.transactions);
      log(`Built ${this.records.length} profile records from transactions`, "Profiles");
    }
  }

  setTransactions(transactions: DailyTransaction[], rebuildProfiles = true): void {
    this.transactions = [...transactions].sort(
      (a, b) => a.date.localeCompare(b.date) || a.entity.localeCompare(b.entity),
    );
    this.kpis = buildYearlyKpis(this.transactions);
    if (rebuildProfiles) {
      this.records = buildProfiles(this.transactions);
    }
  }

  setProfiles(records: HistoricalIndexRecord[]): void {
    this.records = records;
  }

  getTransactions(): DailyTransaction[] {
    return this.transactions;
  }

  getYearlyKpis(): YearlyKpi[] {
    return this.kpis;
  }

  hasProfiles(): boolean {
    return this.records.length > 0;
  }

  requireProfiles(): HistoricalIndexRecord[] {
    if (!this.hasProfiles()) {
      throw new ForecastError(
        "PROFILES_NOT_LOADED",
        "No historical profile data is loaded. Upload transactions or profiles first.",
      );
    }
    return this.records;
  }

  entities(): string[] {
    const names = new Set<string>();
    this.records.forEach((record) => names.add(record.entity));
    this.transactions.forEach((row) => names.add(row.entity));
    return Array.from(names).sort();
  }

  // Selected entities, or every known entity when none is selected
  resolveEntities(selected: string[]): string[] {
    const normalized = selected.map(normalizeEntity).filter(Boolean);
    return normalized.length > 0 ? normalized : this.entities();
  }

  summary(): CatalogueSummary {
    const years = new Set<number>();
    for (const record of this.records) {
      if (record.year !== OVERALL_YEAR) {
        years.add(Number(record.year));
      }
    }
    const first = this.transactions[0];
    const last = this.transactions[this.transactions.length - 1];
    return {
      entities: this.entities(),
      dataYears: Array.from(years).sort((a, b) => a - b),
      transactionRange: first && last ? { start: first.date, end: last.date } : null,
      profileRecords: this.records.length,
      transactions: this.transactions.length,
    };
  }
}
