import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { ForecastError } from "../errors";
import {
  buildProfiles,
  buildYearlyKpis,
  parseProfilesCsv,
  parseTransactionsCsv,
  ProfileStore,
} from "../profileStore";

const TRANSACTIONS_CSV = [
  " Date ,brand,sessions,conversions,revenue",
  "2024-01-01, ACME ,100,2,200",
  "2024-02-01,acme,300,3,600",
  "",
].join("\n");

const PROFILES_CSV = [
  "brand,level_1,TimeIdx,sessions,conversions,revenue,cr,aov,idx_sessions,idx_cr,idx_aov,Level,Year",
  "Acme,0,1,100,2,200,0.02,100,0.5,1.25,0.75,Monthly,Overall",
  "acme,0,1,100,2,200,0.02,100,0.5,1.25,0.75,Monthly,2024",
].join("\n");

describe("parseTransactionsCsv", () => {
  it("trims headers and normalizes entity names", () => {
    expect(parseTransactionsCsv(TRANSACTIONS_CSV)).toEqual([
      { date: "2024-01-01", entity: "acme", sessions: 100, conversions: 2, revenue: 200 },
      { date: "2024-02-01", entity: "acme", sessions: 300, conversions: 3, revenue: 600 },
    ]);
  });

  it("rejects rows without a valid date", () => {
    expect(() => parseTransactionsCsv("Date,brand,sessions\nsoon,acme,1\n")).toThrow(ZodError);
  });
});

describe("parseProfilesCsv", () => {
  it("maps profile columns onto index records", () => {
    const [overall, yearly] = parseProfilesCsv(PROFILES_CSV);
    expect(overall).toEqual({
      entity: "acme",
      year: "Overall",
      granularity: "Monthly",
      period: 1,
      sessions: 100,
      conversions: 2,
      revenue: 200,
      conversionRate: 0.02,
      orderValue: 100,
      sessionsIndex: 0.5,
      conversionRateIndex: 1.25,
      orderValueIndex: 0.75,
    });
    expect(yearly.year).toBe("2024");
  });

  it("rejects an unknown granularity", () => {
    expect(() => parseProfilesCsv(PROFILES_CSV.replace("Monthly,2024", "Hourly,2024"))).toThrow(ZodError);
  });
});

describe("buildProfiles", () => {
  const records = buildProfiles(parseTransactionsCsv(TRANSACTIONS_CSV));

  it("builds overall and yearly profiles at every granularity", () => {
    expect(records).toHaveLength(12);
    expect(new Set(records.map((record) => record.year))).toEqual(new Set(["Overall", "2024"]));
    expect(
      records.filter((record) => record.year === "2024" && record.granularity === "Weekly").map((record) => record.period),
    ).toEqual([1, 5]);
  });

  it("normalizes each series by its median", () => {
    const monthly = records.filter((record) => record.year === "2024" && record.granularity === "Monthly");
    expect(monthly.map((record) => record.sessionsIndex)).toEqual([0.5, 1.5]);
    expect(monthly[0].conversionRateIndex).toBeCloseTo(4 / 3, 12);
    expect(monthly[1].conversionRateIndex).toBeCloseTo(2 / 3, 12);
    expect(monthly[0].orderValueIndex).toBeCloseTo(2 / 3, 12);
    expect(monthly[1].orderValue).toBe(200);
  });

  it("falls back to a flat index when the median is not positive", () => {
    const [record] = buildProfiles([{ date: "2024-05-01", entity: "acme", sessions: 0, conversions: 0, revenue: 0 }]);
    expect(record).toEqual(
      expect.objectContaining({ sessionsIndex: 1, conversionRateIndex: 1, orderValueIndex: 1, conversionRate: 0 }),
    );
  });
});

describe("buildYearlyKpis", () => {
  it("sums each entity-year and derives its ratios", () => {
    expect(buildYearlyKpis(parseTransactionsCsv(TRANSACTIONS_CSV))).toEqual([
      { entity: "acme", year: 2024, sessions: 400, conversions: 5, revenue: 800, conversionRate: 5 / 400, orderValue: 160 },
    ]);
  });
});

describe("ProfileStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "profiles-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("summarizes the loaded catalogue", () => {
    const store = new ProfileStore();
    store.setTransactions(parseTransactionsCsv(TRANSACTIONS_CSV));
    expect(store.summary()).toEqual({
      entities: ["acme"],
      dataYears: [2024],
      transactionRange: { start: "2024-01-01", end: "2024-02-01" },
      profileRecords: 12,
      transactions: 2,
    });
    expect(store.resolveEntities([])).toEqual(["acme"]);
    expect(store.resolveEntities([" Beta "])).toEqual(["beta"]);
  });

  it("refuses to forecast before profiles are loaded", () => {
    const store = new ProfileStore();
    expect(() => store.requireProfiles()).toThrow(ForecastError);
    try {
      store.requireProfiles();
    } catch (error) {
      expect(error).toMatchObject({ code: "PROFILES_NOT_LOADED", status: 503 });
    }
  });

  it("builds profiles from the transactions file when no profile file exists", async () => {
    await fs.writeFile(path.join(dir, "transactions.csv"), TRANSACTIONS_CSV, "utf-8");
    const store = new ProfileStore();
    await store.loadFromDisk(path.join(dir, "brand_profiles.csv"), path.join(dir, "transactions.csv"));
    expect(store.hasProfiles()).toBe(true);
    expect(store.getYearlyKpis()).toHaveLength(1);
  });

  it("prefers the stored profile table", async () => {
    await fs.writeFile(path.join(dir, "transactions.csv"), TRANSACTIONS_CSV, "utf-8");
    await fs.writeFile(path.join(dir, "brand_profiles.csv"), PROFILES_CSV, "utf-8");
    const store = new ProfileStore();
    await store.loadFromDisk(path.join(dir, "brand_profiles.csv"), path.join(dir, "transactions.csv"));
    expect(store.summary().profileRecords).toBe(2);
  });

  it("starts empty when no data files exist", async () => {
    const store = new ProfileStore();
    await store.loadFromDisk(path.join(dir, "missing.csv"), path.join(dir, "missing-too.csv"));
    expect(store.hasProfiles()).toBe(false);
    expect(store.summary().transactionRange).toBeNull();
  });
});
