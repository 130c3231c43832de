import { describe, expect, it } from "vitest";
import type { TargetSettings, YearlyKpi } from "@shared/schema";
import type { ForecastRun, GoalTranslation } from "@shared/forecastTypes";
import { growthTarget, translateGoal } from "../goalTracker";
import { runForecast } from "../pipeline";
import { flatInput } from "./fixtures";

function flatRun(): ForecastRun {
  const run = runForecast(flatInput(), [
    { type: "shock", start: "2025-06-01", end: "2025-06-10", shape: "step", lift: 1 },
  ]);
  if (!run) throw new Error("flat input should calibrate");
  return run;
}

const target: TargetSettings = {
  start: "2025-01-01",
  end: "2025-12-31",
  metric: "Revenue",
  value: 80_000,
  driver: "Sessions",
};

function translated(overrides: Partial<TargetSettings>): Extract<GoalTranslation, { status: "ok" }> {
  const result = translateGoal(flatRun(), { ...target, ...overrides }, "Monthly");
  if (result.status !== "ok") throw new Error("expected a translated goal");
  return result;
}

describe("translateGoal", () => {
  it("scales sessions to reach a revenue target at baseline CR and AOV", () => {
    const result = translated({});
    expect(result.needed.revenue).toBe(80_000);
    expect(result.needed.conversions).toBeCloseTo(800, 6);
    expect(result.needed.sessions).toBeCloseTo(40_000, 6);
    expect(result.needed.conversionRate).toBeCloseTo(0.02, 12);
    expect(result.needed.orderValue).toBeCloseTo(100, 9);
  });

  it("compares baseline and simulation totals", () => {
    const result = translated({});
    expect(result.before.sessions).toBeCloseTo(36_500, 6);
    expect(result.before.revenue).toBeCloseTo(73_000, 6);
    expect(result.before.conversionRate).toBeCloseTo(0.02, 12);
    expect(result.after.sessions).toBeCloseTo(37_500, 6);
    expect(result.after.revenue).toBeCloseTo(75_000, 6);
  });

  it("holds sessions when conversion rate is the driver", () => {
    const result = translated({ driver: "CR" });
    expect(result.needed.sessions).toBeCloseTo(36_500, 6);
    expect(result.needed.conversions).toBeCloseTo(800, 6);
    expect(result.needed.conversionRate).toBeCloseTo(800 / 36_500, 12);
  });

  it("holds volumes when order value is the driver", () => {
    const result = translated({ driver: "AOV" });
    expect(result.needed.conversions).toBeCloseTo(730, 6);
    expect(result.needed.orderValue).toBeCloseTo(80_000 / 730, 9);
  });

  it("translates volume and ratio targets", () => {
    expect(translated({ metric: "Conversions", value: 1_000 }).needed).toEqual(
      expect.objectContaining({ conversions: 1_000 }),
    );
    expect(translated({ metric: "Conversions", value: 1_000 }).needed.sessions).toBeCloseTo(50_000, 6);
    expect(translated({ metric: "Sessions", value: 40_000 }).needed.revenue).toBeCloseTo(80_000, 6);
    expect(translated({ metric: "CR", value: 0.03 }).needed.conversions).toBeCloseTo(1_095, 6);
    expect(translated({ metric: "AOV", value: 120 }).needed.revenue).toBeCloseTo(87_600, 6);
  });

  it("spreads needed volumes across periods in proportion to baseline", () => {
    const { periods } = translated({});
    expect(periods).toHaveLength(12);
    const [january] = periods;
    expect(january.period).toBe(1);
    expect(january.firstDate).toBe("2025-01-01");
    expect(january.needed.sessions).toBeCloseTo((40_000 * 3_100) / 36_500, 6);
    expect(january.gapBase.sessions).toBeCloseTo(3_100 - (40_000 * 3_100) / 36_500, 6);
    expect(periods.reduce((sum, period) => sum + period.needed.revenue, 0)).toBeCloseTo(80_000, 6);
    expect(periods[5].gapSim.sessions - periods[5].gapBase.sessions).toBeCloseTo(1_000, 6);
  });

  it("reports a target window outside the projection year", () => {
    expect(translateGoal(flatRun(), { ...target, start: "2026-01-01", end: "2026-03-31" }, "Monthly")).toEqual({
      status: "empty_target_window",
      metric: "Revenue",
    });
  });
});

describe("growthTarget", () => {
  const kpi: YearlyKpi = {
    entity: "acme",
    year: 2024,
    sessions: 50_000,
    conversions: 1_000,
    revenue: 120_000,
    conversionRate: 0.02,
    orderValue: 120,
  };

  it("grows the base year's value", () => {
    expect(growthTarget(kpi, "Revenue", 10)).toBeCloseTo(132_000, 6);
    expect(growthTarget(kpi, "AOV", -25)).toBeCloseTo(90, 9);
    expect(growthTarget(kpi, "Sessions", 0)).toBe(50_000);
  });
});
