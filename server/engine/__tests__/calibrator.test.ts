import { describe, expect, it } from "vitest";
import { adjustTrialTotals, calibrate, preAdjust } from "../calibrator";
import { compileLayers } from "../layerCompiler";
import { runForecast } from "../pipeline";
import { buildYearFrame } from "../yearFrame";
import { flatInput, pureDna } from "./fixtures";

describe("preAdjust", () => {
  it("removes a known boost or suppression from trial totals", () => {
    expect(preAdjust(120, 20)).toBeCloseTo(100, 12);
    expect(preAdjust(80, -20)).toBeCloseTo(100, 12);
    expect(preAdjust(100, 0)).toBe(100);
  });

  it("keeps the raw value when the factor is zero", () => {
    expect(preAdjust(50, -100)).toBe(50);
  });

  it("adjusts each metric independently", () => {
    expect(adjustTrialTotals({ sessions: 110, conversions: 4, revenue: 300 }, { sessions: 10, conversions: 0, revenue: 50 })).toEqual({
      sessions: 110 / 1.1,
      conversions: 4,
      revenue: 200,
    });
  });
});

describe("calibrate", () => {
  const frame = buildYearFrame(2025);

  it("derives per-day constants from a flat DNA", () => {
    const layers = compileLayers(frame, pureDna(), []);
    const constants = calibrate(layers, "2025-01-01", "2025-01-31", { sessions: 3100, conversions: 62, revenue: 6200 });
    expect(constants?.baseSessions).toBeCloseTo(100, 12);
    expect(constants?.baseConversionRate).toBeCloseTo(0.02, 12);
    expect(constants?.baseOrderValue).toBeCloseTo(100, 12);
  });

  it("divides the trial ratios by the mean trial indices", () => {
    const layers = compileLayers(frame, pureDna({ 1: { sessions: 2, conversionRate: 0.5, orderValue: 4 } }), []);
    const constants = calibrate(layers, "2025-01-01", "2025-01-31", { sessions: 3100, conversions: 62, revenue: 6200 });
    expect(constants?.baseSessions).toBeCloseTo(50, 12);
    expect(constants?.baseConversionRate).toBeCloseTo(0.04, 12);
    expect(constants?.baseOrderValue).toBeCloseTo(25, 12);
  });

  it("returns null when the trial has no days in the projection year", () => {
    const layers = compileLayers(frame, pureDna(), []);
    expect(calibrate(layers, "2026-01-01", "2026-01-31", { sessions: 1, conversions: 1, revenue: 1 })).toBeNull();
  });

  it("returns null when the trial sessions index sums to zero", () => {
    const layers = compileLayers(frame, pureDna({ 1: { sessions: 0 } }), []);
    expect(calibrate(layers, "2025-01-01", "2025-01-31", { sessions: 3100, conversions: 62, revenue: 6200 })).toBeNull();
  });

  it("reproduces the observed trial sessions from the baseline", () => {
    const dna = pureDna({ 1: { sessions: 0.7 }, 2: { sessions: 1.6 }, 3: { sessions: 1.1 } });
    const input = { ...flatInput(dna), trialStart: "2025-01-15", trialEnd: "2025-02-20", observed: { sessions: 5000, conversions: 90, revenue: 8000 } };
    const run = runForecast(input, []);
    const trialSessions = (run?.rows ?? [])
      .filter((row) => row.date >= "2025-01-15" && row.date <= "2025-02-20")
      .reduce((sum, row) => sum + row.sessionsBase, 0);
    expect(trialSessions).toBeCloseTo(5000, 6);
  });
});
