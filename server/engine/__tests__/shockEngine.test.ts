import { describe, expect, it } from "vitest";
import type { ForecastEvent, ReappliedShockEvent } from "@shared/schema";
import { runForecast } from "../pipeline";
import {
  buildInjectionChannels,
  previewInjection,
  previewShape,
  shapeValue,
  shockDuration,
  shockMultiplier,
} from "../shockEngine";
import { buildYearFrame } from "../yearFrame";
import { flatInput } from "./fixtures";

describe("shapeValue", () => {
  it("keeps a step flat over the whole window", () => {
    expect(shapeValue("step", 0, 10)).toBe(1);
    expect(shapeValue("step", 9, 10)).toBe(1);
  });

  it("fades linearly from 1 towards 0", () => {
    expect(shapeValue("linear_fade", 0, 10)).toBe(1);
    expect(shapeValue("linear_fade", 5, 10)).toBe(0.5);
    expect(shapeValue("linear_fade", 10, 10)).toBe(0);
  });

  it("decays a front-loaded campaign exponentially", () => {
    expect(shapeValue("front_loaded", 0, 10)).toBe(1);
    expect(shapeValue("front_loaded", 10, 10)).toBeCloseTo(Math.exp(-3), 12);
  });

  it("peaks a delayed campaign at 40% of its length", () => {
    expect(shapeValue("delayed_peak", 4, 10)).toBe(1);
    expect(shapeValue("delayed_peak", 0, 10)).toBeCloseTo(Math.exp(-16 / 18), 12);
    expect(shapeValue("delayed_peak", 7, 10)).toBeCloseTo(Math.exp(-9 / 18), 12);
  });
});

describe("shockMultiplier", () => {
  const events: ForecastEvent[] = [
    { type: "shock", start: "2025-03-01", end: "2025-03-10", shape: "step", lift: 0.2 },
    { type: "shock", start: "2025-03-05", end: "2025-03-14", shape: "step", lift: 0.3 },
    { type: "custom_drag", granularity: "Monthly", target: 3, multiplier: 5, scope: "post_trial" },
  ];

  it("adds overlapping shocks", () => {
    expect(shockMultiplier("2025-03-01", events)).toBeCloseTo(0.2, 12);
    expect(shockMultiplier("2025-03-07", events)).toBeCloseTo(0.5, 12);
    expect(shockMultiplier("2025-03-14", events)).toBeCloseTo(0.3, 12);
  });

  it("is zero outside every shock window", () => {
    expect(shockMultiplier("2025-02-28", events)).toBe(0);
    expect(shockMultiplier("2025-03-15", events)).toBe(0);
  });

  it("counts a shock's days inclusively", () => {
    expect(shockDuration({ start: "2025-03-01", end: "2025-03-10" })).toBe(10);
  });
});

describe("previewShape", () => {
  it("returns one multiplier per day of the window", () => {
    expect(previewShape("2025-06-01", "2025-06-03", "step", 0.5)).toEqual([
      { date: "2025-06-01", elapsed: 0, multiplier: 1.5 },
      { date: "2025-06-02", elapsed: 1, multiplier: 1.5 },
      { date: "2025-06-03", elapsed: 2, multiplier: 1.5 },
    ]);
  });

  it("fades a linear campaign", () => {
    const points = previewShape("2025-06-01", "2025-06-04", "linear_fade", 1);
    expect(points.map((point) => point.multiplier)).toEqual([2, 1.75, 1.5, 1.25]);
  });
});

describe("buildInjectionChannels", () => {
  const frame = buildYearFrame(2025);
  const injection: ReappliedShockEvent = {
    type: "reapplied_shock",
    signatureName: "Spring sale",
    mode: "absolute",
    newStart: "2025-04-10",
    duration: 3,
    absolute: { sessions: [10, 20, 30], conversions: [1, 2, 3], revenue: [100, 200, 300] },
    relative: { sessions: [0.1, 0.2, 0.3], conversions: [0.5, 0.5, 0.5], revenue: [1, 1, 1] },
  };
  const dayIndex = (date: string) => frame.findIndex((row) => row.date === date);

  it("places absolute deltas by day offset from the new start", () => {
    const { absolute, relative } = buildInjectionChannels(frame, [injection]);
    expect(absolute[dayIndex("2025-04-09")]).toEqual({ sessions: 0, conversions: 0, revenue: 0 });
    expect(absolute[dayIndex("2025-04-10")]).toEqual({ sessions: 10, conversions: 1, revenue: 100 });
    expect(absolute[dayIndex("2025-04-12")]).toEqual({ sessions: 30, conversions: 3, revenue: 300 });
    expect(absolute[dayIndex("2025-04-13")]).toEqual({ sessions: 0, conversions: 0, revenue: 0 });
    expect(relative[dayIndex("2025-04-10")]).toEqual({ sessions: 0, conversions: 0, revenue: 0 });
  });

  it("routes relative injections to the relative channel", () => {
    const { absolute, relative } = buildInjectionChannels(frame, [{ ...injection, mode: "relative" }]);
    expect(relative[dayIndex("2025-04-11")]).toEqual({ sessions: 0.2, conversions: 0.5, revenue: 1 });
    expect(absolute[dayIndex("2025-04-11")]).toEqual({ sessions: 0, conversions: 0, revenue: 0 });
  });

  it("drops days that run past the end of the year", () => {
    const { absolute } = buildInjectionChannels(frame, [{ ...injection, newStart: "2025-12-30" }]);
    expect(absolute[dayIndex("2025-12-31")]).toEqual({ sessions: 20, conversions: 2, revenue: 200 });
    expect(absolute).toHaveLength(365);
  });

  it("starts from the first stored day when the window opens in the previous year", () => {
    const lateStart: ReappliedShockEvent = {
      ...injection,
      newStart: "2024-12-30",
      duration: 4,
      absolute: { sessions: [1, 2, 3, 4], conversions: [0, 0, 0, 0], revenue: [0, 0, 0, 0] },
    };
    const { absolute } = buildInjectionChannels(frame, [lateStart]);
    expect(absolute[dayIndex("2025-01-01")].sessions).toBe(1);
    expect(absolute[dayIndex("2025-01-02")].sessions).toBe(2);
    expect(absolute[dayIndex("2025-01-03")].sessions).toBe(0);
  });
});

describe("previewInjection", () => {
  const run = runForecast(flatInput(), []);
  const rows = run?.rows ?? [];
  const injection: ReappliedShockEvent = {
    type: "reapplied_shock",
    signatureName: "Spring sale",
    mode: "absolute",
    newStart: "2025-06-01",
    duration: 3,
    absolute: { sessions: [5, 6, 7], conversions: [0, 0, 0], revenue: [0, 0, 0] },
    relative: { sessions: [0.1, 0.2, 0.3], conversions: [0, 0, 0], revenue: [0, 0, 0] },
  };

  it("shows the stored deltas beside the baseline in absolute mode", () => {
    expect(previewInjection(rows, injection)).toEqual([
      { date: "2025-06-01", injectedSessions: 5, sessionsBase: 100 },
      { date: "2025-06-02", injectedSessions: 6, sessionsBase: 100 },
      { date: "2025-06-03", injectedSessions: 7, sessionsBase: 100 },
    ]);
  });

  it("scales the baseline by the stored fractions in relative mode", () => {
    const points = previewInjection(rows, { ...injection, mode: "relative" });
    expect(points.map((point) => point.date)).toEqual(["2025-06-01", "2025-06-02", "2025-06-03"]);
    expect(points[0].injectedSessions).toBeCloseTo(10, 9);
    expect(points[1].injectedSessions).toBeCloseTo(20, 9);
    expect(points[2].injectedSessions).toBeCloseTo(30, 9);
  });

  it("keeps only the days inside the projection year", () => {
    const points = previewInjection(rows, { ...injection, newStart: "2024-12-31" });
    expect(points.map((point) => [point.date, point.injectedSessions])).toEqual([
      ["2025-01-01", 5],
      ["2025-01-02", 6],
    ]);
  });
});
