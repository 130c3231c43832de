import type { CampaignShape, ForecastEvent, ReappliedShockEvent, ShockEvent } from "@shared/schema";
import type { FrameRow, ProjectionRow, VolumeTriple } from "@shared/forecastTypes";
import { addDays, daysBetween, isWithin } from "./calendar";
import { DELAYED_PEAK_CENTER, DELAYED_PEAK_SPREAD, FRONT_LOADED_DECAY } from "./constants";

/**
 * Response curve of a campaign on one day.
 * `elapsed` is whole days since the start, `duration` the inclusive day count.
 */
export function shapeValue(shape: CampaignShape, elapsed: number, duration: number): number {
  const p = duration > 0 ? elapsed / duration : 0;
  switch (shape) {
    case "step":
      return 1;
    case "linear_fade":
      return 1 - p;
    case "front_loaded":
      return Math.exp(-FRONT_LOADED_DECAY * p);
    case "delayed_peak": {
      const center = DELAYED_PEAK_CENTER * duration;
      const spread = DELAYED_PEAK_SPREAD * duration;
      return Math.exp(-((elapsed - center) ** 2) / (2 * spread ** 2));
    }
  }
}

export function shockDuration(event: Pick<ShockEvent, "start" | "end">): number {
  return daysBetween(event.start, event.end) + 1;
}

// Sum of lift x shape over every shock active on `date` (additive model)
export function shockMultiplier(date: string, events: readonly ForecastEvent[]): number {
  let total = 0;
  for (const event of events) {
    if (event.type !== "shock" || !isWithin(date, event.start, event.end)) {
      continue;
    }
    total += event.lift * shapeValue(event.shape, daysBetween(event.start, date), shockDuration(event));
  }
  return total;
}

export interface InjectionChannels {
  absolute: VolumeTriple[];
  relative: VolumeTriple[];
}

function emptyTriple(): VolumeTriple {
  return { sessions: 0, conversions: 0, revenue: 0 };
}

function addInjection(target: VolumeTriple, event: ReappliedShockEvent, offset: number): void {
  const series = event.mode === "absolute" ? event.absolute : event.relative;
  target.sessions += series.sessions[offset] ?? 0;
  target.conversions += series.conversions[offset] ?? 0;
  target.revenue += series.revenue[offset] ?? 0;
}

/**
 * Frame positions that receive a re-applied signature: the days of
 * [newStart, newStart + duration - 1] that fall inside the frame, at most
 * `duration` of them. The k-th position takes the k-th stored value, so a
 * window opening before Jan 1 still starts from the signature's first day.
 */
export function injectionPositions(frame: readonly Pick<FrameRow, "date">[], event: ReappliedShockEvent): number[] {
  const end = addDays(event.newStart, event.duration - 1);
  const positions: number[] = [];
  frame.forEach((row, i) => {
    if (isWithin(row.date, event.newStart, end)) {
      positions.push(i);
    }
  });
  return positions.slice(0, event.duration);
}

// Per-day absolute and relative additions from re-applied signatures
export function buildInjectionChannels(frame: FrameRow[], events: readonly ForecastEvent[]): InjectionChannels {
  const absolute = frame.map(emptyTriple);
  const relative = frame.map(emptyTriple);

  for (const event of events) {
    if (event.type !== "reapplied_shock") {
      continue;
    }
    const channel = event.mode === "absolute" ? absolute : relative;
    injectionPositions(frame, event).forEach((position, k) => {
      addInjection(channel[position], event, k);
    });
  }

  return { absolute, relative };
}

export interface InjectionPoint {
  date: string;
  injectedSessions: number;
  sessionsBase: number;
}

/**
 * Sessions a re-applied signature would add on each day it covers, beside the
 * baseline: the stored deltas in absolute mode, baseline x fraction in relative mode.
 */
export function previewInjection(rows: ProjectionRow[], event: ReappliedShockEvent): InjectionPoint[] {
  return injectionPositions(rows, event).map((position, k) => {
    const row = rows[position];
    const injectedSessions =
      event.mode === "absolute"
        ? event.absolute.sessions[k] ?? 0
        : row.sessionsBase * (event.relative.sessions[k] ?? 0);
    return { date: row.date, injectedSessions, sessionsBase: row.sessionsBase };
  });
}

export interface ShapePoint {
  date: string;
  elapsed: number;
  multiplier: number;
}

// 1 + lift x shape for each day of a hypothetical shock window
export function previewShape(start: string, end: string, shape: CampaignShape, lift: number): ShapePoint[] {
  const duration = shockDuration({ start, end });
  const points: ShapePoint[] = [];
  for (let elapsed = 0; elapsed < duration; elapsed++) {
    points.push({
      date: addDays(start, elapsed),
      elapsed,
      multiplier: 1 + lift * shapeValue(shape, elapsed, duration),
    });
  }
  return points;
}
