import { randomUUID } from "crypto";
import { quantile } from "simple-statistics";
import type { DailyTransaction, InjectionMode, ReappliedShockEvent } from "@shared/schema";
import type { ContextPoint, ShockSignature, SignatureExtraction, VolumeTriple } from "@shared/forecastTypes";
import { addDays, daysBetween, isWithin } from "./calendar";
import { ORGANIC_FLOOR_QUANTILE, SIGNATURE_CONTEXT_DAYS } from "./constants";

export interface ExtractionInput {
  transactions: DailyTransaction[];
  entities: string[];
  start: string;
  end: string;
  name?: string;
}

// Daily totals across the selected entities over [start - 14d, end + 14d]
function aggregateContext(input: ExtractionInput): ContextPoint[] {
  const contextStart = addDays(input.start, -SIGNATURE_CONTEXT_DAYS);
  const contextEnd = addDays(input.end, SIGNATURE_CONTEXT_DAYS);
  const entitySet = new Set(input.entities);

  const byDate = new Map<string, ContextPoint>();
  for (const tx of input.transactions) {
    if (!entitySet.has(tx.entity) || !isWithin(tx.date, contextStart, contextEnd)) {
      continue;
    }
    const point = byDate.get(tx.date) ?? {
      date: tx.date,
      sessions: 0,
      conversions: 0,
      revenue: 0,
      inWindow: isWithin(tx.date, input.start, input.end),
    };
    point.sessions += tx.sessions;
    point.conversions += tx.conversions;
    point.revenue += tx.revenue;
    byDate.set(tx.date, point);
  }

  return Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));
}

function excessOver(values: number[], floor: number): number[] {
  return values.map((value) => Math.max(0, value - floor));
}

function fractionOf(excess: number[], floor: number): number[] {
  return excess.map((value) => (floor > 0 ? value / floor : 0));
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * Isolates a historical shock: the organic floor of each metric is its 10th
 * percentile inside the window, and everything above the floor is the
 * re-injectable excess. The +/-14 day context is returned for display only.
 */
export function extractSignature(input: ExtractionInput): SignatureExtraction {
  const context = aggregateContext(input);
  const window = context.filter((point) => point.inWindow);
  if (window.length === 0) {
    return { status: "no_data", context };
  }

  const sessions = window.map((point) => point.sessions);
  const conversions = window.map((point) => point.conversions);
  const revenue = window.map((point) => point.revenue);

  const floor: VolumeTriple = {
    sessions: quantile(sessions, ORGANIC_FLOOR_QUANTILE),
    conversions: quantile(conversions, ORGANIC_FLOOR_QUANTILE),
    revenue: quantile(revenue, ORGANIC_FLOOR_QUANTILE),
  };

  const absolute = {
    sessions: excessOver(sessions, floor.sessions),
    conversions: excessOver(conversions, floor.conversions),
    revenue: excessOver(revenue, floor.revenue),
  };
  const totals: VolumeTriple = {
    sessions: sum(absolute.sessions),
    conversions: sum(absolute.conversions),
    revenue: sum(absolute.revenue),
  };

  if (totals.sessions <= 0) {
    return { status: "no_significant_shock", floor, context };
  }

  const organicConversionRate = floor.sessions > 0 ? floor.conversions / floor.sessions : 0;
  const eventConversionRate = totals.conversions / totals.sessions;

  const signature: ShockSignature = {
    id: randomUUID(),
    name: input.name ?? `Shock ${input.start}→${input.end}`,
    originStart: input.start,
    originEnd: input.end,
    duration: daysBetween(input.start, input.end) + 1,
    floor,
    totals,
    organicConversionRate,
    eventConversionRate,
    conversionRateDelta: eventConversionRate - organicConversionRate,
    dates: window.map((point) => point.date),
    absolute,
    relative: {
      sessions: fractionOf(absolute.sessions, floor.sessions),
      conversions: fractionOf(absolute.conversions, floor.conversions),
      revenue: fractionOf(absolute.revenue, floor.revenue),
    },
    createdAt: new Date().toISOString(),
  };

  return { status: "ok", signature, context };
}

// Event that re-injects a stored signature from a new start date
export function toReappliedShock(
  signature: ShockSignature,
  newStart: string,
  mode: InjectionMode,
): ReappliedShockEvent {
  return {
    type: "reapplied_shock",
    signatureName: signature.name,
    mode,
    newStart,
    duration: signature.duration,
    absolute: signature.absolute,
    relative: signature.relative,
  };
}
