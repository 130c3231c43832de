import type { ForecastEvent, Granularity, StructuralEvent } from "@shared/schema";
import type { FrameRow, IndexTriple, LayeredRow, PureDnaRow } from "@shared/forecastTypes";
import { periodKey, periodsFromRange } from "./calendar";
import { NEUTRAL_INDEX } from "./constants";

const INDEX_KEYS: Array<keyof IndexTriple> = ["sessions", "conversionRate", "orderValue"];

function isStructural(event: ForecastEvent): event is StructuralEvent {
  return event.type === "custom_drag" || event.type === "swap";
}

function matchingRows(frame: FrameRow[], granularity: Granularity, period: number): number[] {
  const positions: number[] = [];
  frame.forEach((row, i) => {
    if (periodKey(row, granularity) === period) {
      positions.push(i);
    }
  });
  return positions;
}

function meanOf(layer: IndexTriple[], positions: number[], key: keyof IndexTriple): number {
  let sum = 0;
  for (const i of positions) sum += layer[i][key];
  return sum / positions.length;
}

// Exchanges the mean level of two periods by cross-multiplying their rows
function swapPeriods(
  frame: FrameRow[],
  layer: IndexTriple[],
  granularity: Granularity,
  periodA: number,
  periodB: number,
): void {
  const rowsA = matchingRows(frame, granularity, periodA);
  const rowsB = matchingRows(frame, granularity, periodB);
  if (rowsA.length === 0 || rowsB.length === 0) {
    return;
  }

  for (const key of INDEX_KEYS) {
    const meanA = meanOf(layer, rowsA, key);
    const meanB = meanOf(layer, rowsB, key);
    for (const i of rowsA) {
      layer[i][key] = meanA > 0 ? layer[i][key] * (meanB / meanA) : meanB;
    }
    for (const i of rowsB) {
      layer[i][key] = meanB > 0 ? layer[i][key] * (meanA / meanB) : meanA;
    }
  }
}

export function applyStructuralEvent(frame: FrameRow[], layer: IndexTriple[], event: StructuralEvent): void {
  switch (event.type) {
    case "custom_drag": {
      for (const i of matchingRows(frame, event.granularity, event.target)) {
        for (const key of INDEX_KEYS) {
          layer[i][key] *= event.multiplier;
        }
      }
      return;
    }
    case "swap": {
      const { selection } = event;
      if (selection.mode === "periods") {
        swapPeriods(frame, layer, event.granularity, selection.a, selection.b);
        return;
      }
      const periodsA = periodsFromRange(selection.a.start, selection.a.end, event.granularity);
      const periodsB = periodsFromRange(selection.b.start, selection.b.end, event.granularity);
      const pairs = Math.min(periodsA.length, periodsB.length);
      for (let p = 0; p < pairs; p++) {
        swapPeriods(frame, layer, event.granularity, periodsA[p], periodsB[p]);
      }
      return;
    }
  }
}

/**
 * Builds the three DNA layers for the projection year.
 *
 *   pure     - monthly pure DNA broadcast onto every day
 *   preTrial - pure + pre_trial drag/swap events (calibration state)
 *   work     - preTrial + post_trial drag/swap events (simulation state)
 *
 * Shock and re-injection events are ignored here; they act on volumes.
 */
export function compileLayers(
  frame: FrameRow[],
  pureDna: PureDnaRow[],
  events: readonly ForecastEvent[],
): LayeredRow[] {
  const byMonth = new Map(pureDna.map((row) => [row.month, row]));
  const pure: IndexTriple[] = frame.map((row) => {
    const dna = byMonth.get(row.month);
    return {
      sessions: dna?.sessions ?? NEUTRAL_INDEX,
      conversionRate: dna?.conversionRate ?? NEUTRAL_INDEX,
      orderValue: dna?.orderValue ?? NEUTRAL_INDEX,
    };
  });

  const structural = events.filter(isStructural);

  const preTrial = pure.map((value) => ({ ...value }));
  for (const event of structural) {
    if (event.scope === "pre_trial") {
      applyStructuralEvent(frame, preTrial, event);
    }
  }

  const work = preTrial.map((value) => ({ ...value }));
  for (const event of structural) {
    if (event.scope === "post_trial") {
      applyStructuralEvent(frame, work, event);
    }
  }

  return frame.map((row, i) => ({
    ...row,
    pure: pure[i],
    preTrial: preTrial[i],
    work: work[i],
  }));
}
