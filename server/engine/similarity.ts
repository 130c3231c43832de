import { OVERALL_YEAR, type HistoricalIndexRecord } from "@shared/schema";
import type { SimilarityWeights, VolumeTriple } from "@shared/forecastTypes";
import { dateRange, dayOfYear } from "./calendar";
import { SIMILARITY_EPSILON } from "./constants";

export interface SimilarityInput {
  records: HistoricalIndexRecord[];
  entities: string[];
  projectionYear: number;
  trialStart: string;
  trialEnd: string;
  // Raw (not pre-adjusted) trial totals
  observed: VolumeTriple;
}

function relativeError(observed: number, candidate: number): number {
  return Math.abs(observed - candidate) / Math.max(observed, 1);
}

/**
 * Inverse-error weight per historical year.
 *
 * Each year's daily totals over the trial's days-of-year are compared with the
 * observed trial totals; err = mean relative error over sessions, conversions and
 * revenue, w = 1 / (err + 0.01), normalized so the weights sum to 1. Returns an
 * empty mapping when no year overlaps the trial window.
 */
export function computeSimilarityWeights(input: SimilarityInput): SimilarityWeights {
  const { records, entities, projectionYear, trialStart, trialEnd, observed } = input;
  const trialDays = new Set(dateRange(trialStart, trialEnd).map(dayOfYear));
  const entitySet = new Set(entities);
  const excludedYear = String(projectionYear);

  const totalsByYear = new Map<string, VolumeTriple>();
  for (const record of records) {
    if (
      record.granularity !== "Daily" ||
      !entitySet.has(record.entity) ||
      !trialDays.has(record.period) ||
      record.year === OVERALL_YEAR ||
      record.year === excludedYear
    ) {
      continue;
    }
    const totals = totalsByYear.get(record.year) ?? { sessions: 0, conversions: 0, revenue: 0 };
    totals.sessions += record.sessions;
    totals.conversions += record.conversions;
    totals.revenue += record.revenue;
    totalsByYear.set(record.year, totals);
  }

  const rawWeights: Array<[string, number]> = [];
  for (const year of Array.from(totalsByYear.keys()).sort()) {
    const totals = totalsByYear.get(year);
    if (!totals) continue;
    const meanError =
      (relativeError(observed.sessions, totals.sessions) +
        relativeError(observed.conversions, totals.conversions) +
        relativeError(observed.revenue, totals.revenue)) /
      3;
    rawWeights.push([year, 1 / (meanError + SIMILARITY_EPSILON)]);
  }

  const total = rawWeights.reduce((sum, [, weight]) => sum + weight, 0);
  if (total <= 0) {
    return {};
  }
  return Object.fromEntries(rawWeights.map(([year, weight]) => [year, weight / total]));
}
