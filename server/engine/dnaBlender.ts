import { median } from "simple-statistics";
import { OVERALL_YEAR, type HistoricalIndexRecord } from "@shared/schema";
import type { IndexTriple, PureDnaRow, SimilarityWeights } from "@shared/forecastTypes";
import { HISTORICAL_BLEND_WEIGHT, NEUTRAL_INDEX, OVERALL_BLEND_WEIGHT } from "./constants";

const MONTHS = Array.from({ length: 12 }, (_, i) => i + 1);

interface IndexSamples {
  sessions: number[];
  conversionRate: number[];
  orderValue: number[];
}

// Median of each index per month across the selected entities
function monthlyMedians(records: HistoricalIndexRecord[]): Map<number, IndexTriple> {
  const samples = new Map<number, IndexSamples>();
  for (const record of records) {
    const bucket = samples.get(record.period) ?? { sessions: [], conversionRate: [], orderValue: [] };
    bucket.sessions.push(record.sessionsIndex);
    bucket.conversionRate.push(record.conversionRateIndex);
    bucket.orderValue.push(record.orderValueIndex);
    samples.set(record.period, bucket);
  }

  const medians = new Map<number, IndexTriple>();
  samples.forEach((bucket, month) => {
    medians.set(month, {
      sessions: median(bucket.sessions),
      conversionRate: median(bucket.conversionRate),
      orderValue: median(bucket.orderValue),
    });
  });
  return medians;
}

/**
 * Pure DNA_m = 0.35 x Overall_median_m + 0.65 x sum_y(w_y x Year_y_median_m).
 *
 * A weighted year with no data for a month contributes the overall median for
 * that month. A month missing from the overall profile is left unblended at
 * the neutral 1.0, the same value the day broadcast gives an unmapped month.
 */
export function buildPureDna(
  records: HistoricalIndexRecord[],
  entities: string[],
  weights: SimilarityWeights,
): PureDnaRow[] {
  const entitySet = new Set(entities);
  const monthly = records.filter(
    (record) => record.granularity === "Monthly" && entitySet.has(record.entity),
  );

  const overall = monthlyMedians(monthly.filter((record) => record.year === OVERALL_YEAR));
  const byYear = new Map<string, Map<number, IndexTriple>>();
  for (const year of Object.keys(weights)) {
    byYear.set(year, monthlyMedians(monthly.filter((record) => record.year === year)));
  }

  return MONTHS.map((month) => {
    const overallValue = overall.get(month);
    if (!overallValue) {
      return { month, sessions: NEUTRAL_INDEX, conversionRate: NEUTRAL_INDEX, orderValue: NEUTRAL_INDEX };
    }
    const row: PureDnaRow = {
      month,
      sessions: overallValue.sessions * OVERALL_BLEND_WEIGHT,
      conversionRate: overallValue.conversionRate * OVERALL_BLEND_WEIGHT,
      orderValue: overallValue.orderValue * OVERALL_BLEND_WEIGHT,
    };
    for (const [year, weight] of Object.entries(weights)) {
      const yearValue = byYear.get(year)?.get(month) ?? overallValue;
      row.sessions += yearValue.sessions * HISTORICAL_BLEND_WEIGHT * weight;
      row.conversionRate += yearValue.conversionRate * HISTORICAL_BLEND_WEIGHT * weight;
      row.orderValue += yearValue.orderValue * HISTORICAL_BLEND_WEIGHT * weight;
    }
    return row;
  });
}
