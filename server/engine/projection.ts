import type { ForecastEvent, Granularity } from "@shared/schema";
import type {
  CalibrationConstants,
  DnaLayerAggregate,
  IndexTriple,
  LayeredRow,
  PeriodAggregate,
  ProjectionRow,
} from "@shared/forecastTypes";
import { periodKey } from "./calendar";
import { MARGIN_FRACTION } from "./constants";
import { buildInjectionChannels, shockMultiplier } from "./shockEngine";

const LOWER = 1 - MARGIN_FRACTION;
const UPPER = 1 + MARGIN_FRACTION;

/**
 * Baseline (preTrial layer, no shocks) and simulation (work layer, shocks,
 * re-injections) for every day, with fixed +/-15% margins.
 *
 * Simulated conversions chain from simulated sessions and simulated revenue
 * from simulated conversions; re-injections add on top of each metric.
 */
export function buildProjection(
  layers: LayeredRow[],
  constants: CalibrationConstants,
  events: readonly ForecastEvent[],
): ProjectionRow[] {
  const { baseSessions, baseConversionRate, baseOrderValue } = constants;
  const { absolute, relative } = buildInjectionChannels(layers, events);

  return layers.map((row, i) => {
    const sessionsBase = baseSessions * row.preTrial.sessions;
    const conversionsBase = sessionsBase * (baseConversionRate * row.preTrial.conversionRate);
    const revenueBase = conversionsBase * (baseOrderValue * row.preTrial.orderValue);

    const shock = shockMultiplier(row.date, events);
    const sessionsStandard = baseSessions * row.work.sessions * (1 + shock);
    const conversionsStandard = sessionsStandard * (baseConversionRate * row.work.conversionRate);
    const revenueStandard = conversionsStandard * (baseOrderValue * row.work.orderValue);

    const sessionsSim = sessionsStandard + sessionsBase * relative[i].sessions + absolute[i].sessions;
    const conversionsSim =
      conversionsStandard + conversionsBase * relative[i].conversions + absolute[i].conversions;
    const revenueSim = revenueStandard + revenueBase * relative[i].revenue + absolute[i].revenue;

    return {
      ...row,
      shock,
      sessionsBase,
      conversionsBase,
      revenueBase,
      sessionsSim,
      conversionsSim,
      revenueSim,
      sessionsBaseMin: sessionsBase * LOWER,
      sessionsBaseMax: sessionsBase * UPPER,
      conversionsBaseMin: conversionsBase * LOWER,
      conversionsBaseMax: conversionsBase * UPPER,
      revenueBaseMin: revenueBase * LOWER,
      revenueBaseMax: revenueBase * UPPER,
      sessionsSimMin: sessionsSim * LOWER,
      sessionsSimMax: sessionsSim * UPPER,
      conversionsSimMin: conversionsSim * LOWER,
      conversionsSimMax: conversionsSim * UPPER,
      revenueSimMin: revenueSim * LOWER,
      revenueSimMax: revenueSim * UPPER,
    };
  });
}

type SummedColumn = Exclude<
  keyof PeriodAggregate,
  "period" | "firstDate" | "conversionRateBase" | "conversionRateSim" | "orderValueBase" | "orderValueSim"
>;

const SUMMED_COLUMNS: SummedColumn[] = [
  "sessionsBase",
  "conversionsBase",
  "revenueBase",
  "sessionsSim",
  "conversionsSim",
  "revenueSim",
  "sessionsBaseMin",
  "sessionsBaseMax",
  "sessionsSimMin",
  "sessionsSimMax",
  "conversionsBaseMin",
  "conversionsBaseMax",
  "conversionsSimMin",
  "conversionsSimMax",
  "revenueBaseMin",
  "revenueBaseMax",
  "revenueSimMin",
  "revenueSimMax",
];

function safeRatio(numerator: number, denominator: number): number {
  return denominator !== 0 ? numerator / denominator : 0;
}

// Group rows by period in first-seen order
function groupByPeriod<T extends LayeredRow>(rows: T[], granularity: Granularity): Map<number, T[]> {
  const groups = new Map<number, T[]>();
  for (const row of rows) {
    const key = periodKey(row, granularity);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

// Period sums of the projection; CR and AOV derived from the summed volumes
export function aggregateProjection(rows: ProjectionRow[], granularity: Granularity): PeriodAggregate[] {
  const aggregates: PeriodAggregate[] = [];
  groupByPeriod(rows, granularity).forEach((bucket, period) => {
    const aggregate: PeriodAggregate = {
      period,
      firstDate: bucket[0].date,
      sessionsBase: 0,
      conversionsBase: 0,
      revenueBase: 0,
      sessionsSim: 0,
      conversionsSim: 0,
      revenueSim: 0,
      sessionsBaseMin: 0,
      sessionsBaseMax: 0,
      sessionsSimMin: 0,
      sessionsSimMax: 0,
      conversionsBaseMin: 0,
      conversionsBaseMax: 0,
      conversionsSimMin: 0,
      conversionsSimMax: 0,
      revenueBaseMin: 0,
      revenueBaseMax: 0,
      revenueSimMin: 0,
      revenueSimMax: 0,
      conversionRateBase: 0,
      conversionRateSim: 0,
      orderValueBase: 0,
      orderValueSim: 0,
    };
    for (const row of bucket) {
      for (const column of SUMMED_COLUMNS) {
        aggregate[column] += row[column];
      }
    }
    aggregate.conversionRateBase = safeRatio(aggregate.conversionsBase, aggregate.sessionsBase);
    aggregate.conversionRateSim = safeRatio(aggregate.conversionsSim, aggregate.sessionsSim);
    aggregate.orderValueBase = safeRatio(aggregate.revenueBase, aggregate.conversionsBase);
    aggregate.orderValueSim = safeRatio(aggregate.revenueSim, aggregate.conversionsSim);
    aggregates.push(aggregate);
  });
  return aggregates.sort((a, b) => a.period - b.period);
}

function meanTriple(values: IndexTriple[]): IndexTriple {
  const total = values.reduce(
    (sum, value) => ({
      sessions: sum.sessions + value.sessions,
      conversionRate: sum.conversionRate + value.conversionRate,
      orderValue: sum.orderValue + value.orderValue,
    }),
    { sessions: 0, conversionRate: 0, orderValue: 0 },
  );
  return {
    sessions: total.sessions / values.length,
    conversionRate: total.conversionRate / values.length,
    orderValue: total.orderValue / values.length,
  };
}

// Mean index per period for each layer
export function aggregateLayers(rows: LayeredRow[], granularity: Granularity): DnaLayerAggregate[] {
  const aggregates: DnaLayerAggregate[] = [];
  groupByPeriod(rows, granularity).forEach((bucket, period) => {
    aggregates.push({
      period,
      pure: meanTriple(bucket.map((row) => row.pure)),
      preTrial: meanTriple(bucket.map((row) => row.preTrial)),
      work: meanTriple(bucket.map((row) => row.work)),
    });
  });
  return aggregates.sort((a, b) => a.period - b.period);
}
