import type { Granularity, TargetMetric, TargetSettings, YearlyKpi } from "@shared/schema";
import type { ForecastRun, GoalKpis, GoalPeriodRow, GoalTranslation, VolumeTriple } from "@shared/forecastTypes";
import { isWithin, periodKey } from "./calendar";

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

function withRatios(volumes: VolumeTriple): GoalKpis {
  return {
    ...volumes,
    conversionRate: ratio(volumes.conversions, volumes.sessions),
    orderValue: ratio(volumes.revenue, volumes.conversions),
  };
}

function minus(a: VolumeTriple, b: VolumeTriple): VolumeTriple {
  return {
    sessions: a.sessions - b.sessions,
    conversions: a.conversions - b.conversions,
    revenue: a.revenue - b.revenue,
  };
}

// Needed volumes for a target, holding the drivers not being scaled at baseline
function neededVolumes(
  target: TargetSettings,
  base: VolumeTriple,
  conversionRate: number,
  orderValue: number,
): VolumeTriple {
  const value = target.value;
  switch (target.metric) {
    case "Revenue": {
      if (target.driver === "Sessions") {
        const conversions = ratio(value, orderValue);
        return { sessions: ratio(conversions, conversionRate), conversions, revenue: value };
      }
      if (target.driver === "CR") {
        return { sessions: base.sessions, conversions: ratio(value, orderValue), revenue: value };
      }
      return { sessions: base.sessions, conversions: base.conversions, revenue: value };
    }
    case "Conversions": {
      if (target.driver === "Sessions") {
        return { sessions: ratio(value, conversionRate), conversions: value, revenue: value * orderValue };
      }
      return { sessions: base.sessions, conversions: value, revenue: value * orderValue };
    }
    case "Sessions": {
      const conversions = value * conversionRate;
      return { sessions: value, conversions, revenue: conversions * orderValue };
    }
    case "CR": {
      const conversions = base.sessions * value;
      return { sessions: base.sessions, conversions, revenue: conversions * orderValue };
    }
    case "AOV":
      return { sessions: base.sessions, conversions: base.conversions, revenue: base.conversions * value };
  }
}

function spread(total: number, part: number, whole: number): number {
  return whole > 0 ? total * (part / whole) : 0;
}

/**
 * Translates a target into needed sessions, conversions and revenue over the
 * target window, compares it with baseline and simulation, and spreads the
 * needed volumes over the window's periods in proportion to baseline.
 */
export function translateGoal(run: ForecastRun, target: TargetSettings, granularity: Granularity): GoalTranslation {
  const rows = run.rows.filter((row) => isWithin(row.date, target.start, target.end));
  if (rows.length === 0) {
    return { status: "empty_target_window", metric: target.metric };
  }

  const base: VolumeTriple = { sessions: 0, conversions: 0, revenue: 0 };
  const sim: VolumeTriple = { sessions: 0, conversions: 0, revenue: 0 };
  const periods = new Map<number, GoalPeriodRow>();

  for (const row of rows) {
    base.sessions += row.sessionsBase;
    base.conversions += row.conversionsBase;
    base.revenue += row.revenueBase;
    sim.sessions += row.sessionsSim;
    sim.conversions += row.conversionsSim;
    sim.revenue += row.revenueSim;

    const key = periodKey(row, granularity);
    const period = periods.get(key) ?? {
      period: key,
      firstDate: row.date,
      needed: { sessions: 0, conversions: 0, revenue: 0 },
      base: { sessions: 0, conversions: 0, revenue: 0 },
      sim: { sessions: 0, conversions: 0, revenue: 0 },
      gapBase: { sessions: 0, conversions: 0, revenue: 0 },
      gapSim: { sessions: 0, conversions: 0, revenue: 0 },
    };
    period.base.sessions += row.sessionsBase;
    period.base.conversions += row.conversionsBase;
    period.base.revenue += row.revenueBase;
    period.sim.sessions += row.sessionsSim;
    period.sim.conversions += row.conversionsSim;
    period.sim.revenue += row.revenueSim;
    periods.set(key, period);
  }

  const effectiveConversionRate =
    base.sessions > 0 ? base.conversions / base.sessions : run.constants.baseConversionRate;
  const effectiveOrderValue =
    base.conversions > 0 ? base.revenue / base.conversions : run.constants.baseOrderValue;
  const needed = neededVolumes(target, base, effectiveConversionRate, effectiveOrderValue);

  const periodRows = Array.from(periods.values()).sort((a, b) => a.period - b.period);
  for (const period of periodRows) {
    period.needed = {
      sessions: spread(needed.sessions, period.base.sessions, base.sessions),
      conversions: spread(needed.conversions, period.base.conversions, base.conversions),
      revenue: spread(needed.revenue, period.base.revenue, base.revenue),
    };
    period.gapBase = minus(period.base, period.needed);
    period.gapSim = minus(period.sim, period.needed);
  }

  return {
    status: "ok",
    metric: target.metric,
    needed: withRatios(needed),
    before: {
      ...base,
      conversionRate: effectiveConversionRate,
      orderValue: effectiveOrderValue,
    },
    after: withRatios(sim),
    periods: periodRows,
  };
}

const KPI_FIELD: Record<TargetMetric, keyof Pick<YearlyKpi, "sessions" | "conversions" | "revenue" | "conversionRate" | "orderValue">> = {
  Sessions: "sessions",
  Conversions: "conversions",
  Revenue: "revenue",
  CR: "conversionRate",
  AOV: "orderValue",
};

// Target derived from a historical year: base value x (1 + growth% / 100)
export function growthTarget(kpi: YearlyKpi, metric: TargetMetric, growthPct: number): number {
  return kpi[KPI_FIELD[metric]] * (1 + growthPct / 100);
}
