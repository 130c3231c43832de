import type { ForecastEvent, TargetMetric, TargetSettings, VolumeMetric } from "@shared/schema";
import type { AttributionReport, AttributionRow, ProjectionRow } from "@shared/forecastTypes";
import { isWithin } from "./calendar";
import { runForecast, type ForecastInput } from "./pipeline";
import { buildYearFrame } from "./yearFrame";

type ProjectionColumn = "sessionsSim" | "conversionsSim" | "revenueSim" | "sessionsBase" | "conversionsBase" | "revenueBase";

const SIM_COLUMN: Record<VolumeMetric, ProjectionColumn> = {
  Sessions: "sessionsSim",
  Conversions: "conversionsSim",
  Revenue: "revenueSim",
};

const BASE_COLUMN: Record<VolumeMetric, ProjectionColumn> = {
  Sessions: "sessionsBase",
  Conversions: "conversionsBase",
  Revenue: "revenueBase",
};

const EVENT_LABELS: Record<ForecastEvent["type"], string> = {
  shock: "Campaign",
  custom_drag: "DNA Drag",
  swap: "DNA Swap",
  reapplied_shock: "Re-Injection",
};

// Ratio targets are attributed on revenue
export function attributionMetric(metric: TargetMetric): VolumeMetric {
  return metric === "CR" || metric === "AOV" ? "Revenue" : metric;
}

export function sumColumn(
  rows: ProjectionRow[],
  column: ProjectionColumn,
  start: string,
  end: string,
): number {
  let total = 0;
  for (const row of rows) {
    if (isWithin(row.date, start, end)) {
      total += row[column];
    }
  }
  return total;
}

function scopeLabel(scope: string): string {
  return scope
    .split("_")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

export function describeEvent(event: ForecastEvent): Pick<AttributionRow, "label" | "description" | "scope"> {
  const label = EVENT_LABELS[event.type];
  switch (event.type) {
    case "shock":
      return {
        label,
        description: `${event.campaign ?? event.shape} | ${Math.round(event.lift * 100)}% | ${event.start} → ${event.end}`,
        scope: "Post Trial",
      };
    case "custom_drag":
      return {
        label,
        description: `${event.granularity} ${event.target} × ${event.multiplier.toFixed(2)}`,
        scope: scopeLabel(event.scope),
      };
    case "swap": {
      const { selection } = event;
      const description =
        selection.mode === "periods"
          ? `${event.granularity} ${selection.a} ↔ ${selection.b}`
          : `${event.granularity} ${selection.a.start}–${selection.a.end} ↔ ${selection.b.start}–${selection.b.end}`;
      return { label, description, scope: scopeLabel(event.scope) };
    }
    case "reapplied_shock":
      return {
        label,
        description: `${event.signatureName} | ${event.mode} | from ${event.newStart}`,
        scope: "Post Trial",
      };
  }
}

/**
 * Sequential marginal attribution of each event to the target gap.
 *
 * Every prefix of the log is evaluated once; event i contributes
 * total(first i+1 events) - total(first i events), so contributions depend on
 * log order and always telescope to total(full log) - total(empty log).
 * A prefix whose calibration fails totals 0.
 */
export function attributeEvents(
  input: ForecastInput,
  events: readonly ForecastEvent[],
  target: TargetSettings,
): AttributionReport {
  const metric = attributionMetric(target.metric);
  const hasTargetDays = buildYearFrame(input.projectionYear).some((row) =>
    isWithin(row.date, target.start, target.end),
  );
  if (!hasTargetDays) {
    return {
      status: "empty_target_window",
      metric,
      organic: 0,
      needed: 0,
      gap: 0,
      simulated: 0,
      rows: [],
    };
  }

  const prefixTotals: number[] = [];
  let fullRun: ProjectionRow[] = [];
  for (let count = 0; count <= events.length; count++) {
    const run = runForecast(input, events.slice(0, count));
    prefixTotals.push(run ? sumColumn(run.rows, SIM_COLUMN[metric], target.start, target.end) : 0);
    if (count === events.length && run) {
      fullRun = run.rows;
    }
  }

  const organic = prefixTotals[0];
  const needed =
    metric === target.metric
      ? target.value
      : sumColumn(fullRun, BASE_COLUMN[metric], target.start, target.end);
  const gap = needed - organic;
  const totalGap = gap !== 0 ? gap : 1;

  const rows: AttributionRow[] = events.map((event, i) => {
    const contribution = prefixTotals[i + 1] - prefixTotals[i];
    return {
      index: i,
      type: event.type,
      ...describeEvent(event),
      contribution,
      gapCoveragePct: (contribution / totalGap) * 100,
    };
  });

  return {
    status: "ok",
    metric,
    organic,
    needed,
    gap,
    simulated: prefixTotals[events.length],
    rows,
  };
}
