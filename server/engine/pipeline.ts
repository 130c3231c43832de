import type { ForecastEvent } from "@shared/schema";
import type { ForecastRun, PureDnaRow, VolumeTriple } from "@shared/forecastTypes";
import { calibrate } from "./calibrator";
import { compileLayers } from "./layerCompiler";
import { buildProjection } from "./projection";
import { buildYearFrame } from "./yearFrame";

export interface ForecastInput {
  projectionYear: number;
  pureDna: PureDnaRow[];
  trialStart: string;
  trialEnd: string;
  // Pre-adjusted trial totals
  observed: VolumeTriple;
}

/**
 * Deterministic fold over (pure DNA, year, event log): frame, layers,
 * calibration, projection. Rebuilt from scratch on every call.
 * Returns null when the trial window cannot be calibrated.
 */
export function runForecast(input: ForecastInput, events: readonly ForecastEvent[]): ForecastRun | null {
  const frame = buildYearFrame(input.projectionYear);
  const layers = compileLayers(frame, input.pureDna, events);
  const constants = calibrate(layers, input.trialStart, input.trialEnd, input.observed);
  if (!constants) {
    return null;
  }
  return {
    projectionYear: input.projectionYear,
    constants,
    rows: buildProjection(layers, constants, events),
  };
}
