import {
  ForecastContextSchema,
  type ForecastContext,
  type ForecastContextUpdate,
  type ForecastEvent,
  type Granularity,
} from "@shared/schema";
import type {
  AttributionReport,
  DnaLayerAggregate,
  ForecastRun,
  GoalTranslation,
  PureDnaRow,
  SignatureExtraction,
  SimilarityWeights,
  VolumeTriple,
} from "@shared/forecastTypes";
import { attributeEvents } from "./engine/attribution";
import { yearOf } from "./engine/calendar";
import { adjustTrialTotals } from "./engine/calibrator";
import { buildPureDna } from "./engine/dnaBlender";
import { translateGoal } from "./engine/goalTracker";
import { compileLayers } from "./engine/layerCompiler";
import { runForecast, type ForecastInput } from "./engine/pipeline";
import { aggregateLayers } from "./engine/projection";
import { extractSignature } from "./engine/signatureExtractor";
import { computeSimilarityWeights } from "./engine/similarity";
import { buildYearFrame } from "./engine/yearFrame";
import { ForecastError } from "./errors";
import type { ProfileStore } from "./profileStore";

export interface PreparedForecast {
  entities: string[];
  weights: SimilarityWeights;
  pureDna: PureDnaRow[];
  input: ForecastInput;
}

export interface DnaView {
  projectionYear: number;
  entities: string[];
  weights: SimilarityWeights;
  pureDna: PureDnaRow[];
  layers: DnaLayerAggregate[];
}

/**
 * Starting context for a new session: the year after the latest data year,
 * calibrated on August and targeting the full year.
 */
export function defaultContext(profiles: ProfileStore): ForecastContext {
  const { dataYears } = profiles.summary();
  const year = dataYears.length > 0 ? dataYears[dataYears.length - 1] + 1 : new Date().getUTCFullYear();
  return ForecastContextSchema.parse({
    entities: [],
    granularity: "Monthly",
    trial: {
      start: `${year}-08-01`,
      end: `${year}-08-31`,
      sessions: 10_000,
      conversions: 200,
      revenue: 20_000,
    },
    target: {
      start: `${year}-01-01`,
      end: `${year}-12-31`,
      metric: "Revenue",
      value: 100_000,
      driver: "Sessions",
    },
  });
}

export function mergeContext(current: ForecastContext, update: ForecastContextUpdate): ForecastContext {
  return ForecastContextSchema.parse({
    entities: update.entities ?? current.entities,
    granularity: update.granularity ?? current.granularity,
    trial: update.trial ?? current.trial,
    target: update.target ?? current.target,
  });
}

export function trialTotals(context: ForecastContext): VolumeTriple {
  const { sessions, conversions, revenue } = context.trial;
  return { sessions, conversions, revenue };
}

// Similarity weights and pure DNA for the context; the projection year is the trial's year
export function prepareForecast(profiles: ProfileStore, context: ForecastContext): PreparedForecast {
  const records = profiles.requireProfiles();
  const entities = profiles.resolveEntities(context.entities);
  const projectionYear = yearOf(context.trial.start);
  const observed = trialTotals(context);

  const weights = computeSimilarityWeights({
    records,
    entities,
    projectionYear,
    trialStart: context.trial.start,
    trialEnd: context.trial.end,
    observed,
  });
  const pureDna = buildPureDna(records, entities, weights);

  return {
    entities,
    weights,
    pureDna,
    input: {
      projectionYear,
      pureDna,
      trialStart: context.trial.start,
      trialEnd: context.trial.end,
      observed: adjustTrialTotals(observed, context.trial.adjustment),
    },
  };
}

export function requireRun(prepared: PreparedForecast, events: readonly ForecastEvent[]): ForecastRun {
  const run = runForecast(prepared.input, events);
  if (!run) {
    throw new ForecastError(
      "UNCALIBRATABLE_TRIAL",
      "The trial window has no usable days in the projection year. Widen the trial period.",
    );
  }
  return run;
}

export function buildDnaView(
  profiles: ProfileStore,
  context: ForecastContext,
  events: readonly ForecastEvent[],
  granularity: Granularity = context.granularity,
): DnaView {
  const prepared = prepareForecast(profiles, context);
  const frame = buildYearFrame(prepared.input.projectionYear);
  return {
    projectionYear: prepared.input.projectionYear,
    entities: prepared.entities,
    weights: prepared.weights,
    pureDna: prepared.pureDna,
    layers: aggregateLayers(compileLayers(frame, prepared.pureDna, events), granularity),
  };
}

export function forecast(
  profiles: ProfileStore,
  context: ForecastContext,
  events: readonly ForecastEvent[],
): { prepared: PreparedForecast; run: ForecastRun } {
  const prepared = prepareForecast(profiles, context);
  return { prepared, run: requireRun(prepared, events) };
}

export function attribution(
  profiles: ProfileStore,
  context: ForecastContext,
  events: readonly ForecastEvent[],
): AttributionReport {
  const prepared = prepareForecast(profiles, context);
  return attributeEvents(prepared.input, events, context.target);
}

export function goal(
  profiles: ProfileStore,
  context: ForecastContext,
  events: readonly ForecastEvent[],
  granularity: Granularity = context.granularity,
): GoalTranslation {
  const { run } = forecast(profiles, context, events);
  return translateGoal(run, context.target, granularity);
}

export function extract(
  profiles: ProfileStore,
  context: ForecastContext,
  request: { start: string; end: string; name?: string },
): SignatureExtraction {
  return extractSignature({
    transactions: profiles.getTransactions(),
    entities: profiles.resolveEntities(context.entities),
    start: request.start,
    end: request.end,
    name: request.name,
  });
}
