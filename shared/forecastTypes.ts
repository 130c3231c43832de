import type {
  ForecastEvent,
  MetricSeries,
  TargetMetric,
  VolumeMetric,
} from "./schema";

export interface IndexTriple {
  sessions: number;
  conversionRate: number;
  orderValue: number;
}

export interface VolumeTriple {
  sessions: number;
  conversions: number;
  revenue: number;
}

export type SimilarityWeights = Record<string, number>;

export interface PureDnaRow extends IndexTriple {
  month: number;
}

export interface FrameRow {
  date: string;
  month: number;
  week: number;
  dayOfYear: number;
}

export interface LayeredRow extends FrameRow {
  pure: IndexTriple;
  preTrial: IndexTriple;
  work: IndexTriple;
}

export interface CalibrationConstants {
  baseSessions: number;
  baseConversionRate: number;
  baseOrderValue: number;
}

export interface ProjectionRow extends LayeredRow {
  shock: number;
  sessionsBase: number;
  conversionsBase: number;
  revenueBase: number;
  sessionsSim: number;
  conversionsSim: number;
  revenueSim: number;
  sessionsBaseMin: number;
  sessionsBaseMax: number;
  conversionsBaseMin: number;
  conversionsBaseMax: number;
  revenueBaseMin: number;
  revenueBaseMax: number;
  sessionsSimMin: number;
  sessionsSimMax: number;
  conversionsSimMin: number;
  conversionsSimMax: number;
  revenueSimMin: number;
  revenueSimMax: number;
}

export interface ForecastRun {
  projectionYear: number;
  constants: CalibrationConstants;
  rows: ProjectionRow[];
}

export interface PeriodAggregate {
  period: number;
  firstDate: string;
  sessionsBase: number;
  conversionsBase: number;
  revenueBase: number;
  sessionsSim: number;
  conversionsSim: number;
  revenueSim: number;
  sessionsBaseMin: number;
  sessionsBaseMax: number;
  sessionsSimMin: number;
  sessionsSimMax: number;
  conversionsBaseMin: number;
  conversionsBaseMax: number;
  conversionsSimMin: number;
  conversionsSimMax: number;
  revenueBaseMin: number;
  revenueBaseMax: number;
  revenueSimMin: number;
  revenueSimMax: number;
  conversionRateBase: number;
  conversionRateSim: number;
  orderValueBase: number;
  orderValueSim: number;
}

export interface DnaLayerAggregate {
  period: number;
  pure: IndexTriple;
  preTrial: IndexTriple;
  work: IndexTriple;
}

export interface ShockSignature {
  id: string;
  name: string;
  originStart: string;
  originEnd: string;
  duration: number;
  floor: VolumeTriple;
  totals: VolumeTriple;
  organicConversionRate: number;
  eventConversionRate: number;
  conversionRateDelta: number;
  dates: string[];
  absolute: MetricSeries;
  relative: MetricSeries;
  createdAt: string;
}

export interface ContextPoint extends VolumeTriple {
  date: string;
  inWindow: boolean;
}

export type SignatureExtraction =
  | { status: "ok"; signature: ShockSignature; context: ContextPoint[] }
  | { status: "no_data"; context: ContextPoint[] }
  | { status: "no_significant_shock"; floor: VolumeTriple; context: ContextPoint[] };

export interface AttributionRow {
  index: number;
  type: ForecastEvent["type"];
  label: string;
  description: string;
  scope: string;
  contribution: number;
  gapCoveragePct: number;
}

export interface AttributionReport {
  status: "ok" | "empty_target_window";
  metric: VolumeMetric;
  organic: number;
  needed: number;
  gap: number;
  simulated: number;
  rows: AttributionRow[];
}

export interface GoalPeriodRow {
  period: number;
  firstDate: string;
  needed: VolumeTriple;
  base: VolumeTriple;
  sim: VolumeTriple;
  gapBase: VolumeTriple;
  gapSim: VolumeTriple;
}

export interface GoalKpis extends VolumeTriple {
  conversionRate: number;
  orderValue: number;
}

export type GoalTranslation =
  | { status: "empty_target_window"; metric: TargetMetric }
  | {
      status: "ok";
      metric: TargetMetric;
      needed: GoalKpis;
      before: GoalKpis;
      after: GoalKpis;
      periods: GoalPeriodRow[];
    };
