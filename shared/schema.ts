// Demand DNA Lab wire schemas
// Session-based state only; profile data is loaded from CSV at startup or upload

import { z } from "zod";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date");

// === Catalogue Types ===

export const Granularity = z.enum(["Monthly", "Weekly", "Daily"]);
export type Granularity = z.infer<typeof Granularity>;

export const OVERALL_YEAR = "Overall";

// One row of the historical profile table (per entity, year, granularity, period)
export const HistoricalIndexRecordSchema = z.object({
  entity: z.string(),
  year: z.string(), // "Overall" or a calendar year such as "2024"
  granularity: Granularity,
  period: z.number().int().min(1),
  sessions: z.number().default(0),
  conversions: z.number().default(0),
  revenue: z.number().default(0),
  conversionRate: z.number().default(0),
  orderValue: z.number().default(0),
  sessionsIndex: z.number(),
  conversionRateIndex: z.number(),
  orderValueIndex: z.number(),
});
export type HistoricalIndexRecord = z.infer<typeof HistoricalIndexRecordSchema>;

export const DailyTransactionSchema = z.object({
  date: isoDate,
  entity: z.string(),
  sessions: z.number().min(0).default(0),
  conversions: z.number().min(0).default(0),
  revenue: z.number().min(0).default(0),
});
export type DailyTransaction = z.infer<typeof DailyTransactionSchema>;

export const YearlyKpiSchema = z.object({
  entity: z.string(),
  year: z.number().int(),
  sessions: z.number(),
  conversions: z.number(),
  revenue: z.number(),
  conversionRate: z.number(),
  orderValue: z.number(),
});
export type YearlyKpi = z.infer<typeof YearlyKpiSchema>;

// === Event Log ===

export const CampaignShape = z.enum(["front_loaded", "linear_fade", "delayed_peak", "step"]);
export type CampaignShape = z.infer<typeof CampaignShape>;

export const CampaignType = z.enum(["Email Campaign", "Flash Sale", "Product Launch", "Awareness Drive"]);
export type CampaignType = z.infer<typeof CampaignType>;

// Campaign type (display name) -> response curve
export const CAMPAIGN_SHAPES: Record<CampaignType, CampaignShape> = {
  "Email Campaign": "front_loaded",
  "Flash Sale": "linear_fade",
  "Product Launch": "delayed_peak",
  "Awareness Drive": "step",
};

export const EventScope = z.enum(["pre_trial", "post_trial"]);
export type EventScope = z.infer<typeof EventScope>;

export const InjectionMode = z.enum(["absolute", "relative"]);
export type InjectionMode = z.infer<typeof InjectionMode>;

export const ShockEventSchema = z.object({
  type: z.literal("shock"),
  start: isoDate,
  end: isoDate,
  shape: CampaignShape,
  lift: z.number().min(-1).max(10), // fraction, 0.25 = +25%
  campaign: CampaignType.optional(),
});
export type ShockEvent = z.infer<typeof ShockEventSchema>;

export const CustomDragEventSchema = z.object({
  type: z.literal("custom_drag"),
  granularity: Granularity,
  target: z.number().int().min(1),
  multiplier: z.number().min(0),
  scope: EventScope.default("post_trial"),
});
export type CustomDragEvent = z.infer<typeof CustomDragEventSchema>;

export const DateRangeSchema = z.object({
  start: isoDate,
  end: isoDate,
});
export type DateRange = z.infer<typeof DateRangeSchema>;

export const SwapSelectionSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("periods"),
    a: z.number().int().min(1),
    b: z.number().int().min(1),
  }),
  z.object({
    mode: z.literal("ranges"),
    a: DateRangeSchema,
    b: DateRangeSchema,
  }),
]);
export type SwapSelection = z.infer<typeof SwapSelectionSchema>;

export const SwapEventSchema = z.object({
  type: z.literal("swap"),
  granularity: Granularity,
  selection: SwapSelectionSchema,
  scope: EventScope.default("post_trial"),
});
export type SwapEvent = z.infer<typeof SwapEventSchema>;

export const MetricSeriesSchema = z.object({
  sessions: z.array(z.number()),
  conversions: z.array(z.number()),
  revenue: z.array(z.number()),
});
export type MetricSeries = z.infer<typeof MetricSeriesSchema>;

export const ReappliedShockEventSchema = z.object({
  type: z.literal("reapplied_shock"),
  signatureName: z.string(),
  mode: InjectionMode,
  newStart: isoDate,
  duration: z.number().int().min(1),
  absolute: MetricSeriesSchema,
  relative: MetricSeriesSchema,
});
export type ReappliedShockEvent = z.infer<typeof ReappliedShockEventSchema>;

export const ForecastEventSchema = z.discriminatedUnion("type", [
  ShockEventSchema,
  CustomDragEventSchema,
  SwapEventSchema,
  ReappliedShockEventSchema,
]);
export type ForecastEvent = z.infer<typeof ForecastEventSchema>;
export type StructuralEvent = CustomDragEvent | SwapEvent;

export const ShiftEventSchema = z.object({
  newStart: isoDate,
});

// === Forecast Context ===

export const VolumeMetric = z.enum(["Sessions", "Conversions", "Revenue"]);
export type VolumeMetric = z.infer<typeof VolumeMetric>;

export const TargetMetric = z.enum(["Sessions", "Conversions", "Revenue", "CR", "AOV"]);
export type TargetMetric = z.infer<typeof TargetMetric>;

export const VolumeDriver = z.enum(["Sessions", "CR", "AOV"]);
export type VolumeDriver = z.infer<typeof VolumeDriver>;

// Percent by which the trial was boosted (+) or suppressed (-)
export const PreAdjustmentSchema = z.object({
  sessions: z.number().min(-100).max(500).default(0),
  conversions: z.number().min(-100).max(500).default(0),
  revenue: z.number().min(-100).max(500).default(0),
});
export type PreAdjustment = z.infer<typeof PreAdjustmentSchema>;

export const TrialObservationSchema = z.object({
  start: isoDate,
  end: isoDate,
  sessions: z.number().min(0),
  conversions: z.number().min(0),
  revenue: z.number().min(0),
  adjustment: PreAdjustmentSchema.default({}),
});
export type TrialObservation = z.infer<typeof TrialObservationSchema>;

export const TargetSettingsSchema = z.object({
  start: isoDate,
  end: isoDate,
  metric: TargetMetric.default("Revenue"),
  value: z.number().default(0),
  driver: VolumeDriver.default("Sessions"),
});
export type TargetSettings = z.infer<typeof TargetSettingsSchema>;

export const ForecastContextSchema = z.object({
  entities: z.array(z.string()).default([]), // empty = every entity
  granularity: Granularity.default("Monthly"),
  trial: TrialObservationSchema,
  target: TargetSettingsSchema,
});
export type ForecastContext = z.infer<typeof ForecastContextSchema>;

export const ForecastContextUpdateSchema = z.object({
  entities: z.array(z.string()).optional(),
  granularity: Granularity.optional(),
  trial: TrialObservationSchema.optional(),
  target: TargetSettingsSchema.optional(),
});
export type ForecastContextUpdate = z.infer<typeof ForecastContextUpdateSchema>;

// === Signatures ===

export const ExtractSignatureRequestSchema = z.object({
  start: isoDate,
  end: isoDate,
  name: z.string().trim().min(1).optional(),
  save: z.boolean().default(true),
});
export type ExtractSignatureRequest = z.infer<typeof ExtractSignatureRequestSchema>;

export const InjectSignatureRequestSchema = z.object({
  newStart: isoDate,
  mode: InjectionMode.default("absolute"),
});
export type InjectSignatureRequest = z.infer<typeof InjectSignatureRequestSchema>;

export const ShapePreviewRequestSchema = z.object({
  start: isoDate,
  end: isoDate,
  shape: CampaignShape,
  lift: z.number(),
});
export type ShapePreviewRequest = z.infer<typeof ShapePreviewRequestSchema>;

// === Settings ===

export const ALL_ENTITIES_KEY = "__all__";

export const ShapeDefaultsSchema = z.record(CampaignShape, z.number().int());
export type ShapeDefaults = z.infer<typeof ShapeDefaultsSchema>;

export const AppSettingsSchema = z.object({
  campaignDefaults: z.record(z.string(), ShapeDefaultsSchema).default({}),
});
export type AppSettings = z.infer<typeof AppSettingsSchema>;

// === Catalogue Uploads ===

export const CsvUploadSchema = z.object({
  csvText: z.string().min(1),
  fileName: z.string().trim().optional(),
});
export type CsvUpload = z.infer<typeof CsvUploadSchema>;

// === Query Strings ===

export const GranularityQuerySchema = z.object({
  granularity: Granularity.optional(),
});

export const ProjectionQuerySchema = GranularityQuerySchema.extend({
  view: z.enum(["periods", "daily"]).default("periods"),
});
export type ProjectionQuery = z.infer<typeof ProjectionQuerySchema>;

export const CampaignDefaultQuerySchema = z.object({
  entity: z.string().trim().optional(),
  shape: CampaignShape,
});

export const GrowthTargetQuerySchema = z.object({
  entity: z.string().trim().min(1),
  year: z.coerce.number().int(),
  metric: TargetMetric.default("Revenue"),
  growth: z.coerce.number().default(0),
});
export type GrowthTargetQuery = z.infer<typeof GrowthTargetQuerySchema>;
