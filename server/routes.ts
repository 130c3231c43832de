import type { Express, Request } from "express";
import { createServer, type Server } from "http";
import session from "express-session";
import {
  AppSettingsSchema,
  CAMPAIGN_SHAPES,
  CampaignDefaultQuerySchema,
  CampaignType,
  CsvUploadSchema,
  ExtractSignatureRequestSchema,
  ForecastContextUpdateSchema,
  ForecastEventSchema,
  GranularityQuerySchema,
  GrowthTargetQuerySchema,
  InjectSignatureRequestSchema,
  ProjectionQuerySchema,
  ShapePreviewRequestSchema,
  ShiftEventSchema,
  type ForecastContext,
  type ForecastEvent,
} from "@shared/schema";
import type { ShockSignature } from "@shared/forecastTypes";
import { attributeEvents, describeEvent } from "./engine/attribution";
import { appendEvent, removeEvent, replaceEvent, shiftEvent } from "./engine/eventLog";
import { growthTarget } from "./engine/goalTracker";
import { runForecast } from "./engine/pipeline";
import { aggregateProjection } from "./engine/projection";
import { previewInjection, previewShape } from "./engine/shockEngine";
import { toReappliedShock } from "./engine/signatureExtractor";
import { ForecastError, sendError } from "./errors";
import {
  attribution,
  buildDnaView,
  defaultContext,
  extract,
  forecast,
  goal,
  mergeContext,
  prepareForecast,
} from "./forecastService";
import { buildExcelReport } from "./excelReport";
import { log } from "./logger";
import { normalizeEntity, parseProfilesCsv, parseTransactionsCsv, type ProfileStore } from "./profileStore";
import { getCampaignDefault, type SettingsStore } from "./settingsStore";

declare module "express-session" {
  interface SessionData {
    forecastContext?: ForecastContext;
    eventLog?: ForecastEvent[];
    signatureLibrary?: ShockSignature[];
  }
}

export interface RouteDependencies {
  profiles: ProfileStore;
  settings: SettingsStore;
  sessionSecret: string;
  secureCookies?: boolean;
}

function describeLog(events: ForecastEvent[]) {
  return events.map((event, index) => ({ index, event, ...describeEvent(event) }));
}

// A shock may name its campaign type instead of a shape
function withCampaignShape(body: unknown): unknown {
  if (typeof body !== "object" || body === null || !("type" in body) || body.type !== "shock" || "shape" in body) {
    return body;
  }
  const campaign = CampaignType.safeParse("campaign" in body ? body.campaign : undefined);
  return campaign.success ? { ...body, shape: CAMPAIGN_SHAPES[campaign.data] } : body;
}

function parseIndex(raw: string, events: ForecastEvent[]): number {
  const index = Number(raw);
  if (!Number.isInteger(index) || index < 0 || index >= events.length) {
    throw new ForecastError("EVENT_NOT_FOUND", `No event at position ${raw}`);
  }
  return index;
}

export async function registerRoutes(app: Express, deps: RouteDependencies): Promise<Server> {
  const { profiles, settings } = deps;

  // Per-analyst state: forecast context, event log and signature library
  app.use(
    session({
      secret: deps.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: {
        secure: deps.secureCookies ?? false,
        httpOnly: true,
        maxAge: 24 * 60 * 60 * 1000, // 24 hours
      },
    })
  );

  function currentContext(req: Request): ForecastContext {
    if (!req.session.forecastContext) {
      req.session.forecastContext = defaultContext(profiles);
    }
    return req.session.forecastContext;
  }

  function currentEvents(req: Request): ForecastEvent[] {
    return req.session.eventLog ?? [];
  }

  function currentLibrary(req: Request): ShockSignature[] {
    return req.session.signatureLibrary ?? [];
  }

  // === Catalogue ===

  app.get("/api/catalogue", (_req, res) => {
    res.json({ ...profiles.summary(), yearlyKpis: profiles.getYearlyKpis() });
  });

  app.post("/api/catalogue/transactions", (req, res) => {
    try {
      const { csvText, fileName } = CsvUploadSchema.parse(req.body);
      const transactions = parseTransactionsCsv(csvText);
      profiles.setTransactions(transactions);
      log(`Loaded ${transactions.length} transactions from ${fileName ?? "upload"}`, "Profiles");
      res.json(profiles.summary());
    } catch (error) {
      sendError(res, error, "Failed to load transactions");
    }
  });

  app.post("/api/catalogue/profiles", (req, res) => {
    try {
      const { csvText, fileName } = CsvUploadSchema.parse(req.body);
      const records = parseProfilesCsv(csvText);
      profiles.setProfiles(records);
      log(`Loaded ${records.length} profile records from ${fileName ?? "upload"}`, "Profiles");
      res.json(profiles.summary());
    } catch (error) {
      sendError(res, error, "Failed to load profiles");
    }
  });

  app.get("/api/catalogue/growth-target", (req, res) => {
    try {
      const query = GrowthTargetQuerySchema.parse(req.query);
      const entity = normalizeEntity(query.entity);
      const kpi = profiles.getYearlyKpis().find((row) => row.entity === entity && row.year === query.year);
      if (!kpi) {
        return res.status(404).json({ error: `No KPIs for ${entity} in ${query.year}` });
      }
      res.json({
        ...query,
        entity,
        baseValue: growthTarget(kpi, query.metric, 0),
        target: growthTarget(kpi, query.metric, query.growth),
      });
    } catch (error) {
      sendError(res, error, "Failed to compute growth target");
    }
  });

  // === Forecast Context ===

  app.get("/api/context", (req, res) => {
    res.json(currentContext(req));
  });

  app.put("/api/context", (req, res) => {
    try {
      const update = ForecastContextUpdateSchema.parse(req.body);
      const context = mergeContext(currentContext(req), update);
      req.session.forecastContext = context;
      res.json(context);
    } catch (error) {
      sendError(res, error, "Failed to update forecast context");
    }
  });

  // === DNA & Projection ===

  app.get("/api/dna", (req, res) => {
    try {
      const { granularity } = GranularityQuerySchema.parse(req.query);
      const context = currentContext(req);
      res.json(buildDnaView(profiles, context, currentEvents(req), granularity ?? context.granularity));
    } catch (error) {
      sendError(res, error, "Failed to build demand DNA");
    }
  });

  app.get("/api/projection", (req, res) => {
    try {
      const query = ProjectionQuerySchema.parse(req.query);
      const context = currentContext(req);
      const granularity = query.granularity ?? context.granularity;
      const { prepared, run } = forecast(profiles, context, currentEvents(req));
      res.json({
        projectionYear: run.projectionYear,
        entities: prepared.entities,
        weights: prepared.weights,
        constants: run.constants,
        granularity,
        view: query.view,
        rows: query.view === "daily" ? run.rows : aggregateProjection(run.rows, granularity),
      });
    } catch (error) {
      sendError(res, error, "Failed to run projection");
    }
  });

  // === Event Log ===

  app.get("/api/events", (req, res) => {
    res.json({ events: describeLog(currentEvents(req)) });
  });

  app.post("/api/events", (req, res) => {
    try {
      const event = ForecastEventSchema.parse(withCampaignShape(req.body));
      req.session.eventLog = appendEvent(currentEvents(req), event);
      res.status(201).json({ events: describeLog(req.session.eventLog) });
    } catch (error) {
      sendError(res, error, "Failed to add event");
    }
  });

  app.delete("/api/events", (req, res) => {
    req.session.eventLog = [];
    res.json({ events: [] });
  });

  app.delete("/api/events/:index", (req, res) => {
    try {
      const events = currentEvents(req);
      const remaining = removeEvent(events, parseIndex(req.params.index, events));
      req.session.eventLog = remaining ?? events;
      res.json({ events: describeLog(req.session.eventLog) });
    } catch (error) {
      sendError(res, error, "Failed to remove event");
    }
  });

  app.post("/api/events/:index/shift", (req, res) => {
    try {
      const events = currentEvents(req);
      const index = parseIndex(req.params.index, events);
      const { newStart } = ShiftEventSchema.parse(req.body);
      const shifted = shiftEvent(events[index], newStart);
      if (!shifted) {
        throw new ForecastError("EVENT_NOT_SHIFTABLE", "Only campaign and re-injection events can be shifted");
      }
      req.session.eventLog = replaceEvent(events, index, shifted);
      res.json({ events: describeLog(req.session.eventLog) });
    } catch (error) {
      sendError(res, error, "Failed to shift event");
    }
  });

  app.post("/api/shapes/preview", (req, res) => {
    try {
      const { start, end, shape, lift } = ShapePreviewRequestSchema.parse(req.body);
      res.json({ shape, lift, points: previewShape(start, end, shape, lift) });
    } catch (error) {
      sendError(res, error, "Failed to preview shape");
    }
  });

  // === Signature Library ===

  app.post("/api/signatures/extract", (req, res) => {
    try {
      const request = ExtractSignatureRequestSchema.parse(req.body);
      const result = extract(profiles, currentContext(req), request);
      if (result.status === "no_data") {
        throw new ForecastError("NO_DATA_IN_WINDOW", "No transactions fall inside the selected window.");
      }
      if (result.status === "no_significant_shock") {
        throw new ForecastError(
          "NO_SIGNIFICANT_SHOCK",
          "No significant shock detected above the organic floor.",
        );
      }
      if (request.save) {
        req.session.signatureLibrary = [...currentLibrary(req), result.signature];
        log(`Saved signature "${result.signature.name}"`, "Forecast");
      }
      res.status(request.save ? 201 : 200).json({
        signature: result.signature,
        context: result.context,
        saved: request.save,
      });
    } catch (error) {
      sendError(res, error, "Failed to extract signature");
    }
  });

  app.get("/api/signatures", (req, res) => {
    res.json({ signatures: currentLibrary(req) });
  });

  app.post("/api/signatures/:id/inject", (req, res) => {
    try {
      const signature = currentLibrary(req).find((entry) => entry.id === req.params.id);
      if (!signature) {
        throw new ForecastError("SIGNATURE_NOT_FOUND", `Unknown signature ${req.params.id}`);
      }
      const { newStart, mode } = InjectSignatureRequestSchema.parse(req.body);
      const event = toReappliedShock(signature, newStart, mode);
      req.session.eventLog = appendEvent(currentEvents(req), event);
      res.status(201).json({ event, events: describeLog(req.session.eventLog) });
    } catch (error) {
      sendError(res, error, "Failed to inject signature");
    }
  });

  app.post("/api/signatures/:id/preview", (req, res) => {
    try {
      const signature = currentLibrary(req).find((entry) => entry.id === req.params.id);
      if (!signature) {
        throw new ForecastError("SIGNATURE_NOT_FOUND", `Unknown signature ${req.params.id}`);
      }
      const { newStart, mode } = InjectSignatureRequestSchema.parse(req.body);
      const { run } = forecast(profiles, currentContext(req), currentEvents(req));
      res.json({
        signatureId: signature.id,
        newStart,
        mode,
        points: previewInjection(run.rows, toReappliedShock(signature, newStart, mode)),
      });
    } catch (error) {
      sendError(res, error, "Failed to preview injection");
    }
  });

  app.delete("/api/signatures/:id", (req, res) => {
    try {
      const library = currentLibrary(req);
      if (!library.some((entry) => entry.id === req.params.id)) {
        throw new ForecastError("SIGNATURE_NOT_FOUND", `Unknown signature ${req.params.id}`);
      }
      req.session.signatureLibrary = library.filter((entry) => entry.id !== req.params.id);
      res.json({ signatures: req.session.signatureLibrary });
    } catch (error) {
      sendError(res, error, "Failed to delete signature");
    }
  });

  // === Attribution & Goal ===

  app.get("/api/attribution", (req, res) => {
    try {
      const report = attribution(profiles, currentContext(req), currentEvents(req));
      if (report.status === "empty_target_window") {
        throw new ForecastError("EMPTY_TARGET_WINDOW", "The target window has no days in the projection year.");
      }
      res.json(report);
    } catch (error) {
      sendError(res, error, "Failed to attribute events");
    }
  });

  app.get("/api/goal", (req, res) => {
    try {
      const { granularity } = GranularityQuerySchema.parse(req.query);
      const context = currentContext(req);
      const translation = goal(profiles, context, currentEvents(req), granularity ?? context.granularity);
      if (translation.status === "empty_target_window") {
        throw new ForecastError("EMPTY_TARGET_WINDOW", "The target window has no days in the projection year.");
      }
      res.json(translation);
    } catch (error) {
      sendError(res, error, "Failed to translate target");
    }
  });

  // === Settings ===

  app.get("/api/settings", async (_req, res) => {
    try {
      res.json(await settings.load());
    } catch (error) {
      sendError(res, error, "Failed to load settings");
    }
  });

  app.put("/api/settings", async (req, res) => {
    try {
      const saved = await settings.save(AppSettingsSchema.parse(req.body));
      res.json(saved);
    } catch (error) {
      sendError(res, error, "Failed to save settings");
    }
  });

  app.get("/api/settings/campaign-default", async (req, res) => {
    try {
      const { entity, shape } = CampaignDefaultQuerySchema.parse(req.query);
      const lift = getCampaignDefault(await settings.load(), entity, shape);
      res.json({ entity: entity ? normalizeEntity(entity) : null, shape, lift });
    } catch (error) {
      sendError(res, error, "Failed to resolve campaign default");
    }
  });

  // === Excel Report ===

  app.get("/api/report/excel", async (req, res) => {
    try {
      const generatedAt = new Date().toISOString();
      const context = currentContext(req);
      const events = currentEvents(req);
      const prepared = prepareForecast(profiles, context);
      const run = runForecast(prepared.input, events);

      const buffer = await buildExcelReport({
        generatedAt,
        context,
        entities: prepared.entities,
        weights: prepared.weights,
        constants: run?.constants ?? null,
        rows: run?.rows ?? [],
        periods: run ? aggregateProjection(run.rows, context.granularity) : [],
        events,
        attribution: attributeEvents(prepared.input, events, context.target),
        signatures: currentLibrary(req),
      });
      const filenameTimestamp = generatedAt.replace(/[:.]/g, "-");

      res.setHeader(
        "Content-Type",
        "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
      );
      res.setHeader(
        "Content-Disposition",
        `attachment; filename="Demand_DNA_Report_${filenameTimestamp}.xlsx"`,
      );
      res.send(buffer);
    } catch (error) {
      sendError(res, error, "Failed to generate Excel report");
    }
  });

  const httpServer = createServer(app);

  return httpServer;
}
