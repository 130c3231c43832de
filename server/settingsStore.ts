import { promises as fs } from "fs";
import path from "path";
import {
  ALL_ENTITIES_KEY,
  AppSettingsSchema,
  CampaignShape,
  type AppSettings,
  type ShapeDefaults,
} from "@shared/schema";
import { DEFAULT_LIFT_PERCENT } from "./engine/constants";
import { normalizeEntity } from "./profileStore";

export function defaultShapeDefaults(): ShapeDefaults {
  const defaults: ShapeDefaults = {};
  for (const shape of CampaignShape.options) {
    defaults[shape] = DEFAULT_LIFT_PERCENT;
  }
  return defaults;
}

export function defaultSettings(): AppSettings {
  return { campaignDefaults: { [ALL_ENTITIES_KEY]: defaultShapeDefaults() } };
}

// Entity entry wins over the all-entities entry; 25% when neither names the shape
export function getCampaignDefault(settings: AppSettings, entity: string | null | undefined, shape: CampaignShape): number {
  const defaults = settings.campaignDefaults;
  if (entity) {
    const value = defaults[normalizeEntity(entity)]?.[shape];
    if (value !== undefined) {
      return value;
    }
  }
  return defaults[ALL_ENTITIES_KEY]?.[shape] ?? DEFAULT_LIFT_PERCENT;
}

function normalizeSettings(settings: AppSettings): AppSettings {
  const campaignDefaults: AppSettings["campaignDefaults"] = {};
  for (const [entity, shapes] of Object.entries(settings.campaignDefaults)) {
    const key = entity === ALL_ENTITIES_KEY ? entity : normalizeEntity(entity);
    if (key) {
      campaignDefaults[key] = shapes;
    }
  }
  if (!campaignDefaults[ALL_ENTITIES_KEY]) {
    campaignDefaults[ALL_ENTITIES_KEY] = defaultShapeDefaults();
  }
  return { campaignDefaults };
}

/**
 * Campaign default lifts persisted as a JSON file. A missing or unreadable
 * file falls back to the built-in defaults.
 */
export class SettingsStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<AppSettings> {
    try {
      const raw = await fs.readFile(this.filePath, "utf-8");
      const parsed = AppSettingsSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        console.warn(`[Settings] Ignoring invalid settings file "${this.filePath}":`, parsed.error.issues);
        return defaultSettings();
      }
      return normalizeSettings(parsed.data);
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        console.warn(`[Settings] Failed to read settings "${this.filePath}":`, error);
      }
      return defaultSettings();
    }
  }

  async save(settings: AppSettings): Promise<AppSettings> {
    const normalized = normalizeSettings(settings);
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(normalized, null, 2), "utf-8");
    console.log(`[Settings] Saved settings to ${this.filePath}`);
    return normalized;
  }
}
