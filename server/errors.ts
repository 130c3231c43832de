import type { Response } from "express";
import { ZodError } from "zod";

export type ForecastErrorCode =
  | "UNCALIBRATABLE_TRIAL"
  | "EMPTY_TARGET_WINDOW"
  | "NO_SIGNIFICANT_SHOCK"
  | "NO_DATA_IN_WINDOW"
  | "EVENT_NOT_FOUND"
  | "EVENT_NOT_SHIFTABLE"
  | "SIGNATURE_NOT_FOUND"
  | "PROFILES_NOT_LOADED";

const DEFAULT_STATUS: Record<ForecastErrorCode, number> = {
  UNCALIBRATABLE_TRIAL: 422,
  EMPTY_TARGET_WINDOW: 422,
  NO_SIGNIFICANT_SHOCK: 422,
  NO_DATA_IN_WINDOW: 422,
  EVENT_NOT_FOUND: 404,
  EVENT_NOT_SHIFTABLE: 400,
  SIGNATURE_NOT_FOUND: 404,
  PROFILES_NOT_LOADED: 503,
};

export class ForecastError extends Error {
  readonly code: ForecastErrorCode;
  readonly status: number;

  constructor(code: ForecastErrorCode, message: string, status = DEFAULT_STATUS[code]) {
    super(message);
    this.name = "ForecastError";
    this.code = code;
    this.status = status;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Maps a thrown value onto the JSON error contract used by every route
export function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: "Invalid request", details: error.issues });
    return;
  }
  if (error instanceof ForecastError) {
    res.status(error.status).json({ error: error.message, code: error.code });
    return;
  }
  console.error(`${fallback}:`, error);
  res.status(500).json({ error: fallback, details: errorMessage(error) });
}
