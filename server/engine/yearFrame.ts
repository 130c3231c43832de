import type { FrameRow } from "@shared/forecastTypes";
import { dateRange, toFrameRow } from "./calendar";

// 365 or 366 daily rows for the projection year
export function buildYearFrame(year: number): FrameRow[] {
  return dateRange(`${year}-01-01`, `${year}-12-31`).map(toFrameRow);
}
