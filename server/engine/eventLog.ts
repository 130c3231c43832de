import type { ForecastEvent } from "@shared/schema";
import { addDays, daysBetween } from "./calendar";

// The log is ordered; attribution credits events in this order.

export function appendEvent(log: readonly ForecastEvent[], event: ForecastEvent): ForecastEvent[] {
  return [...log, event];
}

// null when the index is out of range
export function removeEvent(log: readonly ForecastEvent[], index: number): ForecastEvent[] | null {
  if (!Number.isInteger(index) || index < 0 || index >= log.length) {
    return null;
  }
  return log.filter((_, i) => i !== index);
}

/**
 * Moves a time-bound event to a new start date keeping its length.
 * Structural events have no dates of their own and are returned as null.
 */
export function shiftEvent(event: ForecastEvent, newStart: string): ForecastEvent | null {
  switch (event.type) {
    case "shock":
      return {
        ...event,
        start: newStart,
        end: addDays(newStart, daysBetween(event.start, event.end)),
      };
    case "reapplied_shock":
      return { ...event, newStart };
    default:
      return null;
  }
}

export function replaceEvent(
  log: readonly ForecastEvent[],
  index: number,
  event: ForecastEvent,
): ForecastEvent[] {
  return log.map((existing, i) => (i === index ? event : existing));
}
