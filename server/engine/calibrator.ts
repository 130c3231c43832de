import type { PreAdjustment } from "@shared/schema";
import type { CalibrationConstants, LayeredRow, VolumeTriple } from "@shared/forecastTypes";
import { isWithin } from "./calendar";

// adjusted = raw / (1 + pct / 100); the raw value is kept when the factor is zero
export function preAdjust(raw: number, pct: number): number {
  const factor = 1 + pct / 100;
  return factor !== 0 ? raw / factor : raw;
}

export function adjustTrialTotals(raw: VolumeTriple, adjustment: PreAdjustment): VolumeTriple {
  return {
    sessions: preAdjust(raw.sessions, adjustment.sessions),
    conversions: preAdjust(raw.conversions, adjustment.conversions),
    revenue: preAdjust(raw.revenue, adjustment.revenue),
  };
}

/**
 * Anchors the unitful constants to the observed trial window using the
 * pre-trial layer:
 *
 *   baseSessions       = observed sessions / sum(preTrial sessions index)
 *   baseConversionRate = trial CR / mean(preTrial CR index)
 *   baseOrderValue     = trial AOV / mean(preTrial AOV index)
 *
 * Returns null when the window has no rows in the projection year or the
 * sessions index sums to zero.
 */
export function calibrate(
  layers: LayeredRow[],
  trialStart: string,
  trialEnd: string,
  observed: VolumeTriple,
): CalibrationConstants | null {
  const trialRows = layers.filter((row) => isWithin(row.date, trialStart, trialEnd));
  if (trialRows.length === 0) {
    return null;
  }

  let sessionsIndexSum = 0;
  let conversionRateIndexSum = 0;
  let orderValueIndexSum = 0;
  for (const row of trialRows) {
    sessionsIndexSum += row.preTrial.sessions;
    conversionRateIndexSum += row.preTrial.conversionRate;
    orderValueIndexSum += row.preTrial.orderValue;
  }
  if (sessionsIndexSum === 0) {
    return null;
  }

  const trialConversionRate = observed.sessions > 0 ? observed.conversions / observed.sessions : 0;
  const trialOrderValue = observed.conversions > 0 ? observed.revenue / observed.conversions : 0;
  const meanConversionRateIndex = conversionRateIndexSum / trialRows.length;
  const meanOrderValueIndex = orderValueIndexSum / trialRows.length;

  return {
    baseSessions: observed.sessions / sessionsIndexSum,
    baseConversionRate:
      meanConversionRateIndex > 0 ? trialConversionRate / meanConversionRateIndex : trialConversionRate,
    baseOrderValue: meanOrderValueIndex > 0 ? trialOrderValue / meanOrderValueIndex : trialOrderValue,
  };
}
