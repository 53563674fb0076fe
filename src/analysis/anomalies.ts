// ── Anomaly & Outlier Detection ─────────────────────────────────────
// Flags measurements that sit unusually far from the rest of a series.
// `detectAnomalies` scores records by z-score; `detectOutliers` returns
// index positions using one of four interchangeable methods.

import type { Measurement } from "./records.js";
import { mean, median, quartiles, standardDeviation } from "./statistics.js";

export type AnomalySeverity = "low" | "medium" | "high" | "critical";

export interface AnomalyPoint {
  timestamp: Date;
  value: number;
  /** Series mean the value was compared against */
  expectedValue: number;
  /** Absolute z-score */
  deviationScore: number;
  severity: AnomalySeverity;
}

export type OutlierMethod = "zScore" | "iqr" | "modifiedZScore" | "isolation";

export const OUTLIER_METHODS: readonly OutlierMethod[] = [
  "zScore",
  "iqr",
  "modifiedZScore",
  "isolation",
];

export const DEFAULT_SENSITIVITY = 2.0;

/**
 * Lower z-score bound of each severity band. Anything flagged below the
 * `medium` bound is `low`, so the bands partition `[sensitivity, ∞)`.
 */
export const SEVERITY_THRESHOLDS = {
  low: 2.0,
  medium: 2.5,
  high: 3.0,
  critical: 4.0,
} as const;

const Z_SCORE_CUTOFF = 2.0;
const IQR_FENCE = 1.5;
const MODIFIED_Z_SCALE = 0.6745;
const MODIFIED_Z_CUTOFF = 3.5;
const MIN_VALUES = 3;

/**
 * Detect anomalous records by z-score against the series mean and sample
 * standard deviation. Needs at least three records; a series without
 * spread has no anomalies.
 */
export function detectAnomalies(
  records: readonly Measurement[],
  sensitivity: number = DEFAULT_SENSITIVITY,
): AnomalyPoint[] {
  return scoreAnomalies(records, sensitivity).map(({ anomaly }) => anomaly);
}

/** Same scan as `detectAnomalies`, keeping each anomaly's input index. */
export function scoreAnomalies(
  records: readonly Measurement[],
  sensitivity: number = DEFAULT_SENSITIVITY,
): { index: number; anomaly: AnomalyPoint }[] {
  if (records.length < MIN_VALUES) return [];

  const values = records.map((r) => r.value);
  const avg = mean(values);
  const stdDev = standardDeviation(values);
  if (stdDev === 0) return [];

  const flagged: { index: number; anomaly: AnomalyPoint }[] = [];

  records.forEach((record, index) => {
    const zScore = Math.abs(record.value - avg) / stdDev;
    if (zScore >= sensitivity) {
      flagged.push({
        index,
        anomaly: {
          timestamp: record.timestamp,
          value: record.value,
          expectedValue: avg,
          deviationScore: zScore,
          severity: severityFromZScore(zScore),
        },
      });
    }
  });

  return flagged;
}

export function severityFromZScore(zScore: number): AnomalySeverity {
  if (zScore >= SEVERITY_THRESHOLDS.critical) return "critical";
  if (zScore >= SEVERITY_THRESHOLDS.high) return "high";
  if (zScore >= SEVERITY_THRESHOLDS.medium) return "medium";
  return "low";
}

/**
 * Index positions of outliers in `values` using the chosen method.
 * Fewer than three values never yields outliers.
 */
export function detectOutliers(
  values: readonly number[],
  method: OutlierMethod = "zScore",
): number[] {
  if (values.length < MIN_VALUES) return [];

  switch (method) {
    case "zScore":
      return zScoreOutliers(values);
    case "iqr":
      return iqrOutliers(values);
    case "modifiedZScore":
      return modifiedZScoreOutliers(values);
    case "isolation":
      // Simplification: no isolation forest, the z-score scan stands in.
      return zScoreOutliers(values);
  }
}

// ── Methods ─────────────────────────────────────────────────────────

function zScoreOutliers(values: readonly number[]): number[] {
  const avg = mean(values);
  const stdDev = standardDeviation(values);
  if (stdDev === 0) return [];

  return indicesWhere(values, (v) => Math.abs(v - avg) / stdDev >= Z_SCORE_CUTOFF);
}

function iqrOutliers(values: readonly number[]): number[] {
  const { q1, q3 } = quartiles(values);
  const iqr = q3 - q1;
  const lower = q1 - IQR_FENCE * iqr;
  const upper = q3 + IQR_FENCE * iqr;

  return indicesWhere(values, (v) => v < lower || v > upper);
}

function modifiedZScoreOutliers(values: readonly number[]): number[] {
  const med = median(values);
  const mad = median(values.map((v) => Math.abs(v - med)));
  if (mad === 0) return [];

  return indicesWhere(
    values,
    (v) => Math.abs((MODIFIED_Z_SCALE * (v - med)) / mad) >= MODIFIED_Z_CUTOFF,
  );
}

function indicesWhere(
  values: readonly number[],
  predicate: (value: number) => boolean,
): number[] {
  const indices: number[] = [];
  values.forEach((v, i) => {
    if (predicate(v)) indices.push(i);
  });
  return indices;
}
