// ── Trend Classification ────────────────────────────────────────────
// Turns a value series into a categorical direction, and a finished
// analysis into a single 0-1 strength score.

import {
  clamp,
  indexedPoints,
  linearRegression,
  mean,
  variability,
} from "./statistics.js";

export type TrendDirection = "increasing" | "decreasing" | "stable" | "volatile";

export const DEFAULT_CLASSIFICATION_THRESHOLD = 0.1;

/** Coefficient of variation above which a series is volatile whatever its slope. */
export const VOLATILITY_CUTOFF = 0.3;

const ANOMALY_PENALTY_WEIGHT = 0.1;

/**
 * Classify a series by its regression slope normalised by the series mean.
 *
 * Volatility dominates: a coefficient of variation above 0.3 is always
 * `volatile`. Otherwise `|slope / mean| < threshold` is `stable`.
 */
export function classifyTrend(
  values: readonly number[],
  threshold: number = DEFAULT_CLASSIFICATION_THRESHOLD,
): TrendDirection {
  if (values.length < 2) return "stable";

  const { slope } = linearRegression(indexedPoints(values));
  const avg = mean(values);
  const normalizedSlope = avg === 0 ? 0 : slope / avg;

  if (variability(values).coefficientOfVariation > VOLATILITY_CUTOFF) {
    return "volatile";
  }

  if (Math.abs(normalizedSlope) < threshold) return "stable";
  return normalizedSlope > 0 ? "increasing" : "decreasing";
}

/** The parts of a `TrendAnalysis` that strength is computed from. */
export interface StrengthInput {
  correlation: number;
  anomalies: readonly unknown[];
  summary: {
    totalDataPoints: number;
    averageValue: number;
    standardDeviation: number;
  };
}

/**
 * Blend of `|correlation|` and consistency (`1 - std / mean`, floored at
 * 0), less a small penalty for the share of anomalous points.
 */
export function calculateTrendStrength(analysis: StrengthInput): number {
  const { summary } = analysis;
  const correlationStrength = Math.abs(analysis.correlation);
  const consistency =
    summary.averageValue === 0
      ? 0
      : 1 - summary.standardDeviation / summary.averageValue;
  const anomalyRatio =
    summary.totalDataPoints === 0
      ? 0
      : analysis.anomalies.length / summary.totalDataPoints;

  const strength =
    (correlationStrength + Math.max(0, consistency)) / 2 -
    anomalyRatio * ANOMALY_PENALTY_WEIGHT;

  return clamp(strength, 0, 1);
}
