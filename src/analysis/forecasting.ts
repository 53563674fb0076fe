// ── Forecasting ─────────────────────────────────────────────────────
// Short-horizon projections: a day-by-day linear extrapolation from a
// finished analysis, and single-value predictions straight from records.

import { TrendAnalysisError } from "./errors.js";
import { addDays, sortByTimestamp, type Measurement, type MetricType } from "./records.js";
import {
  clamp,
  exponentialMovingAverage,
  indexedPoints,
  linearRegression,
  movingAverage,
  predictAt,
} from "./statistics.js";
import type { TrendAnalysis, TrendPoint } from "./trends.js";

export type PredictionMethod =
  | "linearRegression"
  | "exponentialSmoothing"
  | "movingAverage"
  | "seasonalDecomposition";

export const PREDICTION_METHODS: readonly PredictionMethod[] = [
  "linearRegression",
  "exponentialSmoothing",
  "movingAverage",
  "seasonalDecomposition",
];

export interface TrendPrediction {
  dataType: MetricType;
  /** Future-dated, never anomalous, no moving average, values >= 0 */
  predictedPoints: TrendPoint[];
  confidence: number;
  methodology: string;
  validUntil: Date;
}

export interface PredictOptions {
  /** Reference instant for `validUntil` (default: current time) */
  now?: Date;
}

const CONFIDENCE_DECAY = 0.8;
const MIN_CONFIDENCE = 0.1;
const MAX_CONFIDENCE = 0.9;
const SMOOTHING_ALPHA = 0.3;
const MAX_AVERAGE_WINDOW = 7;

/**
 * Extrapolate `lastValue + slope * day` for each of the next `daysAhead`
 * days, starting from the last trend point.
 */
export function predictTrend(
  analysis: TrendAnalysis,
  daysAhead: number,
  options: PredictOptions = {},
): TrendPrediction {
  assertHorizon(daysAhead);

  const lastPoint = analysis.trendPoints[analysis.trendPoints.length - 1];
  if (!lastPoint) {
    throw TrendAnalysisError.insufficientData("Cannot predict from an analysis without trend points");
  }

  const predictedPoints: TrendPoint[] = [];
  for (let day = 1; day <= daysAhead; day++) {
    predictedPoints.push({
      timestamp: addDays(lastPoint.timestamp, day),
      value: Math.max(0, lastPoint.value + analysis.slope * day),
      movingAverage: null,
      isAnomaly: false,
    });
  }

  const now = options.now ?? new Date();

  return {
    dataType: analysis.dataType,
    predictedPoints,
    confidence: clamp(analysis.confidence * CONFIDENCE_DECAY, MIN_CONFIDENCE, MAX_CONFIDENCE),
    methodology: "Linear Regression",
    validUntil: addDays(now, daysAhead),
  };
}

/**
 * Predict a single value `daysAhead` days past the last record.
 *
 * `seasonalDecomposition` is a placeholder that repeats the last value.
 */
export function predictValue(
  records: readonly Measurement[],
  daysAhead: number,
  method: PredictionMethod = "linearRegression",
): number {
  if (records.length === 0) {
    throw TrendAnalysisError.insufficientData("Cannot predict from an empty record set");
  }
  assertHorizon(daysAhead);

  const values = sortByTimestamp(records).map((r) => r.value);
  const lastValue = values[values.length - 1]!;

  switch (method) {
    case "linearRegression": {
      const regression = linearRegression(indexedPoints(values));
      return predictAt(regression, values.length + daysAhead - 1);
    }
    case "exponentialSmoothing": {
      const ema = exponentialMovingAverage(values, SMOOTHING_ALPHA);
      return ema[ema.length - 1] ?? lastValue;
    }
    case "movingAverage": {
      const averages = movingAverage(values, Math.min(MAX_AVERAGE_WINDOW, values.length));
      return averages[averages.length - 1] ?? lastValue;
    }
    case "seasonalDecomposition":
      return lastValue;
  }
}

function assertHorizon(daysAhead: number): void {
  if (!Number.isInteger(daysAhead) || daysAhead <= 0) {
    throw TrendAnalysisError.invalidTimeframe(
      `daysAhead must be a positive integer, got ${daysAhead}`,
    );
  }
}
