// ── Trend Analysis ──────────────────────────────────────────────────
// Filters records to a time window, sorts them, and combines regression,
// classification, anomaly detection and data quality into one
// `TrendAnalysis` snapshot.

import { DEFAULT_SENSITIVITY, scoreAnomalies, type AnomalyPoint } from "./anomalies.js";
import {
  classifyTrend,
  DEFAULT_CLASSIFICATION_THRESHOLD,
  type TrendDirection,
} from "./classification.js";
import { TrendAnalysisError } from "./errors.js";
import { assessDataQuality } from "./quality.js";
import {
  rangeContains,
  resolveTimeWindow,
  sortByTimestamp,
  type DateRange,
  type Measurement,
  type MetricType,
  type TimeWindow,
} from "./records.js";
import {
  indexedPoints,
  linearRegression,
  mean,
  movingAverage,
  standardDeviation,
} from "./statistics.js";

export interface TrendPoint {
  timestamp: Date;
  value: number;
  /** Present once a full moving-average window is available */
  movingAverage: number | null;
  isAnomaly: boolean;
}

export interface TrendSummary {
  totalDataPoints: number;
  averageValue: number;
  minimumValue: number;
  maximumValue: number;
  standardDeviation: number;
  /** (last - first) / first * 100, or 0 when the first value is 0 */
  changePercentage: number;
  firstValue: number;
  lastValue: number;
}

export interface TrendAnalysis {
  dataType: MetricType;
  timeRange: DateRange;
  trendPoints: TrendPoint[];
  direction: TrendDirection;
  slope: number;
  correlation: number;
  anomalies: AnomalyPoint[];
  summary: TrendSummary;
  /** Mean of regression R² and the data-quality overall score */
  confidence: number;
}

export interface AnalyzeOptions {
  /** Reference instant for relative windows and timeliness (default: current time) */
  now?: Date;
}

/**
 * Analyze the records that fall inside `window`.
 *
 * Throws `insufficientData` for an empty input or when fewer than two
 * records remain after filtering, and the window's own errors
 * (`invalidTimeframe`, `invalidPeriod`, `calculationFailed`) when its
 * bounds cannot be derived.
 */
export function analyzeTrends(
  records: readonly Measurement[],
  window: TimeWindow,
  options: AnalyzeOptions = {},
): TrendAnalysis {
  if (records.length === 0) {
    throw TrendAnalysisError.insufficientData("Cannot analyze an empty record set");
  }

  const now = options.now ?? new Date();
  const { range, movingAverageWindow } = resolveTimeWindow(window, now);

  // ── Filter + sort ─────────────────────────────────────────────────
  const sorted = sortByTimestamp(records.filter((r) => rangeContains(range, r.timestamp)));
  if (sorted.length < 2) {
    throw TrendAnalysisError.insufficientData(
      `At least 2 records are required in the window, found ${sorted.length}`,
    );
  }

  const values = sorted.map((r) => r.value);
  const windowSize = movingAverageWindow ?? optimalWindowSize(sorted.length);

  // ── Statistics ────────────────────────────────────────────────────
  const regression = linearRegression(indexedPoints(values));
  const direction = classifyTrend(values, DEFAULT_CLASSIFICATION_THRESHOLD);
  const scored = scoreAnomalies(sorted, DEFAULT_SENSITIVITY);
  const summary = summarizeTrend(values);
  const quality = assessDataQuality(sorted, { now });

  const anomalyIndices = new Set(scored.map((s) => s.index));

  return {
    dataType: sorted[0]!.metricType,
    timeRange: range,
    trendPoints: buildTrendPoints(sorted, windowSize, anomalyIndices),
    direction,
    slope: regression.slope,
    correlation: regression.correlation,
    anomalies: scored.map((s) => s.anomaly),
    summary,
    confidence: (regression.rSquared + quality.overallScore) / 2,
  };
}

/**
 * Moving-average window used when the caller does not supply one,
 * scaled to the number of records.
 */
export function optimalWindowSize(recordCount: number): number {
  if (recordCount <= 7) return Math.max(3, Math.floor(recordCount / 3));
  if (recordCount <= 30) return 7;
  if (recordCount <= 90) return 14;
  return 30;
}

/**
 * One point per record. `movingAverage` is filled from index
 * `windowSize - 1` onward.
 */
export function buildTrendPoints(
  sorted: readonly Measurement[],
  windowSize: number,
  anomalyIndices: ReadonlySet<number> = new Set(),
): TrendPoint[] {
  const averages = movingAverage(
    sorted.map((r) => r.value),
    windowSize,
  );

  return sorted.map((record, index) => ({
    timestamp: record.timestamp,
    value: record.value,
    movingAverage: index >= windowSize - 1 ? (averages[index - windowSize + 1] ?? null) : null,
    isAnomaly: anomalyIndices.has(index),
  }));
}

export function summarizeTrend(values: readonly number[]): TrendSummary {
  if (values.length === 0) {
    return {
      totalDataPoints: 0,
      averageValue: 0,
      minimumValue: 0,
      maximumValue: 0,
      standardDeviation: 0,
      changePercentage: 0,
      firstValue: 0,
      lastValue: 0,
    };
  }

  const firstValue = values[0]!;
  const lastValue = values[values.length - 1]!;

  return {
    totalDataPoints: values.length,
    averageValue: mean(values),
    minimumValue: values.reduce((m, v) => Math.min(m, v), Number.POSITIVE_INFINITY),
    maximumValue: values.reduce((m, v) => Math.max(m, v), Number.NEGATIVE_INFINITY),
    standardDeviation: standardDeviation(values),
    changePercentage: firstValue === 0 ? 0 : ((lastValue - firstValue) / firstValue) * 100,
    firstValue,
    lastValue,
  };
}
