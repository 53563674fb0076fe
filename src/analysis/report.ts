// ── Trend Reports ───────────────────────────────────────────────────
// Record-level trend detection and a human-readable analysis report.
// Unlike `analyzeTrends`, nothing here is restricted to a time window.

import { classifyTrend, type TrendDirection } from "./classification.js";
import { TrendAnalysisError } from "./errors.js";
import { sortByTimestamp, type Measurement } from "./records.js";
import { indexedPoints, linearRegression, mean, sampleVariance } from "./statistics.js";
import type { TrendPoint } from "./trends.js";

export const TIMEFRAMES = {
  day: 1,
  week: 7,
  month: 30,
  year: 365,
} as const;

export type Timeframe = keyof typeof TIMEFRAMES;

export interface MovingAveragePoint {
  /** Newest timestamp in the window */
  timestamp: Date;
  value: number;
  /** Newest original value in the window */
  originalValue: number;
}

export interface TrendResult {
  direction: TrendDirection;
  /** |correlation| */
  strength: number;
  /** R² */
  confidence: number;
  slope: number;
  description: string;
}

export interface AnalysisReport {
  dataPoints: TrendPoint[];
  trend: TrendResult;
  movingAverage: MovingAveragePoint[] | null;
  variance: number;
  summary: string;
  timeframe: Timeframe;
  generatedAt: Date;
}

export interface ReportOptions {
  includeMovingAverage?: boolean;
  /** Window for the moving average (default: 7) */
  movingAveragePeriod?: number;
  /** Timestamp for `generatedAt` (default: current time) */
  now?: Date;
}

/** Finer threshold than `analyzeTrends`, for short record sets. */
const DETECTION_THRESHOLD = 0.01;

/**
 * Moving average over records ordered newest first: one point per full
 * window of `period` records.
 */
export function calculateMovingAveragePoints(
  records: readonly Measurement[],
  period: number,
): MovingAveragePoint[] {
  if (records.length === 0) {
    throw TrendAnalysisError.insufficientData("Cannot average an empty record set");
  }
  if (!Number.isInteger(period) || period <= 0 || period > records.length) {
    throw TrendAnalysisError.insufficientData(
      `Moving-average period ${period} needs between 1 and ${records.length} records`,
    );
  }

  const newestFirst = sortByTimestamp(records).reverse();
  const points: MovingAveragePoint[] = [];

  for (let i = 0; i <= newestFirst.length - period; i++) {
    const window = newestFirst.slice(i, i + period);
    const newest = window[0]!;
    points.push({
      timestamp: newest.timestamp,
      value: mean(window.map((r) => r.value)),
      originalValue: newest.value,
    });
  }

  return points;
}

export function detectTrend(
  records: readonly Measurement[],
  timeframe: Timeframe,
): TrendResult {
  if (records.length < 2) {
    throw TrendAnalysisError.insufficientData(
      `At least 2 records are required to detect a trend, found ${records.length}`,
    );
  }

  const values = sortByTimestamp(records).map((r) => r.value);
  const regression = linearRegression(indexedPoints(values));
  const direction = classifyTrend(values, DETECTION_THRESHOLD);
  const strength = Math.abs(regression.correlation);
  const confidence = regression.rSquared;

  return {
    direction,
    strength,
    confidence,
    slope: regression.slope,
    description: describeTrend(direction, strength, confidence, timeframe),
  };
}

export function calculateVariance(records: readonly Measurement[]): number {
  return sampleVariance(records.map((r) => r.value));
}

export function generateAnalysisReport(
  records: readonly Measurement[],
  timeframe: Timeframe,
  options: ReportOptions = {},
): AnalysisReport {
  if (records.length === 0) {
    throw TrendAnalysisError.insufficientData("Cannot report on an empty record set");
  }

  const period = options.movingAveragePeriod ?? 7;
  const sorted = sortByTimestamp(records);
  const trend = detectTrend(sorted, timeframe);

  const movingAverage =
    options.includeMovingAverage && sorted.length >= period
      ? calculateMovingAveragePoints(sorted, period)
      : null;

  const variance = calculateVariance(sorted);

  return {
    dataPoints: sorted.map((r) => ({
      timestamp: r.timestamp,
      value: r.value,
      movingAverage: null,
      isAnomaly: false,
    })),
    trend,
    movingAverage,
    variance,
    summary: summarize(sorted, trend, variance, timeframe),
    timeframe,
    generatedAt: options.now ?? new Date(),
  };
}

// ── Text ────────────────────────────────────────────────────────────

export function describeTrend(
  direction: TrendDirection,
  strength: number,
  confidence: number,
  timeframe: Timeframe,
): string {
  const directionText = {
    increasing: "upward",
    decreasing: "downward",
    stable: "stable",
    volatile: "volatile",
  }[direction];

  return `A ${band(strength, "strong", "moderate", "weak")} ${directionText} trend detected over ${timeframe} with ${band(confidence, "high", "moderate", "low")} confidence.`;
}

function band(score: number, high: string, mid: string, low: string): string {
  if (score > 0.8) return high;
  if (score > 0.5) return mid;
  return low;
}

function summarize(
  records: readonly Measurement[],
  trend: TrendResult,
  variance: number,
  timeframe: Timeframe,
): string {
  const values = records.map((r) => r.value);
  const min = values.reduce((m, v) => Math.min(m, v), Number.POSITIVE_INFINITY);
  const max = values.reduce((m, v) => Math.max(m, v), Number.NEGATIVE_INFINITY);

  return [
    "Analysis Summary:",
    `- Time Period: ${timeframe}`,
    `- Data Points: ${records.length}`,
    `- Average Value: ${mean(values).toFixed(1)}`,
    `- Range: ${min.toFixed(1)} - ${max.toFixed(1)}`,
    `- Variance: ${variance.toFixed(2)}`,
    `- Trend: ${trend.description}`,
  ].join("\n");
}
