// ── Trend Analyzer ──────────────────────────────────────────────────
// The engine behind one interface, so callers (and the MCP tools) can
// swap in a test double. The default implementation delegates to the
// pure functions, supplies the clock, and logs timing and failures.

import type { Logger } from "pino";
import {
  detectAnomalies,
  detectOutliers,
  DEFAULT_SENSITIVITY,
  type AnomalyPoint,
  type OutlierMethod,
} from "./anomalies.js";
import {
  calculateTrendStrength,
  classifyTrend,
  DEFAULT_CLASSIFICATION_THRESHOLD,
  type StrengthInput,
  type TrendDirection,
} from "./classification.js";
import { isTrendAnalysisError } from "./errors.js";
import {
  predictTrend,
  predictValue,
  type PredictionMethod,
  type TrendPrediction,
} from "./forecasting.js";
import {
  assessDataQuality,
  identifyDataGaps,
  type DataFrequency,
  type DataQualityAssessment,
} from "./quality.js";
import type { DateRange, Measurement, TimeWindow } from "./records.js";
import {
  calculateMovingAveragePoints,
  calculateVariance,
  detectTrend,
  generateAnalysisReport,
  type AnalysisReport,
  type MovingAveragePoint,
  type ReportOptions,
  type Timeframe,
  type TrendResult,
} from "./report.js";
import {
  correlation,
  exponentialMovingAverage,
  linearRegression,
  median,
  movingAverage,
  variability,
  weightedMovingAverage,
  type LinearRegressionResult,
  type Point,
  type VariabilityMetrics,
} from "./statistics.js";
import { analyzeTrends, type TrendAnalysis } from "./trends.js";

export type AnalysisLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

export interface TrendAnalyzer {
  // Orchestration
  analyzeTrends(records: readonly Measurement[], window: TimeWindow): TrendAnalysis;
  predictTrend(analysis: TrendAnalysis, daysAhead: number): TrendPrediction;
  predictValue(
    records: readonly Measurement[],
    daysAhead: number,
    method: PredictionMethod,
  ): number;

  // Averages
  movingAverage(values: readonly number[], windowSize: number): number[];
  weightedMovingAverage(values: readonly number[], weights: readonly number[]): number[];
  exponentialMovingAverage(values: readonly number[], alpha: number): number[];

  // Anomalies
  detectAnomalies(records: readonly Measurement[], sensitivity?: number): AnomalyPoint[];
  detectOutliers(values: readonly number[], method: OutlierMethod): number[];

  // Statistics
  correlation(a: readonly number[], b: readonly number[]): number;
  linearRegression(points: readonly Point[]): LinearRegressionResult;
  variability(values: readonly number[]): VariabilityMetrics;
  median(values: readonly number[]): number;

  // Classification
  classifyTrend(values: readonly number[], threshold?: number): TrendDirection;
  calculateTrendStrength(analysis: StrengthInput): number;

  // Data quality
  assessDataQuality(records: readonly Measurement[]): DataQualityAssessment;
  identifyDataGaps(
    records: readonly Measurement[],
    expectedFrequency: DataFrequency,
  ): DateRange[];

  // Reports
  calculateMovingAveragePoints(
    records: readonly Measurement[],
    period: number,
  ): MovingAveragePoint[];
  detectTrend(records: readonly Measurement[], timeframe: Timeframe): TrendResult;
  calculateVariance(records: readonly Measurement[]): number;
  generateAnalysisReport(
    records: readonly Measurement[],
    timeframe: Timeframe,
    options?: Omit<ReportOptions, "now">,
  ): AnalysisReport;
}

export interface TrendAnalyzerOptions {
  logger: AnalysisLogger;
  /** Clock for relative windows, timeliness and validity dates */
  now?: () => Date;
}

export function createTrendAnalyzer(options: TrendAnalyzerOptions): TrendAnalyzer {
  const { logger } = options;
  const clock = options.now ?? (() => new Date());

  function timed<T>(operation: string, run: () => T): T {
    const start = Date.now();
    try {
      return run();
    } catch (error) {
      const durationMs = Date.now() - start;
      if (isTrendAnalysisError(error)) {
        logger.warn({ operation, durationMs, kind: error.kind }, error.message);
      } else {
        logger.error({ operation, durationMs, err: error }, `${operation} failed`);
      }
      throw error;
    }
  }

  return {
    analyzeTrends(records, window) {
      return timed("analyze_trends", () => {
        const start = Date.now();
        const analysis = analyzeTrends(records, window, { now: clock() });
        logger.info(
          {
            operation: "analyze_trends",
            dataType: analysis.dataType,
            records: analysis.summary.totalDataPoints,
            direction: analysis.direction,
            anomalies: analysis.anomalies.length,
            confidence: analysis.confidence,
            durationMs: Date.now() - start,
          },
          "Trend analysis completed",
        );
        return analysis;
      });
    },

    predictTrend(analysis, daysAhead) {
      return timed("predict_trend", () => {
        const prediction = predictTrend(analysis, daysAhead, { now: clock() });
        logger.info(
          {
            operation: "predict_trend",
            dataType: prediction.dataType,
            daysAhead,
            confidence: prediction.confidence,
          },
          "Trend prediction completed",
        );
        return prediction;
      });
    },

    predictValue(records, daysAhead, method) {
      return timed("predict_value", () => {
        const value = predictValue(records, daysAhead, method);
        logger.info(
          { operation: "predict_value", method, daysAhead, records: records.length },
          "Value prediction completed",
        );
        return value;
      });
    },

    movingAverage,
    weightedMovingAverage,
    exponentialMovingAverage,

    detectAnomalies(records, sensitivity = DEFAULT_SENSITIVITY) {
      const anomalies = detectAnomalies(records, sensitivity);
      logger.debug(
        { operation: "detect_anomalies", records: records.length, anomalies: anomalies.length, sensitivity },
        "Anomaly detection completed",
      );
      return anomalies;
    },

    detectOutliers,
    correlation,
    linearRegression,
    variability,
    median,

    classifyTrend(values, threshold = DEFAULT_CLASSIFICATION_THRESHOLD) {
      return classifyTrend(values, threshold);
    },

    calculateTrendStrength,

    assessDataQuality(records) {
      return assessDataQuality(records, { now: clock() });
    },

    identifyDataGaps,
    calculateMovingAveragePoints(records, period) {
      return timed("moving_average_points", () => calculateMovingAveragePoints(records, period));
    },

    detectTrend(records, timeframe) {
      return timed("detect_trend", () => detectTrend(records, timeframe));
    },

    calculateVariance,

    generateAnalysisReport(records, timeframe, reportOptions = {}) {
      return timed("trend_report", () =>
        generateAnalysisReport(records, timeframe, { ...reportOptions, now: clock() }),
      );
    },
  };
}
