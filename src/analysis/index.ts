// ── Analysis Engine ──────────────────────────────────────────────────
// Barrel export for all analysis modules.
// Pure functions plus the analyzer facade. No MCP, HTTP or I/O.

export {
  TrendAnalysisError,
  isTrendAnalysisError,
  type TrendAnalysisErrorKind,
} from "./errors.js";

export {
  METRIC_TYPES,
  METRIC_DEFINITIONS,
  TIME_RANGES,
  isPlausibleValue,
  createDateRange,
  rangeContains,
  durationInDays,
  addDays,
  timeWindowFor,
  lastDays,
  explicitRange,
  resolveTimeWindow,
  sortByTimestamp,
  type Measurement,
  type MetricType,
  type MetricDefinition,
  type DateRange,
  type TimeRange,
  type TimeWindow,
} from "./records.js";

export {
  mean,
  sampleVariance,
  standardDeviation,
  movingAverage,
  weightedMovingAverage,
  exponentialMovingAverage,
  linearRegression,
  predictAt,
  indexedPoints,
  correlation,
  quartiles,
  variability,
  median,
  type Point,
  type LinearRegressionResult,
  type VariabilityMetrics,
} from "./statistics.js";

export {
  detectAnomalies,
  detectOutliers,
  severityFromZScore,
  DEFAULT_SENSITIVITY,
  OUTLIER_METHODS,
  SEVERITY_THRESHOLDS,
  type AnomalyPoint,
  type AnomalySeverity,
  type OutlierMethod,
} from "./anomalies.js";

export {
  classifyTrend,
  calculateTrendStrength,
  DEFAULT_CLASSIFICATION_THRESHOLD,
  VOLATILITY_CUTOFF,
  type TrendDirection,
  type StrengthInput,
} from "./classification.js";

export {
  assessDataQuality,
  identifyDataGaps,
  type DataQualityAssessment,
  type DataQualityIssue,
  type DataQualityIssueType,
  type DataQualityIssueSeverity,
  type DataFrequency,
} from "./quality.js";

export {
  analyzeTrends,
  optimalWindowSize,
  buildTrendPoints,
  summarizeTrend,
  type TrendPoint,
  type TrendSummary,
  type TrendAnalysis,
  type AnalyzeOptions,
} from "./trends.js";

export {
  predictTrend,
  predictValue,
  PREDICTION_METHODS,
  type PredictionMethod,
  type TrendPrediction,
} from "./forecasting.js";

export {
  calculateMovingAveragePoints,
  detectTrend,
  calculateVariance,
  generateAnalysisReport,
  describeTrend,
  TIMEFRAMES,
  type Timeframe,
  type MovingAveragePoint,
  type TrendResult,
  type AnalysisReport,
  type ReportOptions,
} from "./report.js";

export {
  createTrendAnalyzer,
  type TrendAnalyzer,
  type TrendAnalyzerOptions,
  type AnalysisLogger,
} from "./analyzer.js";
