import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  isTrendAnalysisError,
  type TrendAnalyzer,
} from "../analysis/index.js";
import type { Config } from "../config.js";
import {
  frequencySchema,
  outlierMethodSchema,
  predictionMethodSchema,
  recordsSchema,
  timeframeSchema,
  toMeasurements,
  toTimeWindow,
  valuesSchema,
  windowShape,
} from "./schemas.js";

export interface AnalysisToolDeps {
  analyzer: TrendAnalyzer;
  defaults: Config["analysis"];
}

function jsonResult(data: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }],
  };
}

function errorResult(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  const text = isTrendAnalysisError(error)
    ? `Error (${error.kind}): ${message}`
    : `Error: ${message}`;
  return {
    content: [{ type: "text" as const, text }],
    isError: true,
  };
}

const daysAheadSchema = z
  .number()
  .describe(
    "How many whole days past the last record to forecast. Must be a positive integer.",
  );

export function registerAnalysisTools(server: McpServer, deps: AnalysisToolDeps) {
  const { analyzer, defaults } = deps;

  server.tool(
    "analyze_trends",
    "Analyze a series of health measurements (weight, steps, calories, heart rate, blood glucose) over a time window. Filters the records to the window, fits a linear trend, classifies the direction (increasing, decreasing, stable or volatile), computes a moving average per point, flags anomalous readings and scores confidence from fit quality and data quality. Use this when the user asks how a metric has been changing.",
    {
      records: recordsSchema,
      ...windowShape,
    },
    async ({ records, ...window }) => {
      try {
        const result = analyzer.analyzeTrends(toMeasurements(records), toTimeWindow(window));
        return jsonResult(result);
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    "predict_trend",
    "Analyze the records over a time window and extrapolate the fitted trend one point per day for the requested number of days. Predicted values never go below zero and the confidence is discounted from the analysis confidence. Use this when the user asks where a metric is heading.",
    {
      records: recordsSchema,
      ...windowShape,
      days_ahead: daysAheadSchema,
    },
    async ({ records, days_ahead, ...window }) => {
      try {
        const analysis = analyzer.analyzeTrends(toMeasurements(records), toTimeWindow(window));
        const prediction = analyzer.predictTrend(analysis, days_ahead);
        return jsonResult({
          direction: analysis.direction,
          slope: analysis.slope,
          analysisConfidence: analysis.confidence,
          prediction,
        });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    "predict_value",
    "Forecast a single value for a metric a number of days past the last record, using one of several methods: linear regression over the series, exponential smoothing, a trailing moving average, or the last observed value. Use this when the user wants one number rather than a day-by-day projection.",
    {
      records: recordsSchema,
      days_ahead: daysAheadSchema,
      method: predictionMethodSchema.default("linearRegression"),
    },
    async ({ records, days_ahead, method }) => {
      try {
        const value = analyzer.predictValue(toMeasurements(records), days_ahead, method);
        return jsonResult({ method, daysAhead: days_ahead, predictedValue: value });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    "detect_anomalies",
    "Flag measurements whose z-score reaches the sensitivity threshold and grade each one low, medium, high or critical. Requires at least three records; a perfectly flat series has no anomalies. Use this to find unusual readings such as a sudden weight jump or a heart-rate spike.",
    {
      records: recordsSchema,
      sensitivity: z
        .number()
        .positive()
        .optional()
        .describe(
          `Z-score at or above which a record is anomalous. Lower is more sensitive. Defaults to ${defaults.sensitivity}.`,
        ),
    },
    async ({ records, sensitivity }) => {
      try {
        const anomalies = analyzer.detectAnomalies(
          toMeasurements(records),
          sensitivity ?? defaults.sensitivity,
        );
        return jsonResult({ count: anomalies.length, anomalies });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    "detect_outliers",
    "Find outliers in a plain numeric series and return their zero-based positions. Methods: z-score, interquartile range fences, modified z-score (median based, robust to skew) or isolation (currently a z-score baseline). Use this for quick checks on values that are not time-stamped.",
    {
      values: valuesSchema,
      method: outlierMethodSchema.default("zScore"),
    },
    async ({ values, method }) => {
      try {
        const indices = analyzer.detectOutliers(values, method);
        return jsonResult({
          method,
          indices,
          outliers: indices.map((i) => values[i]),
        });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    "assess_data_quality",
    "Score a set of records for consistency, accuracy (physiologically plausible values for the metric) and timeliness (age of the newest record), and list the issues found. Use this before trusting an analysis or when the user asks whether their tracking data is reliable.",
    {
      records: recordsSchema,
    },
    async ({ records }) => {
      try {
        return jsonResult(analyzer.assessDataQuality(toMeasurements(records)));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    "identify_data_gaps",
    "List the date ranges where records are missing, given how often the user is expected to log the metric. A gap is reported when consecutive records are more than 1.5 times the expected interval apart.",
    {
      records: recordsSchema,
      expected_frequency: frequencySchema.default("daily"),
    },
    async ({ records, expected_frequency }) => {
      try {
        const gaps = analyzer.identifyDataGaps(toMeasurements(records), expected_frequency);
        return jsonResult({ count: gaps.length, gaps });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    "describe_series",
    "Describe a plain numeric series: simple, weighted and exponential moving averages, the fitted linear trend, variability (spread, quartiles, coefficient of variation), median and direction. Use this for ad-hoc statistics on values that are not tied to a metric type.",
    {
      values: valuesSchema,
      window_size: z
        .number()
        .int()
        .positive()
        .optional()
        .describe("Simple moving-average window. Defaults to 3."),
      weights: z
        .array(z.number())
        .optional()
        .describe(
          "Weights for a weighted average, one per value, oldest first. Omit to skip the weighted average.",
        ),
      alpha: z
        .number()
        .optional()
        .describe("Exponential smoothing factor in (0, 1]. Defaults to 0.3."),
    },
    async ({ values, window_size, weights, alpha }) => {
      try {
        return jsonResult({
          count: values.length,
          median: analyzer.median(values),
          direction: analyzer.classifyTrend(values, defaults.classificationThreshold),
          regression: analyzer.linearRegression(values.map((y, x) => ({ x, y }))),
          variability: analyzer.variability(values),
          movingAverage: analyzer.movingAverage(values, window_size ?? 3),
          weightedMovingAverage: weights
            ? analyzer.weightedMovingAverage(values, weights)
            : null,
          exponentialMovingAverage: analyzer.exponentialMovingAverage(values, alpha ?? 0.3),
        });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    "correlate_series",
    "Pearson correlation between two numeric series of equal length, from -1 to 1. Returns 0 when the lengths differ or either series is constant. Use this to compare two metrics recorded on the same days, such as steps and weight.",
    {
      a: valuesSchema,
      b: valuesSchema,
    },
    async ({ a, b }) => {
      try {
        return jsonResult({ correlation: analyzer.correlation(a, b) });
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    "trend_report",
    "Produce a readable report for a set of records: trend direction, strength and confidence, sample variance, an optional moving average, and a plain-text summary. Use this when the user wants a write-up rather than raw numbers.",
    {
      records: recordsSchema,
      timeframe: timeframeSchema.default("week"),
      include_moving_average: z
        .boolean()
        .optional()
        .describe("Include a moving average computed over the records. Defaults to false."),
      moving_average_period: z
        .number()
        .int()
        .positive()
        .optional()
        .describe("Records per moving-average window. Defaults to 7."),
    },
    async ({ records, timeframe, include_moving_average, moving_average_period }) => {
      try {
        const report = analyzer.generateAnalysisReport(toMeasurements(records), timeframe, {
          includeMovingAverage: include_moving_average,
          movingAveragePeriod: moving_average_period,
        });
        return jsonResult(report);
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
