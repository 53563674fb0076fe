import { z } from "zod";
import {
  explicitRange,
  lastDays,
  METRIC_TYPES,
  timeWindowFor,
  type Measurement,
  type TimeWindow,
} from "../analysis/index.js";

export const recordSchema = z.object({
  timestamp: z
    .string()
    .datetime({ offset: true })
    .describe("ISO-8601 instant of the measurement, e.g. 2026-03-01T07:30:00Z"),
  value: z.number().finite().describe("Measured value in the metric's unit"),
  metricType: z.enum(METRIC_TYPES).describe("Which health metric this measurement is"),
});

export type RecordInput = z.infer<typeof recordSchema>;

export const recordsSchema = z
  .array(recordSchema)
  .describe(
    "Time-stamped measurements to analyze. Supply them in any order; they are sorted by timestamp.",
  );

export const valuesSchema = z
  .array(z.number().finite())
  .describe("Plain numeric series in chronological order");

export const windowShape = {
  time_range: z
    .enum(["week", "month", "quarter", "year"])
    .optional()
    .describe(
      "Preset window ending now: week (7 days), month (30), quarter (90) or year (365). Defaults to month when no other window is given.",
    ),
  days: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Custom window: the last N days up to now. Overrides time_range."),
  moving_average_window: z
    .number()
    .int()
    .positive()
    .optional()
    .describe(
      "Points per moving-average window. Defaults to the preset's window, 7 for custom day windows, or a size derived from the record count for explicit dates.",
    ),
  start_date: z
    .string()
    .datetime({ offset: true })
    .optional()
    .describe("Explicit window start (ISO-8601). Requires end_date; overrides days and time_range."),
  end_date: z
    .string()
    .datetime({ offset: true })
    .optional()
    .describe("Explicit window end (ISO-8601). Requires start_date."),
};

export interface WindowArgs {
  time_range?: string;
  days?: number;
  moving_average_window?: number;
  start_date?: string;
  end_date?: string;
}

const DEFAULT_CUSTOM_WINDOW = 7;

/** Resolve tool window arguments, most specific first. */
export function toTimeWindow(args: WindowArgs): TimeWindow {
  if (args.start_date !== undefined || args.end_date !== undefined) {
    if (args.start_date === undefined || args.end_date === undefined) {
      throw new Error("start_date and end_date must be given together");
    }
    return explicitRange(
      new Date(args.start_date),
      new Date(args.end_date),
      args.moving_average_window,
    );
  }

  if (args.days !== undefined) {
    return lastDays(args.days, args.moving_average_window ?? DEFAULT_CUSTOM_WINDOW);
  }

  const preset = timeWindowFor(args.time_range ?? "month");
  if (preset.kind === "relative" && args.moving_average_window !== undefined) {
    return { ...preset, movingAverageWindow: args.moving_average_window };
  }
  return preset;
}

export function toMeasurements(records: readonly RecordInput[]): Measurement[] {
  return records.map((r) => ({
    timestamp: new Date(r.timestamp),
    value: r.value,
    metricType: r.metricType,
  }));
}

export const outlierMethodSchema = z
  .enum(["zScore", "iqr", "modifiedZScore", "isolation"])
  .describe(
    "zScore (|z| >= 2), iqr (outside 1.5x IQR fences), modifiedZScore (median/MAD based, >= 3.5) or isolation (z-score baseline)",
  );

export const predictionMethodSchema = z
  .enum([
    "linearRegression",
    "exponentialSmoothing",
    "movingAverage",
    "seasonalDecomposition",
  ])
  .describe(
    "linearRegression, exponentialSmoothing (alpha 0.3), movingAverage (up to 7 points) or seasonalDecomposition (repeats the last value)",
  );

export const timeframeSchema = z
  .enum(["day", "week", "month", "year"])
  .describe("Period label used in the report text: day, week, month or year");

export const frequencySchema = z
  .enum(["daily", "weekly", "monthly", "irregular"])
  .describe(
    "How often records are expected. Gaps longer than 1.5x the interval are reported; irregular never reports gaps.",
  );
