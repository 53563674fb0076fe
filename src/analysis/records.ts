// ── Record Model ────────────────────────────────────────────────────
// Timestamped scalar measurements, metric definitions, and the time
// windows an analysis can be restricted to.

import { TrendAnalysisError } from "./errors.js";

export const METRIC_TYPES = [
  "weight",
  "steps",
  "calories",
  "heartRate",
  "bloodGlucose",
] as const;

export type MetricType = (typeof METRIC_TYPES)[number];

export interface Measurement {
  readonly timestamp: Date;
  readonly value: number;
  readonly metricType: MetricType;
}

export interface MetricDefinition {
  unit: string;
  /** Lowest plausible value */
  min: number;
  /** Whether `min` itself is plausible (weight excludes 0) */
  minInclusive: boolean;
  /** Highest plausible value (inclusive) */
  max: number;
}

export const METRIC_DEFINITIONS: Readonly<Record<MetricType, MetricDefinition>> = {
  weight: { unit: "kg", min: 0, minInclusive: false, max: 500 },
  steps: { unit: "steps", min: 0, minInclusive: true, max: 100_000 },
  calories: { unit: "kcal", min: 0, minInclusive: true, max: 10_000 },
  heartRate: { unit: "bpm", min: 30, minInclusive: true, max: 220 },
  bloodGlucose: { unit: "mg/dL", min: 0, minInclusive: true, max: 600 },
};

export function isPlausibleValue(metricType: MetricType, value: number): boolean {
  const def = METRIC_DEFINITIONS[metricType];
  const aboveMin = def.minInclusive ? value >= def.min : value > def.min;
  return aboveMin && value <= def.max;
}

// ── Date ranges ─────────────────────────────────────────────────────

export interface DateRange {
  readonly start: Date;
  readonly end: Date;
}

export const MS_PER_DAY = 86_400_000;

/**
 * Build an inclusive date range. Fails with `invalidPeriod` when either
 * bound is not a valid instant or `start > end`.
 */
export function createDateRange(start: Date, end: Date): DateRange {
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw TrendAnalysisError.invalidPeriod("Date range bounds must be valid dates");
  }
  if (start.getTime() > end.getTime()) {
    throw TrendAnalysisError.invalidPeriod(
      `Start date ${start.toISOString()} is after end date ${end.toISOString()}`,
    );
  }
  return { start, end };
}

export function rangeContains(range: DateRange, instant: Date): boolean {
  const t = instant.getTime();
  return t >= range.start.getTime() && t <= range.end.getTime();
}

export function durationInDays(range: DateRange): number {
  return Math.floor((range.end.getTime() - range.start.getTime()) / MS_PER_DAY);
}

/**
 * Shift an instant by whole days. Fails with `calculationFailed` when the
 * result falls outside the representable Date range.
 */
export function addDays(instant: Date, days: number): Date {
  const shifted = new Date(instant.getTime() + days * MS_PER_DAY);
  if (Number.isNaN(shifted.getTime())) {
    throw TrendAnalysisError.calculationFailed(
      `cannot shift ${instant.toISOString()} by ${days} days`,
    );
  }
  return shifted;
}

// ── Time windows ────────────────────────────────────────────────────

export const TIME_RANGES = {
  week: { days: 7, movingAverageWindow: 3 },
  month: { days: 30, movingAverageWindow: 7 },
  quarter: { days: 90, movingAverageWindow: 14 },
  year: { days: 365, movingAverageWindow: 30 },
} as const;

export type TimeRange = keyof typeof TIME_RANGES;

export type TimeWindow =
  | { kind: "relative"; days: number; movingAverageWindow: number }
  | { kind: "range"; range: DateRange; movingAverageWindow?: number };

function isTimeRange(name: string): name is TimeRange {
  return Object.prototype.hasOwnProperty.call(TIME_RANGES, name);
}

/** Relative window for a named preset ("week", "month", ...). */
export function timeWindowFor(name: string): TimeWindow {
  if (!isTimeRange(name)) {
    throw TrendAnalysisError.invalidTimeframe(`Unknown time range "${name}"`);
  }
  const preset = TIME_RANGES[name];
  return {
    kind: "relative",
    days: preset.days,
    movingAverageWindow: preset.movingAverageWindow,
  };
}

/** Relative window ending now and reaching `days` back. */
export function lastDays(days: number, movingAverageWindow: number): TimeWindow {
  return { kind: "relative", days, movingAverageWindow };
}

export function explicitRange(
  start: Date,
  end: Date,
  movingAverageWindow?: number,
): TimeWindow {
  return { kind: "range", range: createDateRange(start, end), movingAverageWindow };
}

/**
 * Turn a window into concrete bounds. Relative windows end at `now`.
 * Returns the bounds together with the moving-average window, which is
 * `undefined` when the caller left it to the record-count heuristic.
 */
export function resolveTimeWindow(
  window: TimeWindow,
  now: Date,
): { range: DateRange; movingAverageWindow: number | undefined } {
  if (window.kind === "range") {
    if (window.movingAverageWindow !== undefined) {
      assertPositiveInteger(window.movingAverageWindow, "movingAverageWindow");
    }
    return {
      range: createDateRange(window.range.start, window.range.end),
      movingAverageWindow: window.movingAverageWindow,
    };
  }

  assertPositiveInteger(window.days, "days");
  assertPositiveInteger(window.movingAverageWindow, "movingAverageWindow");

  const start = addDays(now, -window.days);
  return {
    range: createDateRange(start, now),
    movingAverageWindow: window.movingAverageWindow,
  };
}

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw TrendAnalysisError.invalidTimeframe(
      `${name} must be a positive integer, got ${value}`,
    );
  }
}

/** Records sorted ascending by timestamp. The input is left untouched. */
export function sortByTimestamp<T extends { timestamp: Date }>(
  records: readonly T[],
): T[] {
  return [...records].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}
