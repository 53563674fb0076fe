// ── Data Quality Assessment ─────────────────────────────────────────
// Scores a record set on completeness, consistency, accuracy and
// timeliness (each 0-1) and reports structured issues. Also finds gaps
// in a series against an expected recording frequency.

import { detectOutliers } from "./anomalies.js";
import {
  addDays,
  isPlausibleValue,
  MS_PER_DAY,
  sortByTimestamp,
  type DateRange,
  type Measurement,
} from "./records.js";
import { clamp } from "./statistics.js";

export type DataQualityIssueType =
  | "missingData"
  | "duplicateData"
  | "inconsistentData"
  | "outlierData"
  | "staleData";

export type DataQualityIssueSeverity = "low" | "medium" | "high" | "critical";

export interface DataQualityIssue {
  type: DataQualityIssueType;
  description: string;
  severity: DataQualityIssueSeverity;
  affectedRecords: number;
  suggestedAction: string;
}

export interface DataQualityAssessment {
  completeness: number;
  consistency: number;
  accuracy: number;
  timeliness: number;
  /** Unweighted mean of the four components */
  overallScore: number;
  issues: DataQualityIssue[];
}

export type DataFrequency = "daily" | "weekly" | "monthly" | "irregular";

export interface QualityOptions {
  /** Reference instant for timeliness (default: current time) */
  now?: Date;
}

/** Outlier share above which the series is reported as inconsistent. */
const INCONSISTENT_OUTLIER_RATIO = 0.1;
/** Age after which timeliness reaches zero. */
const TIMELINESS_HORIZON_DAYS = 30;
/** Age after which the latest record counts as stale. */
const STALE_AFTER_DAYS = 7;
/** Interval tolerance before a gap is reported. */
const GAP_TOLERANCE = 1.5;

const EXPECTED_INTERVAL_DAYS: Record<Exclude<DataFrequency, "irregular">, number> = {
  daily: 1,
  weekly: 7,
  monthly: 30,
};

/**
 * Assess the quality of a record set. An empty set scores zero on every
 * component and has no issues.
 */
export function assessDataQuality(
  records: readonly Measurement[],
  options: QualityOptions = {},
): DataQualityAssessment {
  if (records.length === 0) {
    return {
      completeness: 0,
      consistency: 0,
      accuracy: 0,
      timeliness: 0,
      overallScore: 0,
      issues: [],
    };
  }

  const now = options.now ?? new Date();
  const total = records.length;
  const issues: DataQualityIssue[] = [];

  // Only present records are considered, so nothing can be missing.
  const completeness = 1;

  // ── Consistency ───────────────────────────────────────────────────
  const outliers = detectOutliers(
    records.map((r) => r.value),
    "zScore",
  );
  const consistency = 1 - outliers.length / total;

  if (outliers.length > total * INCONSISTENT_OUTLIER_RATIO) {
    issues.push({
      type: "inconsistentData",
      description: `${outliers.length} of ${total} records are statistical outliers`,
      severity: "medium",
      affectedRecords: outliers.length,
      suggestedAction: "Review the data collection process",
    });
  }

  // ── Accuracy ──────────────────────────────────────────────────────
  const implausible = records.filter((r) => !isPlausibleValue(r.metricType, r.value));
  const accuracy = 1 - implausible.length / total;

  if (implausible.length > 0) {
    issues.push({
      type: "outlierData",
      description: `${implausible.length} values fall outside the plausible range for their metric`,
      severity: "high",
      affectedRecords: implausible.length,
      suggestedAction: "Verify sensor calibration and manual data entry",
    });
  }

  // ── Timeliness ────────────────────────────────────────────────────
  const latest = records.reduce(
    (max, r) => Math.max(max, r.timestamp.getTime()),
    Number.NEGATIVE_INFINITY,
  );
  const daysSinceLatest = (now.getTime() - latest) / MS_PER_DAY;
  const timeliness = clamp(1 - daysSinceLatest / TIMELINESS_HORIZON_DAYS, 0, 1);

  if (daysSinceLatest > STALE_AFTER_DAYS) {
    issues.push({
      type: "staleData",
      description: `Latest record is ${Math.floor(daysSinceLatest)} days old`,
      severity: "medium",
      affectedRecords: 1,
      suggestedAction: "Record or sync data more frequently",
    });
  }

  return {
    completeness,
    consistency,
    accuracy,
    timeliness,
    overallScore: (completeness + consistency + accuracy + timeliness) / 4,
    issues,
  };
}

/**
 * Find gaps between consecutive records that exceed 1.5x the expected
 * interval. Each gap is the range strictly between the two bounding
 * records, inset by one day on each side; gaps too short to leave a
 * non-empty range are skipped. Irregular data never has gaps.
 */
export function identifyDataGaps(
  records: readonly Measurement[],
  expectedFrequency: DataFrequency,
): DateRange[] {
  if (records.length < 2 || expectedFrequency === "irregular") return [];

  const expectedMs = EXPECTED_INTERVAL_DAYS[expectedFrequency] * MS_PER_DAY;
  const sorted = sortByTimestamp(records);
  const gaps: DateRange[] = [];

  for (let i = 0; i < sorted.length - 1; i++) {
    const current = sorted[i]!.timestamp;
    const next = sorted[i + 1]!.timestamp;
    const interval = next.getTime() - current.getTime();

    if (interval > expectedMs * GAP_TOLERANCE) {
      const start = addDays(current, 1);
      const end = addDays(next, -1);
      if (start.getTime() <= end.getTime()) {
        gaps.push({ start, end });
      }
    }
  }

  return gaps;
}
