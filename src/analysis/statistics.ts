// ── Statistics Primitives ───────────────────────────────────────────
// Pure numeric helpers shared by every analysis module. None of these
// throw: too little data yields a zero or empty result.

export interface Point {
  x: number;
  y: number;
}

export interface LinearRegressionResult {
  slope: number;
  intercept: number;
  /** Pearson correlation, in [-1, 1] */
  correlation: number;
  /** Always `correlation ** 2` */
  rSquared: number;
  /** Residual standard error, sqrt(SSR / (n - 2)) */
  standardError: number;
}

export interface VariabilityMetrics {
  variance: number;
  standardDeviation: number;
  coefficientOfVariation: number;
  range: number;
  interquartileRange: number;
}

const ZERO_REGRESSION: LinearRegressionResult = {
  slope: 0,
  intercept: 0,
  correlation: 0,
  rSquared: 0,
  standardError: 0,
};

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/** Sample variance (n - 1 denominator). 0 for fewer than two values. */
export function sampleVariance(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const avg = mean(values);
  let sum = 0;
  for (const v of values) {
    sum += (v - avg) ** 2;
  }
  return sum / (n - 1);
}

export function standardDeviation(values: readonly number[]): number {
  return Math.sqrt(sampleVariance(values));
}

// ── Averages ────────────────────────────────────────────────────────

/**
 * Simple moving average. Returns `values.length - windowSize + 1` means,
 * each over the window ending at that index.
 */
export function movingAverage(values: readonly number[], windowSize: number): number[] {
  if (windowSize <= 0 || windowSize > values.length) return [];

  const averages: number[] = [];
  for (let i = windowSize - 1; i < values.length; i++) {
    let windowSum = 0;
    for (let j = i - windowSize + 1; j <= i; j++) {
      windowSum += values[j]!;
    }
    averages.push(windowSum / windowSize);
  }
  return averages;
}

/**
 * Single weighted mean `Σ(value·weight) / Σ(weight)`, wrapped in an array
 * so that invalid input can yield an empty result.
 */
export function weightedMovingAverage(
  values: readonly number[],
  weights: readonly number[],
): number[] {
  if (values.length === 0 || values.length !== weights.length) return [];

  const weightSum = weights.reduce((s, w) => s + w, 0);
  if (weightSum <= 0) return [];

  let weighted = 0;
  for (let i = 0; i < values.length; i++) {
    weighted += values[i]! * weights[i]!;
  }
  return [weighted / weightSum];
}

/**
 * Exponential moving average with smoothing factor `alpha` in (0, 1].
 * The first output is the first input.
 */
export function exponentialMovingAverage(
  values: readonly number[],
  alpha: number,
): number[] {
  if (values.length === 0 || !(alpha > 0 && alpha <= 1)) return [];

  const ema: number[] = [values[0]!];
  for (let i = 1; i < values.length; i++) {
    ema.push(alpha * values[i]! + (1 - alpha) * ema[i - 1]!);
  }
  return ema;
}

// ── Regression & correlation ────────────────────────────────────────

/**
 * Ordinary least squares over (x, y) pairs.
 * Fewer than two points gives an all-zero result; a vertical point set
 * (no variance in x) gives a zero slope.
 */
export function linearRegression(points: readonly Point[]): LinearRegressionResult {
  const n = points.length;
  if (n < 2) return { ...ZERO_REGRESSION };

  const xMean = points.reduce((s, p) => s + p.x, 0) / n;
  const yMean = points.reduce((s, p) => s + p.y, 0) / n;

  let sxx = 0;
  let syy = 0;
  let sxy = 0;
  for (const { x, y } of points) {
    const dx = x - xMean;
    const dy = y - yMean;
    sxx += dx * dx;
    syy += dy * dy;
    sxy += dx * dy;
  }

  const slope = sxx === 0 ? 0 : sxy / sxx;
  const intercept = yMean - slope * xMean;

  const denominator = Math.sqrt(sxx * syy);
  const correlation = denominator === 0 ? 0 : clamp(sxy / denominator, -1, 1);

  let ssr = 0;
  for (const { x, y } of points) {
    const residual = y - (slope * x + intercept);
    ssr += residual * residual;
  }
  const standardError = n > 2 ? Math.sqrt(ssr / (n - 2)) : 0;

  return {
    slope,
    intercept,
    correlation,
    rSquared: correlation * correlation,
    standardError,
  };
}

/** Regression line value at `x`. */
export function predictAt(regression: LinearRegressionResult, x: number): number {
  return regression.slope * x + regression.intercept;
}

/** Index-as-x points for a value series. */
export function indexedPoints(values: readonly number[]): Point[] {
  return values.map((y, x) => ({ x, y }));
}

/**
 * Pearson correlation between two equal-length series.
 * 0 when lengths differ, either series is empty, or either has no variance.
 */
export function correlation(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  const meanA = mean(a);
  const meanB = mean(b);

  let numerator = 0;
  let sumSqA = 0;
  let sumSqB = 0;
  for (let i = 0; i < a.length; i++) {
    const da = a[i]! - meanA;
    const db = b[i]! - meanB;
    numerator += da * db;
    sumSqA += da * da;
    sumSqB += db * db;
  }

  const denominator = Math.sqrt(sumSqA * sumSqB);
  return denominator === 0 ? 0 : clamp(numerator / denominator, -1, 1);
}

// ── Spread ──────────────────────────────────────────────────────────

/**
 * Lower and upper quartiles taken at `floor(0.25n)` / `floor(0.75n)` of
 * the sorted series.
 */
export function quartiles(values: readonly number[]): { q1: number; q3: number } {
  if (values.length === 0) return { q1: 0, q3: 0 };
  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;
  return {
    q1: sorted[Math.floor(n * 0.25)]!,
    q3: sorted[Math.floor(n * 0.75)]!,
  };
}

export function variability(values: readonly number[]): VariabilityMetrics {
  if (values.length === 0) {
    return {
      variance: 0,
      standardDeviation: 0,
      coefficientOfVariation: 0,
      range: 0,
      interquartileRange: 0,
    };
  }

  const avg = mean(values);
  const variance = sampleVariance(values);
  const stdDev = Math.sqrt(variance);
  const sorted = [...values].sort((a, b) => a - b);
  const { q1, q3 } = quartiles(sorted);

  return {
    variance,
    standardDeviation: stdDev,
    coefficientOfVariation: avg === 0 ? 0 : stdDev / Math.abs(avg),
    range: sorted[sorted.length - 1]! - sorted[0]!,
    interquartileRange: q3 - q1,
  };
}

export function median(values: readonly number[]): number {
  const n = values.length;
  if (n === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(n / 2);
  return n % 2 === 0 ? (sorted[mid - 1]! + sorted[mid]!) / 2 : sorted[mid]!;
}

// ── Helpers ─────────────────────────────────────────────────────────

export function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}
