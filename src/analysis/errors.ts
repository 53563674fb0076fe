// ── Analysis Errors ──────────────────────────────────────────────────
// Typed failures raised by the public entry points of the engine.
// Internal helpers never throw; they return zero/empty results instead.

export type TrendAnalysisErrorKind =
  | "insufficientData"
  | "invalidPeriod"
  | "invalidTimeframe"
  | "calculationFailed";

export class TrendAnalysisError extends Error {
  readonly kind: TrendAnalysisErrorKind;
  /** Only set for `calculationFailed`. */
  readonly reason?: string;

  constructor(kind: TrendAnalysisErrorKind, message: string, reason?: string) {
    super(message);
    this.name = "TrendAnalysisError";
    this.kind = kind;
    this.reason = reason;
  }

  static insufficientData(message: string): TrendAnalysisError {
    return new TrendAnalysisError("insufficientData", message);
  }

  static invalidPeriod(message: string): TrendAnalysisError {
    return new TrendAnalysisError("invalidPeriod", message);
  }

  static invalidTimeframe(message: string): TrendAnalysisError {
    return new TrendAnalysisError("invalidTimeframe", message);
  }

  static calculationFailed(reason: string): TrendAnalysisError {
    return new TrendAnalysisError(
      "calculationFailed",
      `Calculation failed: ${reason}`,
      reason,
    );
  }
}

export function isTrendAnalysisError(
  value: unknown,
): value is TrendAnalysisError {
  return value instanceof TrendAnalysisError;
}
