import { describe, expect, test } from "vitest";
import { recordSchema, toMeasurements, toTimeWindow } from "./schemas.js";

describe("toTimeWindow", () => {
  test("defaults to the month preset", () => {
    expect(toTimeWindow({})).toEqual({ kind: "relative", days: 30, movingAverageWindow: 7 });
  });

  test("uses a named preset, optionally with its own moving-average window", () => {
    expect(toTimeWindow({ time_range: "week" })).toEqual({
      kind: "relative",
      days: 7,
      movingAverageWindow: 3,
    });
    expect(toTimeWindow({ time_range: "quarter", moving_average_window: 5 })).toEqual({
      kind: "relative",
      days: 90,
      movingAverageWindow: 5,
    });
  });

  test("lets a custom day count override the preset", () => {
    expect(toTimeWindow({ time_range: "year", days: 14 })).toEqual({
      kind: "relative",
      days: 14,
      movingAverageWindow: 7,
    });
  });

  test("lets explicit dates override everything else", () => {
    expect(
      toTimeWindow({
        days: 14,
        start_date: "2026-01-01T00:00:00Z",
        end_date: "2026-02-01T00:00:00Z",
      }),
    ).toEqual({
      kind: "range",
      range: {
        start: new Date("2026-01-01T00:00:00Z"),
        end: new Date("2026-02-01T00:00:00Z"),
      },
      movingAverageWindow: undefined,
    });
  });

  test("requires both explicit dates", () => {
    expect(() => toTimeWindow({ start_date: "2026-01-01T00:00:00Z" })).toThrow(
      "start_date and end_date must be given together",
    );
  });
});

describe("recordSchema", () => {
  test("accepts an ISO timestamp and a known metric", () => {
    const parsed = recordSchema.parse({
      timestamp: "2026-03-01T07:30:00Z",
      value: 71.2,
      metricType: "weight",
    });
    expect(toMeasurements([parsed])).toEqual([
      { timestamp: new Date("2026-03-01T07:30:00Z"), value: 71.2, metricType: "weight" },
    ]);
  });

  test("rejects unknown metrics, non-finite values and bad timestamps", () => {
    const base = { timestamp: "2026-03-01T07:30:00Z", value: 70, metricType: "weight" };
    expect(recordSchema.safeParse({ ...base, metricType: "mood" }).success).toBe(false);
    expect(recordSchema.safeParse({ ...base, value: Number.POSITIVE_INFINITY }).success).toBe(false);
    expect(recordSchema.safeParse({ ...base, timestamp: "yesterday" }).success).toBe(false);
  });
});
