import { describe, expect, test } from "vitest";
import { calculateTrendStrength, classifyTrend } from "./classification.js";

describe("classifyTrend", () => {
  test("classifies a steady climb as increasing", () => {
    expect(classifyTrend([50, 60, 70, 80, 90], 0.1)).toBe("increasing");
  });

  test("classifies a steady fall as decreasing", () => {
    expect(classifyTrend([90, 80, 70, 60, 50], 0.1)).toBe("decreasing");
  });

  test("treats a small normalised slope as stable", () => {
    // slope 1 over mean 70 is ~0.014
    expect(classifyTrend([68, 69, 70, 71, 72], 0.1)).toBe("stable");
    expect(classifyTrend([68, 69, 70, 71, 72], 0.01)).toBe("increasing");
  });

  test("reports high relative spread as volatile regardless of slope", () => {
    expect(classifyTrend([10, 50, 5, 60, 8])).toBe("volatile");
  });

  test("is stable for fewer than two values", () => {
    expect(classifyTrend([])).toBe("stable");
    expect(classifyTrend([42])).toBe("stable");
  });

  test("is stable for a constant series", () => {
    expect(classifyTrend(Array<number>(10).fill(70))).toBe("stable");
  });

  test("is stable when the mean is zero", () => {
    expect(classifyTrend([-1, 1])).toBe("stable");
  });
});

describe("calculateTrendStrength", () => {
  const summary = { totalDataPoints: 10, averageValue: 100, standardDeviation: 10 };

  test("blends correlation and consistency less the anomaly penalty", () => {
    const strength = calculateTrendStrength({
      correlation: -0.9,
      anomalies: [{}],
      summary,
    });
    expect(strength).toBeCloseTo(0.89, 10);
  });

  test("caps at 1", () => {
    expect(
      calculateTrendStrength({
        correlation: 1,
        anomalies: [],
        summary: { ...summary, standardDeviation: 0 },
      }),
    ).toBe(1);
  });

  test("floors at 0", () => {
    expect(
      calculateTrendStrength({
        correlation: 0,
        anomalies: [{}, {}, {}],
        summary: { ...summary, standardDeviation: 500 },
      }),
    ).toBe(0);
  });

  test("treats consistency as 0 when the mean is zero", () => {
    expect(
      calculateTrendStrength({
        correlation: 0.6,
        anomalies: [],
        summary: { totalDataPoints: 4, averageValue: 0, standardDeviation: 2 },
      }),
    ).toBeCloseTo(0.3, 10);
  });
});
