import { describe, expect, test, vi } from "vitest";
import { createTrendAnalyzer } from "./analyzer.js";
import { TrendAnalysisError } from "./errors.js";
import { timeWindowFor, type Measurement } from "./records.js";

const NOW = new Date("2026-03-10T12:00:00Z");

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function daily(values: number[], firstDay = 1): Measurement[] {
  return values.map((value, i) => ({
    timestamp: new Date(Date.UTC(2026, 2, firstDay + i, 7)),
    value,
    metricType: "weight",
  }));
}

describe("createTrendAnalyzer", () => {
  test("uses the injected clock for relative windows and logs the result", () => {
    const logger = fakeLogger();
    const analyzer = createTrendAnalyzer({ logger, now: () => NOW });

    const analysis = analyzer.analyzeTrends(daily([70, 70.5, 71, 71.5], 5), timeWindowFor("week"));

    expect(analysis.timeRange.end).toEqual(NOW);
    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ operation: "analyze_trends", dataType: "weight", records: 4 }),
      "Trend analysis completed",
    );
  });

  test("logs analysis failures as warnings and rethrows them", () => {
    const logger = fakeLogger();
    const analyzer = createTrendAnalyzer({ logger, now: () => NOW });

    expect(() => analyzer.analyzeTrends([], timeWindowFor("week"))).toThrow(TrendAnalysisError);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ operation: "analyze_trends", kind: "insufficientData" }),
      "Cannot analyze an empty record set",
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  test("dates predictions from the injected clock", () => {
    const analyzer = createTrendAnalyzer({ logger: fakeLogger(), now: () => NOW });
    const analysis = analyzer.analyzeTrends(daily([70, 70.5, 71, 71.5], 5), timeWindowFor("week"));

    const prediction = analyzer.predictTrend(analysis, 2);
    expect(prediction.validUntil).toEqual(new Date("2026-03-12T12:00:00Z"));
    expect(prediction.predictedPoints).toHaveLength(2);
  });

  test("defaults anomaly sensitivity to 2.0", () => {
    const logger = fakeLogger();
    const analyzer = createTrendAnalyzer({ logger });

    const anomalies = analyzer.detectAnomalies(daily([70, 70, 70, 75, 70, 70, 70]));
    expect(anomalies).toHaveLength(1);
    expect(logger.debug).toHaveBeenCalledWith(
      expect.objectContaining({ operation: "detect_anomalies", sensitivity: 2, anomalies: 1 }),
      "Anomaly detection completed",
    );
  });

  test("defaults the classification threshold to 0.1", () => {
    const analyzer = createTrendAnalyzer({ logger: fakeLogger() });
    expect(analyzer.classifyTrend([68, 69, 70, 71, 72])).toBe("stable");
    expect(analyzer.classifyTrend([68, 69, 70, 71, 72], 0.01)).toBe("increasing");
  });

  test("stamps reports and quality with the injected clock", () => {
    const analyzer = createTrendAnalyzer({ logger: fakeLogger(), now: () => NOW });
    const records = daily([70, 71, 72]);

    expect(analyzer.generateAnalysisReport(records, "week").generatedAt).toEqual(NOW);
    // Latest record (March 3rd, 07:00) is more than a week before NOW
    expect(analyzer.assessDataQuality(records).issues.map((i) => i.type)).toEqual(["staleData"]);
  });

  test("logs completed value predictions", () => {
    const logger = fakeLogger();
    const analyzer = createTrendAnalyzer({ logger, now: () => NOW });

    expect(analyzer.predictValue(daily([70, 72, 74]), 3, "seasonalDecomposition")).toBe(74);
    expect(logger.info).toHaveBeenCalledWith(
      { operation: "predict_value", method: "seasonalDecomposition", daysAhead: 3, records: 3 },
      "Value prediction completed",
    );
  });
});
