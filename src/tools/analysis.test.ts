import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { pino } from "pino";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createTrendAnalyzer } from "../analysis/index.js";
import { createMcpServer } from "../mcp/server.js";

const NOW = new Date("2026-03-10T12:00:00Z");

function dailyRecords(values: number[], metricType = "weight", firstDay = 1) {
  return values.map((value, i) => ({
    timestamp: new Date(Date.UTC(2026, 2, firstDay + i, 7)).toISOString(),
    value,
    metricType,
  }));
}

let client: Client;

beforeEach(async () => {
  const analyzer = createTrendAnalyzer({ logger: pino({ level: "silent" }), now: () => NOW });
  const server = createMcpServer({
    analyzer,
    analysis: { sensitivity: 2, classificationThreshold: 0.1 },
  });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  client = new Client({ name: "test-client", version: "1.0.0" });
  await client.connect(clientTransport);
});

afterEach(async () => {
  await client.close();
});

async function call(name: string, args: Record<string, unknown>) {
  const result = await client.callTool({ name, arguments: args });
  const content: unknown = "content" in result ? result.content : undefined;
  if (!Array.isArray(content)) throw new Error(`${name} returned no content`);
  const first: unknown = content[0];
  if (
    typeof first !== "object" ||
    first === null ||
    !("text" in first) ||
    typeof first.text !== "string"
  ) {
    throw new Error(`${name} returned no text`);
  }
  return {
    text: first.text,
    isError: "isError" in result && result.isError === true,
  };
}

async function callJson(name: string, args: Record<string, unknown>) {
  const { text, isError } = await call(name, args);
  expect(isError).toBe(false);
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

describe("analysis tools", () => {
  test("registers every tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "analyze_trends",
      "assess_data_quality",
      "correlate_series",
      "describe_series",
      "detect_anomalies",
      "detect_outliers",
      "identify_data_gaps",
      "predict_trend",
      "predict_value",
      "trend_report",
    ]);
  });

  test("analyze_trends returns the analysis with ISO dates", async () => {
    const result = await callJson("analyze_trends", {
      records: dailyRecords([5000, 6000, 7000, 8000, 9000], "steps", 5),
      time_range: "week",
    });

    expect(result).toMatchObject({
      dataType: "steps",
      direction: "increasing",
      timeRange: { start: "2026-03-03T12:00:00.000Z", end: "2026-03-10T12:00:00.000Z" },
      anomalies: [],
      summary: { totalDataPoints: 5, firstValue: 5000, lastValue: 9000 },
    });
  });

  test("analyze_trends reports typed analysis errors", async () => {
    const result = await call("analyze_trends", { records: [], time_range: "week" });
    expect(result).toEqual({
      isError: true,
      text: "Error (insufficientData): Cannot analyze an empty record set",
    });
  });

  test("analyze_trends reports half-specified date ranges", async () => {
    const result = await call("analyze_trends", {
      records: dailyRecords([70, 71]),
      start_date: "2026-03-01T00:00:00Z",
    });
    expect(result).toEqual({
      isError: true,
      text: "Error: start_date and end_date must be given together",
    });
  });

  test("predict_trend rejects a zero-day horizon", async () => {
    const result = await call("predict_trend", {
      records: dailyRecords([70, 70.5, 71], "weight", 7),
      time_range: "week",
      days_ahead: 0,
    });
    expect(result).toEqual({
      isError: true,
      text: "Error (invalidTimeframe): daysAhead must be a positive integer, got 0",
    });
  });

  test("predict_trend projects one point per day", async () => {
    const result = await callJson("predict_trend", {
      records: dailyRecords([5000, 6000, 7000, 8000, 9000], "steps", 5),
      time_range: "week",
      days_ahead: 2,
    });
    expect(result).toMatchObject({
      direction: "increasing",
      prediction: {
        dataType: "steps",
        methodology: "Linear Regression",
        validUntil: "2026-03-12T12:00:00.000Z",
        predictedPoints: [
          { timestamp: "2026-03-10T07:00:00.000Z", value: 10000, isAnomaly: false },
          { timestamp: "2026-03-11T07:00:00.000Z", value: 11000, isAnomaly: false },
        ],
      },
    });
  });

  test("predict_value uses the requested method", async () => {
    const result = await callJson("predict_value", {
      records: dailyRecords([3, 6, 9], "steps"),
      days_ahead: 4,
      method: "seasonalDecomposition",
    });
    expect(result).toEqual({ method: "seasonalDecomposition", daysAhead: 4, predictedValue: 9 });
  });

  test("detect_anomalies flags the single spike", async () => {
    const result = await callJson("detect_anomalies", {
      records: dailyRecords([70, 70, 70, 75, 70, 70, 70]),
    });
    expect(result).toMatchObject({
      count: 1,
      anomalies: [{ timestamp: "2026-03-04T07:00:00.000Z", value: 75, severity: "low" }],
    });
  });

  test("detect_outliers returns positions and values", async () => {
    const result = await callJson("detect_outliers", {
      values: [10, 10, 10, 10, 10, 10, 10, 10, 10, 50],
      method: "iqr",
    });
    expect(result).toEqual({ method: "iqr", indices: [9], outliers: [50] });
  });

  test("assess_data_quality flags implausible values", async () => {
    const result = await callJson("assess_data_quality", {
      records: dailyRecords([70, 0, 71, 600, 70], "weight", 5),
    });
    expect(result).toMatchObject({ accuracy: 0.6, issues: [{ type: "outlierData", affectedRecords: 2 }] });
  });

  test("identify_data_gaps lists missing days", async () => {
    const records = [...dailyRecords([70, 71]), ...dailyRecords([72], "weight", 6)];
    const result = await callJson("identify_data_gaps", { records, expected_frequency: "daily" });
    expect(result).toEqual({
      count: 1,
      gaps: [{ start: "2026-03-03T07:00:00.000Z", end: "2026-03-05T07:00:00.000Z" }],
    });
  });

  test("describe_series summarizes plain values", async () => {
    const result = await callJson("describe_series", {
      values: [1, 2, 3, 4, 5],
      weights: [1, 1, 1, 1, 1],
      alpha: 1,
    });
    expect(result).toMatchObject({
      count: 5,
      median: 3,
      movingAverage: [2, 3, 4],
      weightedMovingAverage: [3],
      exponentialMovingAverage: [1, 2, 3, 4, 5],
      variability: { range: 4, interquartileRange: 2 },
    });
  });

  test("correlate_series compares two series", async () => {
    const result = await callJson("correlate_series", { a: [1, 2, 3], b: [5, 5, 5] });
    expect(result).toEqual({ correlation: 0 });
  });

  test("trend_report returns the text summary", async () => {
    const result = await callJson("trend_report", {
      records: dailyRecords([68, 69, 70, 71, 72]),
      timeframe: "week",
    });
    expect(result).toMatchObject({
      timeframe: "week",
      variance: 2.5,
      movingAverage: null,
      generatedAt: "2026-03-10T12:00:00.000Z",
      trend: { direction: "increasing" },
    });
  });
});

describe("resources and prompts", () => {
  test("health://metrics lists the supported metrics", async () => {
    const { contents } = await client.readResource({ uri: "health://metrics" });
    const first = contents[0];
    if (!first || !("text" in first) || typeof first.text !== "string") {
      throw new Error("metrics resource returned no text");
    }
    const catalog: unknown = JSON.parse(first.text);
    expect(catalog).toMatchObject({
      metrics: [
        { type: "weight", unit: "kg" },
        { type: "steps", unit: "steps" },
        { type: "calories", unit: "kcal" },
        { type: "heartRate", unit: "bpm", min: 30, max: 220 },
        { type: "bloodGlucose", unit: "mg/dL" },
      ],
      defaults: { sensitivity: 2, classificationThreshold: 0.1 },
    });
  });

  test("metric-review names the metric and window", async () => {
    const { messages } = await client.getPrompt({
      name: "metric-review",
      arguments: { metric: "heartRate", time_range: "week" },
    });
    const content = messages[0]?.content;
    if (!content || content.type !== "text") throw new Error("prompt returned no text");
    expect(content.text.startsWith("Please review my heartRate data over the last week.")).toBe(
      true,
    );
  });
});
