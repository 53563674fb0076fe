import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  METRIC_DEFINITIONS,
  METRIC_TYPES,
  OUTLIER_METHODS,
  PREDICTION_METHODS,
  SEVERITY_THRESHOLDS,
  TIME_RANGES,
} from "../analysis/index.js";
import type { Config } from "../config.js";

export function registerResources(server: McpServer, defaults: Config["analysis"]) {
  server.registerResource(
    "metrics",
    "health://metrics",
    {
      description:
        "Supported health metrics with units and plausible ranges, preset time windows, and the analysis defaults this server uses",
    },
    async (uri) => {
      const catalog = {
        metrics: METRIC_TYPES.map((type) => ({ type, ...METRIC_DEFINITIONS[type] })),
        timeRanges: TIME_RANGES,
        predictionMethods: PREDICTION_METHODS,
        outlierMethods: OUTLIER_METHODS,
        severityThresholds: SEVERITY_THRESHOLDS,
        defaults,
      };

      return {
        contents: [
          {
            uri: uri.href,
            mimeType: "application/json",
            text: JSON.stringify(catalog, null, 2),
          },
        ],
      };
    }
  );
}
