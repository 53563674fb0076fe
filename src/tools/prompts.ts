import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

export function registerPrompts(server: McpServer) {
  server.registerPrompt(
    "metric-review",
    {
      description:
        "Review one health metric end to end: data quality, trend, anomalies and a short forecast",
      argsSchema: {
        metric: z
          .string()
          .describe("Metric to review: weight, steps, calories, heartRate or bloodGlucose"),
        time_range: z
          .string()
          .optional()
          .describe("week, month, quarter or year. Defaults to month."),
      },
    },
    async ({ metric, time_range }) => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: `Please review my ${metric} data over the last ${time_range ?? "month"}. Use these tools in order:\n\n1. **assess_data_quality** - Check whether the records are plausible, consistent and recent\n2. **identify_data_gaps** - List any days with missing records\n3. **analyze_trends** - Analyze the trend with time_range "${time_range ?? "month"}"\n4. **detect_anomalies** - Flag unusual readings\n5. **predict_trend** - Project the next 7 days\n\nFormat the review with these sections:\n- **Data Quality**: Scores and any issues that limit how far the numbers can be trusted\n- **Trend**: Direction, rate of change per day and confidence\n- **Anomalies**: Each flagged reading with its date, value and severity\n- **Outlook**: The 7-day projection and how much weight to give it\n- **Suggestions**: 2-3 concrete next steps, such as logging more consistently`,
          },
        },
      ],
    })
  );
}
