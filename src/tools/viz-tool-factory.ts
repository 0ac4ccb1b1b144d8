import type { ChartRenderer } from "../services/chart-service";
import type { MetricsService } from "../services/metrics-service";
import { CHART_LIMITS, DEFAULT_CHART_TITLE } from "../services/chart-service";
import { imageResult, jsonResult } from "../types/tool-result";
import { defineTool, formatZodError, type ToolDefinition } from "../utils/define-tools";
import { InvalidArgumentError } from "../utils/errors";

export type VizToolDeps = {
    metrics: MetricsService;
    charts: ChartRenderer;
    /** Scope every tool call reads and writes. */
    scope: string;
};

export function createVizTools({ metrics, charts, scope }: VizToolDeps): ToolDefinition[] {
    const push = defineTool((z) => ({
        name: "push",
        description:
            "Add a data point to the metrics. Returns { pushed, count } where count is the new number of samples.",
        inputSchema: {
            value: z.number().finite().describe("Measured value (finite number)"),
            label: z
                .string()
                .optional()
                .describe("Series label; points sharing a label are charted as one line")
        },
        handler: async (input) => {
            const parsed = z
                .object({ value: z.number().finite(), label: z.string().optional() })
                .safeParse(input);
            if (!parsed.success) {
                throw new InvalidArgumentError(`Invalid input: ${formatZodError(parsed.error)}`);
            }
            const res = await metrics.push(scope, parsed.data.value, parsed.data.label ?? "");
            return jsonResult(res);
        }
    }));

    const get_metrics = defineTool(() => ({
        name: "get_metrics",
        description:
            "Get current metrics as JSON: { count, samples: [{ value, label, sequence_index }], last_updated }.",
        inputSchema: {},
        handler: async () => jsonResult(await metrics.getMetrics(scope))
    }));

    const get_chart = defineTool((z) => {
        const shape = {
            title: z.string().optional().describe(`Chart title (default "${DEFAULT_CHART_TITLE}")`),
            width: z
                .number()
                .int()
                .min(CHART_LIMITS.width.min)
                .max(CHART_LIMITS.width.max)
                .optional()
                .describe(`Image width in pixels (default ${CHART_LIMITS.width.default})`),
            height: z
                .number()
                .int()
                .min(CHART_LIMITS.height.min)
                .max(CHART_LIMITS.height.max)
                .optional()
                .describe(`Image height in pixels (default ${CHART_LIMITS.height.default})`)
        };
        return {
            name: "get_chart",
            description:
                "Render the metrics as a PNG line chart (one line per label). Works on an empty dataset.",
            inputSchema: shape,
            handler: async (input) => {
                const parsed = z.object(shape).safeParse(input);
                if (!parsed.success) {
                    throw new InvalidArgumentError(`Invalid input: ${formatZodError(parsed.error)}`);
                }
                const snapshot = await metrics.getMetrics(scope);
                const png = await charts.render(
                    snapshot,
                    {
                        title: parsed.data.title ?? DEFAULT_CHART_TITLE,
                        width: parsed.data.width ?? CHART_LIMITS.width.default,
                        height: parsed.data.height ?? CHART_LIMITS.height.default
                    }
                );
                return imageResult(png);
            }
        };
    });

    const clear = defineTool(() => ({
        name: "clear",
        description: "Clear all metrics data. Use when starting fresh.",
        inputSchema: {},
        handler: async () => jsonResult(await metrics.clear(scope))
    }));

    return [push, get_metrics, get_chart, clear];
}
