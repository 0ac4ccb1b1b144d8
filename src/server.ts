import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z, type ZodRawShape } from "zod";
import type { MetricsService } from "./services/metrics-service";
import type { ToolDispatcher } from "./tools/dispatcher";
import type { ToolResult } from "./types/tool-result";

export const SERVER_NAME = "viz";
export const SERVER_VERSION = "1.0.0";
export const METRICS_RESOURCE_URI = "data://metrics";

export function toCallToolResult(result: ToolResult): CallToolResult {
    switch (result.kind) {
        case "json":
            return { content: [{ type: "text", text: JSON.stringify(result.data, null, 2) }] };
        case "image":
            return {
                content: [
                    { type: "image", data: result.data.toString("base64"), mimeType: result.mimeType }
                ]
            };
        case "error":
            return {
                content: [
                    {
                        type: "text",
                        text: JSON.stringify({ error: { code: result.code, message: result.message } })
                    }
                ],
                isError: true
            };
    }
}

/** Same keys, any value: the dispatcher validates and reports bad input as INVALID_ARGUMENT. */
export function toWireShape(shape: ZodRawShape): Record<string, z.ZodUnknown> {
    return Object.fromEntries(
        Object.entries(shape).map(([key, field]) => [key, z.unknown().describe(field.description ?? key)])
    );
}

export function createVizServer(deps: {
    dispatcher: ToolDispatcher;
    metrics: MetricsService;
    scope: string;
}): McpServer {
    const server = new McpServer(
        {
            name: SERVER_NAME,
            version: SERVER_VERSION
        },
        {
            capabilities: {
                tools: {},
                resources: {}
            }
        }
    );

    deps.dispatcher.tools.forEach((tool) => {
        server.tool(
            tool.name,
            tool.description,
            toWireShape(tool.inputSchema),
            async (args: Record<string, unknown>) =>
                toCallToolResult(await deps.dispatcher.dispatch(tool.name, args))
        );
    });

    server.resource(
        "metrics",
        METRICS_RESOURCE_URI,
        { description: "Current metrics snapshot", mimeType: "application/json" },
        async (uri) => ({
            contents: [
                {
                    uri: uri.href,
                    mimeType: "application/json",
                    text: JSON.stringify(await deps.metrics.getMetrics(deps.scope), null, 2)
                }
            ]
        })
    );

    return server;
}
