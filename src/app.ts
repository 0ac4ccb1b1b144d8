import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { VizConfig } from "./config/config";
import { createChartRenderer, type Rasterize } from "./services/chart-service";
import { createMetricsService } from "./services/metrics-service";
import { createVizServer } from "./server";
import { createStateStore, type StateStore } from "./stores";
import { createToolDispatcher, type ToolDispatcher } from "./tools/dispatcher";
import { createVizTools } from "./tools/viz-tool-factory";

export type VizApp = {
    server: McpServer;
    dispatcher: ToolDispatcher;
    store: StateStore;
};

/** Wires store -> services -> tools -> MCP server. */
export function createVizApp(
    config: VizConfig,
    overrides: { store?: StateStore; rasterize?: Rasterize; now?: () => Date } = {}
): VizApp {
    const store = overrides.store ?? createStateStore(config);
    const metrics = createMetricsService(store, {
        maxSamples: config.maxSamples,
        now: overrides.now
    });
    const charts = createChartRenderer(overrides.rasterize);
    const dispatcher = createToolDispatcher(
        createVizTools({ metrics, charts, scope: config.scope })
    );
    const server = createVizServer({ dispatcher, metrics, scope: config.scope });
    return { server, dispatcher, store };
}
