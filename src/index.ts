#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createVizApp, type VizApp } from "./app";
import { loadConfig } from "./config/config";

async function main(): Promise<void> {
    console.error("Starting Viz MCP Server...");

    let app: VizApp;
    try {
        const config = loadConfig();
        app = createVizApp(config);
        console.error(
            `State backend: ${config.store.backend}, scope: ${config.scope}` +
                (config.maxSamples ? `, keeping last ${config.maxSamples} samples` : "")
        );
    } catch (error) {
        console.error("Fatal Error: Could not initialize Viz MCP Server:", error);
        process.exit(1);
    }

    const shutdown = async () => {
        await app.server.close();
        await app.store.close();
        process.exit(0);
    };
    const onSignal = () => {
        shutdown().catch((error) => {
            console.error("Error during shutdown:", error);
            process.exit(1);
        });
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    const transport = new StdioServerTransport();
    console.error("Connecting server to transport...");
    await app.server.connect(transport);

    console.error("Viz MCP Server running on stdio");
}

main().catch((error) => {
    console.error("Fatal error in main():", error);
    process.exit(1);
});
