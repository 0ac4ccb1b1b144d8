import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { METRICS_RESOURCE_URI } from "../server";

export type DecodedToolResult =
    | { kind: "json"; data: unknown }
    | { kind: "image"; data: Buffer; mimeType: string }
    | { kind: "error"; code: string; message: string };

const parseJson = (text: string): unknown => {
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
};

/** Turns MCP content back into the server's json / image / error shapes. */
export function decodeToolResult(result: CallToolResult): DecodedToolResult {
    const first = result.content[0];
    if (result.isError) {
        const text = first?.type === "text" ? first.text : "";
        const body = parseJson(text);
        if (typeof body === "object" && body !== null && "error" in body) {
            const { error } = body;
            if (typeof error === "object" && error !== null) {
                const code = "code" in error ? String(error.code) : "UNKNOWN";
                const message = "message" in error ? String(error.message) : text;
                return { kind: "error", code, message };
            }
        }
        return { kind: "error", code: "UNKNOWN", message: text };
    }
    if (first?.type === "image") {
        return { kind: "image", data: Buffer.from(first.data, "base64"), mimeType: first.mimeType };
    }
    if (first?.type === "text") {
        return { kind: "json", data: parseJson(first.text) };
    }
    return { kind: "json", data: undefined };
}

export class VizMcpClient {
    private client: Client;

    constructor(private transport: Transport) {
        this.client = new Client(
            { name: "viz-client", version: "1.0.0" },
            {
                capabilities: {}
            }
        );
    }

    async connect(): Promise<void> {
        await this.client.connect(this.transport);
    }

    async listToolNames(): Promise<string[]> {
        const res = await this.client.listTools();
        return res.tools.map((t) => t.name);
    }

    async callTool(name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
        const raw = await this.client.callTool({ name, arguments: args });
        return CallToolResultSchema.parse(raw);
    }

    async call(name: string, args: Record<string, unknown> = {}): Promise<DecodedToolResult> {
        return decodeToolResult(await this.callTool(name, args));
    }

    async readMetricsResource(): Promise<unknown> {
        const res = await this.client.readResource({ uri: METRICS_RESOURCE_URI });
        const item = res.contents[0];
        return item && "text" in item && typeof item.text === "string"
            ? parseJson(item.text)
            : undefined;
    }

    async close(): Promise<void> {
        await this.client.close();
    }
}
