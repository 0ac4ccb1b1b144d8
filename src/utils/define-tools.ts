import { z, type ZodError, type ZodRawShape } from "zod";
import type { ToolResult } from "../types/tool-result";

export type ToolDefinition<S extends ZodRawShape = ZodRawShape> = {
    name: string;
    description: string;
    inputSchema: S;
    handler: (input: Record<string, unknown>) => Promise<ToolResult>;
};

/** Builds a tool against the shared zod instance so schemas and handlers agree. */
export function defineTool<S extends ZodRawShape>(
    build: (zod: typeof z) => ToolDefinition<S>
): ToolDefinition<S> {
    return build(z);
}

export const formatZodError = (error: ZodError): string =>
    error.issues
        .map((i) => `${i.path.length ? i.path.join(".") : "input"}: ${i.message}`)
        .join("; ");
