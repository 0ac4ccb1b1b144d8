import type { ErrorResult, ToolResult } from "../types/tool-result";
import type { ToolDefinition } from "../utils/define-tools";
import { VizError, errorMessage } from "../utils/errors";
import { withToolLogging } from "../utils/tool-logging";

export type ToolDispatcher = {
    tools: readonly ToolDefinition[];
    dispatch: (name: string, args?: unknown) => Promise<ToolResult>;
};

const isPlainObject = (v: unknown): v is Record<string, unknown> =>
    typeof v === "object" && v !== null && !Array.isArray(v);

export function toErrorResult(err: unknown): ErrorResult {
    if (err instanceof VizError) {
        return { kind: "error", code: err.code, message: err.message };
    }
    console.error("Unexpected tool failure:", err);
    return { kind: "error", code: "INTERNAL", message: errorMessage(err) };
}

/**
 * Routes a named call to its tool. Never rejects: every failure comes back
 * as an `ErrorResult`. Holds no state besides the tool table.
 */
export function createToolDispatcher(tools: ToolDefinition[]): ToolDispatcher {
    const byName = new Map(tools.map((t) => [t.name, t]));

    async function dispatch(name: string, args: unknown = {}): Promise<ToolResult> {
        const tool = byName.get(name);
        if (!tool) {
            return { kind: "error", code: "UNKNOWN_TOOL", message: `Unknown tool: ${name}` };
        }
        if (!isPlainObject(args)) {
            return {
                kind: "error",
                code: "INVALID_ARGUMENT",
                message: "Invalid input: arguments must be an object"
            };
        }
        return withToolLogging(name, args, async () => {
            try {
                return await tool.handler(args);
            } catch (err) {
                return toErrorResult(err);
            }
        });
    }

    return { tools, dispatch };
}
