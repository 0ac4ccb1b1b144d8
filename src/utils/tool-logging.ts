import type { ToolResult } from "../types/tool-result";
import { logDebug } from "./log";

const SENSITIVE_KEYS = new Set([
    "authorization",
    "api-key",
    "apikey",
    "password",
    "secret",
    "token",
    "access_token"
]);
const MAX_VALUE_CHARS = 80;

/** One-line argument summary with secret-looking keys blanked out. */
export function summarizeArgs(args: Record<string, unknown>): string {
    const parts = Object.entries(args).map(([k, v]) => {
        if (SENSITIVE_KEYS.has(k.toLowerCase())) return `${k}=***`;
        const text = typeof v === "string" ? JSON.stringify(v) : String(v);
        return `${k}=${text.length > MAX_VALUE_CHARS ? `${text.slice(0, MAX_VALUE_CHARS)}…` : text}`;
    });
    return parts.join(" ");
}

export async function withToolLogging(
    tool: string,
    args: Record<string, unknown>,
    fn: () => Promise<ToolResult>
): Promise<ToolResult> {
    const started = Date.now();
    logDebug(`[tool] ${tool} called ${summarizeArgs(args)}`);
    const result = await fn();
    const durationMs = Date.now() - started;
    if (result.kind === "error") {
        console.error(`[tool] ${tool} error ${durationMs}ms ${result.code}: ${result.message}`);
    } else {
        console.error(`[tool] ${tool} ok ${durationMs}ms`);
    }
    return result;
}
