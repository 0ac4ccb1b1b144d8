import { IS_DEV } from "../config/config";

// stdout carries the stdio transport, so everything goes to stderr.
export function logDebug(...args: unknown[]): void {
    if (IS_DEV) {
        console.error("[debug]", ...args);
    }
}
