import type { StateStore } from "./state-store";
import { StoreUnavailableError } from "../utils/errors";
import { logDebug } from "../utils/log";

export type RetryOptions = {
    /** Extra attempts after the first failure. */
    attempts: number;
    baseDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) =>
    new Promise<void>((resolve) => setTimeout(resolve, ms));

export function withRetry(store: StateStore, opts: RetryOptions): StateStore {
    if (opts.attempts <= 0) {
        return store;
    }
    const sleep = opts.sleep ?? defaultSleep;

    async function attempt<T>(op: string, fn: () => Promise<T>): Promise<T> {
        for (let i = 0; ; i++) {
            try {
                return await fn();
            } catch (err) {
                if (!(err instanceof StoreUnavailableError) || i >= opts.attempts) {
                    throw err;
                }
                const delay = opts.baseDelayMs * (i + 1);
                logDebug(`store ${op} failed, retry ${i + 1}/${opts.attempts} in ${delay}ms`);
                await sleep(delay);
            }
        }
    }

    return {
        read: (scope) => attempt("read", () => store.read(scope)),
        write: (scope, dataset) => attempt("write", () => store.write(scope, dataset)),
        close: () => store.close()
    };
}
