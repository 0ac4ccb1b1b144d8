import { withRetry } from "../retrying-store";
import type { StateStore } from "../state-store";
import { InvalidArgumentError, StoreUnavailableError } from "../../utils/errors";

const EMPTY = { samples: [], last_updated: null };

function flakyStore(failures: Error[]): StateStore & { reads: number } {
    const store = {
        reads: 0,
        read: async () => {
            store.reads++;
            const next = failures.shift();
            if (next) throw next;
            return EMPTY;
        },
        write: async () => undefined,
        close: async () => undefined
    };
    return store;
}

describe("withRetry", () => {
    it("returns the backend unchanged when no retries are configured", () => {
        const store = flakyStore([]);
        expect(withRetry(store, { attempts: 0, baseDelayMs: 100 })).toBe(store);
    });

    it("retries store-unavailable failures with linear backoff", async () => {
        const inner = flakyStore([
            new StoreUnavailableError("down"),
            new StoreUnavailableError("still down")
        ]);
        const delays: number[] = [];
        const store = withRetry(inner, {
            attempts: 3,
            baseDelayMs: 10,
            sleep: async (ms) => {
                delays.push(ms);
            }
        });

        await expect(store.read("s")).resolves.toEqual(EMPTY);
        expect(inner.reads).toBe(3);
        expect(delays).toEqual([10, 20]);
    });

    it("gives up after the configured attempts", async () => {
        const inner = flakyStore([
            new StoreUnavailableError("1"),
            new StoreUnavailableError("2"),
            new StoreUnavailableError("3")
        ]);
        const store = withRetry(inner, { attempts: 2, baseDelayMs: 0, sleep: async () => undefined });

        await expect(store.read("s")).rejects.toThrow("3");
        expect(inner.reads).toBe(3);
    });

    it("does not retry other errors", async () => {
        const inner = flakyStore([new InvalidArgumentError("bad")]);
        const store = withRetry(inner, { attempts: 5, baseDelayMs: 0, sleep: async () => undefined });

        await expect(store.read("s")).rejects.toBeInstanceOf(InvalidArgumentError);
        expect(inner.reads).toBe(1);
    });
});
