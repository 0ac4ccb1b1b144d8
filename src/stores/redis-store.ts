import { Redis, type RedisOptions } from "ioredis";
import type { StateStore } from "./state-store";
import type { Dataset } from "../types/viz";
import { decodeDataset, encodeDataset } from "../utils/dataset-codec";
import { StoreUnavailableError, errorMessage } from "../utils/errors";
import { logDebug } from "../utils/log";

/** The subset of the ioredis client the store relies on. */
export type RedisStateClient = {
    get: (key: string) => Promise<string | null>;
    set: (key: string, value: string) => Promise<unknown>;
    quit: () => Promise<unknown>;
};

const REDIS_OPTIONS: RedisOptions = {
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
    commandTimeout: 5000,
    lazyConnect: true,
    retryStrategy: (times: number) => {
        // 50ms, 100ms, 150ms ... capped at 2s
        const delay = Math.min(times * 50, 2000);
        logDebug(`Retrying Redis connection (attempt ${times}, ${delay}ms)`);
        return delay;
    },
    reconnectOnError: (err: Error) => err.message.includes("READONLY")
};

export function createRedisClient(url: string): Redis {
    const client = new Redis(url, REDIS_OPTIONS);
    client.on("error", (err: Error) => {
        console.error("Redis connection error:", err.message);
    });
    return client;
}

export function createRedisStateStore(
    client: RedisStateClient,
    keyPrefix = "viz:"
): StateStore {
    const keyFor = (scope: string) => `${keyPrefix}${scope}`;

    async function read(scope: string) {
        let raw: string | null;
        try {
            raw = await client.get(keyFor(scope));
        } catch (err) {
            throw new StoreUnavailableError(
                `Redis read failed for scope "${scope}": ${errorMessage(err)}`,
                err
            );
        }
        return decodeDataset(raw);
    }

    async function write(scope: string, dataset: Dataset) {
        const encoded = encodeDataset(dataset);
        try {
            await client.set(keyFor(scope), encoded);
        } catch (err) {
            throw new StoreUnavailableError(
                `Redis write failed for scope "${scope}": ${errorMessage(err)}`,
                err
            );
        }
    }

    async function close() {
        await client.quit();
    }

    return { read, write, close };
}
