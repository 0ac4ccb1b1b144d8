import type { StoreConfig, VizConfig } from "../config/config";
import type { StateStore } from "./state-store";
import { createMemoryStateStore } from "./memory-store";
import { createRedisClient, createRedisStateStore } from "./redis-store";
import { withRetry } from "./retrying-store";
import { createWebhookStateStore } from "./webhook-store";

export type { StateStore } from "./state-store";

function createBackend(store: StoreConfig): StateStore {
    switch (store.backend) {
        case "redis":
            return createRedisStateStore(createRedisClient(store.url), store.keyPrefix);
        case "webhook":
            return createWebhookStateStore({ url: store.url, token: store.token });
        case "memory":
            return createMemoryStateStore();
    }
}

export function createStateStore(config: Pick<VizConfig, "store" | "retry">): StateStore {
    return withRetry(createBackend(config.store), config.retry);
}
