import type { StateStore } from "./state-store";
import { decodeDataset, encodeDataset } from "../utils/dataset-codec";

// Holds encoded text so callers never share a reference with the store.
export function createMemoryStateStore(
    seed: Map<string, string> = new Map()
): StateStore {
    const m = seed;
    return {
        read: async (scope) => decodeDataset(m.get(scope)),
        write: async (scope, dataset) => {
            m.set(scope, encodeDataset(dataset));
        },
        close: async () => undefined
    };
}
