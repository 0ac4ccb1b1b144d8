import { createMemoryStateStore } from "../memory-store";

describe("memory state store", () => {
    it("reads an empty dataset for a scope that was never written", async () => {
        const store = createMemoryStateStore();
        await expect(store.read("nothing-here")).resolves.toEqual({
            samples: [],
            last_updated: null
        });
    });

    it("returns what was written, keyed by scope", async () => {
        const store = createMemoryStateStore();
        const a = {
            samples: [{ value: 2.5, label: "cpu", sequence_index: 0 }],
            last_updated: "2026-01-02T03:04:05.000Z"
        };
        await store.write("a", a);
        await expect(store.read("a")).resolves.toEqual(a);
        await expect(store.read("b")).resolves.toEqual({ samples: [], last_updated: null });
    });

    it("does not share references with callers", async () => {
        const store = createMemoryStateStore();
        const dataset = { samples: [{ value: 1, label: "x", sequence_index: 0 }], last_updated: null };
        await store.write("s", dataset);
        dataset.samples.push({ value: 2, label: "y", sequence_index: 1 });

        const first = await store.read("s");
        first.samples.length = 0;
        const second = await store.read("s");
        expect(second.samples).toEqual([{ value: 1, label: "x", sequence_index: 0 }]);
    });

    it("stores encoded JSON in the backing map", async () => {
        const backing = new Map<string, string>();
        const store = createMemoryStateStore(backing);
        await store.write("s", { samples: [], last_updated: null });
        expect(backing.get("s")).toBe('{"samples":[],"last_updated":null}');
    });
});
