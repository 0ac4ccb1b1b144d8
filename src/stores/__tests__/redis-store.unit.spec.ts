import { createRedisStateStore, type RedisStateClient } from "../redis-store";
import { StoreUnavailableError } from "../../utils/errors";

function fakeRedis(): RedisStateClient & { data: Map<string, string>; quitCalls: number } {
    const data = new Map<string, string>();
    const fake = {
        data,
        quitCalls: 0,
        get: async (key: string) => data.get(key) ?? null,
        set: async (key: string, value: string) => {
            data.set(key, value);
            return "OK";
        },
        quit: async () => {
            fake.quitCalls++;
            return "OK";
        }
    };
    return fake;
}

describe("redis state store", () => {
    it("writes the encoded dataset under the prefixed key", async () => {
        const client = fakeRedis();
        const store = createRedisStateStore(client, "test:");
        await store.write("viz_state", {
            samples: [{ value: 3, label: "a", sequence_index: 0 }],
            last_updated: null
        });
        expect(client.data.get("test:viz_state")).toBe(
            '{"samples":[{"value":3,"label":"a","sequence_index":0}],"last_updated":null}'
        );
        await expect(store.read("viz_state")).resolves.toEqual({
            samples: [{ value: 3, label: "a", sequence_index: 0 }],
            last_updated: null
        });
    });

    it("uses the viz: prefix by default and reads absent keys as empty", async () => {
        const client = fakeRedis();
        const store = createRedisStateStore(client);
        await expect(store.read("s")).resolves.toEqual({ samples: [], last_updated: null });
        await store.write("s", { samples: [], last_updated: null });
        expect([...client.data.keys()]).toEqual(["viz:s"]);
    });

    it("wraps connection failures as StoreUnavailableError", async () => {
        const client = fakeRedis();
        client.get = async () => {
            throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
        };
        client.set = async () => {
            throw new Error("Command timed out");
        };
        const store = createRedisStateStore(client);

        await expect(store.read("s")).rejects.toThrow(
            'Redis read failed for scope "s": connect ECONNREFUSED 127.0.0.1:6379'
        );
        await expect(store.write("s", { samples: [], last_updated: null })).rejects.toBeInstanceOf(
            StoreUnavailableError
        );
    });

    it("treats an undecodable value as store unavailable", async () => {
        const client = fakeRedis();
        client.data.set("viz:s", "garbage");
        await expect(createRedisStateStore(client).read("s")).rejects.toBeInstanceOf(
            StoreUnavailableError
        );
    });

    it("quits the client on close", async () => {
        const client = fakeRedis();
        await createRedisStateStore(client).close();
        expect(client.quitCalls).toBe(1);
    });
});
