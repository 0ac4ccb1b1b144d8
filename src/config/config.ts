import { config as dotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "../utils/errors";
dotenv();

export const IS_DEV = process.env.NODE_ENV === "development";

const intFromEnv = (fallback: number) =>
    z.coerce.number().int().min(0).default(fallback);

const envSchema = z
    .object({
        STATE_BACKEND: z.enum(["memory", "redis", "webhook"]).default("memory"),
        REDIS_URL: z.string().url().optional(),
        REDIS_KEY_PREFIX: z.string().default("viz:"),
        STATE_WEBHOOK_URL: z.string().url().optional(),
        STATE_WEBHOOK_TOKEN: z.string().min(1).optional(),
        VIZ_STATE_SCOPE: z.string().min(1).default("viz_state"),
        VIZ_MAX_SAMPLES: intFromEnv(0),
        STORE_RETRY_ATTEMPTS: intFromEnv(0),
        STORE_RETRY_DELAY_MS: intFromEnv(100)
    })
    .superRefine((env, ctx) => {
        if (env.STATE_BACKEND === "redis" && !env.REDIS_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["REDIS_URL"],
                message: "required when STATE_BACKEND=redis"
            });
        }
        if (env.STATE_BACKEND === "webhook" && !env.STATE_WEBHOOK_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["STATE_WEBHOOK_URL"],
                message: "required when STATE_BACKEND=webhook"
            });
        }
    });

export type StoreConfig =
    | { backend: "memory" }
    | { backend: "redis"; url: string; keyPrefix: string }
    | { backend: "webhook"; url: string; token?: string };

export type VizConfig = {
    store: StoreConfig;
    retry: { attempts: number; baseDelayMs: number };
    scope: string;
    maxSamples: number;
};

// Empty strings count as unset, the way a blank line in .env reads.
const blankToUndefined = (env: NodeJS.ProcessEnv) =>
    Object.fromEntries(
        Object.entries(env).filter(([, v]) => v !== undefined && v !== "")
    );

export function loadConfig(env: NodeJS.ProcessEnv = process.env): VizConfig {
    const parsed = envSchema.safeParse(blankToUndefined(env));
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
        );
    }
    const e = parsed.data;

    let store: StoreConfig;
    if (e.STATE_BACKEND === "redis" && e.REDIS_URL) {
        store = { backend: "redis", url: e.REDIS_URL, keyPrefix: e.REDIS_KEY_PREFIX };
    } else if (e.STATE_BACKEND === "webhook" && e.STATE_WEBHOOK_URL) {
        store = {
            backend: "webhook",
            url: e.STATE_WEBHOOK_URL,
            token: e.STATE_WEBHOOK_TOKEN
        };
    } else {
        store = { backend: "memory" };
    }

    return {
        store,
        retry: { attempts: e.STORE_RETRY_ATTEMPTS, baseDelayMs: e.STORE_RETRY_DELAY_MS },
        scope: e.VIZ_STATE_SCOPE,
        maxSamples: e.VIZ_MAX_SAMPLES
    };
}
