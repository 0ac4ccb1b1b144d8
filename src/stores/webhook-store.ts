import type { StateStore } from "./state-store";
import type { Dataset } from "../types/viz";
import { createHttp, HttpError, type FetchLike } from "../http/client";
import { emptyDataset } from "../types/viz";
import { encodeDataset, parseDataset } from "../utils/dataset-codec";
import { StoreUnavailableError, errorMessage } from "../utils/errors";

export type WebhookStoreOptions = {
    url: string;
    token?: string;
    fetch?: FetchLike;
    timeoutMs?: number;
};

/**
 * Proxies state to an HTTP endpoint:
 *   GET  <url>/state?scope=<scope>  -> encoded Dataset, 404 when never written
 *   PUT  <url>/state?scope=<scope>  <- encoded Dataset
 */
export function createWebhookStateStore(opts: WebhookStoreOptions): StateStore {
    const http = createHttp({
        baseUrl: opts.url,
        getToken: () => opts.token,
        fetch: opts.fetch,
        timeoutMs: opts.timeoutMs
    });

    async function read(scope: string): Promise<Dataset> {
        let body: unknown;
        try {
            body = await http.get("/state", { scope });
        } catch (err) {
            if (err instanceof HttpError && err.status === 404) {
                return emptyDataset();
            }
            throw new StoreUnavailableError(
                `Webhook read failed for scope "${scope}": ${errorMessage(err)}`,
                err
            );
        }
        return body === undefined ? emptyDataset() : parseDataset(body);
    }

    async function write(scope: string, dataset: Dataset): Promise<void> {
        const encoded = encodeDataset(dataset);
        try {
            await http.put("/state", encoded, { scope });
        } catch (err) {
            throw new StoreUnavailableError(
                `Webhook write failed for scope "${scope}": ${errorMessage(err)}`,
                err
            );
        }
    }

    return { read, write, close: async () => undefined };
}
