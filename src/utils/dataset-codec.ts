import { z } from "zod";
import type { Dataset } from "../types/viz";
import { emptyDataset } from "../types/viz";
import { StoreUnavailableError, errorMessage } from "./errors";

const sampleSchema = z.object({
    value: z.number().finite(),
    label: z.string(),
    sequence_index: z.number().int().min(0)
});

const datasetSchema = z.object({
    samples: z.array(sampleSchema),
    last_updated: z.string().nullable().default(null)
});

export function encodeDataset(dataset: Dataset): string {
    const parsed = datasetSchema.safeParse(dataset);
    if (!parsed.success) {
        throw new StoreUnavailableError(
            `Dataset cannot be encoded: ${parsed.error.message}`,
            parsed.error
        );
    }
    return JSON.stringify(parsed.data);
}

/** Decode stored text. `null`/empty means the scope was never written. */
export function decodeDataset(raw: string | null | undefined): Dataset {
    if (raw == null || raw === "") {
        return emptyDataset();
    }
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (err) {
        throw new StoreUnavailableError(
            `Stored dataset is not valid JSON: ${errorMessage(err)}`,
            err
        );
    }
    return parseDataset(json);
}

export function parseDataset(json: unknown): Dataset {
    const parsed = datasetSchema.safeParse(json);
    if (!parsed.success) {
        throw new StoreUnavailableError(
            `Stored dataset has an unexpected shape: ${parsed.error.message}`,
            parsed.error
        );
    }
    return parsed.data;
}
