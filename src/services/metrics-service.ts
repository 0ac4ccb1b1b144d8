import type { StateStore } from "../stores/state-store";
import type { MetricsSnapshot, PushResult, Sample } from "../types/viz";
import { emptyDataset } from "../types/viz";
import { InvalidArgumentError } from "../utils/errors";

export type MetricsService = {
    push: (scope: string, value: number, label?: string) => Promise<PushResult>;
    getMetrics: (scope: string) => Promise<MetricsSnapshot>;
    clear: (scope: string) => Promise<{ cleared: true }>;
};

export type MetricsServiceOptions = {
    /** Keep only the newest N samples. 0 keeps everything. */
    maxSamples?: number;
    now?: () => Date;
};

/**
 * Every call re-reads the whole Dataset and writes it back. Nothing is cached
 * between calls, and concurrent pushes to one scope are last-write-wins.
 */
export function createMetricsService(
    store: StateStore,
    opts: MetricsServiceOptions = {}
): MetricsService {
    const maxSamples = opts.maxSamples ?? 0;
    const now = opts.now ?? (() => new Date());

    async function push(scope: string, value: number, label = ""): Promise<PushResult> {
        if (typeof value !== "number" || !Number.isFinite(value)) {
            throw new InvalidArgumentError(`value must be a finite number, got ${String(value)}`);
        }
        const dataset = await store.read(scope);
        const last = dataset.samples[dataset.samples.length - 1];
        const sample: Sample = {
            value: Object.is(value, -0) ? 0 : value,
            label,
            sequence_index: last ? last.sequence_index + 1 : 0
        };
        let samples = [...dataset.samples, sample];
        if (maxSamples > 0 && samples.length > maxSamples) {
            samples = samples.slice(-maxSamples);
        }
        await store.write(scope, { samples, last_updated: now().toISOString() });
        return { pushed: sample, count: samples.length };
    }

    async function getMetrics(scope: string): Promise<MetricsSnapshot> {
        const { samples, last_updated } = await store.read(scope);
        return { count: samples.length, samples, last_updated };
    }

    async function clear(scope: string): Promise<{ cleared: true }> {
        await store.write(scope, emptyDataset());
        return { cleared: true };
    }

    return { push, getMetrics, clear };
}
