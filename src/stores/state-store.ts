import type { Dataset } from "../types/viz";

/**
 * Durable home of every Dataset, addressed by scope.
 *
 * `read` resolves to an empty Dataset for a scope that was never written.
 * Both operations reject with `StoreUnavailableError` when the backend fails;
 * callers never see a partial write.
 */
export type StateStore = {
    read: (scope: string) => Promise<Dataset>;
    write: (scope: string, dataset: Dataset) => Promise<void>;
    close: () => Promise<void>;
};
