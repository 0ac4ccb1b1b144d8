export type Sample = {
    value: number;
    label: string;
    sequence_index: number;
};

export type Dataset = {
    samples: Sample[];
    last_updated: string | null; // ISO-8601 of the last push
};

export type ChartRequest = {
    title: string;
    width: number;
    height: number;
};

export type MetricsSnapshot = {
    count: number;
    samples: Sample[];
    last_updated: string | null;
};

export type PushResult = {
    pushed: Sample;
    count: number;
};

export const emptyDataset = (): Dataset => ({ samples: [], last_updated: null });
