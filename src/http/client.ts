import { withQuery, type QueryValue } from "./query";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class HttpError extends Error {
    constructor(
        readonly status: number,
        message: string
    ) {
        super(message);
        this.name = "HttpError";
    }
}

export type Http = {
    get: (path: string, query?: Record<string, QueryValue>) => Promise<unknown>;
    put: (
        path: string,
        body: string,
        query?: Record<string, QueryValue>
    ) => Promise<unknown>;
};

export type HttpOptions = {
    baseUrl: string;
    getToken?: () => string | undefined;
    fetch?: FetchLike;
    timeoutMs?: number;
};

export function createHttp(opts: HttpOptions): Http {
    const doFetch: FetchLike = opts.fetch ?? ((url, init) => fetch(url, init));
    const base = opts.baseUrl.replace(/\/+$/, "");
    const timeoutMs = opts.timeoutMs ?? 10_000;

    async function request(
        method: "GET" | "PUT",
        path: string,
        { query, body }: { query?: Record<string, QueryValue>; body?: string } = {}
    ): Promise<unknown> {
        const url = `${base}${withQuery(path, query)}`;
        const headers: Record<string, string> = {
            Accept: "application/json"
        };
        if (body !== undefined) headers["Content-Type"] = "application/json";
        const token = opts.getToken?.();
        if (token) headers.Authorization = `Bearer ${token}`;

        const res = await doFetch(url, {
            method,
            headers,
            signal: AbortSignal.timeout(timeoutMs),
            ...(body !== undefined ? { body } : {})
        });
        if (!res.ok) {
            throw new HttpError(res.status, `${method} ${path} -> HTTP ${res.status}`);
        }
        const text = await res.text();
        return text ? JSON.parse(text) : undefined;
    }

    return {
        get: (p, q) => request("GET", p, { query: q }),
        put: (p, b, q) => request("PUT", p, { body: b, query: q })
    };
}
