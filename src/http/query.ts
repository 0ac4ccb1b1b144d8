export type QueryValue = string | number | boolean | null | undefined;

export function withQuery(
    path: string,
    query: Record<string, QueryValue> = {}
): string {
    const pairs: [string, string][] = [];
    for (const [k, v] of Object.entries(query)) {
        if (v != null) pairs.push([k, String(v)]);
    }
    return pairs.length
        ? `${path}${path.includes("?") ? "&" : "?"}${new URLSearchParams(pairs)}`
        : path;
}
