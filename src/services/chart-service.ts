import sharp from "sharp";
import type { ChartRequest, Dataset, Sample } from "../types/viz";
import { RenderFailureError, errorMessage } from "../utils/errors";

export const CHART_LIMITS = {
    maxTitleLength: 200,
    width: { min: 200, max: 2000, default: 800 },
    height: { min: 150, max: 2000, default: 400 }
} as const;

export const DEFAULT_CHART_TITLE = "Metrics";

export type Rasterize = (svg: string) => Promise<Buffer>;

export type ChartRenderer = {
    render: (dataset: Dataset, request: ChartRequest) => Promise<Buffer>;
};

// matplotlib "tab10"
const PALETTE = [
    "#1f77b4",
    "#ff7f0e",
    "#2ca02c",
    "#d62728",
    "#9467bd",
    "#8c564b",
    "#e377c2",
    "#7f7f7f",
    "#bcbd22",
    "#17becf"
];

const MARGIN = { top: 44, right: 24, bottom: 52, left: 68 };
const FONT = "DejaVu Sans, Arial, Helvetica, sans-serif";
// XML 1.0 forbids these outright; tab, LF and CR are allowed.
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/;
const CONTROL_CHARS_ALL = new RegExp(CONTROL_CHARS.source, "g");

export const rasterizeWithSharp: Rasterize = (svg) =>
    sharp(Buffer.from(svg, "utf8")).png().toBuffer();

export const escapeXml = (s: string): string =>
    s
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
        .replace(/'/g, "&apos;");

function formatTick(v: number): string {
    const rounded = Number(v.toPrecision(4));
    return Object.is(rounded, -0) ? "0" : String(rounded);
}

type Domain = { min: number; max: number };

function domainOf(values: number[], pad: number): Domain {
    if (!values.length) return { min: 0, max: 1 };
    // no spread: a large dataset exceeds the engine's argument limit
    let min = values.reduce((a, b) => Math.min(a, b));
    let max = values.reduce((a, b) => Math.max(a, b));
    if (min === max) {
        const d = Math.max(Math.abs(min) * 1e-9, 1);
        min -= d;
        max += d;
    } else {
        // halves keep the span finite near ±Number.MAX_VALUE
        const padding = (max / 2 - min / 2) * 2 * pad;
        min -= padding;
        max += padding;
    }
    return {
        min: Math.max(min, -Number.MAX_VALUE),
        max: Math.min(max, Number.MAX_VALUE)
    };
}

/** Position of `v` within `d`, 0..1. */
const fraction = (v: number, d: Domain): number => (v / 2 - d.min / 2) / (d.max / 2 - d.min / 2);

/** Series per label, in first-seen order. */
export function groupByLabel(samples: Sample[]): Array<{ label: string; points: Sample[] }> {
    const groups = new Map<string, Sample[]>();
    for (const s of samples) {
        const g = groups.get(s.label);
        if (g) g.push(s);
        else groups.set(s.label, [s]);
    }
    return [...groups.entries()].map(([label, points]) => ({ label, points }));
}

function xTicks(d: Domain): number[] {
    const lo = Math.ceil(d.min);
    const hi = Math.floor(d.max);
    const step = Math.max(1, Math.ceil((hi - lo) / 10));
    const out: number[] = [];
    for (let t = lo; t <= hi; t += step) out.push(t);
    return out;
}

function yTicks(d: Domain, count = 5): number[] {
    const out: number[] = [];
    for (let i = 0; i <= count; i++) {
        const t = i / count;
        out.push(d.min * (1 - t) + d.max * t);
    }
    return out;
}

function assertTitleEncodable(title: string): void {
    if (title.length > CHART_LIMITS.maxTitleLength) {
        throw new RenderFailureError(
            `Chart title is ${title.length} characters; the limit is ${CHART_LIMITS.maxTitleLength}`
        );
    }
    if (CONTROL_CHARS.test(title)) {
        throw new RenderFailureError("Chart title contains control characters that cannot be rendered");
    }
}

export function buildLineChartSvg(dataset: Dataset, request: ChartRequest): string {
    assertTitleEncodable(request.title);

    const { width, height } = request;
    const left = MARGIN.left;
    const right = width - MARGIN.right;
    const top = MARGIN.top;
    const bottom = height - MARGIN.bottom;
    const samples = dataset.samples;

    const xd = samples.length
        ? domainOf(samples.map((s) => s.sequence_index), 0)
        : { min: 0, max: 1 };
    const yd = domainOf(samples.map((s) => s.value), 0.05);
    const sx = (x: number) => left + fraction(x, xd) * (right - left);
    const sy = (y: number) => bottom - fraction(y, yd) * (bottom - top);
    const f = (n: number) => {
        if (!Number.isFinite(n)) {
            throw new RenderFailureError("Chart coordinates are not finite for this dataset");
        }
        return n.toFixed(2);
    };

    const parts: string[] = [];
    parts.push(
        `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
        `<rect x="0" y="0" width="${width}" height="${height}" fill="#ffffff"/>`,
        `<text x="${f(width / 2)}" y="28" text-anchor="middle" font-family="${FONT}" font-size="16" fill="#222222">${escapeXml(request.title)}</text>`
    );

    // grid + ticks
    for (const t of yTicks(yd)) {
        const y = f(sy(t));
        parts.push(
            `<line x1="${left}" y1="${y}" x2="${right}" y2="${y}" stroke="#000000" stroke-opacity="0.1"/>`,
            `<text x="${left - 6}" y="${y}" dy="4" text-anchor="end" font-family="${FONT}" font-size="11" fill="#444444">${formatTick(t)}</text>`
        );
    }
    for (const t of xTicks(xd)) {
        const x = f(sx(t));
        parts.push(
            `<line x1="${x}" y1="${top}" x2="${x}" y2="${bottom}" stroke="#000000" stroke-opacity="0.1"/>`,
            `<text x="${x}" y="${bottom + 16}" text-anchor="middle" font-family="${FONT}" font-size="11" fill="#444444">${t}</text>`
        );
    }

    parts.push(
        `<rect x="${left}" y="${top}" width="${right - left}" height="${bottom - top}" fill="none" stroke="#333333"/>`,
        `<text x="${f((left + right) / 2)}" y="${height - 14}" text-anchor="middle" font-family="${FONT}" font-size="12" fill="#222222">Sample</text>`,
        `<text x="16" y="${f((top + bottom) / 2)}" text-anchor="middle" transform="rotate(-90 16 ${f((top + bottom) / 2)})" font-family="${FONT}" font-size="12" fill="#222222">Value</text>`
    );

    if (!samples.length) {
        parts.push(
            `<text x="${f((left + right) / 2)}" y="${f((top + bottom) / 2)}" text-anchor="middle" font-family="${FONT}" font-size="13" fill="#888888">No data</text>`
        );
    }

    const series = groupByLabel(samples);
    series.forEach(({ label, points }, i) => {
        const color = PALETTE[i % PALETTE.length];
        const coords = points.map((p) => ({ x: f(sx(p.sequence_index)), y: f(sy(p.value)) }));
        parts.push(
            `<polyline points="${coords.map((c) => `${c.x},${c.y}`).join(" ")}" fill="none" stroke="${color}" stroke-width="2"/>`
        );
        for (const c of coords) {
            parts.push(`<circle cx="${c.x}" cy="${c.y}" r="3" fill="${color}"/>`);
        }
        // legend
        const ly = top + 14 + i * 16;
        const name = label === "" ? "(unlabeled)" : label.replace(CONTROL_CHARS_ALL, " ");
        parts.push(
            `<line x1="${right - 130}" y1="${ly}" x2="${right - 112}" y2="${ly}" stroke="${color}" stroke-width="2"/>`,
            `<text x="${right - 106}" y="${ly}" dy="4" font-family="${FONT}" font-size="11" fill="#222222">${escapeXml(name.slice(0, 18))}</text>`
        );
    });

    parts.push("</svg>");
    return parts.join("\n");
}

export function createChartRenderer(rasterize: Rasterize = rasterizeWithSharp): ChartRenderer {
    async function render(dataset: Dataset, request: ChartRequest): Promise<Buffer> {
        const svg = buildLineChartSvg(dataset, request);
        let png: Buffer;
        try {
            png = await rasterize(svg);
        } catch (err) {
            throw new RenderFailureError(`Chart rasterization failed: ${errorMessage(err)}`, err);
        }
        if (!png.length) {
            throw new RenderFailureError("Chart rasterization produced no bytes");
        }
        return png;
    }
    return { render };
}
