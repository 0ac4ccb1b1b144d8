import type { ErrorCode } from "../utils/errors";

export type JsonResult = {
    kind: "json";
    data: unknown;
};

export type ImageResult = {
    kind: "image";
    data: Buffer;
    mimeType: "image/png";
};

export type ErrorResult = {
    kind: "error";
    code: ErrorCode | "UNKNOWN_TOOL" | "INTERNAL";
    message: string;
};

export type ToolResult = JsonResult | ImageResult | ErrorResult;

export const jsonResult = (data: unknown): JsonResult => ({ kind: "json", data });

export const imageResult = (data: Buffer): ImageResult => ({
    kind: "image",
    data,
    mimeType: "image/png"
});
