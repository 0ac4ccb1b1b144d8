export type ErrorCode = "INVALID_ARGUMENT" | "STORE_UNAVAILABLE" | "RENDER_FAILURE";

export class VizError extends Error {
    constructor(
        readonly code: ErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Malformed or out-of-range tool input. Raised before any store access. */
export class InvalidArgumentError extends VizError {
    constructor(message: string) {
        super("INVALID_ARGUMENT", message);
    }
}

/** The state backend could not be read or written. */
export class StoreUnavailableError extends VizError {
    constructor(message: string, cause?: unknown) {
        super("STORE_UNAVAILABLE", message, { cause });
    }
}

export class RenderFailureError extends VizError {
    constructor(message: string, cause?: unknown) {
        super("RENDER_FAILURE", message, { cause });
    }
}

/** Required environment variable missing or invalid. */
export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join("; ")}`);
        this.name = "ConfigError";
    }
}

export const errorMessage = (err: unknown): string =>
    err instanceof Error ? err.message : String(err);
