/**
 * Error Taxonomy
 *
 * All failures raised inside the extraction layer are instances of
 * `ExtractionError` and carry a stable `code`, so callers can branch on the
 * kind of failure without matching message strings.
 *
 * | Code               | Retryable | Raised when                                   |
 * |--------------------|-----------|-----------------------------------------------|
 * | `API_KEY_MISSING`  | no        | No model credentials were configured          |
 * | `SCHEMA_MISMATCH`  | no        | The model answered with something off-schema  |
 * | `RATE_LIMITED`     | yes       | Provider returned 429                         |
 * | `TIMEOUT`          | yes       | The call was aborted by its timeout           |
 * | `TRANSIENT`        | yes       | 408 / 5xx / connection reset                  |
 * | `CONFIG_INVALID`   | no        | Environment could not be parsed               |
 * | `UNKNOWN`          | no        | Anything else                                 |
 *
 * @module errors
 */

import { APICallError, NoObjectGeneratedError, TypeValidationError } from "ai";

export type ExtractionErrorCode =
    | "API_KEY_MISSING"
    | "SCHEMA_MISMATCH"
    | "RATE_LIMITED"
    | "TIMEOUT"
    | "TRANSIENT"
    | "CONFIG_INVALID"
    | "UNKNOWN";

export class ExtractionError extends Error {
    readonly code: ExtractionErrorCode;
    readonly retryable: boolean;

    constructor(message: string, code: ExtractionErrorCode = "UNKNOWN", options: { retryable?: boolean; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = "ExtractionError";
        this.code = code;
        this.retryable = options.retryable ?? false;
    }
}

export class ApiKeyError extends ExtractionError {
    constructor(message: string) {
        super(message, "API_KEY_MISSING");
        this.name = "ApiKeyError";
    }
}

export class SchemaValidationError extends ExtractionError {
    constructor(message: string, cause?: unknown) {
        super(message, "SCHEMA_MISMATCH", { cause });
        this.name = "SchemaValidationError";
    }
}

export class RateLimitError extends ExtractionError {
    constructor(message: string, cause?: unknown) {
        super(message, "RATE_LIMITED", { retryable: true, cause });
        this.name = "RateLimitError";
    }
}

export class TimeoutError extends ExtractionError {
    constructor(message: string, cause?: unknown) {
        super(message, "TIMEOUT", { retryable: true, cause });
        this.name = "TimeoutError";
    }
}

export class ConfigError extends ExtractionError {
    constructor(message: string) {
        super(message, "CONFIG_INVALID");
        this.name = "ConfigError";
    }
}

const RETRYABLE_NETWORK_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EAI_AGAIN", "EPIPE"]);

function networkCode(error: unknown): string | undefined {
    if (typeof error === "object" && error !== null && "code" in error) {
        const code = error.code;
        return typeof code === "string" ? code : undefined;
    }
    return undefined;
}

function prefixed(context: string | undefined, message: string): string {
    return context ? `${context}: ${message}` : message;
}

/**
 * Normalize anything thrown by the AI SDK, fetch, or our own code into an
 * `ExtractionError`. Already-wrapped errors pass through untouched.
 */
export function wrapError(error: unknown, context?: string): ExtractionError {
    if (error instanceof ExtractionError) {
        return error;
    }

    if (APICallError.isInstance(error)) {
        const status = error.statusCode;
        const message = prefixed(context, error.message);
        if (status === 429) {
            return new RateLimitError(message, error);
        }
        if (status === 401 || status === 403) {
            return new ExtractionError(message, "API_KEY_MISSING", { cause: error });
        }
        const transient = error.isRetryable || status === 408 || (status !== undefined && status >= 500);
        return new ExtractionError(message, transient ? "TRANSIENT" : "UNKNOWN", {
            retryable: transient,
            cause: error,
        });
    }

    if (NoObjectGeneratedError.isInstance(error) || TypeValidationError.isInstance(error)) {
        return new SchemaValidationError(prefixed(context, error.message), error);
    }

    if (error instanceof Error) {
        if (error.name === "TimeoutError" || error.name === "AbortError") {
            return new TimeoutError(prefixed(context, "Model call timed out"), error);
        }
        const code = networkCode(error);
        if (code && RETRYABLE_NETWORK_CODES.has(code)) {
            return new ExtractionError(prefixed(context, error.message), "TRANSIENT", {
                retryable: true,
                cause: error,
            });
        }
        return new ExtractionError(prefixed(context, error.message), "UNKNOWN", { cause: error });
    }

    return new ExtractionError(prefixed(context, String(error)), "UNKNOWN", { cause: error });
}

export function isRetryableError(error: unknown): boolean {
    return wrapError(error).retryable;
}
