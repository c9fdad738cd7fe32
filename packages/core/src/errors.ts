/**
 * Stable error codes surfaced by the session jar and its adapters.
 */
export type ErrorCode =
    | "NOT_FOUND"
    | "NO_COOKIE"
    | "EMPTY_SESSION_ID"
    | "INVALID_SIGNATURE"
    | "SESSION_EXPIRED"
    | "MALFORMED_PAYLOAD"
    | "ENCODE_FAILED"
    | "INVALID_OPTIONS";

/**
 * Canonical error type used across sessionjar packages.
 *
 * Errors raised by a {@link Store} backend are not wrapped in this type;
 * they reach the caller unchanged.
 */
export class SessionJarError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message, { cause });
        this.name = "SessionJarError";
        this.details = details;
    }
}

/**
 * JSON-safe error response shape for HTTP handlers.
 */
export type ErrorBody = {
    error: {
        code: ErrorCode;
        message: string;
    };
};

/**
 * Logger contract used by sessionjar core for optional diagnostics.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

/**
 * Creates a normalized error response body.
 */
export function defaultErrorBody(code: ErrorCode, message: string): ErrorBody {
    return { error: { code, message } };
}

/**
 * Type guard for {@link SessionJarError}.
 */
export function isSessionJarError(error: unknown): error is SessionJarError {
    return error instanceof SessionJarError;
}

export type ErrorStatus = 401 | 500;

/**
 * Maps {@link ErrorCode} to an HTTP status code. Codes meaning "the client
 * holds no usable session" map to 401 so handlers can take the
 * unauthenticated path.
 */
export function statusFromErrorCode(code: ErrorCode): ErrorStatus {
    switch (code) {
        case "NOT_FOUND":
        case "NO_COOKIE":
        case "EMPTY_SESSION_ID":
        case "INVALID_SIGNATURE":
        case "SESSION_EXPIRED":
            return 401;
        case "MALFORMED_PAYLOAD":
        case "ENCODE_FAILED":
        case "INVALID_OPTIONS":
        default:
            return 500;
    }
}
