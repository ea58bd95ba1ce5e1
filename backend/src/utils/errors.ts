/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can fix the request and retry
    NOT_FOUND = "NOT_FOUND",
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",

    // Request errors
    INVALID_REQUEST = "INVALID_REQUEST",
    RELEASE_NOT_FOUND = "RELEASE_NOT_FOUND",

    // Merge planning errors
    MERGE_LOOKUP_FAILED = "MERGE_LOOKUP_FAILED",

    // Edit queue errors
    EDIT_CREATION_FAILED = "EDIT_CREATION_FAILED",

    // Database errors
    DB_CONNECTION_ERROR = "DB_CONNECTION_ERROR",
    DB_QUERY_ERROR = "DB_QUERY_ERROR",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

export function isRecoverable(error: unknown): boolean {
    return (
        error instanceof AppError &&
        error.category === ErrorCategory.RECOVERABLE
    );
}

export function isTransient(error: unknown): boolean {
    return (
        error instanceof AppError && error.category === ErrorCategory.TRANSIENT
    );
}

export function releaseNotFound(reference: number | string): AppError {
    return new AppError(
        ErrorCode.RELEASE_NOT_FOUND,
        ErrorCategory.NOT_FOUND,
        `Release not found: ${reference}`,
        { reference }
    );
}

/**
 * A referenced medium or release disappeared between loading and building
 * merge parameters. Not retried.
 */
export function mergeLookupFailed(
    message: string,
    details: Record<string, unknown>
): AppError {
    return new AppError(
        ErrorCode.MERGE_LOOKUP_FAILED,
        ErrorCategory.FATAL,
        message,
        details
    );
}

/**
 * Wrap a node-postgres error in an AppError
 */
export function wrapDatabaseError(err: unknown, context: string): AppError {
    const message = err instanceof Error ? err.message : String(err);
    const code =
        typeof err === "object" && err !== null && "code" in err
            ? String(err.code)
            : undefined;

    if (
        code === "ECONNREFUSED" ||
        code === "ECONNRESET" ||
        code === "57P01" ||
        code === "53300"
    ) {
        return new AppError(
            ErrorCode.DB_CONNECTION_ERROR,
            ErrorCategory.TRANSIENT,
            `Database unavailable: ${context}`,
            { originalError: message, code }
        );
    }

    return new AppError(
        ErrorCode.DB_QUERY_ERROR,
        ErrorCategory.FATAL,
        `Database query failed: ${context}`,
        { originalError: message, code }
    );
}
