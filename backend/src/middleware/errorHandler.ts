import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory } from "../utils/errors";
import { config } from "../config";
import "../types/express";

function statusForCategory(category: ErrorCategory): number {
    switch (category) {
        case ErrorCategory.RECOVERABLE:
            return 400; // Bad Request - client can retry with changes
        case ErrorCategory.NOT_FOUND:
            return 404;
        case ErrorCategory.TRANSIENT:
            return 503; // Service Unavailable - client can retry later
        case ErrorCategory.FATAL:
            return 500;
    }
}

export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
) {
    if (err instanceof AppError) {
        const statusCode = statusForCategory(err.category);

        if (statusCode >= 500) {
            logger.error(`[AppError] ${err.code}: ${err.message}`, err.details);
        } else {
            logger.warn(`[AppError] ${err.code}: ${err.message}`, err.details);
        }

        return res.status(statusCode).json({
            error: err.message,
            code: err.code,
            category: err.category,
            ...(req.requestId && { requestId: req.requestId }),
            ...(config.nodeEnv === "development" && { details: err.details }),
        });
    }

    logger.error("Unhandled error:", err.stack);

    // In production, hide stack traces and internal details
    if (config.nodeEnv === "production") {
        return res.status(500).json({ error: "Internal server error" });
    }

    res.status(500).json({
        error: err.message || "Internal server error",
        stack: err.stack,
    });
}
