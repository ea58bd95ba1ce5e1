import type { Response } from "express";
import type { FieldErrorsT } from "@discbase/entity-contract";

export interface RouteErrorExtras {
    fieldErrors?: FieldErrorsT;
    issues?: unknown[];
    [key: string]: unknown;
}

/** Sends `{ error, ...extras }`, dropping extras that are all undefined. */
export const sendRouteError = (
    res: Response,
    statusCode: number,
    message: string,
    extras?: RouteErrorExtras
): Response => {
    const defined = Object.entries(extras ?? {}).filter(
        ([, value]) => value !== undefined
    );
    if (defined.length === 0) {
        return res.status(statusCode).json({ error: message });
    }

    return res.status(statusCode).json({
        error: message,
        ...Object.fromEntries(defined),
    });
};
