import { randomUUID } from "crypto";
import { Request, Response, NextFunction } from "express";
import { eq } from "drizzle-orm";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { config } from "../config";
import { apiKeys, editors } from "../db/schema";
import type { EditorIdentity, RequestContext } from "../services/requestContext";
import { db } from "../utils/db";
import { logger } from "../utils/logger";
import "../types/express";

const jwtPayloadSchema = z.object({
    editorId: z.number().int().positive(),
    name: z.string(),
    tokenVersion: z.number().int().optional(),
});

export type JWTPayload = z.infer<typeof jwtPayloadSchema>;

export function generateToken(editor: {
    id: number;
    name: string;
    tokenVersion: number;
}): string {
    const payload: JWTPayload = {
        editorId: editor.id,
        name: editor.name,
        tokenVersion: editor.tokenVersion,
    };
    return jwt.sign(payload, config.jwtSecret, { expiresIn: "24h" });
}

async function authenticateApiKey(key: string): Promise<EditorIdentity | null> {
    const record = await db.query.apiKeys.findFirst({
        where: eq(apiKeys.key, key),
        columns: { id: true },
        with: { editor: { columns: { id: true, name: true } } },
    });
    if (!record) {
        return null;
    }

    db.update(apiKeys)
        .set({ lastUsed: new Date() })
        .where(eq(apiKeys.id, record.id))
        .catch((error: unknown) => {
            logger.warn("[Auth] Failed to record API key use:", error);
        });

    return record.editor;
}

async function authenticateBearer(token: string): Promise<EditorIdentity | null> {
    let payload: JWTPayload;
    try {
        const parsed = jwtPayloadSchema.safeParse(jwt.verify(token, config.jwtSecret));
        if (!parsed.success) {
            return null;
        }
        payload = parsed.data;
    } catch (error) {
        logger.debug("[Auth] Rejected bearer token:", error);
        return null;
    }

    const editor = await db.query.editors.findFirst({
        where: eq(editors.id, payload.editorId),
        columns: { id: true, name: true, tokenVersion: true },
    });
    // A bumped tokenVersion revokes every token issued before it
    if (!editor || payload.tokenVersion !== editor.tokenVersion) {
        return null;
    }
    return { id: editor.id, name: editor.name };
}

/**
 * Resolves the editor behind an X-API-Key header or a Bearer token.
 */
async function authenticateRequest(req: Request): Promise<EditorIdentity | null> {
    const apiKey = req.header("x-api-key");
    if (apiKey) {
        try {
            const editor = await authenticateApiKey(apiKey);
            if (editor) return editor;
        } catch (error) {
            logger.error("API key auth error:", error);
        }
    }

    const authHeader = req.header("authorization");
    const token = authHeader?.startsWith("Bearer ")
        ? authHeader.substring(7)
        : null;

    if (token) {
        try {
            return await authenticateBearer(token);
        } catch (error) {
            logger.error("Token auth error:", error);
        }
    }

    return null;
}

export function assignRequestId(req: Request, res: Response, next: NextFunction) {
    const incoming = req.header("x-request-id");
    req.requestId = incoming && incoming.length <= 128 ? incoming : randomUUID();
    res.setHeader("X-Request-Id", req.requestId);
    next();
}

export async function requireAuth(
    req: Request,
    res: Response,
    next: NextFunction
) {
    const editor = await authenticateRequest(req);
    if (editor) {
        req.editor = editor;
        return next();
    }
    return res.status(401).json({ error: "Not authenticated" });
}

/** Builds the explicit context for a request that passed `requireAuth`. */
export function requestContext(req: Request): RequestContext | null {
    if (!req.editor) {
        return null;
    }
    return {
        requestId: req.requestId ?? randomUUID(),
        editor: req.editor,
    };
}
