import type { NextFunction, Request, Response } from "express";

jest.mock("../../utils/logger", () => ({
    logger: {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    },
}));

jest.mock("../../config", () => ({
    config: { jwtSecret: "test-secret-test-secret-test-secret" },
}));

const mockApiKeyWhere = jest.fn().mockResolvedValue(undefined);

jest.mock("../../utils/db", () => ({
    db: {
        query: {
            apiKeys: { findFirst: jest.fn() },
            editors: { findFirst: jest.fn() },
        },
        update: jest.fn(() => ({
            set: () => ({ where: mockApiKeyWhere }),
        })),
    },
}));

jest.mock("jsonwebtoken", () => ({
    sign: jest.fn(),
    verify: jest.fn(),
}));

import jwt from "jsonwebtoken";
import { db } from "../../utils/db";
import {
    assignRequestId,
    generateToken,
    requestContext,
    requireAuth,
} from "../auth";

const mockApiKeyFindFirst = db.query.apiKeys.findFirst as jest.Mock;
const mockEditorFindFirst = db.query.editors.findFirst as jest.Mock;
const mockJwtSign = jwt.sign as jest.Mock;
const mockJwtVerify = jwt.verify as jest.Mock;

function createReq(headers: Record<string, string> = {}) {
    const lowered = Object.fromEntries(
        Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value])
    );
    const req: Partial<Request> = {
        header: ((name: string) => lowered[name.toLowerCase()]) as Request["header"],
    };
    return req as Request;
}

interface MockResponse {
    statusCode: number;
    body: unknown;
    headers: Record<string, string>;
    status: jest.Mock;
    json: jest.Mock;
    setHeader: jest.Mock;
}

function createRes(): MockResponse {
    const res: MockResponse = {
        statusCode: 200,
        body: undefined,
        headers: {},
        status: jest.fn((code: number) => {
            res.statusCode = code;
            return res;
        }),
        json: jest.fn((payload: unknown) => {
            res.body = payload;
            return res;
        }),
        setHeader: jest.fn((name: string, value: string) => {
            res.headers[name] = value;
            return res;
        }),
    };
    return res;
}

describe("auth middleware runtime", () => {
    beforeEach(() => {
        jest.clearAllMocks();
        mockApiKeyFindFirst.mockResolvedValue(undefined);
        mockEditorFindFirst.mockResolvedValue(undefined);
        mockApiKeyWhere.mockResolvedValue(undefined);
        mockJwtSign.mockReturnValue("signed-token");
        mockJwtVerify.mockImplementation(() => {
            throw new Error("invalid token");
        });
    });

    it("generates 24h tokens carrying the editor and tokenVersion", () => {
        const token = generateToken({ id: 7, name: "test-editor", tokenVersion: 2 });

        expect(token).toBe("signed-token");
        expect(mockJwtSign).toHaveBeenCalledWith(
            { editorId: 7, name: "test-editor", tokenVersion: 2 },
            "test-secret-test-secret-test-secret",
            { expiresIn: "24h" }
        );
    });

    it("authenticates with an API key", async () => {
        mockApiKeyFindFirst.mockResolvedValue({
            id: 3,
            editor: { id: 7, name: "test-editor" },
        });
        const req = createReq({ "X-API-Key": "test-api-key" });
        const res = createRes();
        const next: NextFunction = jest.fn();

        await requireAuth(req, res as unknown as Response, next);

        expect(next).toHaveBeenCalledTimes(1);
        expect(req.editor).toEqual({ id: 7, name: "test-editor" });
        expect(mockApiKeyWhere).toHaveBeenCalledTimes(1);
    });

    it("authenticates with a bearer token whose tokenVersion is current", async () => {
        mockJwtVerify.mockReturnValue({ editorId: 7, name: "test-editor", tokenVersion: 2 });
        mockEditorFindFirst.mockResolvedValue({ id: 7, name: "test-editor", tokenVersion: 2 });
        const req = createReq({ Authorization: "Bearer signed-token" });
        const res = createRes();
        const next: NextFunction = jest.fn();

        await requireAuth(req, res as unknown as Response, next);

        expect(mockJwtVerify).toHaveBeenCalledWith(
            "signed-token",
            "test-secret-test-secret-test-secret"
        );
        expect(next).toHaveBeenCalledTimes(1);
        expect(req.editor).toEqual({ id: 7, name: "test-editor" });
    });

    it("rejects revoked and malformed tokens", async () => {
        mockJwtVerify.mockReturnValue({ editorId: 7, name: "test-editor", tokenVersion: 1 });
        mockEditorFindFirst.mockResolvedValue({ id: 7, name: "test-editor", tokenVersion: 2 });
        const revokedRes = createRes();
        const next: NextFunction = jest.fn();

        await requireAuth(
            createReq({ Authorization: "Bearer old-token" }),
            revokedRes as unknown as Response,
            next
        );

        expect(revokedRes.statusCode).toBe(401);
        expect(revokedRes.body).toEqual({ error: "Not authenticated" });

        mockJwtVerify.mockReturnValue({ userId: "not-an-editor" });
        const malformedRes = createRes();
        await requireAuth(
            createReq({ Authorization: "Bearer odd-token" }),
            malformedRes as unknown as Response,
            next
        );

        expect(malformedRes.statusCode).toBe(401);
        expect(next).not.toHaveBeenCalled();
    });

    it("falls back to the bearer token when the API key lookup fails", async () => {
        mockApiKeyFindFirst.mockRejectedValue(new Error("db down"));
        mockJwtVerify.mockReturnValue({ editorId: 8, name: "other", tokenVersion: 0 });
        mockEditorFindFirst.mockResolvedValue({ id: 8, name: "other", tokenVersion: 0 });
        const req = createReq({
            "X-API-Key": "test-api-key",
            Authorization: "Bearer signed-token",
        });
        const next: NextFunction = jest.fn();

        await requireAuth(req, createRes() as unknown as Response, next);

        expect(next).toHaveBeenCalledTimes(1);
        expect(req.editor).toEqual({ id: 8, name: "other" });
    });

    it("returns 401 without credentials", async () => {
        const res = createRes();
        const next: NextFunction = jest.fn();

        await requireAuth(createReq(), res as unknown as Response, next);

        expect(res.statusCode).toBe(401);
        expect(next).not.toHaveBeenCalled();
    });
});

describe("request context", () => {
    it("keeps a caller supplied request id", () => {
        const req = createReq({ "X-Request-Id": "req-123" });
        const res = createRes();
        const next: NextFunction = jest.fn();

        assignRequestId(req, res as unknown as Response, next);

        expect(req.requestId).toBe("req-123");
        expect(res.headers["X-Request-Id"]).toBe("req-123");
        expect(next).toHaveBeenCalledTimes(1);
    });

    it("generates a request id when none is supplied", () => {
        const req = createReq();

        assignRequestId(req, createRes() as unknown as Response, jest.fn());

        expect(req.requestId).toMatch(/^[0-9a-f-]{36}$/);
    });

    it("builds a context only for authenticated requests", () => {
        const req = createReq();
        expect(requestContext(req)).toBeNull();

        req.requestId = "req-1";
        req.editor = { id: 7, name: "test-editor" };
        expect(requestContext(req)).toEqual({
            requestId: "req-1",
            editor: { id: 7, name: "test-editor" },
        });
    });
});
