import type { NextFunction, Request, Response } from "express";
import request from "supertest";

const AUTH_HEADER = "x-test-auth";
const AUTH_VALUE = "ok";

jest.mock("../../middleware/auth", () => ({
    requireAuth: (req: Request, res: Response, next: NextFunction) => {
        if (req.header(AUTH_HEADER) !== AUTH_VALUE) {
            return res.status(401).json({ error: "Not authenticated" });
        }
        req.editor = { id: 7, name: "test-editor" };
        req.requestId = "req-test";
        next();
    },
    requestContext: (req: Request) =>
        req.editor
            ? { requestId: req.requestId ?? "req-missing", editor: req.editor }
            : null,
}));

jest.mock("../../middleware/rateLimiter", () => ({
    editLimiter: (_req: Request, _res: Response, next: NextFunction) => next(),
}));

jest.mock("../../utils/logger", () => {
    const mockLogger = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        child: jest.fn(),
    };
    mockLogger.child.mockReturnValue(mockLogger);
    return { logger: mockLogger };
});

jest.mock("../../config", () => ({
    config: { nodeEnv: "test" },
}));

jest.mock("../../utils/db", () => ({
    db: {},
}));

jest.mock("../../services/releaseMerge", () => ({
    releaseMergeService: {
        prepareForm: jest.fn(),
        submit: jest.fn(),
    },
}));

jest.mock("../../services/releaseRepository", () => ({
    releaseRepository: {
        findById: jest.fn(),
        findByGid: jest.fn(),
    },
}));

jest.mock("../../services/releaseQuality", () => ({
    ...jest.requireActual("../../services/releaseQuality"),
    releaseQualityService: {
        changeQuality: jest.fn(),
    },
}));

import { MERGE_STRATEGY, type ReleaseMergeFormT } from "@discbase/entity-contract";
import { toReleaseJson } from "../../services/releaseContracts";
import { releaseMergeService } from "../../services/releaseMerge";
import {
    recording,
    release,
} from "../../services/releaseMerge/__tests__/helpers/releaseFixtures";
import { releaseQualityService } from "../../services/releaseQuality";
import { releaseRepository } from "../../services/releaseRepository";
import { releaseNotFound } from "../../utils/errors";
import router, { parseReleaseReference } from "../releases";
import { createRouteTestApp } from "./helpers/createRouteTestApp";

const app = createRouteTestApp("/api/releases", router);

const editor = { id: 7, name: "test-editor" };
const ctx = { requestId: "req-test", editor };

const createdEdit = (type: number) => ({
    id: 12,
    type,
    status: 1,
    editorId: 7,
    openTime: new Date("2026-01-01T00:00:00.000Z"),
});

const emptyForm: ReleaseMergeFormT = {
    merging: [1, 2],
    target: 1,
    mergeStrategy: MERGE_STRATEGY.APPEND,
    releases: [],
    mediums: [],
    mediumsByRelease: [],
    badRecordingMerges: [],
    recordingMerges: [],
};

describe("releases routes integration", () => {
    const mockPrepareForm = releaseMergeService.prepareForm as jest.Mock;
    const mockSubmit = releaseMergeService.submit as jest.Mock;
    const mockFindById = releaseRepository.findById as jest.Mock;
    const mockFindByGid = releaseRepository.findByGid as jest.Mock;
    const mockChangeQuality = releaseQualityService.changeQuality as jest.Mock;

    beforeEach(() => {
        jest.clearAllMocks();
    });

    describe("GET /api/releases/merge", () => {
        it("requires auth", async () => {
            const res = await request(app).get("/api/releases/merge?ids=1,2");

            expect(res.status).toBe(401);
            expect(res.body).toEqual({ error: "Not authenticated" });
            expect(mockPrepareForm).not.toHaveBeenCalled();
        });

        it("returns the merge form for the selected releases", async () => {
            mockPrepareForm.mockResolvedValueOnce(emptyForm);

            const res = await request(app)
                .get("/api/releases/merge?ids=1,2&target=2")
                .set(AUTH_HEADER, AUTH_VALUE);

            expect(res.status).toBe(200);
            expect(res.body).toEqual(emptyForm);
            expect(mockPrepareForm).toHaveBeenCalledWith(ctx, [1, 2], 2);
        });

        it("rejects fewer than two releases", async () => {
            const res = await request(app)
                .get("/api/releases/merge?ids=1")
                .set(AUTH_HEADER, AUTH_VALUE);

            expect(res.status).toBe(400);
            expect(res.body.error).toBe("Invalid merge request");
            expect(res.body.issues[0].message).toBe(
                "Select at least two releases to merge"
            );
            expect(mockPrepareForm).not.toHaveBeenCalled();
        });
    });

    describe("POST /api/releases/merge", () => {
        const submission = {
            merging: [1, 2],
            target: 1,
            mergeStrategy: "append",
            mediumPositions: [
                { id: 11, releaseId: 1, position: 1 },
                { id: 21, releaseId: 2, position: 2 },
            ],
        };

        it("validates the body before reaching the service", async () => {
            const res = await request(app)
                .post("/api/releases/merge")
                .set(AUTH_HEADER, AUTH_VALUE)
                .send({ merging: [1], target: 1, mergeStrategy: "append" });

            expect(res.status).toBe(400);
            expect(res.body.error).toBe("Invalid merge submission");
            expect(res.body.issues[0]).toEqual(
                expect.objectContaining({
                    path: ["merging"],
                    message: "Select at least two releases to merge",
                })
            );
            expect(mockSubmit).not.toHaveBeenCalled();
        });

        it("passes the normalized submission to the service", async () => {
            mockSubmit.mockResolvedValueOnce({
                state: "created",
                edit: createdEdit(225),
                directive: {},
                redirect: "/release/00000000-0000-4000-a000-000000000001",
            });

            const res = await request(app)
                .post("/api/releases/merge")
                .set(AUTH_HEADER, AUTH_VALUE)
                .send(submission);

            expect(res.status).toBe(201);
            expect(res.body).toEqual({
                edit: {
                    id: 12,
                    type: 225,
                    status: 1,
                    editorId: 7,
                    openTime: "2026-01-01T00:00:00.000Z",
                },
                redirect: "/release/00000000-0000-4000-a000-000000000001",
            });
            expect(mockSubmit).toHaveBeenCalledWith(ctx, {
                merging: [1, 2],
                target: 1,
                mergeStrategy: MERGE_STRATEGY.APPEND,
                mediumPositions: [
                    { id: 11, releaseId: 1, position: 1, name: "" },
                    { id: 21, releaseId: 2, position: 2, name: "" },
                ],
                confirmBadRecordingMerges: false,
            });
        });

        it("returns field errors and the form when the submission is rejected", async () => {
            const fieldErrors = {
                mergeStrategy: [
                    "This merge strategy is not applicable to the releases you have selected.",
                ],
            };
            mockSubmit.mockResolvedValueOnce({
                state: "rejected",
                fieldErrors,
                form: emptyForm,
            });

            const res = await request(app)
                .post("/api/releases/merge")
                .set(AUTH_HEADER, AUTH_VALUE)
                .send(submission);

            expect(res.status).toBe(400);
            expect(res.body).toEqual({
                error: "Merge submission rejected",
                fieldErrors,
                form: emptyForm,
            });
        });

        it("maps a missing release to 404", async () => {
            mockSubmit.mockRejectedValueOnce(releaseNotFound(2));

            const res = await request(app)
                .post("/api/releases/merge")
                .set(AUTH_HEADER, AUTH_VALUE)
                .send(submission);

            expect(res.status).toBe(404);
            expect(res.body).toEqual({
                error: "Release not found: 2",
                code: "RELEASE_NOT_FOUND",
                category: "NOT_FOUND",
                requestId: "req-test",
            });
        });
    });

    describe("GET /api/releases/:idOrGid", () => {
        const fixture = release({
            id: 5,
            mediums: [{ id: 51, position: 1, recordings: [recording(501)] }],
        });

        it("returns a release by id", async () => {
            mockFindById.mockResolvedValueOnce(fixture);

            const res = await request(app).get("/api/releases/5");

            expect(res.status).toBe(200);
            expect(res.body).toEqual(toReleaseJson(fixture));
            expect(res.body.combinedFormatName).toBe("CD");
            expect(mockFindById).toHaveBeenCalledWith(5);
        });

        it("looks up a release by lowercased gid", async () => {
            mockFindByGid.mockResolvedValueOnce(fixture);

            const res = await request(app).get(
                "/api/releases/00000000-0000-4000-A000-000000000005"
            );

            expect(res.status).toBe(200);
            expect(mockFindByGid).toHaveBeenCalledWith(
                "00000000-0000-4000-a000-000000000005"
            );
        });

        it("returns 404 for an unknown release", async () => {
            mockFindById.mockResolvedValueOnce(null);

            const res = await request(app).get("/api/releases/99");

            expect(res.status).toBe(404);
            expect(res.body).toEqual({
                error: "Release not found: 99",
                code: "RELEASE_NOT_FOUND",
                category: "NOT_FOUND",
            });
        });

        it("rejects references that are neither ids nor gids", async () => {
            const res = await request(app).get("/api/releases/not-a-release");

            expect(res.status).toBe(400);
            expect(res.body).toEqual({ error: "Invalid release id or gid" });
            expect(mockFindById).not.toHaveBeenCalled();
            expect(mockFindByGid).not.toHaveBeenCalled();
        });
    });

    describe("POST /api/releases/:idOrGid/change-quality", () => {
        const fixture = release({ id: 5 });

        it("creates a change quality edit", async () => {
            mockFindById.mockResolvedValueOnce(fixture);
            mockChangeQuality.mockResolvedValueOnce({
                state: "created",
                edit: createdEdit(263),
                redirect: `/release/${fixture.gid}`,
            });

            const res = await request(app)
                .post("/api/releases/5/change-quality")
                .set(AUTH_HEADER, AUTH_VALUE)
                .send({ quality: 1, editNote: "Tracklist checked" });

            expect(res.status).toBe(201);
            expect(res.body.edit.type).toBe(263);
            expect(res.body.redirect).toBe(
                "/release/00000000-0000-4000-a000-000000000005"
            );
            expect(mockChangeQuality).toHaveBeenCalledWith(ctx, fixture, {
                quality: 1,
                editNote: "Tracklist checked",
            });
        });

        it("returns field errors for an unchanged quality", async () => {
            const fieldErrors = {
                quality: ["The release already has normal data quality."],
            };
            mockFindById.mockResolvedValueOnce(fixture);
            mockChangeQuality.mockResolvedValueOnce({ state: "rejected", fieldErrors });

            const res = await request(app)
                .post("/api/releases/5/change-quality")
                .set(AUTH_HEADER, AUTH_VALUE)
                .send({ quality: 1 });

            expect(res.status).toBe(400);
            expect(res.body).toEqual({
                error: "Quality change rejected",
                fieldErrors,
            });
        });

        it("rejects an unknown quality value", async () => {
            const res = await request(app)
                .post("/api/releases/5/change-quality")
                .set(AUTH_HEADER, AUTH_VALUE)
                .send({ quality: 5 });

            expect(res.status).toBe(400);
            expect(res.body.error).toBe("Invalid quality change");
            expect(mockFindById).not.toHaveBeenCalled();
        });

        it("requires auth", async () => {
            const res = await request(app)
                .post("/api/releases/5/change-quality")
                .send({ quality: 1 });

            expect(res.status).toBe(401);
            expect(mockChangeQuality).not.toHaveBeenCalled();
        });
    });
});

describe("parseReleaseReference", () => {
    it("reads positive integer ids", () => {
        expect(parseReleaseReference("42")).toEqual({ kind: "id", id: 42 });
        expect(parseReleaseReference("0")).toBeNull();
    });

    it("reads gids case-insensitively", () => {
        expect(
            parseReleaseReference("ABCDEF00-0000-4000-A000-000000000001")
        ).toEqual({ kind: "gid", gid: "abcdef00-0000-4000-a000-000000000001" });
    });

    it("rejects anything else", () => {
        expect(parseReleaseReference("release-1")).toBeNull();
        expect(parseReleaseReference("")).toBeNull();
    });
});
