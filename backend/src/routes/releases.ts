import { Router, type Request } from "express";
import { requestContext, requireAuth } from "../middleware/auth";
import { editLimiter } from "../middleware/rateLimiter";
import { toEditJson } from "../services/editService";
import { toReleaseJson, type ReleaseAggregate } from "../services/releaseContracts";
import { releaseMergeService } from "../services/releaseMerge";
import {
    mergeFormQuerySchema,
    parseMergeSubmission,
} from "../services/releaseMerge/mergeForm";
import {
    changeQualitySchema,
    releaseQualityService,
} from "../services/releaseQuality";
import { releaseRepository } from "../services/releaseRepository";
import { releaseNotFound } from "../utils/errors";
import { logger } from "../utils/logger";
import { sendRouteError } from "./routeErrorResponse";

const router = Router();
const log = logger.child("Releases");

const GID_PATTERN =
    /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

type ReleaseReference =
    | { kind: "id"; id: number }
    | { kind: "gid"; gid: string };

export function parseReleaseReference(value: string): ReleaseReference | null {
    if (/^\d+$/.test(value)) {
        const id = Number(value);
        return Number.isSafeInteger(id) && id > 0 ? { kind: "id", id } : null;
    }
    if (GID_PATTERN.test(value)) {
        return { kind: "gid", gid: value.toLowerCase() };
    }
    return null;
}

async function loadReleaseByReference(
    reference: ReleaseReference
): Promise<ReleaseAggregate> {
    const release =
        reference.kind === "id"
            ? await releaseRepository.findById(reference.id)
            : await releaseRepository.findByGid(reference.gid);
    if (!release) {
        throw releaseNotFound(reference.kind === "id" ? reference.id : reference.gid);
    }
    return release;
}

function contextOrNull(req: Request) {
    const ctx = requestContext(req);
    if (!ctx) {
        log.warn("Authenticated route reached without an editor");
    }
    return ctx;
}

/**
 * @openapi
 * /api/releases/merge:
 *   get:
 *     summary: Build the release merge form
 *     tags: [Releases]
 *     security:
 *       - bearerAuth: []
 *       - apiKeyAuth: []
 *     parameters:
 *       - in: query
 *         name: ids
 *         required: true
 *         schema:
 *           type: string
 *         description: Comma-separated release ids, at least two
 *         example: "1,2"
 *       - in: query
 *         name: target
 *         schema:
 *           type: integer
 *         description: Release that survives the merge (defaults to the first id)
 *     responses:
 *       200:
 *         description: Merge form view model
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ReleaseMergeForm'
 *       400:
 *         description: Invalid query
 *       404:
 *         description: A release does not exist
 */
router.get("/merge", requireAuth, async (req, res, next) => {
    const query = mergeFormQuerySchema.safeParse(req.query);
    if (!query.success) {
        return sendRouteError(res, 400, "Invalid merge request", {
            issues: query.error.issues,
        });
    }

    const ctx = contextOrNull(req);
    if (!ctx) {
        return sendRouteError(res, 401, "Not authenticated");
    }

    try {
        const form = await releaseMergeService.prepareForm(
            ctx,
            query.data.ids,
            query.data.target
        );
        res.json(form);
    } catch (error) {
        next(error);
    }
});

/**
 * @openapi
 * /api/releases/merge:
 *   post:
 *     summary: Submit a release merge edit
 *     tags: [Releases]
 *     security:
 *       - bearerAuth: []
 *       - apiKeyAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/ReleaseMergeSubmission'
 *     responses:
 *       201:
 *         description: Merge edit created
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 edit:
 *                   $ref: '#/components/schemas/Edit'
 *                 redirect:
 *                   type: string
 *                   example: "/release/0b6f1e2a-1a7c-4c1e-9a41-1f2d6b7c8d90"
 *       400:
 *         description: Malformed body, or the submission was rejected with field errors
 *       401:
 *         description: Not authenticated
 *       404:
 *         description: A release does not exist
 */
router.post("/merge", requireAuth, editLimiter, async (req, res, next) => {
    const parsed = parseMergeSubmission(req.body);
    if (!parsed.success) {
        return sendRouteError(res, 400, "Invalid merge submission", {
            issues: parsed.issues,
        });
    }

    const ctx = contextOrNull(req);
    if (!ctx) {
        return sendRouteError(res, 401, "Not authenticated");
    }

    try {
        const result = await releaseMergeService.submit(ctx, parsed.data);
        if (result.state === "rejected") {
            return sendRouteError(res, 400, "Merge submission rejected", {
                fieldErrors: result.fieldErrors,
                form: result.form,
            });
        }

        res.status(201).json({
            edit: toEditJson(result.edit),
            redirect: result.redirect,
        });
    } catch (error) {
        next(error);
    }
});

/**
 * @openapi
 * /api/releases/{idOrGid}:
 *   get:
 *     summary: Get a release with its mediums, tracks and recordings
 *     tags: [Releases]
 *     security: []
 *     parameters:
 *       - in: path
 *         name: idOrGid
 *         required: true
 *         schema:
 *           type: string
 *         description: Numeric release id or release gid
 *     responses:
 *       200:
 *         description: Release
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/Release'
 *       400:
 *         description: Not a release id or gid
 *       404:
 *         description: Release not found
 */
router.get("/:idOrGid", async (req, res, next) => {
    const reference = parseReleaseReference(req.params.idOrGid);
    if (!reference) {
        return sendRouteError(res, 400, "Invalid release id or gid");
    }

    try {
        const release = await loadReleaseByReference(reference);
        res.json(toReleaseJson(release));
    } catch (error) {
        next(error);
    }
});

/**
 * @openapi
 * /api/releases/{idOrGid}/change-quality:
 *   post:
 *     summary: Submit a change of a release's data quality
 *     tags: [Releases]
 *     security:
 *       - bearerAuth: []
 *       - apiKeyAuth: []
 *     parameters:
 *       - in: path
 *         name: idOrGid
 *         required: true
 *         schema:
 *           type: string
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - quality
 *             properties:
 *               quality:
 *                 type: integer
 *                 enum: [-1, 0, 1, 2]
 *               editNote:
 *                 type: string
 *     responses:
 *       201:
 *         description: Change quality edit created
 *       400:
 *         description: Invalid body or unchanged quality
 *       401:
 *         description: Not authenticated
 *       404:
 *         description: Release not found
 */
router.post(
    "/:idOrGid/change-quality",
    requireAuth,
    editLimiter,
    async (req, res, next) => {
        const reference = parseReleaseReference(req.params.idOrGid);
        if (!reference) {
            return sendRouteError(res, 400, "Invalid release id or gid");
        }

        const input = changeQualitySchema.safeParse(req.body);
        if (!input.success) {
            return sendRouteError(res, 400, "Invalid quality change", {
                issues: input.error.issues,
            });
        }

        const ctx = contextOrNull(req);
        if (!ctx) {
            return sendRouteError(res, 401, "Not authenticated");
        }

        try {
            const release = await loadReleaseByReference(reference);
            const result = await releaseQualityService.changeQuality(
                ctx,
                release,
                input.data
            );
            if (result.state === "rejected") {
                return sendRouteError(res, 400, "Quality change rejected", {
                    fieldErrors: result.fieldErrors,
                });
            }

            res.status(201).json({
                edit: toEditJson(result.edit),
                redirect: result.redirect,
            });
        } catch (error) {
            next(error);
        }
    }
);

export default router;
