import { z } from "zod";
import {
    EDIT_TYPE,
    RELEASE_QUALITY_VALUES,
    type FieldErrorsT,
    type ReleaseQuality,
} from "@discbase/entity-contract";
import { db } from "../utils/db";
import { l } from "../utils/i18n";
import {
    DrizzleEditUnitOfWork,
    insertEdit,
    type CreatedEdit,
    type EditUnitOfWork,
} from "./editService";
import type { ReleaseAggregate } from "./releaseContracts";
import type { RequestContext } from "./requestContext";

function qualityName(quality: ReleaseQuality): string {
    switch (quality) {
        case 0:
            return "low";
        case 1:
            return "normal";
        case 2:
            return "high";
        default:
            return "unknown";
    }
}

export const changeQualitySchema = z.object({
    quality: z.coerce
        .number()
        .int()
        .refine(
            (value): value is ReleaseQuality =>
                RELEASE_QUALITY_VALUES.some((quality) => quality === value),
            { message: "Quality must be one of -1, 0, 1 or 2" }
        ),
    editNote: z.string().trim().max(10_000).optional(),
});

export type ChangeQualityInput = z.infer<typeof changeQualitySchema>;

export type ChangeQualityResult =
    | { state: "rejected"; fieldErrors: FieldErrorsT }
    | { state: "created"; edit: CreatedEdit; redirect: string };

export class ReleaseQualityService {
    constructor(private readonly edits: EditUnitOfWork) {}

    async changeQuality(
        ctx: RequestContext,
        release: ReleaseAggregate,
        input: ChangeQualityInput
    ): Promise<ChangeQualityResult> {
        if (input.quality === release.quality) {
            return {
                state: "rejected",
                fieldErrors: {
                    quality: [
                        l("The release already has {quality} data quality.", {
                            quality: qualityName(input.quality),
                        }),
                    ],
                },
            };
        }

        const edit = await this.edits.run((writer) =>
            insertEdit(writer, {
                editorId: ctx.editor.id,
                type: EDIT_TYPE.RELEASE_CHANGE_QUALITY,
                data: {
                    release: { id: release.id, name: release.name },
                    old: { quality: release.quality },
                    new: { quality: input.quality },
                },
                editNote: input.editNote,
            })
        );

        return { state: "created", edit, redirect: `/release/${release.gid}` };
    }
}

export const releaseQualityService = new ReleaseQualityService(
    new DrizzleEditUnitOfWork(db)
);
