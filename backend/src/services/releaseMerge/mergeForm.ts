import { z } from "zod";
import {
    normalizeMergeStrategy,
    type FieldErrorsT,
    type MergeStrategy,
} from "@discbase/entity-contract";

const entityId = z.coerce.number().int().positive();

const hasUniqueIds = (ids: readonly number[]) => new Set(ids).size === ids.length;

const mediumPositionSchema = z.object({
    id: entityId,
    releaseId: entityId,
    position: z.coerce.number().int().positive(),
    name: z.string().trim().max(255).default(""),
});

export const mergeSubmissionSchema = z
    .object({
        merging: z
            .array(entityId)
            .min(2, "Select at least two releases to merge")
            .refine(hasUniqueIds, {
                message: "Releases may only be listed once",
            }),
        target: entityId,
        mergeStrategy: z
            .union([z.number(), z.string()])
            .transform((value, ctx): MergeStrategy => {
                const strategy = normalizeMergeStrategy(value);
                if (strategy === null) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: "Unknown merge strategy",
                    });
                    return z.NEVER;
                }
                return strategy;
            }),
        mediumPositions: z
            .array(mediumPositionSchema)
            .refine((mediums) => hasUniqueIds(mediums.map((medium) => medium.id)), {
                message: "Mediums may only be positioned once",
            })
            .default([]),
        editNote: z.string().trim().max(10_000).optional(),
        confirmBadRecordingMerges: z.boolean().default(false),
    });

export const mergeFormQuerySchema = z.object({
    ids: z
        .string()
        .transform((value) => value.split(",").map((part) => part.trim()))
        .pipe(
            z
                .array(entityId)
                .min(2, "Select at least two releases to merge")
                .refine(hasUniqueIds, {
                    message: "Releases may only be listed once",
                })
        ),
    target: entityId.optional(),
});

export interface MediumPositionInput {
    readonly id: number;
    readonly releaseId: number;
    readonly position: number;
    readonly name: string;
}

/** Validated, immutable merge submission. */
export interface MergeSubmission {
    readonly merging: readonly number[];
    readonly target: number;
    readonly mergeStrategy: MergeStrategy;
    readonly mediumPositions: readonly MediumPositionInput[];
    readonly editNote?: string;
    readonly confirmBadRecordingMerges: boolean;
}

export type MergeSubmissionParseResult =
    | { success: true; data: MergeSubmission }
    | { success: false; issues: z.ZodIssue[] };

export function parseMergeSubmission(body: unknown): MergeSubmissionParseResult {
    const parsed = mergeSubmissionSchema.safeParse(body);
    if (!parsed.success) {
        return { success: false, issues: parsed.error.issues };
    }

    const data = parsed.data;
    return {
        success: true,
        data: Object.freeze({
            merging: Object.freeze([...data.merging]),
            target: data.target,
            mergeStrategy: data.mergeStrategy,
            mediumPositions: Object.freeze(
                data.mediumPositions.map((medium) => Object.freeze({ ...medium }))
            ),
            ...(data.editNote ? { editNote: data.editNote } : {}),
            confirmBadRecordingMerges: data.confirmBadRecordingMerges,
        }),
    };
}

export function addFieldError(
    errors: FieldErrorsT,
    field: string,
    message: string
): FieldErrorsT {
    return {
        ...errors,
        [field]: [...(errors[field] ?? []), message],
    };
}
