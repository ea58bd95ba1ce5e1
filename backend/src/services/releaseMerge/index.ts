import {
    EDIT_TYPE,
    MERGE_STRATEGY,
    type FieldErrorsT,
    type ReleaseMergeFormT,
} from "@discbase/entity-contract";
import { db } from "../../utils/db";
import { mergeLookupFailed } from "../../utils/errors";
import { l } from "../../utils/i18n";
import { logger, withLogTiming } from "../../utils/logger";
import {
    DrizzleEditUnitOfWork,
    insertEdit,
    type CreatedEdit,
    type EditUnitOfWork,
} from "../editService";
import {
    releaseRepository,
    type ReleaseRepository,
} from "../releaseRepository";
import type { RequestContext } from "../requestContext";
import { addFieldError, type MergeSubmission } from "./mergeForm";
import { buildMergeForm } from "./mergeFormView";
import {
    buildMergeDirective,
    buildMergeEditData,
    toFeasibilityOptions,
    type MergeDirective,
} from "./mergeParameters";

export const STRATEGY_NOT_APPLICABLE =
    "This merge strategy is not applicable to the releases you have selected.";
export const BAD_RECORDING_MERGES_UNCONFIRMED =
    "Some recordings being merged have different artist credits. Confirm the merge to continue.";

export type MergeSubmissionResult =
    | {
          state: "rejected";
          fieldErrors: FieldErrorsT;
          form: ReleaseMergeFormT;
      }
    | {
          state: "created";
          edit: CreatedEdit;
          directive: MergeDirective;
          redirect: string;
      };

export interface ReleaseMergeDependencies {
    releases: ReleaseRepository;
    edits: EditUnitOfWork;
}

export class ReleaseMergeService {
    private readonly log = logger.child("ReleaseMerge");

    constructor(private readonly deps: ReleaseMergeDependencies) {}

    /** Loads the candidates and proposes positions and recording merges. */
    async prepareForm(
        ctx: RequestContext,
        ids: readonly number[],
        target?: number
    ): Promise<ReleaseMergeFormT> {
        const releases = await this.deps.releases.loadForMerge(ids);
        this.log.debug("Preparing merge form", {
            requestId: ctx.requestId,
            releaseIds: ids,
        });

        return buildMergeForm(releases, {
            merging: ids,
            target: target ?? ids[0],
            mergeStrategy: MERGE_STRATEGY.APPEND,
        });
    }

    /**
     * Validates a submission and, when accepted, files a release merge edit.
     * A rejection carries field errors and the form to show again.
     */
    async submit(
        ctx: RequestContext,
        submission: MergeSubmission
    ): Promise<MergeSubmissionResult> {
        const releases = await this.deps.releases.loadForMerge(submission.merging);
        const reject = (fieldErrors: FieldErrorsT): MergeSubmissionResult => {
            this.log.info("Merge submission rejected", {
                requestId: ctx.requestId,
                fields: Object.keys(fieldErrors),
            });
            return {
                state: "rejected",
                fieldErrors,
                form: buildMergeForm(releases, submission),
            };
        };

        if (!submission.merging.includes(submission.target)) {
            return reject(
                addFieldError({}, "mergeStrategy", l(STRATEGY_NOT_APPLICABLE))
            );
        }

        const directive = buildMergeDirective(submission, releases);
        let fieldErrors: FieldErrorsT = {};

        const feasible = await this.deps.releases.canMerge(
            toFeasibilityOptions(directive)
        );
        if (!feasible) {
            fieldErrors = addFieldError(
                fieldErrors,
                "mergeStrategy",
                l(STRATEGY_NOT_APPLICABLE)
            );
        }

        const hasBadRecordingMerges = (directive.recordingMerges ?? []).some(
            (merge) => merge.hasArtistCreditConflict
        );
        if (hasBadRecordingMerges && !submission.confirmBadRecordingMerges) {
            fieldErrors = addFieldError(
                fieldErrors,
                "confirmBadRecordingMerges",
                l(BAD_RECORDING_MERGES_UNCONFIRMED)
            );
        }

        if (Object.keys(fieldErrors).length > 0) {
            return reject(fieldErrors);
        }

        const target = releases.find((release) => release.id === directive.targetId);
        if (!target) {
            throw mergeLookupFailed("Could not find the target release", {
                target: directive.targetId,
            });
        }
        const data = buildMergeEditData(directive, releases);
        const edit = await withLogTiming(
            this.log,
            "Create release merge edit",
            () =>
                this.deps.edits.run((writer) =>
                    insertEdit(writer, {
                        editorId: ctx.editor.id,
                        type: EDIT_TYPE.RELEASE_MERGE,
                        data,
                        editNote: submission.editNote,
                    })
                ),
            { requestId: ctx.requestId, targetId: directive.targetId }
        );

        return {
            state: "created",
            edit,
            directive,
            redirect: `/release/${target.gid}`,
        };
    }
}

export const releaseMergeService = new ReleaseMergeService({
    releases: releaseRepository,
    edits: new DrizzleEditUnitOfWork(db),
});
