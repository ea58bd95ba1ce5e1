import {
    MERGE_STRATEGY,
    type ArtistCreditT,
    type MergeStrategy,
    type RecordingMergeT,
} from "@discbase/entity-contract";
import { mergeLookupFailed } from "../../utils/errors";
import {
    toArtistCreditJson,
    type MediumAggregate,
    type ReleaseAggregate,
} from "../releaseContracts";
import type { MergeFeasibilityOptions } from "./mergeFeasibility";
import type { MediumPositionInput, MergeSubmission } from "./mergeForm";
import {
    calculateRecordingMerges,
    serializeRecordingMerges,
} from "./recordingMerges";

export interface MediumChange {
    id: number;
    oldPosition: number;
    newPosition: number;
    oldName: string;
    newName: string;
}

export interface ReleaseMediumChanges {
    release: { id: number; name: string };
    mediums: MediumChange[];
}

/** Everything the edit queue needs to carry out one release merge. */
export interface MergeDirective {
    strategy: MergeStrategy;
    targetId: number;
    sourceIds: number[];
    mediumChanges?: ReleaseMediumChanges[];
    recordingMerges?: RecordingMergeT[];
}

function partitionReleases(
    submission: MergeSubmission,
    releases: ReleaseAggregate[]
): { target: ReleaseAggregate; sources: ReleaseAggregate[] } {
    const byId = new Map(releases.map((release) => [release.id, release]));
    const target = byId.get(submission.target);
    if (!target) {
        throw mergeLookupFailed("Could not find the target release", {
            target: submission.target,
        });
    }

    const sources = submission.merging
        .filter((id) => id !== submission.target)
        .map((id) => {
            const release = byId.get(id);
            if (!release) {
                throw mergeLookupFailed("Could not find a release being merged", {
                    releaseId: id,
                });
            }
            return release;
        });

    return { target, sources };
}

export function resolveSubmittedMedium(
    releasesById: Map<number, ReleaseAggregate>,
    input: MediumPositionInput
): { release: ReleaseAggregate; medium: MediumAggregate } {
    const release = releasesById.get(input.releaseId);
    if (!release) {
        throw mergeLookupFailed("Couldn't find release to link with", {
            releaseId: input.releaseId,
            mediumId: input.id,
        });
    }

    const medium = release.mediums.find((candidate) => candidate.id === input.id);
    if (!medium) {
        throw mergeLookupFailed("Couldn't find medium", {
            releaseId: input.releaseId,
            mediumId: input.id,
        });
    }

    return { release, medium };
}

export function buildMediumChanges(
    submission: MergeSubmission,
    releases: ReleaseAggregate[]
): ReleaseMediumChanges[] {
    const byId = new Map(releases.map((release) => [release.id, release]));
    const grouped = new Map<number, ReleaseMediumChanges>();

    for (const input of submission.mediumPositions) {
        const { release, medium } = resolveSubmittedMedium(byId, input);

        let changes = grouped.get(release.id);
        if (!changes) {
            changes = { release: { id: release.id, name: release.name }, mediums: [] };
            grouped.set(release.id, changes);
        }
        changes.mediums.push({
            id: medium.id,
            oldPosition: medium.position,
            newPosition: input.position,
            oldName: medium.name,
            newName: input.name,
        });
    }

    return [...grouped.values()];
}

/** Builds the merge directive for a validated submission. Pure. */
export function buildMergeDirective(
    submission: MergeSubmission,
    releases: ReleaseAggregate[]
): MergeDirective {
    const { target, sources } = partitionReleases(submission, releases);
    const directive: MergeDirective = {
        strategy: submission.mergeStrategy,
        targetId: target.id,
        sourceIds: sources.map((release) => release.id),
    };

    if (submission.mergeStrategy === MERGE_STRATEGY.APPEND) {
        return {
            ...directive,
            mediumChanges: buildMediumChanges(submission, releases),
        };
    }

    return {
        ...directive,
        recordingMerges: serializeRecordingMerges(
            calculateRecordingMerges(target, sources)
        ),
    };
}

export function toFeasibilityOptions(
    directive: MergeDirective
): MergeFeasibilityOptions {
    const options: MergeFeasibilityOptions = {
        mergeStrategy: directive.strategy,
        newId: directive.targetId,
        oldIds: [...directive.sourceIds],
    };

    if (directive.strategy === MERGE_STRATEGY.APPEND) {
        options.mediumPositions = (directive.mediumChanges ?? []).flatMap((changes) =>
            changes.mediums.map((medium) => ({
                id: medium.id,
                position: medium.newPosition,
            }))
        );
    }

    return options;
}

export type MergedReleaseData = {
    id: number;
    name: string;
    artistCredit: ArtistCreditT;
    barcode?: string;
    mediums: Array<{ trackCount: number; formatName: string | null }>;
};

export type ReleaseMergeEditData = {
    newEntity: MergedReleaseData;
    oldEntities: MergedReleaseData[];
    mergeStrategy: MergeStrategy;
    mediumChanges?: ReleaseMediumChanges[];
    recordingMerges?: RecordingMergeT[];
};

function toMergedReleaseData(release: ReleaseAggregate): MergedReleaseData {
    return {
        id: release.id,
        name: release.name,
        artistCredit: toArtistCreditJson(release.artistCredit),
        ...(release.barcode ? { barcode: release.barcode } : {}),
        mediums: release.mediums.map((medium) => ({
            trackCount: medium.trackCount,
            formatName: medium.formatName,
        })),
    };
}

/** Shapes the stored edit data; releases must include every id in the directive. */
export function buildMergeEditData(
    directive: MergeDirective,
    releases: ReleaseAggregate[]
): ReleaseMergeEditData {
    const byId = new Map(releases.map((release) => [release.id, release]));
    const lookup = (id: number): ReleaseAggregate => {
        const release = byId.get(id);
        if (!release) {
            throw mergeLookupFailed("Could not find a release being merged", {
                releaseId: id,
            });
        }
        return release;
    };

    return {
        newEntity: toMergedReleaseData(lookup(directive.targetId)),
        oldEntities: directive.sourceIds.map((id) => toMergedReleaseData(lookup(id))),
        mergeStrategy: directive.strategy,
        ...(directive.mediumChanges ? { mediumChanges: directive.mediumChanges } : {}),
        ...(directive.recordingMerges
            ? { recordingMerges: directive.recordingMerges }
            : {}),
    };
}
