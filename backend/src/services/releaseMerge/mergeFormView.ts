import {
    MERGE_STRATEGY,
    formatArtistCredit,
    type BadRecordingMergeT,
    type MediumPositionT,
    type MergeReleaseSummaryT,
    type MergeStrategy,
    type ReleaseMergeFormT,
} from "@discbase/entity-contract";
import { l } from "../../utils/i18n";
import {
    toArtistCreditJson,
    toMergeRecording,
    type ReleaseAggregate,
} from "../releaseContracts";
import type { MediumPositionInput } from "./mergeForm";
import { groupMediumsByRelease, reconcileMediumPositions } from "./mediumPositions";
import {
    calculateRecordingMerges,
    determineRecordingMerges,
    serializeRecordingMerges,
    type RecordingMergeCandidate,
} from "./recordingMerges";

export interface MergeFormState {
    merging: readonly number[];
    target: number;
    mergeStrategy: MergeStrategy;
    /**
     * Positions an operator already submitted for an append merge. Proposals
     * are computed instead when they are empty or name a medium that is not
     * on the listed release.
     */
    mediumPositions?: readonly MediumPositionInput[];
}

function toReleaseSummary(release: ReleaseAggregate): MergeReleaseSummaryT {
    return {
        id: release.id,
        gid: release.gid,
        name: release.name,
        artistCredit: toArtistCreditJson(release.artistCredit),
        mediumCount: release.mediums.length,
    };
}

function submittedMediumPositions(
    releases: ReleaseAggregate[],
    inputs: readonly MediumPositionInput[]
): MediumPositionT[] | null {
    const byId = new Map(releases.map((release) => [release.id, release]));
    const entries: MediumPositionT[] = [];
    for (const input of inputs) {
        const release = byId.get(input.releaseId);
        const medium = release?.mediums.find((candidate) => candidate.id === input.id);
        if (!release || !medium) {
            return null;
        }
        entries.push({
            id: medium.id,
            releaseId: release.id,
            oldPosition: medium.position,
            newPosition: input.position,
            oldName: medium.name,
            newName: input.name,
            trackCount: medium.trackCount,
            format: medium.formatName,
        });
    }
    return entries.sort((a, b) => a.newPosition - b.newPosition);
}

function toBadRecordingMerge(candidate: RecordingMergeCandidate): BadRecordingMergeT {
    const recordings = candidate.recordings.map((recording) => ({
        ...toMergeRecording(recording),
        artistCredit: toArtistCreditJson(recording.artistCredit),
    }));

    return {
        medium: candidate.medium,
        track: candidate.track,
        recordings,
        warning: l(
            "The recordings on medium {medium}, track {track} have different artist credits ({credits}). Confirm before merging them.",
            {
                medium: candidate.medium,
                track: candidate.track,
                credits: recordings
                    .map((recording) => formatArtistCredit(recording.artistCredit))
                    .join(" / "),
            }
        ),
    };
}

/** Builds the view model the client renders as the release merge form. */
export function buildMergeForm(
    releases: ReleaseAggregate[],
    state: MergeFormState
): ReleaseMergeFormT {
    const summaries = releases.map(toReleaseSummary);
    const submitted =
        state.mergeStrategy === MERGE_STRATEGY.APPEND &&
        state.mediumPositions &&
        state.mediumPositions.length > 0
            ? submittedMediumPositions(releases, state.mediumPositions)
            : null;
    const mediums = submitted ?? reconcileMediumPositions(releases, state.target);

    const target = releases.find((release) => release.id === state.target);
    const recordingMerges = target
        ? serializeRecordingMerges(
              calculateRecordingMerges(
                  target,
                  releases.filter((release) => release !== target)
              )
          )
        : [];

    return {
        merging: [...state.merging],
        target: state.target,
        mergeStrategy: state.mergeStrategy,
        releases: summaries,
        mediums,
        mediumsByRelease: groupMediumsByRelease(summaries, mediums),
        badRecordingMerges: determineRecordingMerges(releases)
            .filter((candidate) => candidate.hasArtistCreditConflict)
            .map(toBadRecordingMerge),
        recordingMerges,
    };
}
