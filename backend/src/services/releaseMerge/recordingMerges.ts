import type { RecordingMergeT } from "@discbase/entity-contract";
import {
    toMergeRecording,
    type RecordingSummary,
    type ReleaseAggregate,
} from "../releaseContracts";

export interface RecordingMergeCandidate {
    medium: number;
    track: number;
    recordings: RecordingSummary[];
    hasArtistCreditConflict: boolean;
}

export interface RecordingMergeGroup {
    medium: number;
    track: number;
    destination: RecordingSummary;
    sources: RecordingSummary[];
    hasArtistCreditConflict: boolean;
}

export function hasArtistCreditConflict(recordings: RecordingSummary[]): boolean {
    return new Set(recordings.map((recording) => recording.artistCredit.id)).size > 1;
}

function positionKey(medium: number, track: number): string {
    return `${medium}:${track}`;
}

/**
 * Groups the recordings of every candidate release by medium and track
 * position. Only positions that hold more than one distinct recording are
 * returned, ordered by medium then track position.
 */
export function determineRecordingMerges(
    releases: ReleaseAggregate[]
): RecordingMergeCandidate[] {
    const groups = new Map<
        string,
        { medium: number; track: number; recordings: Map<number, RecordingSummary> }
    >();

    for (const release of releases) {
        for (const medium of release.mediums) {
            for (const track of medium.tracks) {
                const key = positionKey(medium.position, track.position);
                let group = groups.get(key);
                if (!group) {
                    group = {
                        medium: medium.position,
                        track: track.position,
                        recordings: new Map(),
                    };
                    groups.set(key, group);
                }
                if (!group.recordings.has(track.recording.id)) {
                    group.recordings.set(track.recording.id, track.recording);
                }
            }
        }
    }

    return [...groups.values()]
        .filter((group) => group.recordings.size > 1)
        .sort((a, b) => a.medium - b.medium || a.track - b.track)
        .map((group) => {
            const recordings = [...group.recordings.values()];
            return {
                medium: group.medium,
                track: group.track,
                recordings,
                hasArtistCreditConflict: hasArtistCreditConflict(recordings),
            };
        });
}

/**
 * Pairs every target track with the source recordings found at the same
 * medium and track position. Positions where all sources already use the
 * destination recording produce no group.
 */
export function calculateRecordingMerges(
    target: ReleaseAggregate,
    sources: ReleaseAggregate[]
): RecordingMergeGroup[] {
    const sourceRecordings = new Map<string, RecordingSummary[]>();
    for (const release of sources) {
        for (const medium of release.mediums) {
            for (const track of medium.tracks) {
                const key = positionKey(medium.position, track.position);
                const existing = sourceRecordings.get(key) ?? [];
                existing.push(track.recording);
                sourceRecordings.set(key, existing);
            }
        }
    }

    const merges: RecordingMergeGroup[] = [];
    const targetMediums = [...target.mediums].sort(
        (a, b) => a.position - b.position
    );

    for (const medium of targetMediums) {
        const targetTracks = [...medium.tracks].sort(
            (a, b) => a.position - b.position
        );
        for (const track of targetTracks) {
            const destination = track.recording;
            const seen = new Set<number>([destination.id]);
            const groupSources: RecordingSummary[] = [];

            for (const recording of sourceRecordings.get(
                positionKey(medium.position, track.position)
            ) ?? []) {
                if (seen.has(recording.id)) {
                    continue;
                }
                seen.add(recording.id);
                groupSources.push(recording);
            }

            if (groupSources.length === 0) {
                continue;
            }

            merges.push({
                medium: medium.position,
                track: track.position,
                destination,
                sources: groupSources,
                hasArtistCreditConflict: hasArtistCreditConflict([
                    destination,
                    ...groupSources,
                ]),
            });
        }
    }

    return merges;
}

export function serializeRecordingMerges(
    merges: RecordingMergeGroup[]
): RecordingMergeT[] {
    return merges.map((merge) => ({
        medium: merge.medium,
        track: merge.track,
        destination: toMergeRecording(merge.destination),
        sources: merge.sources.map(toMergeRecording),
        hasArtistCreditConflict: merge.hasArtistCreditConflict,
    }));
}
