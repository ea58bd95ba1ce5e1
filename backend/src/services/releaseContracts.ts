import type {
    ArtistCreditT,
    MediumT,
    MergeRecordingT,
    ReleaseQuality,
    ReleaseT,
    TrackT,
} from "@discbase/entity-contract";

export interface ArtistCreditName {
    artistId: number;
    artistName: string;
    name: string;
    joinPhrase: string;
}

export interface ArtistCredit {
    id: number;
    name: string;
    names: ArtistCreditName[];
}

export interface RecordingSummary {
    id: number;
    gid: string;
    name: string;
    length: number | null;
    artistCredit: ArtistCredit;
}

export interface TrackAggregate {
    id: number;
    gid: string;
    position: number;
    number: string;
    name: string;
    length: number | null;
    recording: RecordingSummary;
}

export interface MediumAggregate {
    id: number;
    releaseId: number;
    position: number;
    name: string;
    formatName: string | null;
    trackCount: number;
    tracks: TrackAggregate[];
}

/** A release with every medium, track and recording already resolved. */
export interface ReleaseAggregate {
    id: number;
    gid: string;
    name: string;
    comment: string;
    barcode: string | null;
    quality: ReleaseQuality;
    status: string | null;
    artistCredit: ArtistCredit;
    mediums: MediumAggregate[];
}

export function toArtistCreditJson(artistCredit: ArtistCredit): ArtistCreditT {
    return artistCredit.names.map((name) => ({
        artist: { id: name.artistId, name: name.artistName },
        name: name.name,
        joinPhrase: name.joinPhrase,
    }));
}

export function toMergeRecording(recording: RecordingSummary): MergeRecordingT {
    return {
        id: recording.id,
        name: recording.name,
        length: recording.length,
    };
}

/**
 * Summarizes medium formats the way release listings show them, e.g.
 * "2×CD + DVD-Video". Unknown formats count as "(unknown)".
 */
export function combinedFormatName(mediums: MediumAggregate[]): string {
    const counts = new Map<string, number>();
    for (const medium of mediums) {
        const format = medium.formatName ?? "(unknown)";
        counts.set(format, (counts.get(format) ?? 0) + 1);
    }
    return [...counts.entries()]
        .map(([format, count]) => (count > 1 ? `${count}×${format}` : format))
        .join(" + ");
}

export function combinedTrackCount(mediums: MediumAggregate[]): string {
    return mediums.map((medium) => String(medium.trackCount)).join(" + ");
}

function toTrackJson(track: TrackAggregate): TrackT {
    return {
        entityType: "track",
        id: track.id,
        gid: track.gid,
        position: track.position,
        number: track.number,
        name: track.name,
        length: track.length,
        recording: {
            entityType: "recording",
            id: track.recording.id,
            gid: track.recording.gid,
            name: track.recording.name,
            length: track.recording.length,
            artistCredit: toArtistCreditJson(track.recording.artistCredit),
        },
    };
}

function toMediumJson(medium: MediumAggregate): MediumT {
    return {
        entityType: "medium",
        id: medium.id,
        position: medium.position,
        name: medium.name,
        format: medium.formatName,
        trackCount: medium.trackCount,
        tracks: medium.tracks.map(toTrackJson),
    };
}

export function toReleaseJson(release: ReleaseAggregate): ReleaseT {
    return {
        entityType: "release",
        id: release.id,
        gid: release.gid,
        name: release.name,
        comment: release.comment,
        barcode: release.barcode,
        quality: release.quality,
        status: release.status,
        artistCredit: toArtistCreditJson(release.artistCredit),
        combinedFormatName: combinedFormatName(release.mediums),
        combinedTrackCount: combinedTrackCount(release.mediums),
        mediums: release.mediums.map(toMediumJson),
    };
}
