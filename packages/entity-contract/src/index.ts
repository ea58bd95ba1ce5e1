export const ENTITY_CONTRACT_VERSION = "1.0.0";

export const MERGE_STRATEGY = {
    APPEND: 1,
    MERGE: 2,
} as const;

export type MergeStrategy = (typeof MERGE_STRATEGY)[keyof typeof MERGE_STRATEGY];

export const RELEASE_QUALITY_VALUES = [-1, 0, 1, 2] as const;

export type ReleaseQuality = (typeof RELEASE_QUALITY_VALUES)[number];

export const EDIT_TYPE = {
    RELEASE_MERGE: 225,
    RELEASE_CHANGE_QUALITY: 263,
} as const;

export type EditType = (typeof EDIT_TYPE)[keyof typeof EDIT_TYPE];

export const EDIT_STATUS = {
    OPEN: 1,
    APPLIED: 2,
    FAILED_VOTE: 3,
    DELETED: 9,
} as const;

export type EditStatus = (typeof EDIT_STATUS)[keyof typeof EDIT_STATUS];

export interface ArtistCreditNameT {
    artist: { id: number; name: string };
    name: string;
    joinPhrase: string;
}

export type ArtistCreditT = ArtistCreditNameT[];

export interface RecordingT {
    entityType: "recording";
    id: number;
    gid: string;
    name: string;
    length: number | null;
    artistCredit: ArtistCreditT;
}

export interface TrackT {
    entityType: "track";
    id: number;
    gid: string;
    position: number;
    number: string;
    name: string;
    length: number | null;
    recording: RecordingT;
}

export interface MediumT {
    entityType: "medium";
    id: number;
    position: number;
    name: string;
    format: string | null;
    trackCount: number;
    tracks: TrackT[];
}

export interface ReleaseT {
    entityType: "release";
    id: number;
    gid: string;
    name: string;
    comment: string;
    barcode: string | null;
    quality: ReleaseQuality;
    status: string | null;
    artistCredit: ArtistCreditT;
    combinedFormatName: string;
    combinedTrackCount: string;
    mediums: MediumT[];
}

export interface EditT {
    id: number;
    type: EditType;
    status: EditStatus;
    editorId: number;
    openTime: string;
}

export interface MergeReleaseSummaryT {
    id: number;
    gid: string;
    name: string;
    artistCredit: ArtistCreditT;
    mediumCount: number;
}

export interface MediumPositionT {
    id: number;
    releaseId: number;
    oldPosition: number;
    newPosition: number;
    oldName: string;
    newName: string;
    trackCount: number;
    format: string | null;
}

export interface MergeRecordingT {
    id: number;
    name: string;
    length: number | null;
}

export interface RecordingMergeT {
    medium: number;
    track: number;
    destination: MergeRecordingT;
    sources: MergeRecordingT[];
    hasArtistCreditConflict: boolean;
}

export interface BadRecordingMergeT {
    medium: number;
    track: number;
    recordings: Array<MergeRecordingT & { artistCredit: ArtistCreditT }>;
    warning: string;
}

export interface ReleaseMergeFormT {
    merging: number[];
    target: number;
    mergeStrategy: MergeStrategy;
    releases: MergeReleaseSummaryT[];
    mediums: MediumPositionT[];
    mediumsByRelease: Array<{
        release: MergeReleaseSummaryT;
        mediums: MediumPositionT[];
    }>;
    badRecordingMerges: BadRecordingMergeT[];
    recordingMerges: RecordingMergeT[];
}

export type FieldErrorsT = Record<string, string[]>;

export const normalizeMergeStrategy = (value: unknown): MergeStrategy | null => {
    if (value === MERGE_STRATEGY.APPEND || value === "append" || value === "1") {
        return MERGE_STRATEGY.APPEND;
    }
    if (value === MERGE_STRATEGY.MERGE || value === "merge" || value === "2") {
        return MERGE_STRATEGY.MERGE;
    }
    return null;
};

export const normalizeReleaseQuality = (value: unknown): ReleaseQuality => {
    const numeric = typeof value === "string" ? Number(value) : value;
    for (const quality of RELEASE_QUALITY_VALUES) {
        if (numeric === quality) {
            return quality;
        }
    }
    return -1;
};

export const formatArtistCredit = (artistCredit: ArtistCreditT): string =>
    artistCredit.map((name) => `${name.name}${name.joinPhrase}`).join("");
