import type { MediumPositionT } from "@discbase/entity-contract";
import type { ReleaseAggregate } from "../releaseContracts";

const DISC_PATTERN = /\(disc (\d+)(?:: (.+?))?\)/;

export interface InferredMedium {
    position: number;
    name: string;
}

/**
 * Reads "(disc N)" or "(disc N: Name)" from a release title. Returns null when
 * the title has no such marker or the disc number is not a positive integer.
 */
export function inferMediumFromReleaseName(
    releaseName: string
): InferredMedium | null {
    const match = DISC_PATTERN.exec(releaseName);
    if (!match) {
        return null;
    }

    const position = Number.parseInt(match[1], 10);
    if (!Number.isSafeInteger(position) || position < 1) {
        return null;
    }

    return { position, name: match[2] ?? "" };
}

interface Proposal {
    entry: MediumPositionT;
    proposedPosition: number;
}

function proposeForRelease(release: ReleaseAggregate): Proposal[] {
    const inferred =
        release.mediums.length === 1 && !release.mediums[0].name
            ? inferMediumFromReleaseName(release.name)
            : null;

    return release.mediums.map((medium) => {
        const newPosition = inferred?.position ?? medium.position;
        const newName = inferred ? inferred.name : medium.name;
        return {
            proposedPosition: newPosition,
            entry: {
                id: medium.id,
                releaseId: release.id,
                oldPosition: medium.position,
                newPosition,
                oldName: medium.name,
                newName,
                trackCount: medium.trackCount,
                format: medium.formatName,
            },
        };
    });
}

function byNewPosition(a: MediumPositionT, b: MediumPositionT): number {
    return a.newPosition - b.newPosition;
}

/**
 * Proposes the medium order for an append merge.
 *
 * The target release (when given) claims its positions first; the other
 * releases follow in input order. A position already claimed moves to one
 * past the highest claimed position, so no two mediums share a position.
 */
export function reconcileMediumPositions(
    releases: ReleaseAggregate[],
    targetId?: number
): MediumPositionT[] {
    const target = releases.find((release) => release.id === targetId);
    const visitOrder = target
        ? [target, ...releases.filter((release) => release !== target)]
        : releases;

    const claimed = new Set<number>();
    let highest = 0;
    const assigned: MediumPositionT[] = [];

    for (const release of visitOrder) {
        const proposals = proposeForRelease(release).sort(
            (a, b) => a.proposedPosition - b.proposedPosition
        );

        for (const { entry, proposedPosition } of proposals) {
            const newPosition = claimed.has(proposedPosition)
                ? highest + 1
                : proposedPosition;
            claimed.add(newPosition);
            highest = Math.max(highest, newPosition);
            assigned.push({ ...entry, newPosition });
        }
    }

    return assigned.sort(byNewPosition);
}

export interface MediumsForRelease<TRelease> {
    release: TRelease;
    mediums: MediumPositionT[];
}

/** Groups reconciled mediums under their releases, in release input order. */
export function groupMediumsByRelease<TRelease extends { id: number }>(
    releases: TRelease[],
    mediums: MediumPositionT[]
): Array<MediumsForRelease<TRelease>> {
    return releases.map((release) => ({
        release,
        mediums: mediums.filter((medium) => medium.releaseId === release.id),
    }));
}
