import { MERGE_STRATEGY, type MergeStrategy } from "@discbase/entity-contract";

export interface MergeFeasibilityOptions {
    mergeStrategy: MergeStrategy;
    newId: number;
    oldIds: number[];
    /** One placement per submitted medium; required for append merges. */
    mediumPositions?: readonly MediumPlacement[];
}

export interface MediumPlacement {
    id: number;
    position: number;
}

export interface MediumShape {
    id: number;
    releaseId: number;
    position: number;
    trackCount: number;
}

function appendIsFeasible(
    mediums: MediumShape[],
    placements: readonly MediumPlacement[] | undefined
): boolean {
    if (!placements || placements.length !== mediums.length) {
        return false;
    }

    const positionById = new Map(
        placements.map((placement): [number, number] => [placement.id, placement.position])
    );
    // A medium placed twice leaves another medium without a placement
    if (positionById.size !== placements.length) {
        return false;
    }

    const used = new Set<number>();
    for (const medium of mediums) {
        const position = positionById.get(medium.id);
        if (
            position === undefined ||
            !Number.isInteger(position) ||
            position < 1 ||
            used.has(position)
        ) {
            return false;
        }
        used.add(position);
    }
    return true;
}

function mergeIsFeasible(
    mediums: MediumShape[],
    newId: number,
    oldIds: number[]
): boolean {
    const targetByPosition = new Map<number, MediumShape>();
    for (const medium of mediums) {
        if (medium.releaseId === newId) {
            targetByPosition.set(medium.position, medium);
        }
    }

    const sourceIds = new Set(oldIds);
    return mediums
        .filter((medium) => sourceIds.has(medium.releaseId))
        .every((medium) => {
            const counterpart = targetByPosition.get(medium.position);
            return counterpart !== undefined &&
                counterpart.trackCount === medium.trackCount;
        });
}

/**
 * Structural check behind `ReleaseRepository.canMerge`. `mediums` must hold
 * every medium of the target and source releases.
 */
export function evaluateMergeFeasibility(
    mediums: MediumShape[],
    options: MergeFeasibilityOptions
): boolean {
    const { mergeStrategy, newId, oldIds } = options;
    if (oldIds.length === 0 || oldIds.includes(newId)) {
        return false;
    }

    if (mergeStrategy === MERGE_STRATEGY.APPEND) {
        return appendIsFeasible(mediums, options.mediumPositions);
    }

    return mergeIsFeasible(mediums, newId, oldIds);
}
