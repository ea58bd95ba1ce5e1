import { asc, eq, inArray, type SQL } from "drizzle-orm";
import { normalizeReleaseQuality } from "@discbase/entity-contract";
import { mediums, releases } from "../db/schema";
import { db, type Database } from "../utils/db";
import { releaseNotFound, wrapDatabaseError } from "../utils/errors";
import { logger } from "../utils/logger";
import type {
    ArtistCredit,
    MediumAggregate,
    ReleaseAggregate,
} from "./releaseContracts";
import {
    evaluateMergeFeasibility,
    type MergeFeasibilityOptions,
} from "./releaseMerge/mergeFeasibility";

const log = logger.child("ReleaseRepository");

export interface ReleaseRepository {
    findById(id: number): Promise<ReleaseAggregate | null>;
    findByGid(gid: string): Promise<ReleaseAggregate | null>;
    /** Loads every release in `ids` order; a missing id is a not-found error. */
    loadForMerge(ids: readonly number[]): Promise<ReleaseAggregate[]>;
    canMerge(options: MergeFeasibilityOptions): Promise<boolean>;
}

interface ArtistCreditRow {
    id: number;
    name: string;
    names: Array<{
        position: number;
        name: string;
        joinPhrase: string;
        artist: { id: number; name: string };
    }>;
}

export interface ReleaseRow {
    id: number;
    gid: string;
    name: string;
    comment: string;
    barcode: string | null;
    quality: number;
    status: { name: string } | null;
    artistCredit: ArtistCreditRow;
    mediums: Array<{
        id: number;
        releaseId: number;
        position: number;
        name: string;
        trackCount: number;
        format: { name: string } | null;
        tracks: Array<{
            id: number;
            gid: string;
            position: number;
            number: string;
            name: string;
            length: number | null;
            recording: {
                id: number;
                gid: string;
                name: string;
                length: number | null;
                artistCredit: ArtistCreditRow;
            };
        }>;
    }>;
}

const artistCreditWith = {
    columns: { id: true, name: true },
    with: {
        names: {
            columns: { position: true, name: true, joinPhrase: true },
            with: { artist: { columns: { id: true, name: true } } },
        },
    },
} as const;

function toArtistCredit(row: ArtistCreditRow): ArtistCredit {
    return {
        id: row.id,
        name: row.name,
        names: [...row.names]
            .sort((a, b) => a.position - b.position)
            .map((name) => ({
                artistId: name.artist.id,
                artistName: name.artist.name,
                name: name.name,
                joinPhrase: name.joinPhrase,
            })),
    };
}

export function mapReleaseRow(row: ReleaseRow): ReleaseAggregate {
    const mediumAggregates: MediumAggregate[] = [...row.mediums]
        .sort((a, b) => a.position - b.position)
        .map((medium) => ({
            id: medium.id,
            releaseId: medium.releaseId,
            position: medium.position,
            name: medium.name,
            formatName: medium.format?.name ?? null,
            trackCount: medium.trackCount,
            tracks: [...medium.tracks]
                .sort((a, b) => a.position - b.position)
                .map((track) => ({
                    id: track.id,
                    gid: track.gid,
                    position: track.position,
                    number: track.number,
                    name: track.name,
                    length: track.length,
                    recording: {
                        id: track.recording.id,
                        gid: track.recording.gid,
                        name: track.recording.name,
                        length: track.recording.length,
                        artistCredit: toArtistCredit(track.recording.artistCredit),
                    },
                })),
        }));

    return {
        id: row.id,
        gid: row.gid,
        name: row.name,
        comment: row.comment,
        barcode: row.barcode,
        quality: normalizeReleaseQuality(row.quality),
        status: row.status?.name ?? null,
        artistCredit: toArtistCredit(row.artistCredit),
        mediums: mediumAggregates,
    };
}

export class DrizzleReleaseRepository implements ReleaseRepository {
    constructor(private readonly database: Database) {}

    private async findRows(
        where: SQL
    ): Promise<ReleaseRow[]> {
        try {
            return await this.database.query.releases.findMany({
                where,
                columns: {
                    id: true,
                    gid: true,
                    name: true,
                    comment: true,
                    barcode: true,
                    quality: true,
                },
                with: {
                    status: { columns: { name: true } },
                    artistCredit: artistCreditWith,
                    mediums: {
                        columns: {
                            id: true,
                            releaseId: true,
                            position: true,
                            name: true,
                            trackCount: true,
                        },
                        with: {
                            format: { columns: { name: true } },
                            tracks: {
                                columns: {
                                    id: true,
                                    gid: true,
                                    position: true,
                                    number: true,
                                    name: true,
                                    length: true,
                                },
                                with: {
                                    recording: {
                                        columns: {
                                            id: true,
                                            gid: true,
                                            name: true,
                                            length: true,
                                        },
                                        with: { artistCredit: artistCreditWith },
                                    },
                                },
                            },
                        },
                    },
                },
            });
        } catch (error) {
            throw wrapDatabaseError(error, "load releases");
        }
    }

    async findById(id: number): Promise<ReleaseAggregate | null> {
        const [row] = await this.findRows(eq(releases.id, id));
        return row ? mapReleaseRow(row) : null;
    }

    async findByGid(gid: string): Promise<ReleaseAggregate | null> {
        const [row] = await this.findRows(eq(releases.gid, gid));
        return row ? mapReleaseRow(row) : null;
    }

    async loadForMerge(ids: readonly number[]): Promise<ReleaseAggregate[]> {
        const rows = await this.findRows(inArray(releases.id, [...ids]));
        const byId = new Map(rows.map((row) => [row.id, mapReleaseRow(row)]));

        return ids.map((id) => {
            const release = byId.get(id);
            if (!release) {
                throw releaseNotFound(id);
            }
            return release;
        });
    }

    async canMerge(options: MergeFeasibilityOptions): Promise<boolean> {
        const releaseIds = [options.newId, ...options.oldIds];
        try {
            const rows = await this.database
                .select({
                    id: mediums.id,
                    releaseId: mediums.releaseId,
                    position: mediums.position,
                    trackCount: mediums.trackCount,
                })
                .from(mediums)
                .where(inArray(mediums.releaseId, releaseIds))
                .orderBy(asc(mediums.releaseId), asc(mediums.position));

            const feasible = evaluateMergeFeasibility(rows, options);
            log.debug("Merge feasibility evaluated", {
                mergeStrategy: options.mergeStrategy,
                newId: options.newId,
                oldIds: options.oldIds,
                feasible,
            });
            return feasible;
        } catch (error) {
            throw wrapDatabaseError(error, "check merge feasibility");
        }
    }
}

export const releaseRepository = new DrizzleReleaseRepository(db);
