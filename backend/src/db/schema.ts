import { relations } from "drizzle-orm";
import {
    boolean,
    index,
    integer,
    jsonb,
    pgTable,
    primaryKey,
    serial,
    smallint,
    text,
    timestamp,
    uuid,
} from "drizzle-orm/pg-core";

export const artists = pgTable("artist", {
    id: serial("id").primaryKey(),
    gid: uuid("gid").notNull().unique(),
    name: text("name").notNull(),
    sortName: text("sort_name").notNull(),
});

export const artistCredits = pgTable("artist_credit", {
    id: serial("id").primaryKey(),
    name: text("name").notNull(),
    artistCount: smallint("artist_count").notNull(),
});

export const artistCreditNames = pgTable(
    "artist_credit_name",
    {
        artistCreditId: integer("artist_credit")
            .notNull()
            .references(() => artistCredits.id),
        position: smallint("position").notNull(),
        artistId: integer("artist")
            .notNull()
            .references(() => artists.id),
        name: text("name").notNull(),
        joinPhrase: text("join_phrase").notNull().default(""),
    },
    (table) => ({
        pk: primaryKey({ columns: [table.artistCreditId, table.position] }),
    })
);

export const recordings = pgTable("recording", {
    id: serial("id").primaryKey(),
    gid: uuid("gid").notNull().unique(),
    name: text("name").notNull(),
    artistCreditId: integer("artist_credit")
        .notNull()
        .references(() => artistCredits.id),
    length: integer("length"),
    comment: text("comment").notNull().default(""),
    video: boolean("video").notNull().default(false),
});

export const releaseStatuses = pgTable("release_status", {
    id: serial("id").primaryKey(),
    name: text("name").notNull(),
});

export const releases = pgTable("release", {
    id: serial("id").primaryKey(),
    gid: uuid("gid").notNull().unique(),
    name: text("name").notNull(),
    artistCreditId: integer("artist_credit")
        .notNull()
        .references(() => artistCredits.id),
    statusId: integer("status").references(() => releaseStatuses.id),
    barcode: text("barcode"),
    comment: text("comment").notNull().default(""),
    quality: smallint("quality").notNull().default(-1),
});

export const mediumFormats = pgTable("medium_format", {
    id: serial("id").primaryKey(),
    name: text("name").notNull(),
});

// Lookup indexes rather than unique constraints: replicas apply reorders
// row by row and would trip a uniqueness check mid-transaction.
export const mediums = pgTable(
    "medium",
    {
        id: serial("id").primaryKey(),
        releaseId: integer("release")
            .notNull()
            .references(() => releases.id),
        position: integer("position").notNull(),
        formatId: integer("format").references(() => mediumFormats.id),
        name: text("name").notNull().default(""),
        trackCount: integer("track_count").notNull().default(0),
    },
    (table) => ({
        releasePosition: index("medium_idx_release_position").on(
            table.releaseId,
            table.position
        ),
    })
);

export const tracks = pgTable(
    "track",
    {
        id: serial("id").primaryKey(),
        gid: uuid("gid").notNull().unique(),
        recordingId: integer("recording")
            .notNull()
            .references(() => recordings.id),
        mediumId: integer("medium")
            .notNull()
            .references(() => mediums.id),
        position: integer("position").notNull(),
        number: text("number").notNull(),
        name: text("name").notNull(),
        artistCreditId: integer("artist_credit")
            .notNull()
            .references(() => artistCredits.id),
        length: integer("length"),
    },
    (table) => ({
        mediumPosition: index("track_idx_medium_position").on(
            table.mediumId,
            table.position
        ),
    })
);

export const editors = pgTable("editor", {
    id: serial("id").primaryKey(),
    name: text("name").notNull().unique(),
    privs: integer("privs").notNull().default(0),
    tokenVersion: integer("token_version").notNull().default(0),
});

export const apiKeys = pgTable("api_key", {
    id: serial("id").primaryKey(),
    key: text("key").notNull().unique(),
    editorId: integer("editor")
        .notNull()
        .references(() => editors.id),
    lastUsed: timestamp("last_used", { withTimezone: true }),
});

export const edits = pgTable("edit", {
    id: serial("id").primaryKey(),
    editorId: integer("editor")
        .notNull()
        .references(() => editors.id),
    type: smallint("type").notNull(),
    status: smallint("status").notNull(),
    data: jsonb("data").$type<Record<string, unknown>>().notNull(),
    autoedit: smallint("autoedit").notNull().default(0),
    openTime: timestamp("open_time", { withTimezone: true })
        .notNull()
        .defaultNow(),
});

export const editNotes = pgTable("edit_note", {
    id: serial("id").primaryKey(),
    editorId: integer("editor")
        .notNull()
        .references(() => editors.id),
    editId: integer("edit")
        .notNull()
        .references(() => edits.id),
    text: text("text").notNull(),
    postTime: timestamp("post_time", { withTimezone: true }).defaultNow(),
});

export const artistCreditsRelations = relations(artistCredits, ({ many }) => ({
    names: many(artistCreditNames),
}));

export const artistCreditNamesRelations = relations(
    artistCreditNames,
    ({ one }) => ({
        artistCredit: one(artistCredits, {
            fields: [artistCreditNames.artistCreditId],
            references: [artistCredits.id],
        }),
        artist: one(artists, {
            fields: [artistCreditNames.artistId],
            references: [artists.id],
        }),
    })
);

export const recordingsRelations = relations(recordings, ({ one }) => ({
    artistCredit: one(artistCredits, {
        fields: [recordings.artistCreditId],
        references: [artistCredits.id],
    }),
}));

export const releasesRelations = relations(releases, ({ one, many }) => ({
    artistCredit: one(artistCredits, {
        fields: [releases.artistCreditId],
        references: [artistCredits.id],
    }),
    status: one(releaseStatuses, {
        fields: [releases.statusId],
        references: [releaseStatuses.id],
    }),
    mediums: many(mediums),
}));

export const mediumsRelations = relations(mediums, ({ one, many }) => ({
    release: one(releases, {
        fields: [mediums.releaseId],
        references: [releases.id],
    }),
    format: one(mediumFormats, {
        fields: [mediums.formatId],
        references: [mediumFormats.id],
    }),
    tracks: many(tracks),
}));

export const tracksRelations = relations(tracks, ({ one }) => ({
    medium: one(mediums, {
        fields: [tracks.mediumId],
        references: [mediums.id],
    }),
    recording: one(recordings, {
        fields: [tracks.recordingId],
        references: [recordings.id],
    }),
}));

export const apiKeysRelations = relations(apiKeys, ({ one }) => ({
    editor: one(editors, {
        fields: [apiKeys.editorId],
        references: [editors.id],
    }),
}));
