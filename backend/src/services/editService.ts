import {
    EDIT_STATUS,
    type EditStatus,
    type EditT,
    type EditType,
} from "@discbase/entity-contract";
import { editNotes, edits } from "../db/schema";
import type { Database, DbTransaction } from "../utils/db";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import { logger } from "../utils/logger";

const log = logger.child("EditService");

export interface NewEdit {
    editorId: number;
    type: EditType;
    data: Record<string, unknown>;
    editNote?: string;
}

export interface CreatedEdit {
    id: number;
    type: EditType;
    status: EditStatus;
    editorId: number;
    openTime: Date;
}

export interface EditWriter {
    insertEdit(edit: Omit<NewEdit, "editNote">): Promise<CreatedEdit>;
    insertEditNote(note: { editId: number; editorId: number; text: string }): Promise<void>;
}

/** Runs `work` in one transaction: every write commits or none does. */
export interface EditUnitOfWork {
    run<T>(work: (writer: EditWriter) => Promise<T>): Promise<T>;
}

export class DrizzleEditWriter implements EditWriter {
    constructor(private readonly tx: DbTransaction) {}

    async insertEdit(edit: Omit<NewEdit, "editNote">): Promise<CreatedEdit> {
        const [row] = await this.tx
            .insert(edits)
            .values({
                editorId: edit.editorId,
                type: edit.type,
                status: EDIT_STATUS.OPEN,
                data: edit.data,
            })
            .returning({ id: edits.id, openTime: edits.openTime });

        if (!row) {
            throw new AppError(
                ErrorCode.EDIT_CREATION_FAILED,
                ErrorCategory.FATAL,
                "Edit insert returned no row",
                { type: edit.type }
            );
        }

        return {
            id: row.id,
            type: edit.type,
            status: EDIT_STATUS.OPEN,
            editorId: edit.editorId,
            openTime: row.openTime,
        };
    }

    async insertEditNote(note: {
        editId: number;
        editorId: number;
        text: string;
    }): Promise<void> {
        await this.tx.insert(editNotes).values(note);
    }
}

export class DrizzleEditUnitOfWork implements EditUnitOfWork {
    constructor(private readonly database: Database) {}

    run<T>(work: (writer: EditWriter) => Promise<T>): Promise<T> {
        return this.database.transaction((tx) => work(new DrizzleEditWriter(tx)));
    }
}

/** Inserts an edit and its optional note through the given writer. */
export async function insertEdit(
    writer: EditWriter,
    edit: NewEdit
): Promise<CreatedEdit> {
    const created = await writer.insertEdit({
        editorId: edit.editorId,
        type: edit.type,
        data: edit.data,
    });

    if (edit.editNote) {
        await writer.insertEditNote({
            editId: created.id,
            editorId: edit.editorId,
            text: edit.editNote,
        });
    }

    log.info(`Created edit #${created.id}`, {
        type: created.type,
        editorId: created.editorId,
    });
    return created;
}

export function toEditJson(edit: CreatedEdit): EditT {
    return {
        id: edit.id,
        type: edit.type,
        status: edit.status,
        editorId: edit.editorId,
        openTime: edit.openTime.toISOString(),
    };
}
