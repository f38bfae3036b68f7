import { Note } from "../../data/entities.js";
import type { NoteRecord } from "../schema.js";
import type { UserAdapter } from "./user.js";
import { fromTimestamp, toTimestamp } from "./fields.js";

/**
 * Notes are value objects embedded in the record that owns them, so this
 * adapter converts without caching. Only the author is shared.
 */
export class NoteAdapter {
  constructor(private readonly users: UserAdapter) {}

  toRecord(note: Note): NoteRecord {
    return {
      uuid: note.uuid,
      message: note.message,
      created_by: note.createdBy !== undefined ? this.users.toRecord(note.createdBy).id : undefined,
      is_issue: note.isIssue,
      created_on: toTimestamp(note.createdOn),
    };
  }

  toDomain(record: NoteRecord): Note {
    return new Note({
      uuid: record.uuid,
      message: record.message,
      createdBy:
        record.created_by !== undefined
          ? this.users.resolve(record.created_by, `Note ${record.uuid}`)
          : undefined,
      isIssue: record.is_issue,
      createdOn: fromTimestamp(record.created_on),
    });
  }
}
