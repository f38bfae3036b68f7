import { SequenceAnnotation } from "../../data/annotations.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { SequenceAnnotationRecord } from "../schema.js";
import type { NoteAdapter } from "./note.js";
import type { SequenceAdapter } from "./sequence.js";
import type { TagAdapter } from "./tag.js";
import type { UserAdapter } from "./user.js";
import { fromTimestamp, nonEmpty, toTimestamp } from "./fields.js";

export class SequenceAnnotationAdapter extends UuidIdentityStore<
  SequenceAnnotation,
  SequenceAnnotationRecord
> {
  readonly entityName = "SequenceAnnotation";

  constructor(
    private readonly users: UserAdapter,
    private readonly tags: TagAdapter,
    private readonly notes: NoteAdapter,
    private readonly sequences: SequenceAdapter
  ) {
    super();
  }

  protected assembleRecord(annotation: SequenceAnnotation): SequenceAnnotationRecord {
    return {
      uuid: annotation.uuid,
      sequence: this.sequences.toRecord(annotation.sequence).uuid,
      tags: nonEmpty(annotation.tags.map((tag) => this.tags.toRecord(tag).id)),
      notes: nonEmpty(annotation.notes.map((note) => this.notes.toRecord(note))),
      created_by:
        annotation.createdBy !== undefined ? this.users.toRecord(annotation.createdBy).id : undefined,
      created_on: toTimestamp(annotation.createdOn),
    };
  }

  protected assembleDomain(record: SequenceAnnotationRecord): SequenceAnnotation {
    const referencedBy = `SequenceAnnotation ${record.uuid}`;

    return new SequenceAnnotation({
      uuid: record.uuid,
      sequence: this.sequences.resolve(record.sequence, referencedBy),
      tags: (record.tags ?? []).map((id) => this.tags.resolve(id, referencedBy)),
      notes: (record.notes ?? []).map((note) => this.notes.toDomain(note)),
      createdBy:
        record.created_by !== undefined
          ? this.users.resolve(record.created_by, referencedBy)
          : undefined,
      createdOn: fromTimestamp(record.created_on),
    });
  }
}
