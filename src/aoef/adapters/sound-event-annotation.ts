import { SoundEventAnnotation } from "../../data/annotations.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { SoundEventAnnotationRecord } from "../schema.js";
import type { NoteAdapter } from "./note.js";
import type { SoundEventAdapter } from "./sound-event.js";
import type { TagAdapter } from "./tag.js";
import type { UserAdapter } from "./user.js";
import { fromTimestamp, nonEmpty, toTimestamp } from "./fields.js";

export class SoundEventAnnotationAdapter extends UuidIdentityStore<
  SoundEventAnnotation,
  SoundEventAnnotationRecord
> {
  readonly entityName = "SoundEventAnnotation";

  constructor(
    private readonly users: UserAdapter,
    private readonly tags: TagAdapter,
    private readonly notes: NoteAdapter,
    private readonly soundEvents: SoundEventAdapter
  ) {
    super();
  }

  protected assembleRecord(annotation: SoundEventAnnotation): SoundEventAnnotationRecord {
    return {
      uuid: annotation.uuid,
      sound_event: this.soundEvents.toRecord(annotation.soundEvent).uuid,
      tags: nonEmpty(annotation.tags.map((tag) => this.tags.toRecord(tag).id)),
      notes: nonEmpty(annotation.notes.map((note) => this.notes.toRecord(note))),
      created_by:
        annotation.createdBy !== undefined ? this.users.toRecord(annotation.createdBy).id : undefined,
      created_on: toTimestamp(annotation.createdOn),
    };
  }

  protected assembleDomain(record: SoundEventAnnotationRecord): SoundEventAnnotation {
    const referencedBy = `SoundEventAnnotation ${record.uuid}`;

    return new SoundEventAnnotation({
      uuid: record.uuid,
      soundEvent: this.soundEvents.resolve(record.sound_event, referencedBy),
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
