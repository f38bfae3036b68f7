import { ClipAnnotation } from "../../data/annotations.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { ClipAnnotationRecord } from "../schema.js";
import type { ClipAdapter } from "./clip.js";
import type { NoteAdapter } from "./note.js";
import type { SequenceAnnotationAdapter } from "./sequence-annotation.js";
import type { SoundEventAnnotationAdapter } from "./sound-event-annotation.js";
import type { TagAdapter } from "./tag.js";
import { fromTimestamp, nonEmpty, toTimestamp } from "./fields.js";

/**
 * Clip-level aggregate: the clip plus every sound event and sequence
 * annotated on it.
 */
export class ClipAnnotationAdapter extends UuidIdentityStore<ClipAnnotation, ClipAnnotationRecord> {
  readonly entityName = "ClipAnnotation";

  constructor(
    private readonly clips: ClipAdapter,
    private readonly tags: TagAdapter,
    private readonly notes: NoteAdapter,
    private readonly soundEventAnnotations: SoundEventAnnotationAdapter,
    private readonly sequenceAnnotations: SequenceAnnotationAdapter
  ) {
    super();
  }

  protected assembleRecord(annotation: ClipAnnotation): ClipAnnotationRecord {
    return {
      uuid: annotation.uuid,
      clip: this.clips.toRecord(annotation.clip).uuid,
      sound_events: nonEmpty(
        annotation.soundEvents.map((item) => this.soundEventAnnotations.toRecord(item).uuid)
      ),
      sequences: nonEmpty(
        annotation.sequences.map((item) => this.sequenceAnnotations.toRecord(item).uuid)
      ),
      tags: nonEmpty(annotation.tags.map((tag) => this.tags.toRecord(tag).id)),
      notes: nonEmpty(annotation.notes.map((note) => this.notes.toRecord(note))),
      created_on: toTimestamp(annotation.createdOn),
    };
  }

  protected assembleDomain(record: ClipAnnotationRecord): ClipAnnotation {
    const referencedBy = `ClipAnnotation ${record.uuid}`;

    return new ClipAnnotation({
      uuid: record.uuid,
      clip: this.clips.resolve(record.clip, referencedBy),
      soundEvents: (record.sound_events ?? []).map((id) =>
        this.soundEventAnnotations.resolve(id, referencedBy)
      ),
      sequences: (record.sequences ?? []).map((id) =>
        this.sequenceAnnotations.resolve(id, referencedBy)
      ),
      tags: (record.tags ?? []).map((id) => this.tags.resolve(id, referencedBy)),
      notes: (record.notes ?? []).map((note) => this.notes.toDomain(note)),
      createdOn: fromTimestamp(record.created_on),
    });
  }
}
