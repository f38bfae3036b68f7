import { Sequence } from "../../data/entities.js";
import { CyclicReferenceError } from "../errors.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { SequenceRecord } from "../schema.js";
import type { SoundEventAdapter } from "./sound-event.js";
import { featuresFromRecord, featuresToRecord } from "./fields.js";

/**
 * Sequences may nest under a parent sequence, so this adapter recurses
 * through itself. A parent's record is always completed, and listed, before
 * its child's.
 *
 * Parent chains must be acyclic. A cycle fails with CyclicReferenceError
 * on save and on load.
 */
export class SequenceAdapter extends UuidIdentityStore<Sequence, SequenceRecord> {
  readonly entityName = "Sequence";

  /** Records of the current load, by uuid, so parents can be loaded first */
  private readonly pending = new Map<string, SequenceRecord>();

  /** Uuids of the sequences currently being rebuilt, outermost first */
  private readonly loading: string[] = [];

  constructor(private readonly soundEvents: SoundEventAdapter) {
    super();
  }

  /**
   * Load a full list of sequence records, in any order.
   */
  toDomainAll(records: SequenceRecord[]): Sequence[] {
    for (const record of records) {
      this.pending.set(record.uuid, record);
    }
    try {
      return records.map((record) => this.toDomain(record));
    } finally {
      this.pending.clear();
    }
  }

  protected assembleRecord(sequence: Sequence): SequenceRecord {
    return {
      uuid: sequence.uuid,
      sound_events: sequence.soundEvents.map((event) => this.soundEvents.toRecord(event).uuid),
      features: featuresToRecord(sequence.features),
      parent: sequence.parent !== undefined ? this.toRecord(sequence.parent).uuid : undefined,
    };
  }

  protected assembleDomain(record: SequenceRecord): Sequence {
    const referencedBy = `Sequence ${record.uuid}`;

    this.loading.push(record.uuid);
    try {
      return new Sequence({
        uuid: record.uuid,
        soundEvents: record.sound_events.map((id) => this.soundEvents.resolve(id, referencedBy)),
        features: featuresFromRecord(record.features),
        parent: record.parent !== undefined ? this.loadParent(record.parent, referencedBy) : undefined,
      });
    } finally {
      this.loading.pop();
    }
  }

  private loadParent(parentId: string, referencedBy: string): Sequence {
    const loaded = this.fromId(parentId);
    if (loaded !== undefined) {
      return loaded;
    }

    const record = this.pending.get(parentId);
    if (record === undefined) {
      return this.resolve(parentId, referencedBy);
    }

    if (this.loading.includes(parentId)) {
      throw new CyclicReferenceError([...this.loading, parentId]);
    }

    return this.toDomain(record);
  }
}
