import { isAbsolute, join, relative } from "node:path";
import { Recording } from "../../data/entities.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { RecordingRecord } from "../schema.js";
import type { NoteAdapter } from "./note.js";
import type { TagAdapter } from "./tag.js";
import type { UserAdapter } from "./user.js";
import { featuresFromRecord, featuresToRecord, nonEmpty } from "./fields.js";

/**
 * Recordings reference tags and owners by id and embed their notes.
 *
 * When an audio directory is given, paths are stored relative to it on save
 * and resolved against it on load. Paths outside the directory are stored
 * as given.
 */
export class RecordingAdapter extends UuidIdentityStore<Recording, RecordingRecord> {
  readonly entityName = "Recording";

  constructor(
    private readonly users: UserAdapter,
    private readonly tags: TagAdapter,
    private readonly notes: NoteAdapter,
    private readonly audioDir?: string
  ) {
    super();
  }

  protected assembleRecord(recording: Recording): RecordingRecord {
    return {
      uuid: recording.uuid,
      path: this.storedPath(recording.path),
      duration: recording.duration,
      channels: recording.channels,
      samplerate: recording.samplerate,
      time_expansion: recording.timeExpansion !== 1 ? recording.timeExpansion : undefined,
      hash: recording.hash,
      date: recording.date,
      time: recording.time,
      latitude: recording.latitude,
      longitude: recording.longitude,
      tags: nonEmpty(recording.tags.map((tag) => this.tags.toRecord(tag).id)),
      features: featuresToRecord(recording.features),
      notes: nonEmpty(recording.notes.map((note) => this.notes.toRecord(note))),
      owners: nonEmpty(recording.owners.map((owner) => this.users.toRecord(owner).id)),
      rights: recording.rights,
    };
  }

  protected assembleDomain(record: RecordingRecord): Recording {
    const referencedBy = `Recording ${record.uuid}`;

    return new Recording({
      uuid: record.uuid,
      path: this.resolvedPath(record.path),
      duration: record.duration,
      channels: record.channels,
      samplerate: record.samplerate,
      timeExpansion: record.time_expansion ?? 1,
      hash: record.hash,
      date: record.date,
      time: record.time,
      latitude: record.latitude,
      longitude: record.longitude,
      tags: (record.tags ?? []).map((id) => this.tags.resolve(id, referencedBy)),
      features: featuresFromRecord(record.features),
      notes: (record.notes ?? []).map((note) => this.notes.toDomain(note)),
      owners: (record.owners ?? []).map((id) => this.users.resolve(id, referencedBy)),
      rights: record.rights,
    });
  }

  private storedPath(path: string): string {
    if (this.audioDir === undefined) {
      return path;
    }
    const rel = relative(this.audioDir, path);
    if (rel.startsWith("..") || isAbsolute(rel)) {
      return path;
    }
    return rel;
  }

  private resolvedPath(path: string): string {
    if (this.audioDir === undefined || isAbsolute(path)) {
      return path;
    }
    return join(this.audioDir, path);
  }
}
