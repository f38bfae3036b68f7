import { Clip } from "../../data/entities.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { ClipRecord } from "../schema.js";
import type { RecordingAdapter } from "./recording.js";
import { featuresFromRecord, featuresToRecord } from "./fields.js";

export class ClipAdapter extends UuidIdentityStore<Clip, ClipRecord> {
  readonly entityName = "Clip";

  constructor(private readonly recordings: RecordingAdapter) {
    super();
  }

  protected assembleRecord(clip: Clip): ClipRecord {
    return {
      uuid: clip.uuid,
      recording: this.recordings.toRecord(clip.recording).uuid,
      start_time: clip.startTime,
      end_time: clip.endTime,
      features: featuresToRecord(clip.features),
    };
  }

  protected assembleDomain(record: ClipRecord): Clip {
    return new Clip({
      uuid: record.uuid,
      recording: this.recordings.resolve(record.recording, `Clip ${record.uuid}`),
      startTime: record.start_time,
      endTime: record.end_time,
      features: featuresFromRecord(record.features),
    });
  }
}
