import { SoundEvent } from "../../data/entities.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { SoundEventRecord } from "../schema.js";
import type { RecordingAdapter } from "./recording.js";
import { featuresFromRecord, featuresToRecord } from "./fields.js";

export class SoundEventAdapter extends UuidIdentityStore<SoundEvent, SoundEventRecord> {
  readonly entityName = "SoundEvent";

  constructor(private readonly recordings: RecordingAdapter) {
    super();
  }

  protected assembleRecord(soundEvent: SoundEvent): SoundEventRecord {
    return {
      uuid: soundEvent.uuid,
      recording: this.recordings.toRecord(soundEvent.recording).uuid,
      geometry: soundEvent.geometry,
      features: featuresToRecord(soundEvent.features),
    };
  }

  protected assembleDomain(record: SoundEventRecord): SoundEvent {
    return new SoundEvent({
      uuid: record.uuid,
      recording: this.recordings.resolve(record.recording, `SoundEvent ${record.uuid}`),
      geometry: record.geometry,
      features: featuresFromRecord(record.features),
    });
  }
}
