import { SoundEventPrediction } from "../../data/predictions.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { SoundEventPredictionRecord } from "../schema.js";
import type { SoundEventAdapter } from "./sound-event.js";
import type { TagAdapter } from "./tag.js";
import { predictedTagsFromRecord, predictedTagsToRecord } from "./predicted-tag.js";

export class SoundEventPredictionAdapter extends UuidIdentityStore<
  SoundEventPrediction,
  SoundEventPredictionRecord
> {
  readonly entityName = "SoundEventPrediction";

  constructor(
    private readonly soundEvents: SoundEventAdapter,
    private readonly tags: TagAdapter
  ) {
    super();
  }

  protected assembleRecord(prediction: SoundEventPrediction): SoundEventPredictionRecord {
    return {
      uuid: prediction.uuid,
      sound_event: this.soundEvents.toRecord(prediction.soundEvent).uuid,
      score: prediction.score,
      tags: predictedTagsToRecord(this.tags, prediction.tags),
    };
  }

  protected assembleDomain(record: SoundEventPredictionRecord): SoundEventPrediction {
    const referencedBy = `SoundEventPrediction ${record.uuid}`;

    return new SoundEventPrediction({
      uuid: record.uuid,
      soundEvent: this.soundEvents.resolve(record.sound_event, referencedBy),
      score: record.score,
      tags: predictedTagsFromRecord(this.tags, record.tags, referencedBy),
    });
  }
}
