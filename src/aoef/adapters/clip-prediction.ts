import { ClipPrediction } from "../../data/predictions.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { ClipPredictionRecord } from "../schema.js";
import type { ClipAdapter } from "./clip.js";
import type { SequencePredictionAdapter } from "./sequence-prediction.js";
import type { SoundEventPredictionAdapter } from "./sound-event-prediction.js";
import type { TagAdapter } from "./tag.js";
import { featuresFromRecord, featuresToRecord, nonEmpty } from "./fields.js";
import { predictedTagsFromRecord, predictedTagsToRecord } from "./predicted-tag.js";

/**
 * Clip-level aggregate of everything a model predicted on one clip.
 */
export class ClipPredictionAdapter extends UuidIdentityStore<ClipPrediction, ClipPredictionRecord> {
  readonly entityName = "ClipPrediction";

  constructor(
    private readonly clips: ClipAdapter,
    private readonly soundEventPredictions: SoundEventPredictionAdapter,
    private readonly sequencePredictions: SequencePredictionAdapter,
    private readonly tags: TagAdapter
  ) {
    super();
  }

  protected assembleRecord(prediction: ClipPrediction): ClipPredictionRecord {
    return {
      uuid: prediction.uuid,
      clip: this.clips.toRecord(prediction.clip).uuid,
      sound_events: nonEmpty(
        prediction.soundEvents.map((item) => this.soundEventPredictions.toRecord(item).uuid)
      ),
      sequences: nonEmpty(
        prediction.sequences.map((item) => this.sequencePredictions.toRecord(item).uuid)
      ),
      tags: predictedTagsToRecord(this.tags, prediction.tags),
      features: featuresToRecord(prediction.features),
    };
  }

  protected assembleDomain(record: ClipPredictionRecord): ClipPrediction {
    const referencedBy = `ClipPrediction ${record.uuid}`;

    return new ClipPrediction({
      uuid: record.uuid,
      clip: this.clips.resolve(record.clip, referencedBy),
      soundEvents: (record.sound_events ?? []).map((id) =>
        this.soundEventPredictions.resolve(id, referencedBy)
      ),
      sequences: (record.sequences ?? []).map((id) =>
        this.sequencePredictions.resolve(id, referencedBy)
      ),
      tags: predictedTagsFromRecord(this.tags, record.tags, referencedBy),
      features: featuresFromRecord(record.features),
    });
  }
}
