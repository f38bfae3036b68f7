import { SequencePrediction } from "../../data/predictions.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { SequencePredictionRecord } from "../schema.js";
import type { SequenceAdapter } from "./sequence.js";
import type { TagAdapter } from "./tag.js";
import { predictedTagsFromRecord, predictedTagsToRecord } from "./predicted-tag.js";

export class SequencePredictionAdapter extends UuidIdentityStore<
  SequencePrediction,
  SequencePredictionRecord
> {
  readonly entityName = "SequencePrediction";

  constructor(
    private readonly sequences: SequenceAdapter,
    private readonly tags: TagAdapter
  ) {
    super();
  }

  protected assembleRecord(prediction: SequencePrediction): SequencePredictionRecord {
    return {
      uuid: prediction.uuid,
      sequence: this.sequences.toRecord(prediction.sequence).uuid,
      score: prediction.score,
      tags: predictedTagsToRecord(this.tags, prediction.tags),
    };
  }

  protected assembleDomain(record: SequencePredictionRecord): SequencePrediction {
    const referencedBy = `SequencePrediction ${record.uuid}`;

    return new SequencePrediction({
      uuid: record.uuid,
      sequence: this.sequences.resolve(record.sequence, referencedBy),
      score: record.score,
      tags: predictedTagsFromRecord(this.tags, record.tags, referencedBy),
    });
  }
}
