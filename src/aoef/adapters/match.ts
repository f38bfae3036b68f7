import { Match } from "../../data/evaluations.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { MatchRecord } from "../schema.js";
import type { SoundEventAnnotationAdapter } from "./sound-event-annotation.js";
import type { SoundEventPredictionAdapter } from "./sound-event-prediction.js";
import { featuresFromRecord, featuresToRecord } from "./fields.js";

/**
 * Matches are keyed on the (source, target) pair rather than their own
 * uuid: two matches pairing the same prediction with the same annotation
 * share one record.
 */
export class MatchAdapter extends UuidIdentityStore<Match, MatchRecord> {
  readonly entityName = "Match";

  constructor(
    private readonly soundEventAnnotations: SoundEventAnnotationAdapter,
    private readonly soundEventPredictions: SoundEventPredictionAdapter
  ) {
    super();
  }

  protected keyOf(match: Match): string {
    return JSON.stringify([match.source?.uuid ?? null, match.target?.uuid ?? null]);
  }

  protected assembleRecord(match: Match): MatchRecord {
    return {
      uuid: match.uuid,
      source:
        match.source !== undefined ? this.soundEventPredictions.toRecord(match.source).uuid : undefined,
      target:
        match.target !== undefined ? this.soundEventAnnotations.toRecord(match.target).uuid : undefined,
      affinity: match.affinity,
      score: match.score,
      metrics: featuresToRecord(match.metrics),
    };
  }

  protected assembleDomain(record: MatchRecord): Match {
    const referencedBy = `Match ${record.uuid}`;

    return new Match({
      uuid: record.uuid,
      source:
        record.source !== undefined
          ? this.soundEventPredictions.resolve(record.source, referencedBy)
          : undefined,
      target:
        record.target !== undefined
          ? this.soundEventAnnotations.resolve(record.target, referencedBy)
          : undefined,
      affinity: record.affinity,
      score: record.score,
      metrics: featuresFromRecord(record.metrics),
    });
  }
}
