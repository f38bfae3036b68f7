import { ClipEvaluation } from "../../data/evaluations.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { ClipEvaluationRecord } from "../schema.js";
import type { ClipAnnotationAdapter } from "./clip-annotation.js";
import type { ClipPredictionAdapter } from "./clip-prediction.js";
import type { MatchAdapter } from "./match.js";
import { featuresFromRecord, featuresToRecord, nonEmpty } from "./fields.js";

/**
 * Pairs the annotations and predictions of one clip with their matches.
 */
export class ClipEvaluationAdapter extends UuidIdentityStore<ClipEvaluation, ClipEvaluationRecord> {
  readonly entityName = "ClipEvaluation";

  constructor(
    private readonly clipAnnotations: ClipAnnotationAdapter,
    private readonly clipPredictions: ClipPredictionAdapter,
    private readonly matches: MatchAdapter
  ) {
    super();
  }

  protected assembleRecord(evaluation: ClipEvaluation): ClipEvaluationRecord {
    return {
      uuid: evaluation.uuid,
      annotations: this.clipAnnotations.toRecord(evaluation.annotations).uuid,
      predictions: this.clipPredictions.toRecord(evaluation.predictions).uuid,
      matches: nonEmpty(evaluation.matches.map((match) => this.matches.toRecord(match).uuid)),
      metrics: featuresToRecord(evaluation.metrics),
      score: evaluation.score,
    };
  }

  protected assembleDomain(record: ClipEvaluationRecord): ClipEvaluation {
    const referencedBy = `ClipEvaluation ${record.uuid}`;

    return new ClipEvaluation({
      uuid: record.uuid,
      annotations: this.clipAnnotations.resolve(record.annotations, referencedBy),
      predictions: this.clipPredictions.resolve(record.predictions, referencedBy),
      matches: (record.matches ?? []).map((id) => this.matches.resolve(id, referencedBy)),
      metrics: featuresFromRecord(record.metrics),
      score: record.score,
    });
  }
}
