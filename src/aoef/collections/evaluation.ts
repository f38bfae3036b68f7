import { Evaluation } from "../../data/collections.js";
import { featuresFromRecord, featuresToRecord, fromTimestamp, nonEmpty, toTimestamp } from "../adapters/fields.js";
import {
  exportAnnotationLists,
  exportEntityLists,
  exportPredictionLists,
  importClipAnnotations,
  importClipPredictions,
  importEntityLists,
  importEventAnnotations,
  importEventPredictions,
} from "./lists.js";
import type { CollectionAdapter } from "./types.js";

/**
 * An evaluation carries both sides of every comparison, so its document
 * holds the annotation lists, the prediction lists, the matches and the
 * clip evaluations that tie them together.
 */
export const evaluationAdapter: CollectionAdapter<"evaluation", Evaluation> = {
  collectionType: "evaluation",

  toObject(evaluation, tree) {
    for (const clipEvaluation of evaluation.clipEvaluations) {
      tree.clipEvaluations.toRecord(clipEvaluation);
    }

    return {
      collection_type: "evaluation",
      uuid: evaluation.uuid,
      created_on: toTimestamp(evaluation.createdOn),
      evaluation_task: evaluation.evaluationTask,
      ...exportEntityLists(tree),
      ...exportAnnotationLists(tree),
      ...exportPredictionLists(tree),
      matches: nonEmpty(tree.matches.values()),
      clip_evaluations: nonEmpty(tree.clipEvaluations.values()),
      metrics: featuresToRecord(evaluation.metrics),
      score: evaluation.score,
    };
  },

  fromObject(object, tree) {
    importEntityLists(tree, object);
    importEventAnnotations(tree, object);
    importEventPredictions(tree, object);
    importClipAnnotations(tree, object);
    importClipPredictions(tree, object);
    for (const record of object.matches ?? []) {
      tree.matches.toDomain(record);
    }

    return new Evaluation({
      uuid: object.uuid,
      evaluationTask: object.evaluation_task,
      clipEvaluations: (object.clip_evaluations ?? []).map((record) =>
        tree.clipEvaluations.toDomain(record)
      ),
      metrics: featuresFromRecord(object.metrics),
      score: object.score,
      createdOn: fromTimestamp(object.created_on),
    });
  },
};
