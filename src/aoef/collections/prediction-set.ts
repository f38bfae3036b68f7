import { ModelRun, PredictionSet, type PredictionSetInit } from "../../data/collections.js";
import type { AdapterTree } from "../builder.js";
import { fromTimestamp, toTimestamp } from "../adapters/fields.js";
import type { PredictionSetObject } from "../schema.js";
import {
  exportEntityLists,
  exportPredictionLists,
  importClipPredictions,
  importEntityLists,
  importEventPredictions,
} from "./lists.js";
import type { CollectionAdapter } from "./types.js";

type PredictionSetFields = Omit<PredictionSetObject, "collection_type">;

function exportPredictionSet(set: PredictionSet, tree: AdapterTree): PredictionSetFields {
  for (const prediction of set.clipPredictions) {
    tree.clipPredictions.toRecord(prediction);
  }

  return {
    uuid: set.uuid,
    created_on: toTimestamp(set.createdOn),
    ...exportEntityLists(tree),
    ...exportPredictionLists(tree),
  };
}

function importPredictionSet(object: PredictionSetFields, tree: AdapterTree): PredictionSetInit {
  importEntityLists(tree, object);
  importEventPredictions(tree, object);

  return {
    uuid: object.uuid,
    clipPredictions: importClipPredictions(tree, object),
    createdOn: fromTimestamp(object.created_on),
  };
}

export const predictionSetAdapter: CollectionAdapter<"prediction_set", PredictionSet> = {
  collectionType: "prediction_set",

  toObject(set, tree) {
    return { collection_type: "prediction_set", ...exportPredictionSet(set, tree) };
  },

  fromObject(object, tree) {
    return new PredictionSet(importPredictionSet(object, tree));
  },
};

export const modelRunAdapter: CollectionAdapter<"model_run", ModelRun> = {
  collectionType: "model_run",

  toObject(run, tree) {
    return {
      collection_type: "model_run",
      ...exportPredictionSet(run, tree),
      name: run.name,
      version: run.version,
      description: run.description,
    };
  },

  fromObject(object, tree) {
    return new ModelRun({
      ...importPredictionSet(object, tree),
      name: object.name,
      version: object.version,
      description: object.description,
    });
  },
};
