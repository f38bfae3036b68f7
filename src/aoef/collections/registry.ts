/**
 * Collection dispatch.
 *
 * Several collection classes extend another (Dataset extends RecordingSet,
 * and so on), so an export matches the runtime class against the adapters
 * in COLLECTION_TYPES order, which lists every subclass before its base.
 * Import looks the adapter up by the document's collection_type.
 */

import {
  AnnotationProject,
  AnnotationSet,
  Dataset,
  Evaluation,
  EvaluationSet,
  ModelRun,
  PredictionSet,
  RecordingSet,
  type DataCollection,
} from "../../data/collections.js";
import type { AdapterTree } from "../builder.js";
import { CollectionTypeMismatchError, UnsupportedTypeError } from "../errors.js";
import {
  COLLECTION_TYPES,
  CollectionType,
  type CollectionObject,
  type CollectionObjectOf,
} from "../schema.js";
import { annotationProjectAdapter, annotationSetAdapter, evaluationSetAdapter } from "./annotation-set.js";
import { evaluationAdapter } from "./evaluation.js";
import { modelRunAdapter, predictionSetAdapter } from "./prediction-set.js";
import { datasetAdapter, recordingSetAdapter } from "./recording-set.js";
import type { CollectionAdapter } from "./types.js";

/**
 * A collection adapter paired with the class it handles, with the types
 * erased so that entries can share one list.
 */
export interface RegisteredCollection {
  readonly collectionType: CollectionType;
  handles(collection: DataCollection): boolean;
  toObject(collection: DataCollection, tree: AdapterTree): CollectionObject;
  fromObject(object: CollectionObject, tree: AdapterTree): DataCollection;
}

export function isCollectionType(value: string): value is CollectionType {
  return CollectionType.safeParse(value).success;
}

export function isCollectionOf<T extends CollectionType>(
  object: CollectionObject,
  type: T
): object is CollectionObjectOf<T> {
  return object.collection_type === type;
}

function register<T extends CollectionType, C extends DataCollection>(
  collectionClass: new (...args: never[]) => C,
  adapter: CollectionAdapter<T, C>
): RegisteredCollection {
  return {
    collectionType: adapter.collectionType,

    handles(collection) {
      return collection instanceof collectionClass;
    },

    toObject(collection, tree) {
      if (!(collection instanceof collectionClass)) {
        throw new UnsupportedTypeError(collection.constructor.name);
      }
      return adapter.toObject(collection, tree);
    },

    fromObject(object, tree) {
      if (!isCollectionOf(object, adapter.collectionType)) {
        throw new CollectionTypeMismatchError(object.collection_type, adapter.collectionType);
      }
      return adapter.fromObject(object, tree);
    },
  };
}

const REGISTRY = {
  evaluation: register(Evaluation, evaluationAdapter),
  dataset: register(Dataset, datasetAdapter),
  annotation_project: register(AnnotationProject, annotationProjectAdapter),
  evaluation_set: register(EvaluationSet, evaluationSetAdapter),
  model_run: register(ModelRun, modelRunAdapter),
  annotation_set: register(AnnotationSet, annotationSetAdapter),
  prediction_set: register(PredictionSet, predictionSetAdapter),
  recording_set: register(RecordingSet, recordingSetAdapter),
} satisfies Record<CollectionType, RegisteredCollection>;

/**
 * Registered adapters, most specific first.
 */
export const COLLECTION_ADAPTERS: readonly RegisteredCollection[] = COLLECTION_TYPES.map(
  (type) => REGISTRY[type]
);

/**
 * Find the adapter for an in-memory collection.
 *
 * @throws UnsupportedTypeError if no adapter handles the object's class
 */
export function adapterForCollection(collection: DataCollection): RegisteredCollection {
  const entry = COLLECTION_ADAPTERS.find((candidate) => candidate.handles(collection));
  if (entry === undefined) {
    throw new UnsupportedTypeError(collection.constructor.name);
  }
  return entry;
}

/**
 * Find the adapter for a document's collection_type.
 *
 * @throws UnsupportedTypeError if the type is not registered
 */
export function adapterForType(type: string): RegisteredCollection {
  if (!isCollectionType(type)) {
    throw new UnsupportedTypeError(type);
  }
  return REGISTRY[type];
}
