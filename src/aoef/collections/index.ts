export type { CollectionAdapter } from "./types.js";
export { recordingSetAdapter, datasetAdapter } from "./recording-set.js";
export { annotationSetAdapter, annotationProjectAdapter, evaluationSetAdapter } from "./annotation-set.js";
export { predictionSetAdapter, modelRunAdapter } from "./prediction-set.js";
export { evaluationAdapter } from "./evaluation.js";
export {
  COLLECTION_ADAPTERS,
  adapterForCollection,
  adapterForType,
  isCollectionOf,
  isCollectionType,
  type RegisteredCollection,
} from "./registry.js";
