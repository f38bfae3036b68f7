/**
 * Acoustic Objects Exchange Format engine.
 */

export {
  AOEF_VERSION,
  COLLECTION_TYPES,
  CollectionType,
  AoefDocumentSchema,
  CollectionObjectSchema,
  EnvelopeHeaderSchema,
  type AoefDocument,
  type CollectionObject,
  type CollectionObjectOf,
  type EnvelopeHeader,
  type TagRecord,
  type UserRecord,
  type NoteRecord,
  type RecordingRecord,
  type ClipRecord,
  type SoundEventRecord,
  type SequenceRecord,
  type SoundEventAnnotationRecord,
  type SequenceAnnotationRecord,
  type ClipAnnotationRecord,
  type AnnotationTaskRecord,
  type StatusBadgeRecord,
  type SoundEventPredictionRecord,
  type SequencePredictionRecord,
  type ClipPredictionRecord,
  type MatchRecord,
  type ClipEvaluationRecord,
} from "./schema.js";

export {
  AoefError,
  MissingReferenceError,
  UnsupportedTypeError,
  CollectionTypeMismatchError,
  VersionMismatchError,
  MalformedDocumentError,
  CyclicReferenceError,
  DocumentNotFoundError,
  type DocumentIssue,
} from "./errors.js";

export { IdentityStore, UuidIdentityStore, IndexedIdentityStore, type RecordId } from "./identity-store.js";
export { buildAdapterTree, type AdapterTree, type AdapterTreeOptions } from "./builder.js";
export * from "./adapters/index.js";
export {
  COLLECTION_ADAPTERS,
  adapterForCollection,
  adapterForType,
  isCollectionType,
  type CollectionAdapter,
  type RegisteredCollection,
} from "./collections/index.js";

export {
  toDocument,
  fromDocument,
  serializeDocument,
  deserializeDocument,
  parseDocument,
  validateDocument,
  save,
  load,
  loadRecordingSet,
  loadDataset,
  loadAnnotationSet,
  loadAnnotationProject,
  loadEvaluationSet,
  loadPredictionSet,
  loadModelRun,
  loadEvaluation,
  summarizeDocument,
  formatDocumentSummary,
  type DocumentSummary,
  type ExportOptions,
  type SaveOptions,
  type LoadOptions,
  type ParseResult,
} from "./serialization.js";
