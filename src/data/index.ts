/**
 * Acoustic domain model.
 */

export { GEOMETRY_TYPES, GeometrySchema, GeometryType, type Geometry } from "./geometry.js";

export {
  Tag,
  Feature,
  User,
  Note,
  Recording,
  Clip,
  SoundEvent,
  Sequence,
  type UserInit,
  type NoteInit,
  type RecordingInit,
  type ClipInit,
  type SoundEventInit,
  type SequenceInit,
} from "./entities.js";

export {
  SoundEventAnnotation,
  SequenceAnnotation,
  ClipAnnotation,
  StatusBadge,
  AnnotationTask,
  ANNOTATION_STATES,
  type AnnotationState,
  type SoundEventAnnotationInit,
  type SequenceAnnotationInit,
  type ClipAnnotationInit,
  type AnnotationTaskInit,
} from "./annotations.js";

export {
  PredictedTag,
  SoundEventPrediction,
  SequencePrediction,
  ClipPrediction,
  type SoundEventPredictionInit,
  type SequencePredictionInit,
  type ClipPredictionInit,
} from "./predictions.js";

export {
  Match,
  ClipEvaluation,
  type MatchInit,
  type ClipEvaluationInit,
} from "./evaluations.js";

export {
  RecordingSet,
  Dataset,
  AnnotationSet,
  AnnotationProject,
  EvaluationSet,
  PredictionSet,
  ModelRun,
  Evaluation,
  type DataCollection,
  type RecordingSetInit,
  type DatasetInit,
  type AnnotationSetInit,
  type AnnotationProjectInit,
  type EvaluationSetInit,
  type PredictionSetInit,
  type ModelRunInit,
  type EvaluationInit,
} from "./collections.js";
