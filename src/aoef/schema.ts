/**
 * Acoustic Objects Exchange Format (AOEF) schema definitions.
 *
 * An AOEF document stores one collection as flat lists of records. Records
 * never embed each other: a clip record holds the uuid of its recording, an
 * annotation holds integer tag ids, and so on. Every referenced record is
 * present exactly once in the same document.
 *
 * Two id spaces are used:
 *
 * - Tags and users carry a small integer `id`, assigned in first-seen order.
 * - Every other record carries the `uuid` of the domain object.
 *
 * VERSIONING:
 * `AOEF_VERSION` is stamped on every saved document and loaders only accept
 * that exact string. There are no migrations.
 *
 * Field names are snake_case because they are part of the file format.
 */

import { z } from "zod";
import { GeometrySchema } from "../data/geometry.js";
import { ANNOTATION_STATES } from "../data/annotations.js";

/**
 * Format version written by this engine. Loading any other version fails.
 */
export const AOEF_VERSION = "1.1.0";

const Uuid = z.string().uuid();
const IntId = z.number().int().nonnegative();
/** ISO 8601, with or without a UTC offset */
const Timestamp = z.string().datetime({ offset: true, local: true });

/** Named numeric values, keyed by feature or metric name */
const FeatureMap = z.record(z.string(), z.number());

/** `[tag id, score]` pairs */
const PredictedTagList = z.array(z.tuple([IntId, z.number()]));

// ═══════════════════════════════════════════════════════════════════════════
// LEAF RECORDS
// ═══════════════════════════════════════════════════════════════════════════

export const TagRecordSchema = z.object({
  id: IntId,
  key: z.string(),
  value: z.string(),
});

export type TagRecord = z.infer<typeof TagRecordSchema>;

export const UserRecordSchema = z.object({
  id: IntId,
  uuid: Uuid,
  username: z.string().optional(),
  email: z.string().optional(),
  name: z.string().optional(),
  institution: z.string().optional(),
});

export type UserRecord = z.infer<typeof UserRecordSchema>;

/**
 * Notes are embedded in their owner rather than listed on their own.
 */
export const NoteRecordSchema = z.object({
  uuid: Uuid,
  message: z.string(),
  created_by: IntId.optional(),
  is_issue: z.boolean().default(false),
  created_on: Timestamp.optional(),
});

export type NoteRecord = z.infer<typeof NoteRecordSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// ENTITY RECORDS
// ═══════════════════════════════════════════════════════════════════════════

export const RecordingRecordSchema = z.object({
  uuid: Uuid,
  path: z.string(),
  duration: z.number(),
  channels: z.number().int(),
  samplerate: z.number().int(),
  /** Omitted when the recording is real-time (factor 1) */
  time_expansion: z.number().optional(),
  hash: z.string().optional(),
  date: z.string().optional(),
  time: z.string().optional(),
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  tags: z.array(IntId).optional(),
  features: FeatureMap.optional(),
  notes: z.array(NoteRecordSchema).optional(),
  owners: z.array(IntId).optional(),
  rights: z.string().optional(),
});

export type RecordingRecord = z.infer<typeof RecordingRecordSchema>;

export const ClipRecordSchema = z.object({
  uuid: Uuid,
  recording: Uuid,
  start_time: z.number(),
  end_time: z.number(),
  features: FeatureMap.optional(),
});

export type ClipRecord = z.infer<typeof ClipRecordSchema>;

export const SoundEventRecordSchema = z.object({
  uuid: Uuid,
  recording: Uuid,
  geometry: GeometrySchema.optional(),
  features: FeatureMap.optional(),
});

export type SoundEventRecord = z.infer<typeof SoundEventRecordSchema>;

export const SequenceRecordSchema = z.object({
  uuid: Uuid,
  sound_events: z.array(Uuid),
  features: FeatureMap.optional(),
  parent: Uuid.optional(),
});

export type SequenceRecord = z.infer<typeof SequenceRecordSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// ANNOTATION RECORDS
// ═══════════════════════════════════════════════════════════════════════════

export const SoundEventAnnotationRecordSchema = z.object({
  uuid: Uuid,
  sound_event: Uuid,
  tags: z.array(IntId).optional(),
  notes: z.array(NoteRecordSchema).optional(),
  created_by: IntId.optional(),
  created_on: Timestamp.optional(),
});

export type SoundEventAnnotationRecord = z.infer<typeof SoundEventAnnotationRecordSchema>;

export const SequenceAnnotationRecordSchema = z.object({
  uuid: Uuid,
  sequence: Uuid,
  tags: z.array(IntId).optional(),
  notes: z.array(NoteRecordSchema).optional(),
  created_by: IntId.optional(),
  created_on: Timestamp.optional(),
});

export type SequenceAnnotationRecord = z.infer<typeof SequenceAnnotationRecordSchema>;

export const ClipAnnotationRecordSchema = z.object({
  uuid: Uuid,
  clip: Uuid,
  sound_events: z.array(Uuid).optional(),
  sequences: z.array(Uuid).optional(),
  tags: z.array(IntId).optional(),
  notes: z.array(NoteRecordSchema).optional(),
  created_on: Timestamp.optional(),
});

export type ClipAnnotationRecord = z.infer<typeof ClipAnnotationRecordSchema>;

export const StatusBadgeRecordSchema = z.object({
  state: z.enum(ANNOTATION_STATES),
  owner: IntId.optional(),
  created_on: Timestamp.optional(),
});

export type StatusBadgeRecord = z.infer<typeof StatusBadgeRecordSchema>;

export const AnnotationTaskRecordSchema = z.object({
  uuid: Uuid,
  clip: Uuid,
  status_badges: z.array(StatusBadgeRecordSchema).optional(),
  created_on: Timestamp.optional(),
});

export type AnnotationTaskRecord = z.infer<typeof AnnotationTaskRecordSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// PREDICTION RECORDS
// ═══════════════════════════════════════════════════════════════════════════

export const SoundEventPredictionRecordSchema = z.object({
  uuid: Uuid,
  sound_event: Uuid,
  score: z.number(),
  tags: PredictedTagList.optional(),
});

export type SoundEventPredictionRecord = z.infer<typeof SoundEventPredictionRecordSchema>;

export const SequencePredictionRecordSchema = z.object({
  uuid: Uuid,
  sequence: Uuid,
  score: z.number(),
  tags: PredictedTagList.optional(),
});

export type SequencePredictionRecord = z.infer<typeof SequencePredictionRecordSchema>;

export const ClipPredictionRecordSchema = z.object({
  uuid: Uuid,
  clip: Uuid,
  sound_events: z.array(Uuid).optional(),
  sequences: z.array(Uuid).optional(),
  tags: PredictedTagList.optional(),
  features: FeatureMap.optional(),
});

export type ClipPredictionRecord = z.infer<typeof ClipPredictionRecordSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// EVALUATION RECORDS
// ═══════════════════════════════════════════════════════════════════════════

export const MatchRecordSchema = z.object({
  uuid: Uuid,
  /** Sound event prediction uuid */
  source: Uuid.optional(),
  /** Sound event annotation uuid */
  target: Uuid.optional(),
  affinity: z.number(),
  score: z.number().optional(),
  metrics: FeatureMap.optional(),
});

export type MatchRecord = z.infer<typeof MatchRecordSchema>;

export const ClipEvaluationRecordSchema = z.object({
  uuid: Uuid,
  annotations: Uuid,
  predictions: Uuid,
  matches: z.array(Uuid).optional(),
  metrics: FeatureMap.optional(),
  score: z.number().optional(),
});

export type ClipEvaluationRecord = z.infer<typeof ClipEvaluationRecordSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// COLLECTION RECORDS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Collection types in dispatch priority order: every subclass appears before
 * the collection it extends.
 */
export const COLLECTION_TYPES = [
  "evaluation",
  "dataset",
  "annotation_project",
  "evaluation_set",
  "model_run",
  "annotation_set",
  "prediction_set",
  "recording_set",
] as const;

export const CollectionType = z.enum(COLLECTION_TYPES);
export type CollectionType = z.infer<typeof CollectionType>;

const CollectionBase = {
  uuid: Uuid,
  created_on: Timestamp.optional(),
};

const RecordingSetFields = {
  ...CollectionBase,
  recordings: z.array(RecordingRecordSchema),
  tags: z.array(TagRecordSchema).optional(),
  users: z.array(UserRecordSchema).optional(),
};

export const RecordingSetObjectSchema = z.object({
  collection_type: z.literal("recording_set"),
  ...RecordingSetFields,
});

export type RecordingSetObject = z.infer<typeof RecordingSetObjectSchema>;

export const DatasetObjectSchema = z.object({
  collection_type: z.literal("dataset"),
  ...RecordingSetFields,
  name: z.string(),
  description: z.string().optional(),
});

export type DatasetObject = z.infer<typeof DatasetObjectSchema>;

const AnnotationSetFields = {
  ...CollectionBase,
  users: z.array(UserRecordSchema).optional(),
  tags: z.array(TagRecordSchema).optional(),
  recordings: z.array(RecordingRecordSchema).optional(),
  clips: z.array(ClipRecordSchema).optional(),
  sound_events: z.array(SoundEventRecordSchema).optional(),
  sequences: z.array(SequenceRecordSchema).optional(),
  sound_event_annotations: z.array(SoundEventAnnotationRecordSchema).optional(),
  sequence_annotations: z.array(SequenceAnnotationRecordSchema).optional(),
  clip_annotations: z.array(ClipAnnotationRecordSchema).optional(),
};

export const AnnotationSetObjectSchema = z.object({
  collection_type: z.literal("annotation_set"),
  ...AnnotationSetFields,
});

export type AnnotationSetObject = z.infer<typeof AnnotationSetObjectSchema>;

export const AnnotationProjectObjectSchema = z.object({
  collection_type: z.literal("annotation_project"),
  ...AnnotationSetFields,
  name: z.string(),
  description: z.string().optional(),
  instructions: z.string().optional(),
  project_tags: z.array(IntId).optional(),
  tasks: z.array(AnnotationTaskRecordSchema).optional(),
});

export type AnnotationProjectObject = z.infer<typeof AnnotationProjectObjectSchema>;

export const EvaluationSetObjectSchema = z.object({
  collection_type: z.literal("evaluation_set"),
  ...AnnotationSetFields,
  name: z.string(),
  description: z.string().optional(),
  evaluation_tags: z.array(IntId).optional(),
});

export type EvaluationSetObject = z.infer<typeof EvaluationSetObjectSchema>;

const PredictionSetFields = {
  ...CollectionBase,
  users: z.array(UserRecordSchema).optional(),
  tags: z.array(TagRecordSchema).optional(),
  recordings: z.array(RecordingRecordSchema).optional(),
  clips: z.array(ClipRecordSchema).optional(),
  sound_events: z.array(SoundEventRecordSchema).optional(),
  sequences: z.array(SequenceRecordSchema).optional(),
  sound_event_predictions: z.array(SoundEventPredictionRecordSchema).optional(),
  sequence_predictions: z.array(SequencePredictionRecordSchema).optional(),
  clip_predictions: z.array(ClipPredictionRecordSchema).optional(),
};

export const PredictionSetObjectSchema = z.object({
  collection_type: z.literal("prediction_set"),
  ...PredictionSetFields,
});

export type PredictionSetObject = z.infer<typeof PredictionSetObjectSchema>;

export const ModelRunObjectSchema = z.object({
  collection_type: z.literal("model_run"),
  ...PredictionSetFields,
  name: z.string(),
  version: z.string().optional(),
  description: z.string().optional(),
});

export type ModelRunObject = z.infer<typeof ModelRunObjectSchema>;

export const EvaluationObjectSchema = z.object({
  collection_type: z.literal("evaluation"),
  ...CollectionBase,
  evaluation_task: z.string(),
  users: z.array(UserRecordSchema).optional(),
  tags: z.array(TagRecordSchema).optional(),
  recordings: z.array(RecordingRecordSchema).optional(),
  clips: z.array(ClipRecordSchema).optional(),
  sound_events: z.array(SoundEventRecordSchema).optional(),
  sequences: z.array(SequenceRecordSchema).optional(),
  sound_event_annotations: z.array(SoundEventAnnotationRecordSchema).optional(),
  sequence_annotations: z.array(SequenceAnnotationRecordSchema).optional(),
  clip_annotations: z.array(ClipAnnotationRecordSchema).optional(),
  sound_event_predictions: z.array(SoundEventPredictionRecordSchema).optional(),
  sequence_predictions: z.array(SequencePredictionRecordSchema).optional(),
  clip_predictions: z.array(ClipPredictionRecordSchema).optional(),
  matches: z.array(MatchRecordSchema).optional(),
  clip_evaluations: z.array(ClipEvaluationRecordSchema).optional(),
  metrics: FeatureMap.optional(),
  score: z.number().optional(),
});

export type EvaluationObject = z.infer<typeof EvaluationObjectSchema>;

export const CollectionObjectSchema = z.discriminatedUnion("collection_type", [
  EvaluationObjectSchema,
  DatasetObjectSchema,
  AnnotationProjectObjectSchema,
  EvaluationSetObjectSchema,
  ModelRunObjectSchema,
  AnnotationSetObjectSchema,
  PredictionSetObjectSchema,
  RecordingSetObjectSchema,
]);

export type CollectionObject = z.infer<typeof CollectionObjectSchema>;

/**
 * The collection record stored under a given collection_type.
 */
export type CollectionObjectOf<T extends CollectionType> = Extract<
  CollectionObject,
  { collection_type: T }
>;

// ═══════════════════════════════════════════════════════════════════════════
// ENVELOPE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Minimal envelope shape, checked before the version gate so that a version
 * mismatch is reported even when the rest of the document is unreadable.
 */
export const EnvelopeHeaderSchema = z.object({
  version: z.union([z.string(), z.number()]),
  created_on: z.string().optional(),
  data: z
    .object({
      collection_type: z.string(),
    })
    .passthrough(),
});

export type EnvelopeHeader = z.infer<typeof EnvelopeHeaderSchema>;

export const AoefDocumentSchema = z.object({
  version: z.string(),
  created_on: Timestamp,
  data: CollectionObjectSchema,
});

export type AoefDocument = z.infer<typeof AoefDocumentSchema>;
