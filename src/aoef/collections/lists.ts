/**
 * Record lists shared by several collection kinds, and the hydration
 * stages that load them.
 *
 * Export calls must come after every root object has been converted: the
 * lists are read from the adapters' identity maps, so they contain
 * everything reached during traversal.
 */

import type { ClipAnnotation } from "../../data/annotations.js";
import type { ClipPrediction } from "../../data/predictions.js";
import type { AdapterTree } from "../builder.js";
import { nonEmpty } from "../adapters/fields.js";
import type {
  ClipAnnotationRecord,
  ClipPredictionRecord,
  ClipRecord,
  RecordingRecord,
  SequenceAnnotationRecord,
  SequencePredictionRecord,
  SequenceRecord,
  SoundEventAnnotationRecord,
  SoundEventPredictionRecord,
  SoundEventRecord,
  TagRecord,
  UserRecord,
} from "../schema.js";

export interface EntityLists {
  users?: UserRecord[];
  tags?: TagRecord[];
  recordings?: RecordingRecord[];
  clips?: ClipRecord[];
  sound_events?: SoundEventRecord[];
  sequences?: SequenceRecord[];
}

export interface AnnotationLists {
  sound_event_annotations?: SoundEventAnnotationRecord[];
  sequence_annotations?: SequenceAnnotationRecord[];
  clip_annotations?: ClipAnnotationRecord[];
}

export interface PredictionLists {
  sound_event_predictions?: SoundEventPredictionRecord[];
  sequence_predictions?: SequencePredictionRecord[];
  clip_predictions?: ClipPredictionRecord[];
}

// ═══════════════════════════════════════════════════════════════════════════
// EXPORT
// ═══════════════════════════════════════════════════════════════════════════

export function exportEntityLists(tree: AdapterTree): EntityLists {
  return {
    users: nonEmpty(tree.users.values()),
    tags: nonEmpty(tree.tags.values()),
    recordings: nonEmpty(tree.recordings.values()),
    clips: nonEmpty(tree.clips.values()),
    sound_events: nonEmpty(tree.soundEvents.values()),
    sequences: nonEmpty(tree.sequences.values()),
  };
}

export function exportAnnotationLists(tree: AdapterTree): AnnotationLists {
  return {
    sound_event_annotations: nonEmpty(tree.soundEventAnnotations.values()),
    sequence_annotations: nonEmpty(tree.sequenceAnnotations.values()),
    clip_annotations: nonEmpty(tree.clipAnnotations.values()),
  };
}

export function exportPredictionLists(tree: AdapterTree): PredictionLists {
  return {
    sound_event_predictions: nonEmpty(tree.soundEventPredictions.values()),
    sequence_predictions: nonEmpty(tree.sequencePredictions.values()),
    clip_predictions: nonEmpty(tree.clipPredictions.values()),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPORT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Load users, tags, recordings, clips, sound events and sequences, in that
 * order.
 */
export function importEntityLists(tree: AdapterTree, lists: EntityLists): void {
  for (const record of lists.users ?? []) {
    tree.users.toDomain(record);
  }
  for (const record of lists.tags ?? []) {
    tree.tags.toDomain(record);
  }
  for (const record of lists.recordings ?? []) {
    tree.recordings.toDomain(record);
  }
  for (const record of lists.clips ?? []) {
    tree.clips.toDomain(record);
  }
  for (const record of lists.sound_events ?? []) {
    tree.soundEvents.toDomain(record);
  }
  tree.sequences.toDomainAll(lists.sequences ?? []);
}

export function importEventAnnotations(tree: AdapterTree, lists: AnnotationLists): void {
  for (const record of lists.sound_event_annotations ?? []) {
    tree.soundEventAnnotations.toDomain(record);
  }
  for (const record of lists.sequence_annotations ?? []) {
    tree.sequenceAnnotations.toDomain(record);
  }
}

export function importClipAnnotations(tree: AdapterTree, lists: AnnotationLists): ClipAnnotation[] {
  return (lists.clip_annotations ?? []).map((record) => tree.clipAnnotations.toDomain(record));
}

export function importEventPredictions(tree: AdapterTree, lists: PredictionLists): void {
  for (const record of lists.sound_event_predictions ?? []) {
    tree.soundEventPredictions.toDomain(record);
  }
  for (const record of lists.sequence_predictions ?? []) {
    tree.sequencePredictions.toDomain(record);
  }
}

export function importClipPredictions(tree: AdapterTree, lists: PredictionLists): ClipPrediction[] {
  return (lists.clip_predictions ?? []).map((record) => tree.clipPredictions.toDomain(record));
}
