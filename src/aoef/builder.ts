/**
 * Adapter tree construction.
 *
 * Every save or load call builds its own tree so that identity maps never
 * leak between documents. Each adapter is created exactly once and handed to
 * the adapters that depend on it.
 */

import {
  AnnotationTaskAdapter,
  ClipAdapter,
  ClipAnnotationAdapter,
  ClipEvaluationAdapter,
  ClipPredictionAdapter,
  MatchAdapter,
  NoteAdapter,
  RecordingAdapter,
  SequenceAdapter,
  SequenceAnnotationAdapter,
  SequencePredictionAdapter,
  SoundEventAdapter,
  SoundEventAnnotationAdapter,
  SoundEventPredictionAdapter,
  TagAdapter,
  UserAdapter,
} from "./adapters/index.js";

export interface AdapterTreeOptions {
  /** Recording paths are stored relative to this directory */
  audioDir?: string;
}

export interface AdapterTree {
  users: UserAdapter;
  tags: TagAdapter;
  notes: NoteAdapter;
  recordings: RecordingAdapter;
  clips: ClipAdapter;
  soundEvents: SoundEventAdapter;
  sequences: SequenceAdapter;
  soundEventAnnotations: SoundEventAnnotationAdapter;
  sequenceAnnotations: SequenceAnnotationAdapter;
  clipAnnotations: ClipAnnotationAdapter;
  annotationTasks: AnnotationTaskAdapter;
  soundEventPredictions: SoundEventPredictionAdapter;
  sequencePredictions: SequencePredictionAdapter;
  clipPredictions: ClipPredictionAdapter;
  matches: MatchAdapter;
  clipEvaluations: ClipEvaluationAdapter;
}

export function buildAdapterTree(options: AdapterTreeOptions = {}): AdapterTree {
  const users = new UserAdapter();
  const tags = new TagAdapter();
  const notes = new NoteAdapter(users);
  const recordings = new RecordingAdapter(users, tags, notes, options.audioDir);
  const clips = new ClipAdapter(recordings);
  const soundEvents = new SoundEventAdapter(recordings);
  const sequences = new SequenceAdapter(soundEvents);

  const soundEventAnnotations = new SoundEventAnnotationAdapter(users, tags, notes, soundEvents);
  const sequenceAnnotations = new SequenceAnnotationAdapter(users, tags, notes, sequences);
  const clipAnnotations = new ClipAnnotationAdapter(
    clips,
    tags,
    notes,
    soundEventAnnotations,
    sequenceAnnotations
  );
  const annotationTasks = new AnnotationTaskAdapter(clips, users);

  const soundEventPredictions = new SoundEventPredictionAdapter(soundEvents, tags);
  const sequencePredictions = new SequencePredictionAdapter(sequences, tags);
  const clipPredictions = new ClipPredictionAdapter(
    clips,
    soundEventPredictions,
    sequencePredictions,
    tags
  );

  const matches = new MatchAdapter(soundEventAnnotations, soundEventPredictions);
  const clipEvaluations = new ClipEvaluationAdapter(clipAnnotations, clipPredictions, matches);

  return {
    users,
    tags,
    notes,
    recordings,
    clips,
    soundEvents,
    sequences,
    soundEventAnnotations,
    sequenceAnnotations,
    clipAnnotations,
    annotationTasks,
    soundEventPredictions,
    sequencePredictions,
    clipPredictions,
    matches,
    clipEvaluations,
  };
}
