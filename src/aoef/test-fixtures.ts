/**
 * Shared object graphs for the engine tests.
 */

import {
  AnnotationTask,
  Clip,
  ClipAnnotation,
  ClipEvaluation,
  ClipPrediction,
  Feature,
  Match,
  Note,
  PredictedTag,
  Recording,
  Sequence,
  SequenceAnnotation,
  SequencePrediction,
  SoundEvent,
  SoundEventAnnotation,
  SoundEventPrediction,
  StatusBadge,
  Tag,
  User,
  type RecordingInit,
} from "../data/index.js";
import { createLogger, type Logger } from "../logging/index.js";

/** Fixed timestamp so documents compare equal after a round trip */
export const CREATED_ON = new Date("2024-03-01T12:00:00.000Z");

/**
 * Deterministic v4-shaped uuid: uuid(7) -> "00000000-0000-4000-8000-000000000007"
 */
export function uuid(n: number): string {
  return `00000000-0000-4000-8000-${n.toString().padStart(12, "0")}`;
}

/** Logger that writes nowhere */
export function silentLogger(): Logger {
  return createLogger({ console: false, file: false });
}

export function makeRecording(n: number, overrides: Partial<RecordingInit> = {}): Recording {
  return new Recording({
    uuid: uuid(n),
    path: `/audio/site-a/rec-${n}.wav`,
    duration: 60,
    channels: 1,
    samplerate: 48000,
    ...overrides,
  });
}

/**
 * Every entity kind, wired together the way a small evaluation would be.
 */
export function buildGraph() {
  const alice = new User({ uuid: uuid(1), username: "alice", email: "alice@example.com" });
  const bob = new User({ uuid: uuid(2), username: "bob", institution: "Test Lab" });

  const dog = new Tag({ key: "species", value: "dog" });
  const night = new Tag({ key: "period", value: "night" });

  const recording = makeRecording(10, {
    timeExpansion: 10,
    hash: "abc123",
    date: "2024-03-01",
    time: "21:30:00",
    latitude: 51.5,
    longitude: -0.12,
    tags: [dog],
    features: [new Feature({ name: "snr", value: 12.5 })],
    notes: [
      new Note({
        uuid: uuid(11),
        message: "wind noise after 40s",
        createdBy: bob,
        isIssue: true,
        createdOn: CREATED_ON,
      }),
    ],
    owners: [alice],
    rights: "CC-BY-4.0",
  });

  const clip = new Clip({ uuid: uuid(20), recording, startTime: 0, endTime: 10 });

  const soundEvent = new SoundEvent({
    uuid: uuid(30),
    recording,
    geometry: { type: "BoundingBox", coordinates: [1, 1000, 2, 4000] },
    features: [new Feature({ name: "duration", value: 1 })],
  });

  const parentSequence = new Sequence({ uuid: uuid(40), soundEvents: [soundEvent] });
  const sequence = new Sequence({ uuid: uuid(41), soundEvents: [soundEvent], parent: parentSequence });

  const soundEventAnnotation = new SoundEventAnnotation({
    uuid: uuid(50),
    soundEvent,
    tags: [dog],
    createdBy: alice,
    createdOn: CREATED_ON,
  });

  const sequenceAnnotation = new SequenceAnnotation({
    uuid: uuid(51),
    sequence,
    tags: [night],
    createdOn: CREATED_ON,
  });

  const clipAnnotation = new ClipAnnotation({
    uuid: uuid(52),
    clip,
    soundEvents: [soundEventAnnotation],
    sequences: [sequenceAnnotation],
    tags: [night],
    createdOn: CREATED_ON,
  });

  const task = new AnnotationTask({
    uuid: uuid(53),
    clip,
    statusBadges: [new StatusBadge({ state: "completed", owner: alice, createdOn: CREATED_ON })],
    createdOn: CREATED_ON,
  });

  const soundEventPrediction = new SoundEventPrediction({
    uuid: uuid(60),
    soundEvent,
    score: 0.9,
    tags: [new PredictedTag({ tag: dog, score: 0.8 })],
  });

  const sequencePrediction = new SequencePrediction({ uuid: uuid(61), sequence, score: 0.7 });

  const clipPrediction = new ClipPrediction({
    uuid: uuid(62),
    clip,
    soundEvents: [soundEventPrediction],
    sequences: [sequencePrediction],
    tags: [new PredictedTag({ tag: night, score: 0.6 })],
    features: [new Feature({ name: "energy", value: 0.25 })],
  });

  const match = new Match({
    uuid: uuid(70),
    source: soundEventPrediction,
    target: soundEventAnnotation,
    affinity: 0.75,
    score: 0.8,
    metrics: [new Feature({ name: "iou", value: 0.75 })],
  });

  const clipEvaluation = new ClipEvaluation({
    uuid: uuid(71),
    annotations: clipAnnotation,
    predictions: clipPrediction,
    matches: [match],
    metrics: [new Feature({ name: "accuracy", value: 1 })],
    score: 0.8,
  });

  return {
    alice,
    bob,
    dog,
    night,
    recording,
    clip,
    soundEvent,
    parentSequence,
    sequence,
    soundEventAnnotation,
    sequenceAnnotation,
    clipAnnotation,
    task,
    soundEventPrediction,
    sequencePrediction,
    clipPrediction,
    match,
    clipEvaluation,
  };
}
