/**
 * Results of comparing predictions against annotations.
 */

import { randomUUID } from "node:crypto";
import type { Feature } from "./entities.js";
import type { ClipAnnotation, SoundEventAnnotation } from "./annotations.js";
import type { ClipPrediction, SoundEventPrediction } from "./predictions.js";

export interface MatchInit {
  uuid?: string;
  source?: SoundEventPrediction;
  target?: SoundEventAnnotation;
  affinity?: number;
  score?: number;
  metrics?: Feature[];
}

/**
 * A pairing of a predicted sound event (source) with an annotated one
 * (target). Either side may be missing for unmatched events.
 */
export class Match {
  uuid: string;
  source: SoundEventPrediction | undefined;
  target: SoundEventAnnotation | undefined;
  affinity: number;
  score: number | undefined;
  metrics: Feature[];

  constructor(init: MatchInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.source = init.source;
    this.target = init.target;
    this.affinity = init.affinity ?? 0;
    this.score = init.score;
    this.metrics = init.metrics ?? [];
  }
}

export interface ClipEvaluationInit {
  uuid?: string;
  annotations: ClipAnnotation;
  predictions: ClipPrediction;
  matches?: Match[];
  metrics?: Feature[];
  score?: number;
}

export class ClipEvaluation {
  uuid: string;
  annotations: ClipAnnotation;
  predictions: ClipPrediction;
  matches: Match[];
  metrics: Feature[];
  score: number | undefined;

  constructor(init: ClipEvaluationInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.annotations = init.annotations;
    this.predictions = init.predictions;
    this.matches = init.matches ?? [];
    this.metrics = init.metrics ?? [];
    this.score = init.score;
  }
}
