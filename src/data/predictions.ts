/**
 * Machine outputs: scored sound events, sequences and clip-level tags.
 */

import { randomUUID } from "node:crypto";
import type { Clip, Feature, SoundEvent, Sequence, Tag } from "./entities.js";

export class PredictedTag {
  tag: Tag;
  /** Confidence in [0, 1] */
  score: number;

  constructor(init: { tag: Tag; score?: number }) {
    this.tag = init.tag;
    this.score = init.score ?? 1;
  }
}

export interface SoundEventPredictionInit {
  uuid?: string;
  soundEvent: SoundEvent;
  score?: number;
  tags?: PredictedTag[];
}

export class SoundEventPrediction {
  uuid: string;
  soundEvent: SoundEvent;
  score: number;
  tags: PredictedTag[];

  constructor(init: SoundEventPredictionInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.soundEvent = init.soundEvent;
    this.score = init.score ?? 1;
    this.tags = init.tags ?? [];
  }
}

export interface SequencePredictionInit {
  uuid?: string;
  sequence: Sequence;
  score?: number;
  tags?: PredictedTag[];
}

export class SequencePrediction {
  uuid: string;
  sequence: Sequence;
  score: number;
  tags: PredictedTag[];

  constructor(init: SequencePredictionInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.sequence = init.sequence;
    this.score = init.score ?? 1;
    this.tags = init.tags ?? [];
  }
}

export interface ClipPredictionInit {
  uuid?: string;
  clip: Clip;
  soundEvents?: SoundEventPrediction[];
  sequences?: SequencePrediction[];
  tags?: PredictedTag[];
  features?: Feature[];
}

export class ClipPrediction {
  uuid: string;
  clip: Clip;
  soundEvents: SoundEventPrediction[];
  sequences: SequencePrediction[];
  tags: PredictedTag[];
  features: Feature[];

  constructor(init: ClipPredictionInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.clip = init.clip;
    this.soundEvents = init.soundEvents ?? [];
    this.sequences = init.sequences ?? [];
    this.tags = init.tags ?? [];
    this.features = init.features ?? [];
  }
}
