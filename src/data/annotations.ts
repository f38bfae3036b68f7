/**
 * Human annotations and the annotation tasks that produce them.
 */

import { randomUUID } from "node:crypto";
import type { Clip, Note, SoundEvent, Sequence, Tag, User } from "./entities.js";

export interface SoundEventAnnotationInit {
  uuid?: string;
  soundEvent: SoundEvent;
  tags?: Tag[];
  notes?: Note[];
  createdBy?: User;
  createdOn?: Date;
}

export class SoundEventAnnotation {
  uuid: string;
  soundEvent: SoundEvent;
  tags: Tag[];
  notes: Note[];
  createdBy: User | undefined;
  createdOn: Date;

  constructor(init: SoundEventAnnotationInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.soundEvent = init.soundEvent;
    this.tags = init.tags ?? [];
    this.notes = init.notes ?? [];
    this.createdBy = init.createdBy;
    this.createdOn = init.createdOn ?? new Date();
  }
}

export interface SequenceAnnotationInit {
  uuid?: string;
  sequence: Sequence;
  tags?: Tag[];
  notes?: Note[];
  createdBy?: User;
  createdOn?: Date;
}

export class SequenceAnnotation {
  uuid: string;
  sequence: Sequence;
  tags: Tag[];
  notes: Note[];
  createdBy: User | undefined;
  createdOn: Date;

  constructor(init: SequenceAnnotationInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.sequence = init.sequence;
    this.tags = init.tags ?? [];
    this.notes = init.notes ?? [];
    this.createdBy = init.createdBy;
    this.createdOn = init.createdOn ?? new Date();
  }
}

export interface ClipAnnotationInit {
  uuid?: string;
  clip: Clip;
  soundEvents?: SoundEventAnnotation[];
  sequences?: SequenceAnnotation[];
  tags?: Tag[];
  notes?: Note[];
  createdOn?: Date;
}

/**
 * Everything annotated on a single clip.
 */
export class ClipAnnotation {
  uuid: string;
  clip: Clip;
  soundEvents: SoundEventAnnotation[];
  sequences: SequenceAnnotation[];
  /** Clip-level tags */
  tags: Tag[];
  notes: Note[];
  createdOn: Date;

  constructor(init: ClipAnnotationInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.clip = init.clip;
    this.soundEvents = init.soundEvents ?? [];
    this.sequences = init.sequences ?? [];
    this.tags = init.tags ?? [];
    this.notes = init.notes ?? [];
    this.createdOn = init.createdOn ?? new Date();
  }
}

export const ANNOTATION_STATES = ["assigned", "completed", "verified", "rejected"] as const;
export type AnnotationState = (typeof ANNOTATION_STATES)[number];

export class StatusBadge {
  state: AnnotationState;
  owner: User | undefined;
  createdOn: Date;

  constructor(init: { state: AnnotationState; owner?: User; createdOn?: Date }) {
    this.state = init.state;
    this.owner = init.owner;
    this.createdOn = init.createdOn ?? new Date();
  }
}

export interface AnnotationTaskInit {
  uuid?: string;
  clip: Clip;
  statusBadges?: StatusBadge[];
  createdOn?: Date;
}

/**
 * A unit of annotation work: one clip, tracked through status badges.
 */
export class AnnotationTask {
  uuid: string;
  clip: Clip;
  statusBadges: StatusBadge[];
  createdOn: Date;

  constructor(init: AnnotationTaskInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.clip = init.clip;
    this.statusBadges = init.statusBadges ?? [];
    this.createdOn = init.createdOn ?? new Date();
  }
}
