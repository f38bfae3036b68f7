/**
 * Core acoustic entities: tags, users, notes, recordings and the objects cut
 * out of them (clips, sound events, sequences).
 *
 * These classes carry data only. Field validation belongs to whoever builds
 * them; the exchange engine copies values through as given.
 */

import { randomUUID } from "node:crypto";
import type { Geometry } from "./geometry.js";

/**
 * A key/value label. Tags are identified by content, not by reference.
 */
export class Tag {
  key: string;
  value: string;

  constructor(init: { key: string; value: string }) {
    this.key = init.key;
    this.value = init.value;
  }
}

/**
 * A named numeric measurement attached to an object.
 */
export class Feature {
  name: string;
  value: number;

  constructor(init: { name: string; value: number }) {
    this.name = init.name;
    this.value = init.value;
  }
}

export interface UserInit {
  uuid?: string;
  username?: string;
  email?: string;
  name?: string;
  institution?: string;
}

export class User {
  uuid: string;
  username: string | undefined;
  email: string | undefined;
  name: string | undefined;
  institution: string | undefined;

  constructor(init: UserInit = {}) {
    this.uuid = init.uuid ?? randomUUID();
    this.username = init.username;
    this.email = init.email;
    this.name = init.name;
    this.institution = init.institution;
  }
}

export interface NoteInit {
  uuid?: string;
  message: string;
  createdBy?: User;
  isIssue?: boolean;
  createdOn?: Date;
}

export class Note {
  uuid: string;
  message: string;
  createdBy: User | undefined;
  /** Whether the note flags a problem that needs review */
  isIssue: boolean;
  createdOn: Date;

  constructor(init: NoteInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.message = init.message;
    this.createdBy = init.createdBy;
    this.isIssue = init.isIssue ?? false;
    this.createdOn = init.createdOn ?? new Date();
  }
}

export interface RecordingInit {
  uuid?: string;
  path: string;
  duration: number;
  channels: number;
  samplerate: number;
  timeExpansion?: number;
  hash?: string;
  date?: string;
  time?: string;
  latitude?: number;
  longitude?: number;
  tags?: Tag[];
  features?: Feature[];
  notes?: Note[];
  owners?: User[];
  rights?: string;
}

/**
 * A single audio file and its metadata.
 */
export class Recording {
  uuid: string;
  /** Location of the audio file */
  path: string;
  /** Duration in seconds, after time expansion */
  duration: number;
  channels: number;
  samplerate: number;
  /** Time expansion factor of the recorder; 1 for real-time recordings */
  timeExpansion: number;
  hash: string | undefined;
  /** Recording date (YYYY-MM-DD) */
  date: string | undefined;
  /** Recording time of day (HH:MM:SS) */
  time: string | undefined;
  latitude: number | undefined;
  longitude: number | undefined;
  tags: Tag[];
  features: Feature[];
  notes: Note[];
  owners: User[];
  rights: string | undefined;

  constructor(init: RecordingInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.path = init.path;
    this.duration = init.duration;
    this.channels = init.channels;
    this.samplerate = init.samplerate;
    this.timeExpansion = init.timeExpansion ?? 1;
    this.hash = init.hash;
    this.date = init.date;
    this.time = init.time;
    this.latitude = init.latitude;
    this.longitude = init.longitude;
    this.tags = init.tags ?? [];
    this.features = init.features ?? [];
    this.notes = init.notes ?? [];
    this.owners = init.owners ?? [];
    this.rights = init.rights;
  }
}

export interface ClipInit {
  uuid?: string;
  recording: Recording;
  startTime: number;
  endTime: number;
  features?: Feature[];
}

/**
 * A time window within a recording.
 */
export class Clip {
  uuid: string;
  recording: Recording;
  startTime: number;
  endTime: number;
  features: Feature[];

  constructor(init: ClipInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.recording = init.recording;
    this.startTime = init.startTime;
    this.endTime = init.endTime;
    this.features = init.features ?? [];
  }
}

export interface SoundEventInit {
  uuid?: string;
  recording: Recording;
  geometry?: Geometry;
  features?: Feature[];
}

export class SoundEvent {
  uuid: string;
  recording: Recording;
  geometry: Geometry | undefined;
  features: Feature[];

  constructor(init: SoundEventInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.recording = init.recording;
    this.geometry = init.geometry;
    this.features = init.features ?? [];
  }
}

export interface SequenceInit {
  uuid?: string;
  soundEvents?: SoundEvent[];
  features?: Feature[];
  parent?: Sequence;
}

/**
 * An ordered group of sound events, optionally nested under a parent
 * sequence.
 */
export class Sequence {
  uuid: string;
  soundEvents: SoundEvent[];
  features: Feature[];
  parent: Sequence | undefined;

  constructor(init: SequenceInit = {}) {
    this.uuid = init.uuid ?? randomUUID();
    this.soundEvents = init.soundEvents ?? [];
    this.features = init.features ?? [];
    this.parent = init.parent;
  }
}
