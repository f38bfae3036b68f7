/**
 * Top-level collections: the objects that are saved to and loaded from a
 * single exchange document.
 *
 * Several collections extend a more general one (a Dataset is a
 * RecordingSet with a name). Code that dispatches on the runtime class must
 * test the subclass first.
 */

import { randomUUID } from "node:crypto";
import type { Feature, Recording, Tag } from "./entities.js";
import type { AnnotationTask, ClipAnnotation } from "./annotations.js";
import type { ClipPrediction } from "./predictions.js";
import type { ClipEvaluation } from "./evaluations.js";

export interface RecordingSetInit {
  uuid?: string;
  recordings?: Recording[];
  createdOn?: Date;
}

export class RecordingSet {
  uuid: string;
  recordings: Recording[];
  createdOn: Date;

  constructor(init: RecordingSetInit = {}) {
    this.uuid = init.uuid ?? randomUUID();
    this.recordings = init.recordings ?? [];
    this.createdOn = init.createdOn ?? new Date();
  }
}

export interface DatasetInit extends RecordingSetInit {
  name: string;
  description?: string;
}

export class Dataset extends RecordingSet {
  name: string;
  description: string | undefined;

  constructor(init: DatasetInit) {
    super(init);
    this.name = init.name;
    this.description = init.description;
  }
}

export interface AnnotationSetInit {
  uuid?: string;
  clipAnnotations?: ClipAnnotation[];
  createdOn?: Date;
}

export class AnnotationSet {
  uuid: string;
  clipAnnotations: ClipAnnotation[];
  createdOn: Date;

  constructor(init: AnnotationSetInit = {}) {
    this.uuid = init.uuid ?? randomUUID();
    this.clipAnnotations = init.clipAnnotations ?? [];
    this.createdOn = init.createdOn ?? new Date();
  }
}

export interface AnnotationProjectInit extends AnnotationSetInit {
  name: string;
  description?: string;
  instructions?: string;
  annotationTags?: Tag[];
  tasks?: AnnotationTask[];
}

export class AnnotationProject extends AnnotationSet {
  name: string;
  description: string | undefined;
  /** Guidance shown to annotators */
  instructions: string | undefined;
  /** Tags annotators may choose from */
  annotationTags: Tag[];
  tasks: AnnotationTask[];

  constructor(init: AnnotationProjectInit) {
    super(init);
    this.name = init.name;
    this.description = init.description;
    this.instructions = init.instructions;
    this.annotationTags = init.annotationTags ?? [];
    this.tasks = init.tasks ?? [];
  }
}

export interface EvaluationSetInit extends AnnotationSetInit {
  name: string;
  description?: string;
  evaluationTags?: Tag[];
}

export class EvaluationSet extends AnnotationSet {
  name: string;
  description: string | undefined;
  /** Tags the evaluation is scored against */
  evaluationTags: Tag[];

  constructor(init: EvaluationSetInit) {
    super(init);
    this.name = init.name;
    this.description = init.description;
    this.evaluationTags = init.evaluationTags ?? [];
  }
}

export interface PredictionSetInit {
  uuid?: string;
  clipPredictions?: ClipPrediction[];
  createdOn?: Date;
}

export class PredictionSet {
  uuid: string;
  clipPredictions: ClipPrediction[];
  createdOn: Date;

  constructor(init: PredictionSetInit = {}) {
    this.uuid = init.uuid ?? randomUUID();
    this.clipPredictions = init.clipPredictions ?? [];
    this.createdOn = init.createdOn ?? new Date();
  }
}

export interface ModelRunInit extends PredictionSetInit {
  name: string;
  version?: string;
  description?: string;
}

export class ModelRun extends PredictionSet {
  name: string;
  /** Version of the model that produced the predictions */
  version: string | undefined;
  description: string | undefined;

  constructor(init: ModelRunInit) {
    super(init);
    this.name = init.name;
    this.version = init.version;
    this.description = init.description;
  }
}

export interface EvaluationInit {
  uuid?: string;
  evaluationTask: string;
  clipEvaluations?: ClipEvaluation[];
  metrics?: Feature[];
  score?: number;
  createdOn?: Date;
}

export class Evaluation {
  uuid: string;
  /** Name of the task evaluated, e.g. "sound_event_detection" */
  evaluationTask: string;
  clipEvaluations: ClipEvaluation[];
  metrics: Feature[];
  score: number | undefined;
  createdOn: Date;

  constructor(init: EvaluationInit) {
    this.uuid = init.uuid ?? randomUUID();
    this.evaluationTask = init.evaluationTask;
    this.clipEvaluations = init.clipEvaluations ?? [];
    this.metrics = init.metrics ?? [];
    this.score = init.score;
    this.createdOn = init.createdOn ?? new Date();
  }
}

/**
 * Every object that can be the root of an exchange document.
 */
export type DataCollection =
  | RecordingSet
  | Dataset
  | AnnotationSet
  | AnnotationProject
  | EvaluationSet
  | PredictionSet
  | ModelRun
  | Evaluation;
