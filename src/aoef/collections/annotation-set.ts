import {
  AnnotationProject,
  AnnotationSet,
  EvaluationSet,
  type AnnotationSetInit,
} from "../../data/collections.js";
import type { AdapterTree } from "../builder.js";
import { fromTimestamp, nonEmpty, toTimestamp } from "../adapters/fields.js";
import type { AnnotationSetObject } from "../schema.js";
import {
  exportAnnotationLists,
  exportEntityLists,
  importClipAnnotations,
  importEntityLists,
  importEventAnnotations,
} from "./lists.js";
import type { CollectionAdapter } from "./types.js";

type AnnotationSetFields = Omit<AnnotationSetObject, "collection_type">;

/**
 * Convert the clip annotations, then read every list. Callers that reach
 * more objects (tasks, project tags) must convert those before calling this.
 */
function exportAnnotationSet(set: AnnotationSet, tree: AdapterTree): AnnotationSetFields {
  for (const annotation of set.clipAnnotations) {
    tree.clipAnnotations.toRecord(annotation);
  }

  return {
    uuid: set.uuid,
    created_on: toTimestamp(set.createdOn),
    ...exportEntityLists(tree),
    ...exportAnnotationLists(tree),
  };
}

function importAnnotationSet(object: AnnotationSetFields, tree: AdapterTree): AnnotationSetInit {
  importEntityLists(tree, object);
  importEventAnnotations(tree, object);

  return {
    uuid: object.uuid,
    clipAnnotations: importClipAnnotations(tree, object),
    createdOn: fromTimestamp(object.created_on),
  };
}

export const annotationSetAdapter: CollectionAdapter<"annotation_set", AnnotationSet> = {
  collectionType: "annotation_set",

  toObject(set, tree) {
    return { collection_type: "annotation_set", ...exportAnnotationSet(set, tree) };
  },

  fromObject(object, tree) {
    return new AnnotationSet(importAnnotationSet(object, tree));
  },
};

/**
 * Annotation projects add the tags annotators may use and the task list.
 * Tasks are embedded in the project rather than listed at the top level.
 */
export const annotationProjectAdapter: CollectionAdapter<"annotation_project", AnnotationProject> = {
  collectionType: "annotation_project",

  toObject(project, tree) {
    for (const annotation of project.clipAnnotations) {
      tree.clipAnnotations.toRecord(annotation);
    }
    const projectTags = project.annotationTags.map((tag) => tree.tags.toRecord(tag).id);
    for (const task of project.tasks) {
      tree.annotationTasks.toRecord(task);
    }

    return {
      collection_type: "annotation_project",
      ...exportAnnotationSet(project, tree),
      name: project.name,
      description: project.description,
      instructions: project.instructions,
      project_tags: nonEmpty(projectTags),
      tasks: nonEmpty(tree.annotationTasks.values()),
    };
  },

  fromObject(object, tree) {
    const referencedBy = `AnnotationProject ${object.uuid}`;
    const base = importAnnotationSet(object, tree);

    return new AnnotationProject({
      ...base,
      name: object.name,
      description: object.description,
      instructions: object.instructions,
      annotationTags: (object.project_tags ?? []).map((id) => tree.tags.resolve(id, referencedBy)),
      tasks: (object.tasks ?? []).map((record) => tree.annotationTasks.toDomain(record)),
    });
  },
};

export const evaluationSetAdapter: CollectionAdapter<"evaluation_set", EvaluationSet> = {
  collectionType: "evaluation_set",

  toObject(set, tree) {
    for (const annotation of set.clipAnnotations) {
      tree.clipAnnotations.toRecord(annotation);
    }
    const evaluationTags = set.evaluationTags.map((tag) => tree.tags.toRecord(tag).id);

    return {
      collection_type: "evaluation_set",
      ...exportAnnotationSet(set, tree),
      name: set.name,
      description: set.description,
      evaluation_tags: nonEmpty(evaluationTags),
    };
  },

  fromObject(object, tree) {
    const referencedBy = `EvaluationSet ${object.uuid}`;
    const base = importAnnotationSet(object, tree);

    return new EvaluationSet({
      ...base,
      name: object.name,
      description: object.description,
      evaluationTags: (object.evaluation_tags ?? []).map((id) => tree.tags.resolve(id, referencedBy)),
    });
  },
};
