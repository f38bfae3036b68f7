import { Dataset, RecordingSet, type RecordingSetInit } from "../../data/collections.js";
import type { AdapterTree } from "../builder.js";
import { fromTimestamp, nonEmpty, toTimestamp } from "../adapters/fields.js";
import type { RecordingSetObject } from "../schema.js";
import { importEntityLists } from "./lists.js";
import type { CollectionAdapter } from "./types.js";

type RecordingSetFields = Omit<RecordingSetObject, "collection_type">;

function exportRecordingSet(set: RecordingSet, tree: AdapterTree): RecordingSetFields {
  for (const recording of set.recordings) {
    tree.recordings.toRecord(recording);
  }

  return {
    uuid: set.uuid,
    created_on: toTimestamp(set.createdOn),
    recordings: tree.recordings.values(),
    tags: nonEmpty(tree.tags.values()),
    users: nonEmpty(tree.users.values()),
  };
}

function importRecordingSet(object: RecordingSetFields, tree: AdapterTree): RecordingSetInit {
  importEntityLists(tree, { users: object.users, tags: object.tags });

  return {
    uuid: object.uuid,
    recordings: object.recordings.map((record) => tree.recordings.toDomain(record)),
    createdOn: fromTimestamp(object.created_on),
  };
}

export const recordingSetAdapter: CollectionAdapter<"recording_set", RecordingSet> = {
  collectionType: "recording_set",

  toObject(set, tree) {
    return { collection_type: "recording_set", ...exportRecordingSet(set, tree) };
  },

  fromObject(object, tree) {
    return new RecordingSet(importRecordingSet(object, tree));
  },
};

/**
 * A dataset is stored as a recording set plus its name and description.
 */
export const datasetAdapter: CollectionAdapter<"dataset", Dataset> = {
  collectionType: "dataset",

  toObject(dataset, tree) {
    return {
      collection_type: "dataset",
      ...exportRecordingSet(dataset, tree),
      name: dataset.name,
      description: dataset.description,
    };
  },

  fromObject(object, tree) {
    return new Dataset({
      ...importRecordingSet(object, tree),
      name: object.name,
      description: object.description,
    });
  },
};
