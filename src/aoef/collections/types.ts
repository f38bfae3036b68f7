import type { DataCollection } from "../../data/collections.js";
import type { AdapterTree } from "../builder.js";
import type { CollectionObjectOf, CollectionType } from "../schema.js";

/**
 * Converts one collection kind to and from its document `data` object.
 */
export interface CollectionAdapter<T extends CollectionType, C extends DataCollection> {
  readonly collectionType: T;
  toObject(collection: C, tree: AdapterTree): CollectionObjectOf<T>;
  fromObject(object: CollectionObjectOf<T>, tree: AdapterTree): C;
}
