/**
 * Memoizing two-way map between domain objects and exchange records.
 *
 * Every adapter is an IdentityStore for one entity type. Within a single
 * save or load call the store guarantees that domain objects with the same
 * identity key map to exactly one record (and one record id maps to exactly
 * one domain object), which is what keeps a document flat and deduplicated.
 *
 * Stores are created fresh for every top-level call and thrown away after.
 *
 * @example
 *   const tags = new TagAdapter();
 *   const a = tags.toRecord(new Tag({ key: "species", value: "dog" }));
 *   const b = tags.toRecord(new Tag({ key: "species", value: "dog" }));
 *   // a === b, a.id === 0
 */

import { CyclicReferenceError, MissingReferenceError } from "./errors.js";

export type RecordId = string | number;

export abstract class IdentityStore<D, R, I extends RecordId> {
  /** Identity key -> record id */
  private readonly idsByKey = new Map<string, I>();

  /** Record id -> record, in first-completed order */
  private readonly records = new Map<I, R>();

  /** Record id -> domain object */
  private readonly objects = new Map<I, D>();

  /** Keys whose record is currently being assembled */
  private readonly assembling = new Set<string>();

  /**
   * Entity name used in error messages ("Recording", "Tag", ...).
   */
  abstract readonly entityName: string;

  /**
   * Identity key of a domain object. Objects with equal keys share a record.
   */
  protected abstract keyOf(obj: D): string;

  /**
   * Id stored in a record.
   */
  protected abstract idOf(record: R): I;

  /**
   * Id for an object seen for the first time.
   */
  protected abstract allocateId(obj: D): I;

  /**
   * Build the flat record for an object, resolving every nested reference
   * through the owning child adapter.
   */
  protected abstract assembleRecord(obj: D, id: I): R;

  /**
   * Rebuild a domain object from its record.
   */
  protected abstract assembleDomain(record: R): D;

  /**
   * Number of identity keys seen so far.
   */
  protected get allocatedCount(): number {
    return this.idsByKey.size;
  }

  /**
   * Convert a domain object to its record, reusing the cached record when
   * the object's key has been seen before.
   *
   * @throws CyclicReferenceError if the object is reached again while its
   *   own record is still being assembled
   */
  toRecord(obj: D): R {
    const key = this.keyOf(obj);

    let id = this.idsByKey.get(key);
    if (id === undefined) {
      id = this.allocateId(obj);
      this.idsByKey.set(key, id);
    }

    const cached = this.records.get(id);
    if (cached !== undefined) {
      return cached;
    }

    if (this.assembling.has(key)) {
      throw new CyclicReferenceError([...this.assembling, key]);
    }

    this.assembling.add(key);
    let record: R;
    try {
      record = this.assembleRecord(obj, id);
    } finally {
      this.assembling.delete(key);
    }

    this.records.set(id, record);
    if (!this.objects.has(id)) {
      this.objects.set(id, obj);
    }

    return record;
  }

  /**
   * Convert a record back to a domain object, caching by record id.
   */
  toDomain(record: R): D {
    const id = this.idOf(record);

    const cached = this.objects.get(id);
    if (cached !== undefined) {
      return cached;
    }

    const obj = this.assembleDomain(record);
    this.objects.set(id, obj);
    if (!this.records.has(id)) {
      this.records.set(id, record);
    }

    return obj;
  }

  /**
   * Look up a domain object by record id.
   */
  fromId(id: I): D | undefined {
    return this.objects.get(id);
  }

  /**
   * Look up a domain object that another record refers to.
   *
   * @param id - Referenced id
   * @param referencedBy - Description of the referencing record, for errors
   * @throws MissingReferenceError if no object with this id has been loaded
   */
  resolve(id: I, referencedBy: string): D {
    const obj = this.objects.get(id);
    if (obj === undefined) {
      throw new MissingReferenceError(this.entityName, id, referencedBy);
    }
    return obj;
  }

  /**
   * All records, in first-seen order.
   */
  values(): R[] {
    return Array.from(this.records.values());
  }
}

/**
 * Store for entities identified by their uuid. The record reuses the uuid.
 */
export abstract class UuidIdentityStore<
  D extends { uuid: string },
  R extends { uuid: string },
> extends IdentityStore<D, R, string> {
  protected keyOf(obj: D): string {
    return obj.uuid;
  }

  protected idOf(record: R): string {
    return record.uuid;
  }

  protected allocateId(obj: D): string {
    return obj.uuid;
  }
}

/**
 * Store for entities identified by content. Records get sequential integer
 * ids starting at 0.
 */
export abstract class IndexedIdentityStore<D, R extends { id: number }> extends IdentityStore<
  D,
  R,
  number
> {
  protected idOf(record: R): number {
    return record.id;
  }

  protected allocateId(): number {
    return this.allocatedCount;
  }
}
