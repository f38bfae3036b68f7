import { Tag } from "../../data/entities.js";
import { IndexedIdentityStore } from "../identity-store.js";
import type { TagRecord } from "../schema.js";

/**
 * Tags are deduplicated by content: every `(key, value)` pair gets one
 * record, however many objects carry it.
 */
export class TagAdapter extends IndexedIdentityStore<Tag, TagRecord> {
  readonly entityName = "Tag";

  protected keyOf(tag: Tag): string {
    return JSON.stringify([tag.key, tag.value]);
  }

  protected assembleRecord(tag: Tag, id: number): TagRecord {
    return { id, key: tag.key, value: tag.value };
  }

  protected assembleDomain(record: TagRecord): Tag {
    return new Tag({ key: record.key, value: record.value });
  }
}
