import { AnnotationTask, StatusBadge } from "../../data/annotations.js";
import { UuidIdentityStore } from "../identity-store.js";
import type { AnnotationTaskRecord, StatusBadgeRecord } from "../schema.js";
import type { ClipAdapter } from "./clip.js";
import type { UserAdapter } from "./user.js";
import { fromTimestamp, nonEmpty, toTimestamp } from "./fields.js";

/**
 * Annotation tasks embed their status badges; badge owners are user ids.
 */
export class AnnotationTaskAdapter extends UuidIdentityStore<AnnotationTask, AnnotationTaskRecord> {
  readonly entityName = "AnnotationTask";

  constructor(
    private readonly clips: ClipAdapter,
    private readonly users: UserAdapter
  ) {
    super();
  }

  protected assembleRecord(task: AnnotationTask): AnnotationTaskRecord {
    return {
      uuid: task.uuid,
      clip: this.clips.toRecord(task.clip).uuid,
      status_badges: nonEmpty(task.statusBadges.map((badge) => this.badgeToRecord(badge))),
      created_on: toTimestamp(task.createdOn),
    };
  }

  protected assembleDomain(record: AnnotationTaskRecord): AnnotationTask {
    const referencedBy = `AnnotationTask ${record.uuid}`;

    return new AnnotationTask({
      uuid: record.uuid,
      clip: this.clips.resolve(record.clip, referencedBy),
      statusBadges: (record.status_badges ?? []).map(
        (badge) =>
          new StatusBadge({
            state: badge.state,
            owner: badge.owner !== undefined ? this.users.resolve(badge.owner, referencedBy) : undefined,
            createdOn: fromTimestamp(badge.created_on),
          })
      ),
      createdOn: fromTimestamp(record.created_on),
    });
  }

  private badgeToRecord(badge: StatusBadge): StatusBadgeRecord {
    return {
      state: badge.state,
      owner: badge.owner !== undefined ? this.users.toRecord(badge.owner).id : undefined,
      created_on: toTimestamp(badge.createdOn),
    };
  }
}
