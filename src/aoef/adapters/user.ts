import { User } from "../../data/entities.js";
import { IndexedIdentityStore } from "../identity-store.js";
import type { UserRecord } from "../schema.js";

/**
 * Users are identified by their content fields. Two user objects with the
 * same username, email, name and institution share one record (and the
 * uuid of the first one seen).
 */
export class UserAdapter extends IndexedIdentityStore<User, UserRecord> {
  readonly entityName = "User";

  protected keyOf(user: User): string {
    return JSON.stringify([user.username, user.email, user.name, user.institution]);
  }

  protected assembleRecord(user: User, id: number): UserRecord {
    return {
      id,
      uuid: user.uuid,
      username: user.username,
      email: user.email,
      name: user.name,
      institution: user.institution,
    };
  }

  protected assembleDomain(record: UserRecord): User {
    return new User({
      uuid: record.uuid,
      username: record.username,
      email: record.email,
      name: record.name,
      institution: record.institution,
    });
  }
}
