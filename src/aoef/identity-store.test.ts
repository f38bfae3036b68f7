/**
 * Tests for the identity store and the leaf adapters built on it.
 *
 * Run: node --import tsx src/aoef/identity-store.test.ts
 */

import { strict as assert } from "node:assert";

import { Sequence, Tag, User } from "../data/index.js";
import { TagAdapter, UserAdapter } from "./adapters/index.js";
import { buildAdapterTree } from "./builder.js";
import { CyclicReferenceError, MissingReferenceError } from "./errors.js";
import { uuid } from "./test-fixtures.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

// ═══════════════════════════════════════════════════════════════════════════
// CONTENT-KEYED IDS
// ═══════════════════════════════════════════════════════════════════════════

section("Tags");

test("equal tags share one record", () => {
  const tags = new TagAdapter();
  const a = tags.toRecord(new Tag({ key: "species", value: "dog" }));
  const b = tags.toRecord(new Tag({ key: "species", value: "dog" }));
  assert.equal(a, b);
  assert.deepEqual(a, { id: 0, key: "species", value: "dog" });
  assert.equal(tags.values().length, 1);
});

test("ids are allocated from 0 in first-seen order", () => {
  const tags = new TagAdapter();
  tags.toRecord(new Tag({ key: "species", value: "dog" }));
  tags.toRecord(new Tag({ key: "species", value: "cat" }));
  tags.toRecord(new Tag({ key: "species", value: "dog" }));
  tags.toRecord(new Tag({ key: "period", value: "night" }));
  assert.deepEqual(
    tags.values().map((record) => [record.id, record.value]),
    [
      [0, "dog"],
      [1, "cat"],
      [2, "night"],
    ]
  );
});

test("key and value are not confused when they contain separators", () => {
  const tags = new TagAdapter();
  const a = tags.toRecord(new Tag({ key: "a:b", value: "c" }));
  const b = tags.toRecord(new Tag({ key: "a", value: "b:c" }));
  assert.notEqual(a.id, b.id);
});

test("toDomain caches by record id", () => {
  const tags = new TagAdapter();
  const record = { id: 3, key: "species", value: "dog" };
  const first = tags.toDomain(record);
  const second = tags.toDomain({ ...record });
  assert.equal(first, second);
  assert.equal(tags.fromId(3), first);
});

section("Users");

test("users with equal content merge into the first one seen", () => {
  const users = new UserAdapter();
  const first = users.toRecord(new User({ uuid: uuid(1), username: "alice" }));
  const second = users.toRecord(new User({ uuid: uuid(2), username: "alice" }));
  assert.equal(first, second);
  assert.equal(first.id, 0);
  assert.equal(first.uuid, uuid(1));
});

test("users with different content get separate ids", () => {
  const users = new UserAdapter();
  users.toRecord(new User({ uuid: uuid(1), username: "alice" }));
  const bob = users.toRecord(new User({ uuid: uuid(2), username: "alice", institution: "Test Lab" }));
  assert.equal(bob.id, 1);
});

// ═══════════════════════════════════════════════════════════════════════════
// LOOKUPS
// ═══════════════════════════════════════════════════════════════════════════

section("Lookups");

test("fromId returns undefined for unknown ids", () => {
  const tags = new TagAdapter();
  assert.equal(tags.fromId(7), undefined);
});

test("resolve names the missing id and the referencing record", () => {
  const tags = new TagAdapter();
  assert.throws(
    () => tags.resolve(5, `Recording ${uuid(10)}`),
    (err: unknown) => {
      assert.ok(err instanceof MissingReferenceError);
      assert.equal(err.referenceType, "Tag");
      assert.equal(err.missingId, 5);
      assert.equal(err.referencedBy, `Recording ${uuid(10)}`);
      assert.equal(
        err.message,
        `Tag with id 5 not found (referenced by Recording ${uuid(10)})`
      );
      return true;
    }
  );
});

test("objects converted with toRecord can be looked up by id", () => {
  const tree = buildAdapterTree();
  const user = new User({ uuid: uuid(1), username: "alice" });
  tree.users.toRecord(user);
  assert.equal(tree.users.fromId(0), user);
});

// ═══════════════════════════════════════════════════════════════════════════
// SELF-REFERENCE
// ═══════════════════════════════════════════════════════════════════════════

section("Self-reference");

test("a parent sequence is listed before its child", () => {
  const tree = buildAdapterTree();
  const parent = new Sequence({ uuid: uuid(40) });
  const child = new Sequence({ uuid: uuid(41), parent });
  tree.sequences.toRecord(child);
  assert.deepEqual(
    tree.sequences.values().map((record) => record.uuid),
    [uuid(40), uuid(41)]
  );
  assert.equal(tree.sequences.values()[1]?.parent, uuid(40));
});

test("a sequence that is its own parent fails on export", () => {
  const tree = buildAdapterTree();
  const loop = new Sequence({ uuid: uuid(40) });
  loop.parent = loop;
  assert.throws(
    () => tree.sequences.toRecord(loop),
    (err: unknown) => {
      assert.ok(err instanceof CyclicReferenceError);
      assert.deepEqual(err.chain, [uuid(40), uuid(40)]);
      return true;
    }
  );
});

test("a two-step parent loop fails on export", () => {
  const tree = buildAdapterTree();
  const a = new Sequence({ uuid: uuid(40) });
  const b = new Sequence({ uuid: uuid(41), parent: a });
  a.parent = b;
  assert.throws(() => tree.sequences.toRecord(a), CyclicReferenceError);
});

test("a failed export does not leave the key marked as in progress", () => {
  const tree = buildAdapterTree();
  const loop = new Sequence({ uuid: uuid(40) });
  loop.parent = loop;
  assert.throws(() => tree.sequences.toRecord(loop), CyclicReferenceError);
  loop.parent = undefined;
  assert.equal(tree.sequences.toRecord(loop).uuid, uuid(40));
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
