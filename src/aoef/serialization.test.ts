/**
 * Tests for the document envelope: validation order, file I/O and the
 * typed loaders.
 *
 * Run: node --import tsx src/aoef/serialization.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { Dataset, ModelRun } from "../data/index.js";
import {
  CollectionTypeMismatchError,
  DocumentNotFoundError,
  MalformedDocumentError,
  UnsupportedTypeError,
  VersionMismatchError,
} from "./errors.js";
import { AOEF_VERSION } from "./schema.js";
import {
  deserializeDocument,
  formatDocumentSummary,
  load,
  loadDataset,
  loadModelRun,
  parseDocument,
  save,
  serializeDocument,
  summarizeDocument,
  toDocument,
  type ParseResult,
} from "./serialization.js";
import { buildGraph, CREATED_ON, makeRecording, silentLogger, uuid } from "./test-fixtures.js";

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

const logger = silentLogger();
const workDir = mkdtempSync(join(tmpdir(), "aoef-serialization-"));

function sampleDataset(): Dataset {
  return new Dataset({
    uuid: uuid(100),
    name: "Test dataset",
    recordings: [buildGraph().recording, makeRecording(12)],
    createdOn: CREATED_ON,
  });
}

function errorOf(result: ParseResult): Error {
  if (result.success) {
    throw new Error("expected the document to be rejected");
  }
  return result.error;
}

function envelope(version: unknown, data: Record<string, unknown>): string {
  return JSON.stringify({ version, created_on: "2024-03-01T12:00:00Z", data });
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION ORDER
// ═══════════════════════════════════════════════════════════════════════════

section("Validation");

test("syntax errors are reported as malformed JSON", () => {
  const error = errorOf(parseDocument("{"));
  assert.ok(error instanceof MalformedDocumentError);
  assert.equal(error.issues.length, 1);
  assert.equal(error.issues[0]?.code, "invalid_json");
});

test("a missing envelope field is reported with its path", () => {
  const error = errorOf(parseDocument(JSON.stringify({ data: { collection_type: "dataset" } })));
  assert.ok(error instanceof MalformedDocumentError);
  assert.deepEqual(
    error.issues.map((issue) => issue.path),
    [["version"]]
  );
});

test("any other version is rejected", () => {
  const error = errorOf(parseDocument(envelope("0.0.1", { collection_type: "dataset" })));
  assert.ok(error instanceof VersionMismatchError);
  assert.equal(error.found, "0.0.1");
  assert.equal(error.expected, "1.1.0");
  assert.equal(error.message, "Invalid AOEF version: 0.0.1 (expected 1.1.0)");
});

test("the version is checked before the record shape", () => {
  const error = errorOf(
    parseDocument(envelope("2.0.0", { collection_type: "dataset", recordings: "not a list" }))
  );
  assert.ok(error instanceof VersionMismatchError);
});

test("numeric versions are compared as strings", () => {
  const error = errorOf(parseDocument(envelope(1.1, { collection_type: "dataset" })));
  assert.ok(error instanceof VersionMismatchError);
  assert.equal(error.found, "1.1");
});

test("unregistered collection types are rejected", () => {
  const error = errorOf(parseDocument(envelope(AOEF_VERSION, { collection_type: "playlist" })));
  assert.ok(error instanceof UnsupportedTypeError);
  assert.equal(error.typeName, "playlist");
});

test("the expected type is checked before the record shape", () => {
  const error = errorOf(
    parseDocument(envelope(AOEF_VERSION, { collection_type: "dataset" }), "model_run")
  );
  assert.ok(error instanceof CollectionTypeMismatchError);
  assert.equal(error.message, "Invalid collection type: dataset (expected model_run)");
});

test("shape errors carry the path of the invalid field", () => {
  const error = errorOf(
    parseDocument(envelope(AOEF_VERSION, { collection_type: "dataset", uuid: uuid(1), name: "d" }))
  );
  assert.ok(error instanceof MalformedDocumentError);
  assert.deepEqual(
    error.issues.map((issue) => issue.path),
    [["data", "recordings"]]
  );
  assert.equal(error.format().split("\n")[1], "  - data.recordings: Required");
});

test("timestamps without a UTC offset are accepted", () => {
  const result = parseDocument(
    JSON.stringify({
      version: AOEF_VERSION,
      created_on: "2024-03-01T12:00:00.123456",
      data: { collection_type: "recording_set", uuid: uuid(1), recordings: [] },
    })
  );
  assert.equal(result.success, true);
});

test("a valid document parses", () => {
  const json = serializeDocument(toDocument(sampleDataset(), { logger }));
  const result = parseDocument(json, "dataset");
  assert.ok(result.success);
  assert.equal(result.document.version, AOEF_VERSION);
  assert.equal(result.document.data.uuid, uuid(100));
});

// ═══════════════════════════════════════════════════════════════════════════
// SERIALIZATION
// ═══════════════════════════════════════════════════════════════════════════

section("Serialization");

test("documents are compact unless an indent is given", () => {
  const document = toDocument(sampleDataset(), { logger });
  assert.equal(serializeDocument(document, 0).includes("\n"), false);
  assert.ok(serializeDocument(document, 2).startsWith(`{\n  "version": "${AOEF_VERSION}"`));
});

test("deserializeDocument rebuilds the collection", () => {
  const dataset = sampleDataset();
  const json = serializeDocument(toDocument(dataset, { logger }));
  assert.deepStrictEqual(deserializeDocument(json, { logger }), dataset);
});

test("deserializeDocument throws the validation error", () => {
  assert.throws(
    () => deserializeDocument(envelope("0.0.1", { collection_type: "dataset" }), { logger }),
    VersionMismatchError
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// FILE I/O
// ═══════════════════════════════════════════════════════════════════════════

section("Files");

test("save creates missing directories", () => {
  const path = join(workDir, "nested", "deeper", "dataset.json");
  const written = save(sampleDataset(), path, { logger });
  assert.equal(written, path);
  assert.ok(existsSync(path));
});

test("save writes the requested indentation", () => {
  const path = join(workDir, "indented.json");
  save(sampleDataset(), path, { logger, indent: 2 });
  assert.ok(readFileSync(path, "utf-8").startsWith(`{\n  "version": "${AOEF_VERSION}",\n  "created_on": `));
});

test("save then load returns an equal collection", () => {
  const dataset = sampleDataset();
  const path = join(workDir, "roundtrip.json");
  save(dataset, path, { logger });
  assert.deepStrictEqual(load(path, { logger }), dataset);
});

test("recording paths are stored relative to the audio directory", () => {
  const dataset = new Dataset({ uuid: uuid(100), name: "paths", recordings: [makeRecording(12)] });
  const path = join(workDir, "relative.json");
  save(dataset, path, { logger, audioDir: "/audio" });

  const result = parseDocument(readFileSync(path, "utf-8"), "dataset");
  assert.ok(result.success);
  assert.equal(result.document.data.collection_type, "dataset");
  if (result.document.data.collection_type === "dataset") {
    assert.equal(result.document.data.recordings[0]?.path, "site-a/rec-12.wav");
  }

  const loaded = loadDataset(path, { logger, audioDir: "/mnt/audio" });
  assert.equal(loaded.recordings[0]?.path, "/mnt/audio/site-a/rec-12.wav");
});

test("loading a missing file fails with the path", () => {
  const path = join(workDir, "absent.json");
  assert.throws(
    () => load(path, { logger }),
    (err: unknown) => {
      assert.ok(err instanceof DocumentNotFoundError);
      assert.equal(err.path, path);
      return true;
    }
  );
});

test("only .json files are loaded", () => {
  const path = join(workDir, "notes.txt");
  writeFileSync(path, "{}", "utf-8");
  assert.throws(
    () => load(path, { logger }),
    (err: unknown) => {
      assert.ok(err instanceof MalformedDocumentError);
      assert.equal(err.message, "Invalid file type: .txt");
      return true;
    }
  );
});

section("Typed loaders");

test("loadDataset returns a Dataset", () => {
  const path = join(workDir, "typed.json");
  save(sampleDataset(), path, { logger });
  const dataset = loadDataset(path, { logger });
  assert.ok(dataset instanceof Dataset);
  assert.equal(dataset.name, "Test dataset");
});

test("loading with the wrong expected type fails", () => {
  const path = join(workDir, "typed.json");
  save(sampleDataset(), path, { logger });
  assert.throws(
    () => loadModelRun(path, { logger }),
    (err: unknown) => {
      assert.ok(err instanceof CollectionTypeMismatchError);
      assert.equal(err.message, "Invalid collection type: dataset (expected model_run)");
      return true;
    }
  );
});

test("loadModelRun returns a ModelRun", () => {
  const path = join(workDir, "run.json");
  save(new ModelRun({ uuid: uuid(102), name: "detector", version: "2.0" }), path, { logger });
  const run = loadModelRun(path, { logger });
  assert.ok(run instanceof ModelRun);
  assert.equal(run.version, "2.0");
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

section("Summary");

test("summaries count every list", () => {
  const result = parseDocument(serializeDocument(toDocument(sampleDataset(), { logger })));
  assert.ok(result.success);
  const summary = summarizeDocument(result.document);
  assert.equal(summary.collectionType, "dataset");
  assert.equal(summary.uuid, uuid(100));
  assert.deepEqual(summary.counts, { recordings: 2, tags: 1, users: 2 });
});

test("formatted summaries list one count per line", () => {
  const text = formatDocumentSummary({
    version: AOEF_VERSION,
    collectionType: "recording_set",
    uuid: uuid(1),
    createdOn: "2024-03-01T12:00:00.000Z",
    counts: { recordings: 3 },
  });
  assert.deepEqual(text.split("\n"), [
    "=== AOEF Document ===",
    "Version: 1.1.0",
    "Type: recording_set",
    `UUID: ${uuid(1)}`,
    "Created: 2024-03-01T12:00:00.000Z",
    "",
    "--- Records ---",
    "  recordings: 3",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// Cleanup
// ═══════════════════════════════════════════════════════════════════════════

rmSync(workDir, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
