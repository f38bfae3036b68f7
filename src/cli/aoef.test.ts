/**
 * Tests for the AOEF command line tool and the logger it drives.
 *
 * Run: node --import tsx src/cli/aoef.test.ts
 *
 * Tests cover:
 *   1. inspect - summaries as text and JSON, error paths
 *   2. validate - full loads, expected types, error reports
 *   3. Logging - entry format, levels, file output
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { Dataset } from "../data/index.js";
import { save } from "../aoef/serialization.js";
import { makeRecording, silentLogger, uuid } from "../aoef/test-fixtures.js";
import { createLogger, formatLogEntry, generateSessionId } from "../logging/index.js";
import { inspectCommand, validateCommand } from "./aoef.js";

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
const workDir = mkdtempSync(join(tmpdir(), "aoef-cli-"));

const datasetPath = join(workDir, "dataset.json");
save(new Dataset({ uuid: uuid(100), name: "cli", recordings: [makeRecording(12)] }), datasetPath, {
  logger,
});

function writeRaw(name: string, content: string): string {
  const path = join(workDir, name);
  writeFileSync(path, content, "utf-8");
  return path;
}

const oldVersionPath = writeRaw(
  "old.json",
  JSON.stringify({ version: "0.0.1", created_on: "2024-03-01T12:00:00Z", data: { collection_type: "dataset" } })
);

const noRecordingsPath = writeRaw(
  "no-recordings.json",
  JSON.stringify({
    version: "1.1.0",
    created_on: "2024-03-01T12:00:00Z",
    data: { collection_type: "dataset", uuid: uuid(100), name: "cli" },
  })
);

// ═══════════════════════════════════════════════════════════════════════════
// INSPECT
// ═══════════════════════════════════════════════════════════════════════════

section("inspect");

test("prints the header and record counts", () => {
  const result = inspectCommand(datasetPath);
  assert.equal(result.exitCode, 0);
  assert.equal(result.stderr, "");

  const lines = result.stdout.split("\n");
  assert.deepEqual(lines.slice(0, 4), [
    "=== AOEF Document ===",
    "Version: 1.1.0",
    "Type: dataset",
    `UUID: ${uuid(100)}`,
  ]);
  assert.deepEqual(lines.slice(5), ["", "--- Records ---", "  recordings: 1"]);
});

test("--json prints the summary object", () => {
  const result = inspectCommand(datasetPath, { json: true });
  assert.equal(result.exitCode, 0);
  const summary: unknown = JSON.parse(result.stdout);
  assert.ok(typeof summary === "object" && summary !== null);
  assert.ok("counts" in summary && "collectionType" in summary);
  assert.deepEqual(summary.counts, { recordings: 1 });
  assert.equal(summary.collectionType, "dataset");
});

test("a missing file is reported on stderr", () => {
  const path = join(workDir, "absent.json");
  const result = inspectCommand(path);
  assert.equal(result.exitCode, 1);
  assert.equal(result.stdout, "");
  assert.equal(result.stderr, `✗ DocumentNotFoundError: File not found: ${path}`);
});

test("a version mismatch is reported", () => {
  const result = inspectCommand(oldVersionPath);
  assert.equal(result.exitCode, 1);
  assert.equal(result.stderr, "✗ VersionMismatchError: Invalid AOEF version: 0.0.1 (expected 1.1.0)");
});

test("invalid JSON is reported as malformed", () => {
  const result = inspectCommand(writeRaw("broken.json", "{"));
  assert.equal(result.exitCode, 1);
  assert.ok(result.stderr.startsWith("✗ MalformedDocumentError: Failed to parse AOEF JSON: "));
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATE
// ═══════════════════════════════════════════════════════════════════════════

section("validate");

test("a valid document passes", () => {
  const result = validateCommand(datasetPath, { logger });
  assert.equal(result.exitCode, 0);
  assert.equal(result.stdout, `✓ dataset ${uuid(100)}: valid`);
  assert.equal(result.stderr, "");
});

test("colors wrap the mark and the type", () => {
  const result = validateCommand(datasetPath, { logger, color: true });
  assert.equal(result.stdout, `\x1b[32m✓\x1b[0m \x1b[1mdataset\x1b[0m ${uuid(100)}: valid`);
});

test("--json reports the type and uuid", () => {
  const result = validateCommand(datasetPath, { logger, json: true });
  assert.equal(result.exitCode, 0);
  assert.deepEqual(JSON.parse(result.stdout), {
    valid: true,
    collectionType: "dataset",
    uuid: uuid(100),
  });
});

test("--type must match the document", () => {
  const result = validateCommand(datasetPath, { logger, expectedType: "model_run" });
  assert.equal(result.exitCode, 1);
  assert.equal(
    result.stderr,
    "✗ CollectionTypeMismatchError: Invalid collection type: dataset (expected model_run)"
  );
});

test("shape errors list each issue", () => {
  const result = validateCommand(noRecordingsPath, { logger });
  assert.equal(result.exitCode, 1);
  assert.deepEqual(result.stderr.split("\n"), [
    "✗ MalformedDocumentError: Invalid dataset document",
    "  - data.recordings: Required",
  ]);
});

test("--json failures carry the issues on stdout", () => {
  const result = validateCommand(noRecordingsPath, { logger, json: true });
  assert.equal(result.exitCode, 1);
  assert.equal(result.stderr, "");
  assert.deepEqual(JSON.parse(result.stdout), {
    valid: false,
    error: {
      name: "MalformedDocumentError",
      message: "Invalid dataset document",
      issues: [{ path: ["data", "recordings"], message: "Required", code: "invalid_type" }],
    },
  });
});

test("--json failures without issues omit the field", () => {
  const result = validateCommand(oldVersionPath, { logger, json: true });
  assert.deepEqual(JSON.parse(result.stdout), {
    valid: false,
    error: {
      name: "VersionMismatchError",
      message: "Invalid AOEF version: 0.0.1 (expected 1.1.0)",
    },
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// LOGGING
// ═══════════════════════════════════════════════════════════════════════════

section("Logging");

test("log entries carry level, session and context", () => {
  const entry = formatLogEntry("warn", "20240301-a1b2c3", "Saved document", { path: "/x.json" });
  assert.match(
    entry,
    /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN \] \[20240301-a1b2c3\] Saved document \{"path":"\/x\.json"\}$/
  );
});

test("entries without a session or context stay short", () => {
  const entry = formatLogEntry("info", undefined, "Loaded document", {});
  assert.match(entry, /^\[[^\]]+\] \[INFO \] \[-\] Loaded document$/);
});

test("session ids have a date prefix and a random suffix", () => {
  assert.match(generateSessionId(), /^\d{8}-[0-9a-f]{6}$/);
});

test("file output respects the level and tags child sessions", () => {
  const logDir = join(workDir, "logs");
  const fileLogger = createLogger({ console: false, file: true, logDir, logFile: "test.log", level: "info" });
  fileLogger.debug("hidden");
  fileLogger.child("session-1").info("shown", { n: 1 });

  const lines = readFileSync(join(logDir, "test.log"), "utf-8").trimEnd().split("\n");
  assert.equal(lines.length, 1);
  assert.ok(lines[0]?.endsWith('[INFO ] [session-1] shown {"n":1}'));
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
