#!/usr/bin/env node
/**
 * Command line tool for AOEF documents.
 *
 * Usage:
 *   npm run aoef -- inspect <file> [options]
 *   npm run aoef -- validate <file> [options]
 *
 * Commands:
 *   inspect <file>      Print version, collection type and record counts
 *   validate <file>     Load the document fully and report the result
 *
 * Options:
 *   --type <type>       Expected collection type (e.g. dataset, model_run)
 *   --audio-dir <dir>   Directory recording paths are relative to
 *   --json              Output as JSON
 *   --verbose           Print engine log lines to the console
 *   --no-color          Disable ANSI colors
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Invalid arguments, unreadable file or invalid document
 */

import { existsSync, readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import { config, validateConfig } from "../config/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import { adapterForCollection, isCollectionType } from "../aoef/collections/index.js";
import { AoefError, DocumentNotFoundError, MalformedDocumentError, type DocumentIssue } from "../aoef/errors.js";
import type { CollectionType } from "../aoef/schema.js";
import { formatDocumentSummary, load, parseDocument, summarizeDocument } from "../aoef/serialization.js";

// ============================================================
// Types
// ============================================================

export interface CommandOptions {
  json?: boolean;
  color?: boolean;
  expectedType?: CollectionType;
  audioDir?: string;
  logger?: Logger;
}

export interface CommandResult {
  exitCode: 0 | 1;
  /** Text for stdout (success, or any --json output) */
  stdout: string;
  /** Text for stderr */
  stderr: string;
}

interface ErrorReport {
  name: string;
  message: string;
  issues?: DocumentIssue[];
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

type Color = keyof typeof COLORS;

function colorizer(enabled: boolean): (color: Color, text: string) => string {
  return (color, text) => (enabled ? `${COLORS[color]}${text}${COLORS.reset}` : text);
}

function reportError(err: AoefError): ErrorReport {
  if (err instanceof MalformedDocumentError && err.issues.length > 0) {
    return { name: err.name, message: err.message, issues: err.issues };
  }
  return { name: err.name, message: err.message };
}

function failure(err: AoefError, options: CommandOptions): CommandResult {
  if (options.json) {
    return {
      exitCode: 1,
      stdout: JSON.stringify({ valid: false, error: reportError(err) }, null, 2),
      stderr: "",
    };
  }

  const c = colorizer(options.color ?? false);
  const detail = err instanceof MalformedDocumentError ? err.format() : err.message;
  return { exitCode: 1, stdout: "", stderr: `${c("red", "✗")} ${c("bold", err.name)}: ${detail}` };
}

// ============================================================
// Commands
// ============================================================

/**
 * Summarize a document without converting it to domain objects.
 */
export function inspectCommand(path: string, options: CommandOptions = {}): CommandResult {
  if (!existsSync(path)) {
    return failure(new DocumentNotFoundError(path), options);
  }

  const result = parseDocument(readFileSync(path, "utf-8"), options.expectedType);
  if (!result.success) {
    return failure(result.error, options);
  }

  const summary = summarizeDocument(result.document);
  if (options.json) {
    return { exitCode: 0, stdout: JSON.stringify(summary, null, 2), stderr: "" };
  }
  return { exitCode: 0, stdout: formatDocumentSummary(summary), stderr: "" };
}

/**
 * Load a document fully, resolving every reference.
 */
export function validateCommand(path: string, options: CommandOptions = {}): CommandResult {
  try {
    const collection = load(path, {
      expectedType: options.expectedType,
      audioDir: options.audioDir,
      logger: options.logger,
    });
    const collectionType = adapterForCollection(collection).collectionType;

    if (options.json) {
      return {
        exitCode: 0,
        stdout: JSON.stringify({ valid: true, collectionType, uuid: collection.uuid }, null, 2),
        stderr: "",
      };
    }

    const c = colorizer(options.color ?? false);
    return {
      exitCode: 0,
      stdout: `${c("green", "✓")} ${c("bold", collectionType)} ${collection.uuid}: valid`,
      stderr: "",
    };
  } catch (err) {
    if (err instanceof AoefError) {
      return failure(err, options);
    }
    throw err;
  }
}

// ============================================================
// CLI Parsing
// ============================================================

const USAGE = `
Usage: aoef <command> <file> [options]

Commands:
  inspect <file>      Print version, collection type and record counts
  validate <file>     Load the document fully and report the result

Options:
  --type <type>       Expected collection type (e.g. dataset, model_run)
  --audio-dir <dir>   Directory recording paths are relative to
  --json              Output as JSON
  --verbose           Print engine log lines to the console
  --no-color          Disable ANSI colors
  -h, --help          Show this help message
`;

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      type: { type: "string" },
      "audio-dir": { type: "string" },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  return { values, positionals };
}

// ============================================================
// Main
// ============================================================

function emit(result: CommandResult): never {
  if (result.stdout !== "") {
    console.log(result.stdout);
  }
  if (result.stderr !== "") {
    console.error(result.stderr);
  }
  process.exit(result.exitCode);
}

function main(): void {
  validateConfig();
  const { values, positionals } = parseCliArgs();

  if (values.help) {
    console.log(USAGE);
    process.exit(0);
  }

  const [command, path] = positionals;
  if (command === undefined || path === undefined) {
    console.error("Error: a command and a file are required");
    console.error(USAGE);
    process.exit(1);
  }

  let expectedType: CollectionType | undefined;
  if (values.type !== undefined) {
    if (!isCollectionType(values.type)) {
      console.error(`Error: unknown collection type: ${values.type}`);
      process.exit(1);
    }
    expectedType = values.type;
  }

  const options: CommandOptions = {
    json: values.json,
    color: process.stdout.isTTY && !process.env.NO_COLOR && !values["no-color"],
    expectedType,
    audioDir: values["audio-dir"] ?? config.audioDir,
    logger: createLogger({
      console: values.verbose,
      level: values.verbose ? "debug" : config.logLevel,
    }),
  };

  switch (command) {
    case "inspect":
      return emit(inspectCommand(path, options));
    case "validate":
      return emit(validateCommand(path, options));
    default:
      console.error(`Error: unknown command: ${command}`);
      console.error(USAGE);
      process.exit(1);
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("aoef.ts") ||
    process.argv[1].endsWith("aoef.js") ||
    process.argv[1].endsWith("/aoef"));

if (isDirectExecution) {
  try {
    main();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}
