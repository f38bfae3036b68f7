/**
 * Document envelope: conversion between collections and AOEF documents,
 * and the only module that touches the filesystem.
 *
 * Every public call builds a fresh adapter tree and a session logger, so no
 * state survives from one document to the next.
 *
 * VALIDATION ORDER:
 * Input is checked in a fixed order so that the most useful error wins:
 *
 * 1. JSON syntax
 * 2. Envelope header (version, data.collection_type)
 * 3. Version, which must equal AOEF_VERSION exactly
 * 4. collection_type is registered
 * 5. collection_type matches the caller's expected type, if any
 * 6. Full record shape
 *
 * FILE I/O:
 * `save` creates missing parent directories. `load` only reads files ending
 * in `.json`.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, extname } from "node:path";
import {
  AnnotationProject,
  AnnotationSet,
  Dataset,
  Evaluation,
  EvaluationSet,
  ModelRun,
  PredictionSet,
  RecordingSet,
  type DataCollection,
} from "../data/collections.js";
import { config } from "../config/index.js";
import { createLogger, generateSessionId, type Logger } from "../logging/index.js";
import { buildAdapterTree } from "./builder.js";
import { adapterForCollection, adapterForType, isCollectionType } from "./collections/index.js";
import {
  AoefError,
  CollectionTypeMismatchError,
  DocumentNotFoundError,
  MalformedDocumentError,
  UnsupportedTypeError,
  VersionMismatchError,
  toDocumentIssues,
} from "./errors.js";
import { toTimestamp } from "./adapters/fields.js";
import {
  AOEF_VERSION,
  AoefDocumentSchema,
  EnvelopeHeaderSchema,
  type AoefDocument,
  type CollectionType,
} from "./schema.js";

export interface ExportOptions {
  /** Recording paths are stored relative to this directory */
  audioDir?: string;
  logger?: Logger;
}

export interface SaveOptions extends ExportOptions {
  /** Indentation of the written JSON; 0 writes it compact */
  indent?: number;
}

export interface LoadOptions {
  /** Relative recording paths are resolved against this directory */
  audioDir?: string;
  /** Fail unless the document holds this collection type */
  expectedType?: CollectionType;
  logger?: Logger;
}

export type ParseResult =
  | { success: true; document: AoefDocument }
  | { success: false; error: AoefError };

let defaultLogger: Logger | undefined;

function sessionLogger(logger: Logger | undefined): Logger {
  if (logger !== undefined) {
    return logger.child(generateSessionId());
  }
  defaultLogger ??= createLogger();
  return defaultLogger.child(generateSessionId());
}

// ═══════════════════════════════════════════════════════════════════════════
// EXPORT
// ═══════════════════════════════════════════════════════════════════════════

function exportDocument(collection: DataCollection, audioDir: string | undefined, log: Logger): AoefDocument {
  const adapter = adapterForCollection(collection);
  log.debug("Exporting collection", { collectionType: adapter.collectionType, uuid: collection.uuid });

  const tree = buildAdapterTree({ audioDir });
  const data = adapter.toObject(collection, tree);

  return {
    version: AOEF_VERSION,
    created_on: toTimestamp(new Date()),
    data,
  };
}

/**
 * Convert a collection to an AOEF document.
 *
 * @throws UnsupportedTypeError if no adapter handles the collection's class
 */
export function toDocument(collection: DataCollection, options: ExportOptions = {}): AoefDocument {
  const log = sessionLogger(options.logger);
  return exportDocument(collection, options.audioDir ?? config.audioDir, log);
}

/**
 * Serialize a document to a JSON string.
 *
 * @param indent - Spaces of indentation; 0 writes compact JSON
 */
export function serializeDocument(document: AoefDocument, indent = config.jsonIndent): string {
  return JSON.stringify(document, null, indent > 0 ? indent : undefined);
}

/**
 * Save a collection to a JSON file, creating parent directories as needed.
 *
 * @returns The path written
 */
export function save(collection: DataCollection, path: string, options: SaveOptions = {}): string {
  const log = sessionLogger(options.logger);
  const document = exportDocument(collection, options.audioDir ?? config.audioDir, log);

  const directory = dirname(path);
  if (!existsSync(directory)) {
    log.debug("Creating directory", { directory });
    mkdirSync(directory, { recursive: true });
  }

  writeFileSync(path, serializeDocument(document, options.indent), "utf-8");

  log.info("Saved document", {
    path,
    collectionType: document.data.collection_type,
    uuid: document.data.uuid,
  });
  return path;
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Validate an already-parsed JSON value as an AOEF document.
 */
export function validateDocument(value: unknown, expectedType?: CollectionType): ParseResult {
  const header = EnvelopeHeaderSchema.safeParse(value);
  if (!header.success) {
    return {
      success: false,
      error: new MalformedDocumentError(
        "Invalid AOEF document envelope",
        toDocumentIssues(header.error.issues)
      ),
    };
  }

  const version = String(header.data.version);
  if (version !== AOEF_VERSION) {
    return { success: false, error: new VersionMismatchError(version, AOEF_VERSION) };
  }

  const collectionType = header.data.data.collection_type;
  if (!isCollectionType(collectionType)) {
    return { success: false, error: new UnsupportedTypeError(collectionType) };
  }

  if (expectedType !== undefined && collectionType !== expectedType) {
    return { success: false, error: new CollectionTypeMismatchError(collectionType, expectedType) };
  }

  const result = AoefDocumentSchema.safeParse(value);
  if (!result.success) {
    return {
      success: false,
      error: new MalformedDocumentError(
        `Invalid ${collectionType} document`,
        toDocumentIssues(result.error.issues)
      ),
    };
  }

  return { success: true, document: result.data };
}

/**
 * Parse and validate a JSON string as an AOEF document.
 */
export function parseDocument(input: string, expectedType?: CollectionType): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(input);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      success: false,
      error: new MalformedDocumentError(`Failed to parse AOEF JSON: ${message}`, [
        { path: [], message, code: "invalid_json" },
      ]),
    };
  }

  return validateDocument(parsed, expectedType);
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPORT
// ═══════════════════════════════════════════════════════════════════════════

function importDocument(result: ParseResult, audioDir: string | undefined, log: Logger): DataCollection {
  if (!result.success) {
    throw result.error;
  }

  const { data } = result.document;
  log.debug("Importing collection", { collectionType: data.collection_type, uuid: data.uuid });

  const tree = buildAdapterTree({ audioDir });
  return adapterForType(data.collection_type).fromObject(data, tree);
}

/**
 * Rebuild a collection from a parsed AOEF document.
 *
 * @param document - Parsed JSON value; it is validated before conversion
 * @throws VersionMismatchError, UnsupportedTypeError, MalformedDocumentError
 *   or MissingReferenceError
 */
export function fromDocument(document: unknown, options: LoadOptions = {}): DataCollection {
  const log = sessionLogger(options.logger);
  log.debug("Validating document");
  return importDocument(
    validateDocument(document, options.expectedType),
    options.audioDir ?? config.audioDir,
    log
  );
}

/**
 * Rebuild a collection from a JSON string.
 */
export function deserializeDocument(json: string, options: LoadOptions = {}): DataCollection {
  const log = sessionLogger(options.logger);
  log.debug("Validating document", { bytes: json.length });
  return importDocument(
    parseDocument(json, options.expectedType),
    options.audioDir ?? config.audioDir,
    log
  );
}

/**
 * Load a collection from an AOEF JSON file.
 *
 * @throws DocumentNotFoundError if the file does not exist
 * @throws MalformedDocumentError if the path is not a .json file
 */
export function load(path: string, options: LoadOptions = {}): DataCollection {
  const log = sessionLogger(options.logger);

  if (!existsSync(path)) {
    throw new DocumentNotFoundError(path);
  }

  const extension = extname(path);
  if (extension.toLowerCase() !== ".json") {
    throw new MalformedDocumentError(`Invalid file type: ${extension || "(none)"}`);
  }

  log.debug("Reading document", { path });
  const json = readFileSync(path, "utf-8");
  const collection = importDocument(
    parseDocument(json, options.expectedType),
    options.audioDir ?? config.audioDir,
    log
  );

  log.info("Loaded document", { path, uuid: collection.uuid });
  return collection;
}

// ═══════════════════════════════════════════════════════════════════════════
// TYPED LOADERS
// ═══════════════════════════════════════════════════════════════════════════

type TypedLoadOptions = Omit<LoadOptions, "expectedType">;

function typedLoader<C extends DataCollection>(
  collectionType: CollectionType,
  collectionClass: new (...args: never[]) => C
): (path: string, options?: TypedLoadOptions) => C {
  return (path, options = {}) => {
    const collection = load(path, { ...options, expectedType: collectionType });
    if (!(collection instanceof collectionClass)) {
      throw new CollectionTypeMismatchError(collection.constructor.name, collectionType);
    }
    return collection;
  };
}

export const loadRecordingSet = typedLoader("recording_set", RecordingSet);
export const loadDataset = typedLoader("dataset", Dataset);
export const loadAnnotationSet = typedLoader("annotation_set", AnnotationSet);
export const loadAnnotationProject = typedLoader("annotation_project", AnnotationProject);
export const loadEvaluationSet = typedLoader("evaluation_set", EvaluationSet);
export const loadPredictionSet = typedLoader("prediction_set", PredictionSet);
export const loadModelRun = typedLoader("model_run", ModelRun);
export const loadEvaluation = typedLoader("evaluation", Evaluation);

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

export interface DocumentSummary {
  version: string;
  collectionType: CollectionType;
  uuid: string;
  createdOn: string;
  /** Record count of every list in the collection, in document order */
  counts: Record<string, number>;
}

export function summarizeDocument(document: AoefDocument): DocumentSummary {
  const counts: Record<string, number> = {};
  for (const [key, value] of Object.entries(document.data)) {
    if (Array.isArray(value)) {
      counts[key] = value.length;
    }
  }

  return {
    version: document.version,
    collectionType: document.data.collection_type,
    uuid: document.data.uuid,
    createdOn: document.created_on,
    counts,
  };
}

/**
 * Create a human-readable summary of a document.
 */
export function formatDocumentSummary(summary: DocumentSummary): string {
  const lines: string[] = [
    "=== AOEF Document ===",
    `Version: ${summary.version}`,
    `Type: ${summary.collectionType}`,
    `UUID: ${summary.uuid}`,
    `Created: ${summary.createdOn}`,
    "",
    "--- Records ---",
  ];

  const entries = Object.entries(summary.counts);
  if (entries.length === 0) {
    lines.push("  (none)");
  }
  for (const [key, count] of entries) {
    lines.push(`  ${key}: ${count}`);
  }

  return lines.join("\n");
}
