/**
 * Error taxonomy for the exchange engine.
 *
 * Every failure is raised immediately. There is no retry and no partial
 * document recovery: a document either converts completely or not at all.
 */

import type { ZodIssue } from "zod";

/**
 * Base class for every error thrown by the engine.
 */
export class AoefError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AoefError";
  }
}

/**
 * A record references an id that no earlier record in the document defines.
 */
export class MissingReferenceError extends AoefError {
  public readonly referenceType: string;
  public readonly missingId: string | number;
  public readonly referencedBy: string;

  constructor(referenceType: string, missingId: string | number, referencedBy: string) {
    super(`${referenceType} with id ${missingId} not found (referenced by ${referencedBy})`);
    this.name = "MissingReferenceError";
    this.referenceType = referenceType;
    this.missingId = missingId;
    this.referencedBy = referencedBy;
  }
}

/**
 * No registered collection adapter handles the given object or
 * collection_type.
 */
export class UnsupportedTypeError extends AoefError {
  public readonly typeName: string;

  constructor(typeName: string, message?: string) {
    super(message ?? `Unsupported collection type: ${typeName}`);
    this.name = "UnsupportedTypeError";
    this.typeName = typeName;
  }
}

/**
 * The document holds a different collection type than the caller asked for.
 */
export class CollectionTypeMismatchError extends UnsupportedTypeError {
  public readonly expected: string;

  constructor(found: string, expected: string) {
    super(found, `Invalid collection type: ${found} (expected ${expected})`);
    this.name = "CollectionTypeMismatchError";
    this.expected = expected;
  }
}

export class VersionMismatchError extends AoefError {
  public readonly found: string;
  public readonly expected: string;

  constructor(found: string, expected: string) {
    super(`Invalid AOEF version: ${found} (expected ${expected})`);
    this.name = "VersionMismatchError";
    this.found = found;
    this.expected = expected;
  }
}

/**
 * Individual shape violation found while validating a document.
 */
export interface DocumentIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
  /** Zod error code, or "invalid_json" for syntax errors */
  code: string;
}

/**
 * The input is not JSON, or does not have the envelope/record shape.
 */
export class MalformedDocumentError extends AoefError {
  public readonly issues: DocumentIssue[];

  constructor(message: string, issues: DocumentIssue[] = []) {
    super(message);
    this.name = "MalformedDocumentError";
    this.issues = issues;
  }

  /**
   * Format issues for display.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * A sequence is (transitively) its own parent.
 */
export class CyclicReferenceError extends AoefError {
  public readonly chain: string[];

  constructor(chain: string[]) {
    super(`Cyclic sequence parent chain: ${chain.join(" -> ")}`);
    this.name = "CyclicReferenceError";
    this.chain = chain;
  }
}

export class DocumentNotFoundError extends AoefError {
  public readonly path: string;

  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = "DocumentNotFoundError";
    this.path = path;
  }
}

/**
 * Convert Zod issues to our structured format.
 */
export function toDocumentIssues(zodIssues: ZodIssue[]): DocumentIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}
