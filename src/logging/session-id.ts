/**
 * Session ID generation.
 * Each save or load call gets its own session ID so that the log lines of
 * one document can be told apart from the next.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique session ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateSessionId(): string {
  const now = new Date();
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}
