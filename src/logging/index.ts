/**
 * Logging and observability utilities.
 */

export { generateSessionId } from "./session-id.js";
export {
  createLogger,
  formatLogEntry,
  type Logger,
  type LogContext,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
