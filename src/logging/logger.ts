/**
 * Lightweight logging utility.
 * Outputs to the console and, optionally, a log file, with timestamps and
 * the session ID of the save or load call being logged.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { config, type LogLevel } from "../config/index.js";

export type { LogLevel } from "../config/index.js";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /**
   * Logger that writes to the same outputs, tagging every line with the
   * given session ID.
   */
  child(session: string): Logger;
}

function defaultOptions(): Required<LoggerOptions> {
  return {
    level: config.logLevel,
    logDir: config.logDir,
    logFile: "aoef.log",
    console: true,
    file: config.logToFile,
  };
}

/**
 * Format a log entry with timestamp, level, session ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  session: string | undefined,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${session ?? "-"}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance. Unset options come from the application config.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: Required<LoggerOptions> = { ...defaultOptions(), ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  // Ensure log directory exists
  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(
    level: LogLevel,
    session: string | undefined,
    message: string,
    context?: LogContext
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, session, message, context);

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  function bind(session: string | undefined): Logger {
    return {
      debug: (message, context) => log("debug", session, message, context),
      info: (message, context) => log("info", session, message, context),
      warn: (message, context) => log("warn", session, message, context),
      error: (message, context) => log("error", session, message, context),
      child: (childSession) => bind(childSession),
    };
  }

  return bind(undefined);
}
