/**
 * Public API: the acoustic domain model and the AOEF exchange engine.
 */

export * from "./data/index.js";
export * from "./aoef/index.js";
export { createLogger, generateSessionId, type Logger, type LoggerOptions } from "./logging/index.js";
export { ConfigError, loadConfig, validateConfig, type AppConfig } from "./config/index.js";
