/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, maybeEnv, optionalEnv, optionalEnvBool, optionalEnvEnum, optionalEnvInt } from "./env.js";

export { ConfigError, requireEnv } from "./env.js";

export const ENVIRONMENTS = ["development", "production", "test"] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** JSON.stringify ignores indentation above this */
export const MAX_JSON_INDENT = 10;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: Environment;
  readonly logLevel: LogLevel;
  /** Also append log lines to a file under logDir */
  readonly logToFile: boolean;
  readonly logDir: string;
  /** Default audio directory for recording paths */
  readonly audioDir: string | undefined;
  /** Indentation of written documents; 0 writes compact JSON */
  readonly jsonIndent: number;
}

/**
 * Load configuration from the environment.
 * Throws ConfigError on values that cannot be parsed.
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnvEnum("NODE_ENV", ENVIRONMENTS, "development"),
    logLevel: optionalEnvEnum("LOG_LEVEL", LOG_LEVELS, "info"),
    logToFile: optionalEnvBool("AOEF_LOG_FILE", false),
    logDir: optionalEnv("AOEF_LOG_DIR", "output/logs"),
    audioDir: maybeEnv("AOEF_AUDIO_DIR"),
    jsonIndent: optionalEnvInt("AOEF_JSON_INDENT", 0),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Check value ranges that parsing alone does not catch.
 * Call this at application startup to fail fast.
 */
export function validateConfig(cfg: AppConfig = config): void {
  if (cfg.jsonIndent < 0 || cfg.jsonIndent > MAX_JSON_INDENT) {
    throw new ConfigError(
      `Invalid AOEF_JSON_INDENT: ${cfg.jsonIndent}. Must be between 0 and ${MAX_JSON_INDENT}.`
    );
  }
}
