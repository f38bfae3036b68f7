/**
 * Tests for environment parsing and config validation.
 *
 * Run: node --import tsx src/config/config.test.ts
 */

import { strict as assert } from "node:assert";

import { ConfigError, loadConfig, requireEnv, validateConfig, type AppConfig } from "./index.js";
import { maybeEnv, optionalEnvBool, optionalEnvEnum, optionalEnvInt } from "./env.js";

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

const CONFIG_KEYS = [
  "NODE_ENV",
  "LOG_LEVEL",
  "AOEF_LOG_FILE",
  "AOEF_LOG_DIR",
  "AOEF_AUDIO_DIR",
  "AOEF_JSON_INDENT",
];

/**
 * Run fn with the config variables set to exactly `vars`, then restore them.
 */
function withEnv(vars: Record<string, string>, fn: () => void): void {
  const keys = [...new Set([...CONFIG_KEYS, ...Object.keys(vars)])];
  const saved = new Map(keys.map((key) => [key, process.env[key]]));
  for (const key of keys) {
    delete process.env[key];
  }
  Object.assign(process.env, vars);
  try {
    fn();
  } finally {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

function configError(fn: () => unknown, message: string): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof ConfigError);
    assert.equal(err.message, message);
    return true;
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// ENV HELPERS
// ═══════════════════════════════════════════════════════════════════════════

section("Environment helpers");

test("requireEnv fails on a missing variable", () => {
  withEnv({}, () => {
    configError(() => requireEnv("AOEF_TEST_REQUIRED"), "Missing required environment variable: AOEF_TEST_REQUIRED");
  });
});

test("maybeEnv treats an empty value as unset", () => {
  withEnv({ AOEF_TEST_VALUE: "" }, () => {
    assert.equal(maybeEnv("AOEF_TEST_VALUE"), undefined);
  });
});

test("optionalEnvInt parses integers", () => {
  withEnv({ AOEF_TEST_VALUE: "4" }, () => {
    assert.equal(optionalEnvInt("AOEF_TEST_VALUE", 0), 4);
  });
});

test("optionalEnvInt rejects non-numbers", () => {
  withEnv({ AOEF_TEST_VALUE: "four" }, () => {
    configError(
      () => optionalEnvInt("AOEF_TEST_VALUE", 0),
      "Environment variable AOEF_TEST_VALUE must be a valid integer, got: four"
    );
  });
});

test("optionalEnvBool accepts yes and no in any case", () => {
  withEnv({ AOEF_TEST_VALUE: "YES" }, () => {
    assert.equal(optionalEnvBool("AOEF_TEST_VALUE", false), true);
  });
  withEnv({ AOEF_TEST_VALUE: "no" }, () => {
    assert.equal(optionalEnvBool("AOEF_TEST_VALUE", true), false);
  });
});

test("optionalEnvBool rejects other words", () => {
  withEnv({ AOEF_TEST_VALUE: "maybe" }, () => {
    configError(
      () => optionalEnvBool("AOEF_TEST_VALUE", false),
      "Environment variable AOEF_TEST_VALUE must be a boolean (true/false/1/0/yes/no), got: maybe"
    );
  });
});

test("optionalEnvEnum rejects values outside the set", () => {
  withEnv({ AOEF_TEST_VALUE: "loud" }, () => {
    configError(
      () => optionalEnvEnum("AOEF_TEST_VALUE", ["quiet", "normal"], "normal"),
      "Invalid AOEF_TEST_VALUE: loud. Must be one of: quiet, normal."
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// loadConfig
// ═══════════════════════════════════════════════════════════════════════════

section("loadConfig");

test("defaults apply when nothing is set", () => {
  withEnv({}, () => {
    assert.deepEqual(loadConfig(), {
      env: "development",
      logLevel: "info",
      logToFile: false,
      logDir: "output/logs",
      audioDir: undefined,
      jsonIndent: 0,
    });
  });
});

test("every variable is read", () => {
  withEnv(
    {
      NODE_ENV: "test",
      LOG_LEVEL: "debug",
      AOEF_LOG_FILE: "1",
      AOEF_LOG_DIR: "/tmp/aoef-logs",
      AOEF_AUDIO_DIR: "/data/audio",
      AOEF_JSON_INDENT: "2",
    },
    () => {
      assert.deepEqual(loadConfig(), {
        env: "test",
        logLevel: "debug",
        logToFile: true,
        logDir: "/tmp/aoef-logs",
        audioDir: "/data/audio",
        jsonIndent: 2,
      });
    }
  );
});

test("an unknown log level is rejected", () => {
  withEnv({ LOG_LEVEL: "verbose" }, () => {
    configError(() => loadConfig(), "Invalid LOG_LEVEL: verbose. Must be one of: debug, info, warn, error.");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// validateConfig
// ═══════════════════════════════════════════════════════════════════════════

section("validateConfig");

const base: AppConfig = {
  env: "test",
  logLevel: "info",
  logToFile: false,
  logDir: "output/logs",
  audioDir: undefined,
  jsonIndent: 0,
};

test("indentation within range passes", () => {
  validateConfig({ ...base, jsonIndent: 10 });
});

test("indentation out of range fails", () => {
  configError(
    () => validateConfig({ ...base, jsonIndent: 11 }),
    "Invalid AOEF_JSON_INDENT: 11. Must be between 0 and 10."
  );
  configError(
    () => validateConfig({ ...base, jsonIndent: -1 }),
    "Invalid AOEF_JSON_INDENT: -1. Must be between 0 and 10."
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
