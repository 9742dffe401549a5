/**
 * Configuration
 *
 * Loaded lazily on first read, from (in priority order):
 *
 * 1. Programmatic: `config.set()` calls (applied over everything loaded)
 * 2. Environment variables: ANY_OF_DEBUG, ANY_OF_LOG_LEVEL, ANY_OF_ERRORS_SHOW_VALUE
 * 3. Config files: .anyofrc, .anyofrc.json, anyof.config.js, package.json "anyof" key, ...
 * 4. Defaults
 *
 * @example
 * ```typescript
 * import { config } from "any-of";
 *
 * config.set({ errors: { showValue: true } });
 * AnyOf.newRight(2).unwrapLeft();
 * // ExtractionError: called `unwrapLeft` on a value with no left slot: Right(2)
 * ```
 *
 * @example Config file (.anyofrc.json)
 * ```json
 * { "log": { "level": "debug" } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { logger } from "./logging.js";

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

/**
 * Configuration as written by users (every key optional).
 */
export type AnyOfConfig = {
  /** Log everything, regardless of `log.level` */
  debug?: boolean;
  log?: {
    level?: LogLevel;
  };
  errors?: {
    /** Append the offending value to generic extraction failure messages */
    showValue?: boolean;
  };
};

/**
 * Configuration after defaults are applied.
 */
export type ResolvedConfig = {
  readonly debug: boolean;
  readonly log: { readonly level: LogLevel };
  readonly errors: { readonly showValue: boolean };
};

const DEFAULTS: ResolvedConfig = {
  debug: false,
  log: { level: "warn" },
  errors: { showValue: false },
};

// ============================================================================
// Global State
// ============================================================================

let rawStore: Record<string, unknown> = {};
let resolved: ResolvedConfig = DEFAULTS;
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;
  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "anyof";

interface FileLoadResult {
  readonly config: Record<string, unknown>;
  readonly error?: unknown;
}

/**
 * An ES module config file (`export default defineConfig({...})`) can load as
 * its module namespace.
 */
function unwrapDefaultExport(loaded: unknown): unknown {
  return isRecord(loaded) && "default" in loaded ? loaded.default : loaded;
}

function loadConfigFromFiles(searchFrom: string): FileLoadResult {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      const loaded = unwrapDefaultExport(result.config);
      configFilePath = result.filepath;
      return { config: isRecord(loaded) ? loaded : {} };
    }
  } catch (error) {
    return { config: {}, error };
  }

  return { config: {} };
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_KEYS: Readonly<Record<string, string>> = {
  ANY_OF_DEBUG: "debug",
  ANY_OF_LOG_LEVEL: "log.level",
  ANY_OF_ERRORS_SHOW_VALUE: "errors.showValue",
};

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, path] of Object.entries(ENV_KEYS)) {
    const value = process.env[key];
    if (value === undefined) continue;
    setNestedValue(envConfig, path, parseEnvValue(value));
  }

  return envConfig;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Read the known keys out of a merged raw store. Values of the wrong type
 * fall back to the defaults.
 */
function resolve(raw: Record<string, unknown>): ResolvedConfig {
  const debug = getNestedValue(raw, "debug");
  const level = getNestedValue(raw, "log.level");
  const showValue = getNestedValue(raw, "errors.showValue");

  return {
    debug: typeof debug === "boolean" ? debug : DEFAULTS.debug,
    log: { level: isLogLevel(level) ? level : DEFAULTS.log.level },
    errors: {
      showValue: typeof showValue === "boolean" ? showValue : DEFAULTS.errors.showValue,
    },
  };
}

function initializeConfig(searchFrom: string = process.cwd()): void {
  if (configLoaded) return;

  const fileResult = loadConfigFromFiles(searchFrom);
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  rawStore = deepMerge(deepMerge(DEFAULTS, fileResult.config), envConfig);
  resolved = resolve(rawStore);
  configLoaded = true;

  if (fileResult.error !== undefined) {
    logger.debug("Failed to load config file:", fileResult.error);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-notation path (e.g. "log.level").
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(resolved, path);
}

/**
 * Merge configuration values over the current ones.
 */
function set(values: AnyOfConfig): void {
  initializeConfig();
  rawStore = deepMerge(rawStore, values);
  resolved = resolve(rawStore);
}

function getAll(): ResolvedConfig {
  initializeConfig();
  return resolved;
}

/**
 * Path of the config file that was loaded, if any.
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Drop everything loaded so far; the next read loads again.
 */
function reset(): void {
  rawStore = {};
  resolved = DEFAULTS;
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Reset and load again, searching for config files from `directory`.
 */
function loadFrom(directory: string): ResolvedConfig {
  reset();
  initializeConfig(directory);
  return resolved;
}

export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
  loadFrom,
};

/**
 * Identity helper for typed config files.
 */
export function defineConfig(value: AnyOfConfig): AnyOfConfig {
  return value;
}
