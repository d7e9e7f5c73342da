/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: ARITHMOS_* (highest priority, for CI overrides)
 * 2. Config files: arithmos.config.js, .arithmosrc, "arithmos" key in package.json
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@arithmos/core";
 *
 * config.flag("debug");                      // → boolean
 * config.flag("triangle.integerFastPath");   // → true unless disabled
 *
 * config.set({ triangle: { trace: true } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError, type ConfigSource } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Options read by the triangle engines.
 */
export interface TriangleConfig {
  /** Use the O(1) shift-based row sum for integer elements */
  integerFastPath?: boolean;
  /** Print range-sum plans and cache fills */
  trace?: boolean;
}

/**
 * Full arithmos configuration schema.
 */
export interface ArithmosConfig {
  /** Enable debug output for every scope */
  debug?: boolean;
  /** Triangle engine configuration */
  triangle?: TriangleConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

const DEFAULTS: ArithmosConfig = {
  debug: false,
  triangle: {
    integerFastPath: true,
    trace: false,
  },
};

/** Boolean options; their values are checked wherever they come from. */
const BOOLEAN_PATHS = ["debug", "triangle.integerFastPath", "triangle.trace"] as const;

let configStore: ConfigRecord = {};
let programmaticLayer: ConfigRecord = {};
let fileLayer: ConfigRecord = {};
let envLayer: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[parts[i]] = created;
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
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

function validate(values: ConfigRecord, source: ConfigSource): void {
  for (const path of BOOLEAN_PATHS) {
    const value = getNestedValue(values, path);
    if (value !== undefined && typeof value !== "boolean") {
      throw new ConfigError(
        path,
        source,
        `Config option "${path}" must be a boolean, got ${JSON.stringify(value)}`,
      );
    }
  }
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with ARITHMOS_ are parsed into the config object.
 *
 * Examples:
 *   ARITHMOS_DEBUG=1                        → { debug: true }
 *   ARITHMOS_TRIANGLE_INTEGERFASTPATH=0     → { triangle: { integerFastPath: false } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};
  const PREFIX = "ARITHMOS_";

  // Env names are upper case, so known camelCase keys are matched ignoring case.
  const knownPaths = new Map<string, string>(BOOLEAN_PATHS.map((p) => [p.toLowerCase(), p]));

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const lowered = key.slice(PREFIX.length).toLowerCase().replace(/__/g, ".").replace(/_/g, ".");
    const configPath = knownPaths.get(lowered) ?? lowered;

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  validate(envConfig, "env");
  return envConfig;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "arithmos";

/**
 * Load configuration from files. Only the working directory is searched.
 */
function loadConfigFromFiles(): ConfigRecord {
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

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError("", "file", `Failed to load ${MODULE_NAME} config: ${reason}`);
  }

  if (!result || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new ConfigError("", "file", `${result.filepath} must export an object`);
  }

  validate(loaded, "file");
  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  fileLayer = loadConfigFromFiles();
  envLayer = loadConfigFromEnv();
  rebuildStore();
  configLoaded = true;
}

/**
 * Merge: defaults < programmatic < file < env
 */
function rebuildStore(): void {
  configStore = deepMerge(deepMerge(deepMerge(DEFAULTS, programmaticLayer), fileLayer), envLayer);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Read a boolean option. Unset options read as `false`.
 */
function flag(path: string): boolean {
  const value = get(path);
  if (value === undefined) return false;
  if (typeof value !== "boolean") {
    throw new ConfigError(path, "programmatic", `Config option "${path}" is not a boolean`);
  }
  return value;
}

/**
 * Set configuration values programmatically. Config files and env variables
 * still take precedence over them.
 */
function set(values: ArithmosConfig): void {
  initializeConfig();
  validate(values, "programmatic");
  programmaticLayer = deepMerge(programmaticLayer, values);
  rebuildStore();
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = {};
  programmaticLayer = {};
  fileLayer = {};
  envLayer = {};
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  get,
  flag,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Identity helper that type-checks a config file's contents.
 */
export function defineConfig(values: ArithmosConfig): ArithmosConfig {
  return values;
}
