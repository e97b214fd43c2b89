/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: SEQFLOW_* (for CI overrides)
 * 3. Config files: package.json#seqflow, .seqflowrc, seqflow.config.cjs, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@seqflow/core";
 *
 * config.getBoolean("debug", false);                           // → boolean
 * config.getChoice("uniq.strategy", ["compare", "hash"], "compare");
 *
 * config.set({ uniq: { strategy: "hash" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/** How `uniq()` detects repeated values. */
export type UniqStrategy = "compare" | "hash";

/** Whether `splitBy()` emits empty groups. */
export type SplitEmptyMode = "keep" | "drop";

/**
 * Full seqflow configuration schema.
 */
export interface SeqflowConfig {
  /** Print debug output from the sequence engine */
  debug?: boolean;
  uniq?: {
    strategy?: UniqStrategy;
  };
  split?: {
    /** "keep" emits empty groups between adjacent tokens; "drop" omits empty groups */
    empty?: SplitEmptyMode;
  };
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

const MODULE_NAME = "seqflow";
const ENV_PREFIX = "SEQFLOW_";

let configStore: Record<string, unknown> = {};
let programmatic: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

function defaults(): SeqflowConfig {
  return {
    debug: false,
    uniq: { strategy: "compare" },
    split: { empty: "keep" },
  };
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge plain objects (right takes precedence). Arrays are replaced.
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
// Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 *   SEQFLOW_DEBUG=1              → { debug: true }
 *   SEQFLOW_UNIQ_STRATEGY=hash   → { uniq: { strategy: "hash" } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");

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

  return envConfig;
}

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  let found: unknown;
  try {
    const result = explorer.search();
    if (result === null || result.isEmpty) return {};
    configFilePath = result.filepath;
    found = result.config;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[${MODULE_NAME}:config] ignoring unreadable config file: ${reason}`);
    return {};
  }

  if (!isRecord(found)) {
    console.warn(`[${MODULE_NAME}:config] ${configFilePath ?? "config file"} does not export an object`);
    return {};
  }
  return found;
}

function initializeConfig(): void {
  if (configLoaded) return;

  // defaults < file < env < config.set()
  configStore = deepMerge(
    deepMerge(deepMerge(defaults(), loadConfigFromFiles()), loadConfigFromEnv()),
    programmatic
  );
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Read a boolean flag. Values that are not booleans yield `fallback`.
 */
function getBoolean(path: string, fallback: boolean): boolean {
  const value = get(path);
  return typeof value === "boolean" ? value : fallback;
}

/**
 * Read one of a fixed set of string values. Anything else warns and yields
 * `fallback`.
 */
function getChoice<C extends string>(path: string, choices: readonly C[], fallback: C): C {
  const value = get(path);
  if (value === undefined) return fallback;

  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    console.warn(
      `[${MODULE_NAME}:config] ${path} must be one of ${choices.join(", ")}; got ${String(value)}, using ${fallback}`
    );
    return fallback;
  }
  return match;
}

/**
 * Set configuration values programmatically.
 */
function set(values: SeqflowConfig): void {
  initializeConfig();
  programmatic = deepMerge(programmatic, values);
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Path of the config file that was loaded, if any.
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Drop everything, including config.set() values. The next read reloads
 * files and environment (mainly for testing).
 */
function reset(): void {
  configStore = {};
  programmatic = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Export: config object
// ============================================================================

export const config = {
  get,
  getBoolean,
  getChoice,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: SeqflowConfig): SeqflowConfig {
  return cfg;
}
