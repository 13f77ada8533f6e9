/**
 * Unified Configuration System
 *
 * Capability flags and debug settings for @wary/core, loaded from (in
 * priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: WARY_* (for CI overrides)
 * 3. Config files: .waryrc, .waryrc.json, wary.config.js, etc.
 * 4. package.json: "wary" key
 * 5. Defaults (lowest priority)
 *
 * Capability flags are read when an Input is created and stay fixed for every
 * Reader, error and context chain derived from it.
 *
 * @example
 * ```typescript
 * import { config } from "@wary/core";
 *
 * config.get("debug")                 // → boolean
 * config.get("features.fullContext")  // → boolean
 * config.features()                   // → Features
 * ```
 *
 * @example Config file (.waryrc.json)
 * ```json
 * { "features": { "fullContext": false, "unicode": true } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { debug, warn } from "./log.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Capability flags. Disabling any of them still yields a correct core, only
 * a less informative one.
 */
export interface Features {
  /** Boundary shortfalls on unbound input are reported as retryable. */
  readonly retry: boolean;
  /** Errors keep every context frame instead of the innermost span only. */
  readonly fullContext: boolean;
  /** Scans use the engine's native search instead of a byte-by-byte loop. */
  readonly fastScan: boolean;
  /** Diagnostic columns are measured in display width. */
  readonly unicode: boolean;
}

/**
 * Full wary configuration schema.
 */
export interface WaryConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Capability flags */
  features?: Partial<Features>;
  /** Custom user configuration */
  [key: string]: unknown;
}

export const DEFAULT_FEATURES: Features = Object.freeze({
  retry: true,
  fullContext: true,
  fastScan: true,
  unicode: true,
});

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let resolvedFeatures: Features | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
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
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };

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

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "wary";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): Record<string, unknown> {
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

    const result = explorer.search();
    if (result && !result.isEmpty) {
      const loaded: unknown = result.config;
      if (isRecord(loaded)) {
        configFilePath = result.filepath;
        return loaded;
      }
    }
  } catch (error) {
    // Unreadable config files fall back to defaults
    warn(`Failed to load config file: ${error instanceof Error ? error.message : String(error)}`);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with WARY_ are parsed into the config object.
 *
 * Examples:
 *   WARY_DEBUG=1                         → { debug: true }
 *   WARY_FEATURES__FULL_CONTEXT=0        → { features: { fullContext: false } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "WARY_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;
    // Colour switch for the renderer, not a config path
    if (key === "WARY_NO_COLOR") continue;

    // Double underscore __ becomes nested object separator
    const configPath = key
      .slice(PREFIX.length)
      .split("__")
      .map((segment) =>
        segment.toLowerCase().replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase()),
      )
      .join(".");

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

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: Record<string, unknown> = {
    debug: false,
    features: { ...DEFAULT_FEATURES },
  };

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults, loadConfigFromFiles()), loadConfigFromEnv());
  configLoaded = true;
  if (configFilePath !== undefined) debug(`config loaded from ${configFilePath}`);
}

function flag(path: string, fallback: boolean): boolean {
  const value = getNestedValue(configStore, path);
  return typeof value === "boolean" ? value : fallback;
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
 * Set configuration values programmatically.
 */
function set(values: WaryConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
  resolvedFeatures = undefined;
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
 * Resolved capability flags. Non-boolean values fall back to the defaults.
 */
function features(): Features {
  initializeConfig();
  if (!resolvedFeatures) {
    resolvedFeatures = Object.freeze({
      retry: flag("features.retry", DEFAULT_FEATURES.retry),
      fullContext: flag("features.fullContext", DEFAULT_FEATURES.fullContext),
      fastScan: flag("features.fastScan", DEFAULT_FEATURES.fastScan),
      unicode: flag("features.unicode", DEFAULT_FEATURES.unicode),
    });
  }
  return resolvedFeatures;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  resolvedFeatures = undefined;
}

/**
 * Features for one parse: the configured flags with `overrides` applied.
 */
export function resolveFeatures(overrides?: Partial<Features>): Features {
  const base = features();
  if (!overrides) return base;
  return Object.freeze({
    retry: overrides.retry ?? base.retry,
    fullContext: overrides.fullContext ?? base.fullContext,
    fastScan: overrides.fastScan ?? base.fastScan,
    unicode: overrides.unicode ?? base.unicode,
  });
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  features,
  reset,
} as const;
