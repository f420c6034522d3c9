/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for lawkit.
 * Configuration is resolved from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority, merged over everything loaded)
 * 2. Environment variables: LAWKIT_*
 * 3. Config files: lawkit.config.js, .lawkitrc, .lawkitrc.json, etc.
 * 4. package.json: "lawkit" key
 * 5. Defaults (lowest priority)
 *
 * `config.reset()` drops programmatic values; the next read loads the other
 * sources again.
 *
 * @example
 * ```typescript
 * import { config } from "@lawkit/core";
 *
 * config.get("log.level")         // → "warn"
 * config.get("tags.disabled")     // → ["strawman"]
 *
 * config.set({ explorer: { sampleSize: 16 } });
 * ```
 *
 * @example Config file (lawkit.config.js)
 * ```typescript
 * import { defineConfig } from "@lawkit/core";
 *
 * export default defineConfig({
 *   log: { level: "debug" },
 *   tags: { disabled: ["strawman"] },
 * });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogConfig {
  /** Minimum level that reaches the console */
  level?: LogLevel;
}

export interface TagsConfig {
  /** Tags that never block compatibility, whatever a law asks of them */
  disabled?: string[];
}

export interface ExplorerConfig {
  /** Default number of index vectors drawn by Explorer#sample */
  sampleSize?: number;
}

/**
 * Full lawkit configuration schema.
 */
export interface LawkitConfig {
  /** Enable debug mode (lowers the log threshold to "debug") */
  debug?: boolean;
  log?: LogConfig;
  tags?: TagsConfig;
  explorer?: ExplorerConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: LawkitConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with LAWKIT_ are parsed into the config object.
 *
 * Examples:
 *   LAWKIT_DEBUG=1                   → { debug: true }
 *   LAWKIT_LOG_LEVEL=info            → { log: { level: "info" } }
 *   LAWKIT_EXPLORER_SAMPLESIZE=10    → { explorer: { sampleSize: 10 } }
 */
function loadConfigFromEnv(): LawkitConfig {
  const envConfig: LawkitConfig = {};
  const PREFIX = "LAWKIT_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  // Env paths are lowercased; restore the camelCase keys lawkit reads.
  const explorer = envConfig.explorer;
  if (isRecord(explorer) && "samplesize" in explorer) {
    explorer.sampleSize = explorer.samplesize;
    delete explorer.samplesize;
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  if (value.includes(",")) return value.split(",").map((s) => s.trim());
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

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
    if (!isRecord(current)) return undefined;
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence). Arrays are replaced, not merged.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) continue;

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

const MODULE_NAME = "lawkit";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): LawkitConfig {
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
        `.${MODULE_NAME}rc.mjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
        `${MODULE_NAME}.config.mjs`,
      ],
    });

    const result = explorer.search();
    if (result && !result.isEmpty) {
      const loaded: unknown = result.config;
      if (isRecord(loaded)) {
        configFilePath = result.filepath;
        return loaded;
      }
      console.warn(`[lawkit] Ignoring ${result.filepath}: configuration must be an object`);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    console.warn(`[lawkit] Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: LawkitConfig = {
    debug: false,
    log: { level: "warn" },
    tags: { disabled: [] },
    explorer: { sampleSize: 64 },
  };

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 *
 * @param path - Dot-notation path (e.g., "log.level", "debug")
 * @returns The configuration value, or undefined if not set
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 * Merges with existing configuration.
 *
 * @example
 * config.set({ debug: true });
 * config.set({ tags: { disabled: ["strawman"] } });
 */
function set(values: Partial<LawkitConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
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
function getAll(): Readonly<LawkitConfig> {
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
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Typed accessors
// ============================================================================

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

function getLogLevel(): LogLevel {
  if (get("debug") === true) return "debug";
  const level = get("log.level");
  return isLogLevel(level) ? level : "warn";
}

function getDisabledTags(): readonly string[] {
  const disabled = get("tags.disabled");
  if (typeof disabled === "string") return [disabled];
  if (!Array.isArray(disabled)) return [];
  return disabled.filter((d): d is string => typeof d === "string");
}

function getSampleSize(): number {
  const size = get("explorer.sampleSize");
  return typeof size === "number" && Number.isInteger(size) && size > 0 ? size : 64;
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
  reset,
  getLogLevel,
  getDisabledTags,
  getSampleSize,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: LawkitConfig): LawkitConfig {
  return cfg;
}
