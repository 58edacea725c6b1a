/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for the pegcode packages and CLI.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: PEGCODE_* (highest priority, for CI overrides)
 * 2. Config files: pegcode.config.js, .pegcoderc, .pegcoderc.json, etc.
 * 3. package.json: "pegcode" key
 * 4. Programmatic: config.set() calls
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@pegcode/core";
 *
 * config.get("vm.maxSteps")        // → 10000000
 * config.resolved().verbose        // → false
 *
 * config.set({ vm: { maxSteps: 5000 } });
 * ```
 *
 * @example Config file (pegcode.config.js)
 * ```typescript
 * import { defineConfig } from "@pegcode/core";
 *
 * export default defineConfig({
 *   verbose: true,
 *   emit: { format: "module" },
 * });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/** Output format for serialized programs. */
export type EmitFormat = "json" | "module";

/**
 * Virtual machine configuration.
 */
export interface VmConfig {
  /** Upper bound on executed instructions per run */
  maxSteps?: number;
}

/**
 * Program emission configuration.
 */
export interface EmitConfig {
  /** "json" = plain JSON document, "module" = ES module exporting it */
  format?: EmitFormat;
}

/**
 * Full pegcode configuration schema.
 */
export interface PegcodeConfig {
  /** Log debug lines */
  verbose?: boolean;
  vm?: VmConfig;
  emit?: EmitConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

/** Configuration with every known option filled in. */
export interface ResolvedConfig {
  readonly verbose: boolean;
  readonly vm: { readonly maxSteps: number };
  readonly emit: { readonly format: EmitFormat };
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  verbose: false,
  vm: { maxSteps: 10_000_000 },
  emit: { format: "json" },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "pegcode";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations, starting at
 * `searchFrom` (default: the working directory).
 */
function loadConfigFromFiles(searchFrom?: string): Record<string, unknown> {
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
    result = explorer.search(searchFrom);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(searchFrom ?? process.cwd(), `could not be loaded: ${detail}`);
  }
  if (result && !result.isEmpty) {
    const loaded: unknown = result.config;
    if (!isRecord(loaded)) {
      throw new ConfigError(result.filepath, "must be an object");
    }
    configFilePath = result.filepath;
    return loaded;
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with PEGCODE_ are parsed into the config object.
 *
 * Examples:
 *   PEGCODE_VERBOSE=1            → { verbose: true }
 *   PEGCODE_VM__MAX_STEPS=5000   → { vm: { maxSteps: 5000 } }
 *   PEGCODE_EMIT__FORMAT=module  → { emit: { format: "module" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "PEGCODE_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore nests, single underscore joins words in camelCase
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) => segment.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase()))
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
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaultsRecord(): Record<string, unknown> {
  return {
    verbose: DEFAULT_CONFIG.verbose,
    vm: { ...DEFAULT_CONFIG.vm },
    emit: { ...DEFAULT_CONFIG.emit },
  };
}

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > programmatic > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  configStore = deepMerge(deepMerge(deepMerge(defaultsRecord(), configStore), fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 *
 * @param path - Dot-notation path (e.g., "vm.maxSteps", "verbose")
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
 * config.set({ verbose: true });
 * config.set({ vm: { maxSteps: 1000 } });
 */
function set(values: PegcodeConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Get all known options, falling back to defaults where a source holds a
 * value of the wrong type.
 */
function resolved(): ResolvedConfig {
  initializeConfig();
  const verbose = get("verbose");
  const maxSteps = get("vm.maxSteps");
  const format = get("emit.format");
  return {
    verbose: typeof verbose === "boolean" ? verbose : DEFAULT_CONFIG.verbose,
    vm: {
      maxSteps:
        typeof maxSteps === "number" && Number.isInteger(maxSteps) && maxSteps > 0
          ? maxSteps
          : DEFAULT_CONFIG.vm.maxSteps,
    },
    emit: {
      format: format === "json" || format === "module" ? format : DEFAULT_CONFIG.emit.format,
    },
  };
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
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  resolved,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: PegcodeConfig): PegcodeConfig {
  return cfg;
}

export { loadConfigFromEnv as parseEnvConfig, loadConfigFromFiles as readConfigFiles };
