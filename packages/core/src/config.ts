/**
 * Unified Configuration
 *
 * Tolerances and working precisions used by the orbis packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: ORBIS_* (highest priority, for CI overrides)
 * 2. Config files: .orbisrc, .orbisrc.json, orbis.config.js, etc.
 * 3. package.json: "orbis" key
 * 4. Programmatic: config.set() calls
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@orbis/core";
 *
 * config.getAll().epsilon.double    // → 1e-15
 * config.get("decimal.precision")   // → 34
 * config.set({ debug: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Nearly-zero tolerances, one per scalar representation.
 */
export interface EpsilonConfig {
  double: number;
  single: number;
  decimal: number;
  huge: number;
}

/**
 * Full orbis configuration schema.
 */
export interface OrbisConfig {
  /** Enable debug diagnostics */
  debug: boolean;
  epsilon: EpsilonConfig;
  decimal: {
    /** Fractional digits kept by rounding decimal operations */
    precision: number;
  };
  collision: {
    /** Iteration cap for the convex overlap search */
    maxIterations: number;
  };
}

export type OrbisConfigInput = {
  debug?: boolean;
  epsilon?: Partial<EpsilonConfig>;
  decimal?: Partial<OrbisConfig["decimal"]>;
  collision?: Partial<OrbisConfig["collision"]>;
};

type ConfigTree = { [key: string]: unknown };

// ============================================================================
// Global State
// ============================================================================

const DEFAULTS: OrbisConfig = {
  debug: false,
  epsilon: {
    double: 1e-15,
    single: 1e-6,
    decimal: 1e-15,
    huge: 1e-15,
  },
  decimal: { precision: 34 },
  collision: { maxIterations: 64 },
};

let configStore: ConfigTree = {};
let resolved: OrbisConfig | undefined;
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "orbis";

// ============================================================================
// Utility Functions
// ============================================================================

function isTree(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigTree, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isTree(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
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
    if (!isTree(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    result[key] =
      isTree(sourceValue) && isTree(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

function toTree(config: object): ConfigTree {
  const tree: ConfigTree = {};
  for (const [key, value] of Object.entries(config)) {
    tree[key] = isTree(value) ? toTree(value) : value;
  }
  return tree;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

/**
 * Load configuration synchronously from files.
 */
function loadConfigFromFiles(): ConfigTree {
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
      if (isTree(loaded)) {
        configFilePath = result.filepath;
        return loaded;
      }
    }
  } catch (error) {
    // An unreadable config file leaves the defaults in place.
    if (process.env.NODE_ENV === "development") {
      console.warn(`[orbis] Failed to load config file:`, error);
    }
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

/**
 * Parse ORBIS_ variables into the config object.
 *
 * Double underscore separates nesting levels; a single underscore joins
 * camelCase words:
 *   ORBIS_DEBUG=1                          → { debug: true }
 *   ORBIS_EPSILON__DOUBLE=1e-12            → { epsilon: { double: 1e-12 } }
 *   ORBIS_COLLISION__MAX_ITERATIONS=128    → { collision: { maxIterations: 128 } }
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv): ConfigTree {
  const envConfig: ConfigTree = {};
  const PREFIX = "ORBIS_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) =>
        segment.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase())
      )
      .join(".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (NUMBER_PATTERN.test(value)) {
      parsedValue = Number(value);
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

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > programmatic > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = parseEnvConfig(process.env);

  configStore = deepMerge(
    deepMerge(deepMerge(toTree(DEFAULTS), configStore), fileConfig),
    envConfig
  );
  resolved = undefined;
  configLoaded = true;
}

function readNumber(path: string, fallback: number): number {
  const value = getNestedValue(configStore, path);
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function resolve(): OrbisConfig {
  const debug = getNestedValue(configStore, "debug");
  return {
    debug: debug === true,
    epsilon: {
      double: readNumber("epsilon.double", DEFAULTS.epsilon.double),
      single: readNumber("epsilon.single", DEFAULTS.epsilon.single),
      decimal: readNumber("epsilon.decimal", DEFAULTS.epsilon.decimal),
      huge: readNumber("epsilon.huge", DEFAULTS.epsilon.huge),
    },
    decimal: {
      precision: Math.max(
        1,
        Math.trunc(readNumber("decimal.precision", DEFAULTS.decimal.precision))
      ),
    },
    collision: {
      maxIterations: Math.max(
        1,
        Math.trunc(
          readNumber("collision.maxIterations", DEFAULTS.collision.maxIterations)
        )
      ),
    },
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a raw configuration value by dot-notation path.
 *
 * @example
 * config.get("epsilon.single")  // → 1e-6
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 * Merges with existing configuration.
 */
function set(values: OrbisConfigInput): void {
  configStore = deepMerge(configStore, toTree(values));
  resolved = undefined;
}

/**
 * Get the validated configuration. Values of the wrong type fall back to
 * their defaults.
 */
function getAll(): Readonly<OrbisConfig> {
  initializeConfig();
  resolved ??= resolve();
  return resolved;
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
  resolved = undefined;
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Helper for typed config files.
 *
 * @example
 * ```typescript
 * // orbis.config.mjs
 * import { defineConfig } from "@orbis/core";
 * export default defineConfig({ decimal: { precision: 50 } });
 * ```
 */
export function defineConfig(cfg: OrbisConfigInput): OrbisConfigInput {
  return cfg;
}

export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
  defaults: DEFAULTS,
} as const;
