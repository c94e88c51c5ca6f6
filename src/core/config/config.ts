// src/core/config/config.ts
// Configuration system for the archive loader

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type LoaderConfig = {
  /** Device every tensor is placed on, overriding recorded locations */
  device?: string;
  /** Hand legacy-format containers to an injected importer */
  allowLegacy: boolean;
  /** Lowest accepted value of the container's version record */
  minVersion: number;
  /** Highest accepted value of the container's version record */
  maxVersion: number;
  /** Interpreter stack limit per archive */
  maxStackDepth: number;
  /** Print trace events to the console when no trace sink is given */
  trace: boolean;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: LoaderConfig = {
  allowLegacy: true,
  minVersion: 1,
  maxVersion: 2,
  maxStackDepth: 1_000_000,
  trace: false,
};

export const DEFAULT_CONFIG_FILES = ["graph-archive.config.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

function parseIntOr(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw ?? "", 10);
  return Number.isNaN(n) ? fallback : n;
}

function parseBoolOr(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") return fallback;
  return raw === "1" || raw.toLowerCase() === "true" || raw.toLowerCase() === "yes";
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "GRAPH_ARCHIVE", env: NodeJS.ProcessEnv = process.env): LoaderConfig {
  return {
    device: env[`${prefix}_DEVICE`] || undefined,
    allowLegacy: parseBoolOr(env[`${prefix}_ALLOW_LEGACY`], DEFAULT_CONFIG.allowLegacy),
    minVersion: parseIntOr(env[`${prefix}_MIN_VERSION`], DEFAULT_CONFIG.minVersion),
    maxVersion: parseIntOr(env[`${prefix}_MAX_VERSION`], DEFAULT_CONFIG.maxVersion),
    maxStackDepth: parseIntOr(env[`${prefix}_MAX_STACK_DEPTH`], DEFAULT_CONFIG.maxStackDepth),
    trace: parseBoolOr(env[`${prefix}_TRACE`], DEFAULT_CONFIG.trace),
  };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): Partial<LoaderConfig> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw new Error(`Config file must hold a JSON object: ${filePath}`);
  }
  return configFromObject(Object.fromEntries(Object.entries(data)));
}

/**
 * Create configuration from a plain object (e.g., parsed JSON). Keys may be
 * camelCase or snake_case; unknown keys and mistyped values are ignored.
 */
export function configFromObject(data: Record<string, unknown>): Partial<LoaderConfig> {
  const pick = (camel: string, snake: string): unknown => data[camel] ?? data[snake];
  const str = (v: unknown): string | undefined => (typeof v === "string" ? v : undefined);
  const num = (v: unknown): number | undefined => (typeof v === "number" ? v : undefined);
  const bool = (v: unknown): boolean | undefined => (typeof v === "boolean" ? v : undefined);

  const candidate: Partial<LoaderConfig> = {
    device: str(pick("device", "device")),
    allowLegacy: bool(pick("allowLegacy", "allow_legacy")),
    minVersion: num(pick("minVersion", "min_version")),
    maxVersion: num(pick("maxVersion", "max_version")),
    maxStackDepth: num(pick("maxStackDepth", "max_stack_depth")),
    trace: bool(pick("trace", "trace")),
  };

  const result: Partial<LoaderConfig> = {};
  for (const [key, value] of Object.entries(candidate)) {
    if (value !== undefined) Object.assign(result, { [key]: value });
  }
  return result;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(base: LoaderConfig, ...configs: Partial<LoaderConfig>[]): LoaderConfig {
  let result = { ...base };
  for (const cfg of configs) {
    result = { ...result, ...cfg };
  }
  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: Partial<LoaderConfig>;
  env?: NodeJS.ProcessEnv;
}): LoaderConfig {
  let config = configFromEnv("GRAPH_ARCHIVE", options?.env);

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    for (const p of DEFAULT_CONFIG_FILES) {
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: LoaderConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.minVersion) || !Number.isInteger(config.maxVersion)) {
    errors.push("minVersion and maxVersion must be integers");
  } else if (config.minVersion > config.maxVersion) {
    errors.push(`minVersion ${config.minVersion} is above maxVersion ${config.maxVersion}`);
  }
  if (!Number.isInteger(config.maxStackDepth) || config.maxStackDepth < 1) {
    errors.push("maxStackDepth must be a positive integer");
  } else if (config.maxStackDepth < 1000) {
    warnings.push("maxStackDepth is very low, large lists may fail to load");
  }
  if (config.device !== undefined && config.device.trim() === "") {
    errors.push("device must not be empty");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
