// src/core/config/config.ts
// Dispatch configuration: defaults, environment, JSON files, overrides

import * as fs from "fs";
import * as path from "path";
import type { Diagnostic } from "../../outcome/diagnostic";
import { type Failure, failure } from "../../outcome/failure";
import { makeDiagnostic } from "../../outcome/codes";

// =========================================================================
// Configuration Types
// =========================================================================

/**
 * What to do when a call supplies fewer positional arguments than a
 * method declares specs:
 * - lenient: trailing specs are not evaluated (the entry may still match)
 * - strict: the entry does not match
 */
export type ArityPolicy = "lenient" | "strict";

export type DispatchConfig = {
  /** Handling of calls shorter than a method's spec list */
  arityPolicy: ArityPolicy;
  /** Record register/dispatch events in the ledger */
  trace: boolean;
  /** Ledger capacity; oldest events are dropped first */
  maxEvents: number;
  /** Object depth shown when previewing arguments in errors */
  previewDepth: number;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: DispatchConfig = {
  arityPolicy: "lenient",
  trace: false,
  maxEvents: 1000,
  previewDepth: 2,
};

export const DEFAULT_CONFIG_FILES = ["multimethods.config.json", ".multimethodsrc.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

function isArityPolicy(x: unknown): x is ArityPolicy {
  return x === "lenient" || x === "strict";
}

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === "") return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
}

function parseCount(raw: string | undefined, min: number): number | undefined {
  const n = parseInt(raw || "", 10);
  return Number.isInteger(n) && n >= min ? n : undefined;
}

/**
 * Load configuration from environment variables (`MULTIMETHODS_*`).
 */
export function configFromEnv(prefix = "MULTIMETHODS"): DispatchConfig {
  const policy = process.env[`${prefix}_ARITY_POLICY`];
  const arityPolicy = isArityPolicy(policy) ? policy : DEFAULT_CONFIG.arityPolicy;
  const trace = parseBool(process.env[`${prefix}_TRACE`]) ?? DEFAULT_CONFIG.trace;
  const maxEvents = parseCount(process.env[`${prefix}_MAX_EVENTS`], 1) ?? DEFAULT_CONFIG.maxEvents;
  const previewDepth = parseCount(process.env[`${prefix}_PREVIEW_DEPTH`], 0) ?? DEFAULT_CONFIG.previewDepth;

  return { arityPolicy, trace, maxEvents, previewDepth };
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): DispatchConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject({ ...data });
}

function pick(data: Record<string, unknown>, camel: string, snake: string): unknown {
  return data[camel] ?? data[snake];
}

/**
 * Create configuration from a plain object (e.g., parsed JSON).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): DispatchConfig {
  const policy = pick(data, "arityPolicy", "arity_policy");
  const trace = data.trace;
  const maxEvents = pick(data, "maxEvents", "max_events");
  const previewDepth = pick(data, "previewDepth", "preview_depth");

  return {
    arityPolicy: isArityPolicy(policy) ? policy : DEFAULT_CONFIG.arityPolicy,
    trace: typeof trace === "boolean" ? trace : DEFAULT_CONFIG.trace,
    maxEvents: typeof maxEvents === "number" ? maxEvents : DEFAULT_CONFIG.maxEvents,
    previewDepth: typeof previewDepth === "number" ? previewDepth : DEFAULT_CONFIG.previewDepth,
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Array<Partial<DispatchConfig> | undefined>): DispatchConfig {
  let result: DispatchConfig = { ...DEFAULT_CONFIG };

  for (const cfg of configs) {
    if (!cfg) continue;
    result = {
      arityPolicy: cfg.arityPolicy ?? result.arityPolicy,
      trace: cfg.trace ?? result.trace,
      maxEvents: cfg.maxEvents ?? result.maxEvents,
      previewDepth: cfg.previewDepth ?? result.previewDepth,
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: Partial<DispatchConfig>;
}): DispatchConfig {
  let config = configFromEnv();

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
  diagnostics: Diagnostic[];
};

export function validateConfig(config: DispatchConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const diagnostics: Diagnostic[] = [];

  const reject = (field: keyof DispatchConfig, message: string): void => {
    errors.push(message);
    diagnostics.push(makeDiagnostic("C0001", { field, value: String(config[field]) }));
  };

  if (!isArityPolicy(config.arityPolicy)) {
    reject("arityPolicy", `arityPolicy must be "lenient" or "strict", got ${String(config.arityPolicy)}`);
  }

  if (!Number.isInteger(config.maxEvents) || config.maxEvents < 1) {
    reject("maxEvents", `maxEvents must be a positive integer, got ${config.maxEvents}`);
  }

  if (!Number.isInteger(config.previewDepth) || config.previewDepth < 0) {
    reject("previewDepth", `previewDepth must be a non-negative integer, got ${config.previewDepth}`);
  }

  if (config.maxEvents > 100_000) {
    warnings.push(`maxEvents is very high (${config.maxEvents}); the ledger is kept in memory`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    diagnostics,
  };
}

/**
 * ConfigError: a configuration failed validation.
 */
export class ConfigError extends Error {
  constructor(public readonly failure: Failure) {
    super(failure.message);
    this.name = "ConfigError";
  }
}

/**
 * Validate a config, throwing ConfigError if it has errors.
 */
export function assertValidConfig(config: DispatchConfig): DispatchConfig {
  const check = validateConfig(config);
  if (!check.valid) {
    throw new ConfigError(
      failure("invalid-config", `Invalid dispatch config: ${check.errors.join("; ")}`, {
        diagnostics: check.diagnostics,
        context: { config },
      })
    );
  }
  return config;
}

// =========================================================================
// Active Configuration
// =========================================================================

let activeConfig: DispatchConfig = configFromEnv();

/**
 * Process-wide configuration read by generic functions declared without
 * their own overrides. Starts from the `MULTIMETHODS_*` environment.
 */
export function getActiveConfig(): DispatchConfig {
  return activeConfig;
}

export function setActiveConfig(config: Partial<DispatchConfig>): DispatchConfig {
  activeConfig = assertValidConfig(mergeConfigs(activeConfig, config));
  return activeConfig;
}

/**
 * Back to the configuration the environment describes.
 */
export function resetActiveConfig(): void {
  activeConfig = configFromEnv();
}
