// src/core/config/config.ts
// Configuration system for sexpsat

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type ReaderConfig = {
  /** Reject lists left open at end of input */
  strictLists: boolean;
};

export type ElaborationConfig = {
  /** Read decimals other than "n.0" as exact rationals */
  fractionalNumerals: boolean;
};

export type SolverConfig = {
  /** Per-check timeout in milliseconds; 0 disables it */
  timeoutMs: number;
  /** Request a model after a sat verdict */
  produceModels: boolean;
};

export type TraceConfig = {
  /** Write the diagnostic trace to stderr */
  enabled: boolean;
};

export type SexpsatConfig = {
  reader: ReaderConfig;
  elaboration: ElaborationConfig;
  solver: SolverConfig;
  trace: TraceConfig;
};

export type ConfigOverrides = {
  [K in keyof SexpsatConfig]?: Partial<SexpsatConfig[K]>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_READER_CONFIG: ReaderConfig = {
  strictLists: false,
};

export const DEFAULT_ELABORATION_CONFIG: ElaborationConfig = {
  fractionalNumerals: true,
};

export const DEFAULT_SOLVER_CONFIG: SolverConfig = {
  timeoutMs: 0,
  produceModels: false,
};

export const DEFAULT_TRACE_CONFIG: TraceConfig = {
  enabled: true,
};

export const DEFAULT_CONFIG: SexpsatConfig = {
  reader: DEFAULT_READER_CONFIG,
  elaboration: DEFAULT_ELABORATION_CONFIG,
  solver: DEFAULT_SOLVER_CONFIG,
  trace: DEFAULT_TRACE_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["sexpsat.config.json", "sexpsat.config.yaml", "sexpsat.config.yml"];

// =========================================================================
// Configuration Loading
// =========================================================================

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  const v = value.toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
}

function envInt(value: string | undefined): number | undefined {
  const n = parseInt(value || "", 10);
  return Number.isNaN(n) ? undefined : n;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "SEXPSAT", env: NodeJS.ProcessEnv = process.env): SexpsatConfig {
  return {
    reader: {
      strictLists: envFlag(env[`${prefix}_STRICT_LISTS`]) ?? DEFAULT_READER_CONFIG.strictLists,
    },
    elaboration: {
      fractionalNumerals: envFlag(env[`${prefix}_FRACTIONAL_NUMERALS`]) ?? DEFAULT_ELABORATION_CONFIG.fractionalNumerals,
    },
    solver: {
      timeoutMs: envInt(env[`${prefix}_SOLVER_TIMEOUT_MS`]) ?? DEFAULT_SOLVER_CONFIG.timeoutMs,
      produceModels: envFlag(env[`${prefix}_PRODUCE_MODELS`]) ?? DEFAULT_SOLVER_CONFIG.produceModels,
    },
    trace: {
      enabled: envFlag(env[`${prefix}_TRACE`]) ?? DEFAULT_TRACE_CONFIG.enabled,
    },
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): ConfigOverrides {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  return configFromObject(isRecord(data) ? data : {});
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = data[key];
  return isRecord(v) ? v : {};
}

/** First of the given keys holding a value of the wanted type (camelCase or snake_case). */
function pick<T>(obj: Record<string, unknown>, keys: string[], guard: (v: unknown) => v is T): T | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (guard(v)) return v;
  }
  return undefined;
}

const isBool = (v: unknown): v is boolean => typeof v === "boolean";
const isNum = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v);

/**
 * Create a partial configuration from a plain object (e.g., from parsed JSON/YAML).
 * Unknown keys and values of the wrong type are ignored.
 */
export function configFromObject(data: Record<string, unknown>): ConfigOverrides {
  const readerData = section(data, "reader");
  const elaborationData = section(data, "elaboration");
  const solverData = section(data, "solver");
  const traceData = section(data, "trace");

  const out: ConfigOverrides = {};

  const strictLists = pick(readerData, ["strictLists", "strict_lists"], isBool);
  if (strictLists !== undefined) out.reader = { strictLists };

  const fractionalNumerals = pick(elaborationData, ["fractionalNumerals", "fractional_numerals"], isBool);
  if (fractionalNumerals !== undefined) out.elaboration = { fractionalNumerals };

  const timeoutMs = pick(solverData, ["timeoutMs", "timeout_ms"], isNum);
  const produceModels = pick(solverData, ["produceModels", "produce_models"], isBool);
  if (timeoutMs !== undefined || produceModels !== undefined) {
    const solver: Partial<SolverConfig> = {};
    if (timeoutMs !== undefined) solver.timeoutMs = timeoutMs;
    if (produceModels !== undefined) solver.produceModels = produceModels;
    out.solver = solver;
  }

  const enabled = pick(traceData, ["enabled"], isBool);
  if (enabled !== undefined) out.trace = { enabled };

  return out;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(base: SexpsatConfig, ...configs: ConfigOverrides[]): SexpsatConfig {
  let result: SexpsatConfig = { ...base };

  for (const cfg of configs) {
    result = {
      reader: { ...result.reader, ...cfg.reader },
      elaboration: { ...result.elaboration, ...cfg.elaboration },
      solver: { ...result.solver, ...cfg.solver },
      trace: { ...result.trace, ...cfg.trace },
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: CLI overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigOverrides;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): SexpsatConfig {
  // Start with env config (includes defaults)
  let config = configFromEnv("SEXPSAT", options?.env ?? process.env);

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
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
// YAML subset: "section:" lines holding indented "key: value" lines
// =========================================================================

function yamlScalar(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  let current: Record<string, unknown> | undefined;

  for (const rawLine of content.split("\n")) {
    const line = rawLine.replace(/\s+#.*$/, "");
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;
    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();
    const nested = /^\s/.test(line);

    if (!nested) {
      if (value === "") {
        current = {};
        result[key] = current;
      } else {
        current = undefined;
        result[key] = yamlScalar(value);
      }
    } else if (current) {
      current[key] = yamlScalar(value);
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: SexpsatConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.solver.timeoutMs < 0) {
    errors.push("solver.timeoutMs must not be negative");
  } else if (config.solver.timeoutMs > 0 && config.solver.timeoutMs < 10) {
    warnings.push("solver.timeoutMs is very low, most checks will come back unknown");
  }

  if (!config.elaboration.fractionalNumerals) {
    warnings.push("fractional numerals disabled: decimals other than n.0 are rejected");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
