// src/core/config/index.ts
// Configuration system exports

export {
  type ReaderConfig,
  type ElaborationConfig,
  type SolverConfig,
  type TraceConfig,
  type SexpsatConfig,
  type ConfigOverrides,
  type ConfigValidation,
  DEFAULT_READER_CONFIG,
  DEFAULT_ELABORATION_CONFIG,
  DEFAULT_SOLVER_CONFIG,
  DEFAULT_TRACE_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
