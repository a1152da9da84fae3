// src/core/config/index.ts
// Configuration system exports

export {
  type ArityPolicy,
  type DispatchConfig,
  type ConfigValidation,
  ConfigError,
  assertValidConfig,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  getActiveConfig,
  setActiveConfig,
  resetActiveConfig,
} from "./config";
