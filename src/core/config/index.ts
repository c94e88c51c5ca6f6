// src/core/config/index.ts
// Configuration system exports

export {
  type LoaderConfig,
  type ConfigValidation,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
