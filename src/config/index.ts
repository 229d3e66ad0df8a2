// src/config/index.ts
// Configuration system exports

export {
  type LogConfig,
  type VariantConfig,
  type PartialVariantConfig,
  type ConfigValidation,
  DEFAULT_LOG_CONFIG,
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
