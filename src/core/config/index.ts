// src/core/config/index.ts
// Configuration system exports

export {
  type OutputFormat,
  type AnalysisConfig,
  type OutputConfig,
  type OwnlintConfig,
  type OwnlintConfigInput,
  type ConfigValidation,
  DEFAULT_ANALYSIS_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  disablePasses,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
