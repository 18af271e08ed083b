// src/core/config/index.ts
// Configuration system exports

export {
  type LLMProvider,
  type LLMConfig,
  type CompilerConfig,
  type NarrativeConfig,
  type PartialNarrativeConfig,
  type ConfigValidation,
  LLM_PROVIDERS,
  DEFAULT_MODELS,
  DEFAULT_LLM_CONFIG,
  DEFAULT_COMPILER_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  isProvider,
  getApiKeyFromEnv,
  partialConfigFromEnv,
  configFromEnv,
  partialConfigFromObject,
  configFromObject,
  configFromFile,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
  assertValidConfig,
} from "./config";
