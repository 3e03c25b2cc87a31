/**
 * Config Module
 *
 * Programmatic config access; CLI users go through `cqa config`.
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  ChunkingConfigSchema,
  SearchConfigSchema,
  SessionConfigSchema,
  AgentConfigSchema,
  LLMProviderTypeSchema,
} from './schema.js';
export type { Config, PartialConfig, LLMProviderType, EmbeddingProviderType } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export {
  loadConfig,
  writeDefaultConfig,
  resolveDbPath,
  getConfigValue,
  listConfig,
  deepMerge,
  type LoadConfigOptions,
} from './loader.js';

export { getCqaDir, getDbPath, getConfigPath, expandHome } from './paths.js';

export { loadEnv, getEnv, hasApiKey, getOllamaHost, SETUP_INSTRUCTIONS, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
