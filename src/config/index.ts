/**
 * Configuration exports.
 */

export {
  DEFAULT_CONFIG,
  EMBEDDING_PROVIDERS,
  JUDGE_PROVIDERS,
  getConfig,
  resolvePath,
  validateConfig,
  isEmbeddingProvider,
  isJudgeProvider,
} from './retrieval-config.js';
export type { RetrievalConfig, EmbeddingProviderName, JudgeProviderName } from './retrieval-config.js';

export {
  loadConfig,
  parseExternalConfig,
  validateExternalConfig,
  toRuntimeConfig,
  getResolvedDbPath,
  EXTERNAL_DEFAULTS,
} from './loader.js';
export type {
  ExternalConfig,
  ResolvedConfig,
  LoadConfigOptions,
  EmbeddingSection,
  JudgeSection,
  StorageSection,
  RetrievalSection,
} from './loader.js';
