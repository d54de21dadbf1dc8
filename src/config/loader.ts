/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (STUDYRAG_*)
 * 3. Project config file (./studyrag.config.json)
 * 4. User config file (~/.studyrag/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  resolvePath,
  DEFAULT_CONFIG,
  isEmbeddingProvider,
  isJudgeProvider,
  type EmbeddingProviderName,
  type JudgeProviderName,
  type RetrievalConfig,
} from './retrieval-config.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = createLogger('config-loader');

export interface EmbeddingSection {
  provider: EmbeddingProviderName;
  model: string;
  dimension: number;
  baseUrl?: string;
}

export interface JudgeSection {
  provider: JudgeProviderName;
  model: string;
  maxTokens: number;
  /** Calls per minute, 0 = unlimited */
  rateLimitPerMin: number;
  baseUrl?: string;
}

export interface StorageSection {
  dbPath: string;
  collection: string;
}

export interface RetrievalSection {
  defaultK: number;
  rerankCandidates: number;
  scenarioK: number;
  /** Maximum merged results for scenario questions. Default: 12 */
  scenarioCap: number;
  optionMinK: number;
}

/** External config file structure (every field optional) */
export interface ExternalConfig {
  embedding?: Partial<EmbeddingSection>;
  judge?: Partial<JudgeSection>;
  storage?: Partial<StorageSection>;
  retrieval?: Partial<RetrievalSection>;
}

/** Config with every section filled in */
export interface ResolvedConfig {
  embedding: EmbeddingSection;
  judge: JudgeSection;
  storage: StorageSection;
  retrieval: RetrievalSection;
}

/** Default external config values */
const EXTERNAL_DEFAULTS: ResolvedConfig = {
  embedding: {
    provider: DEFAULT_CONFIG.embeddingProvider,
    model: DEFAULT_CONFIG.embeddingModel,
    dimension: DEFAULT_CONFIG.embeddingDimension,
  },
  judge: {
    provider: DEFAULT_CONFIG.judgeProvider,
    model: DEFAULT_CONFIG.judgeModel,
    maxTokens: DEFAULT_CONFIG.judgeMaxTokens,
    rateLimitPerMin: DEFAULT_CONFIG.judgeRateLimitPerMin,
  },
  storage: {
    dbPath: DEFAULT_CONFIG.dbPath,
    collection: DEFAULT_CONFIG.collection,
  },
  retrieval: {
    defaultK: DEFAULT_CONFIG.defaultK,
    rerankCandidates: DEFAULT_CONFIG.rerankCandidateK,
    scenarioK: DEFAULT_CONFIG.scenarioK,
    scenarioCap: DEFAULT_CONFIG.scenarioResultCap,
    optionMinK: DEFAULT_CONFIG.optionMinK,
  },
};

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(obj: JsonObject, key: string): number | undefined {
  const value = obj[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Pick the known fields out of parsed JSON. Unknown keys and wrongly
 * typed values are dropped with a warning.
 */
export function parseExternalConfig(raw: unknown, source: string = 'config'): ExternalConfig {
  const config: ExternalConfig = {};
  if (!isObject(raw)) {
    log.warn(`Ignoring ${source}: top level is not an object`);
    return config;
  }

  const embedding = raw.embedding;
  if (isObject(embedding)) {
    const provider = embedding.provider;
    if (provider !== undefined && !isEmbeddingProvider(provider)) {
      log.warn(`Unknown embedding provider in ${source}`, { provider });
    }
    config.embedding = {
      provider: isEmbeddingProvider(provider) ? provider : undefined,
      model: readString(embedding, 'model'),
      dimension: readNumber(embedding, 'dimension'),
      baseUrl: readString(embedding, 'baseUrl'),
    };
  }

  const judge = raw.judge;
  if (isObject(judge)) {
    const provider = judge.provider;
    if (provider !== undefined && !isJudgeProvider(provider)) {
      log.warn(`Unknown judge provider in ${source}`, { provider });
    }
    config.judge = {
      provider: isJudgeProvider(provider) ? provider : undefined,
      model: readString(judge, 'model'),
      maxTokens: readNumber(judge, 'maxTokens'),
      rateLimitPerMin: readNumber(judge, 'rateLimitPerMin'),
      baseUrl: readString(judge, 'baseUrl'),
    };
  }

  const storage = raw.storage;
  if (isObject(storage)) {
    config.storage = {
      dbPath: readString(storage, 'dbPath'),
      collection: readString(storage, 'collection'),
    };
  }

  const retrieval = raw.retrieval;
  if (isObject(retrieval)) {
    config.retrieval = {
      defaultK: readNumber(retrieval, 'defaultK'),
      rerankCandidates: readNumber(retrieval, 'rerankCandidates'),
      scenarioK: readNumber(retrieval, 'scenarioK'),
      scenarioCap: readNumber(retrieval, 'scenarioCap'),
      optionMinK: readNumber(retrieval, 'optionMinK'),
    };
  }

  return config;
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    return parseExternalConfig(JSON.parse(content), path);
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error: errorMessage(error) });
    return null;
  }
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Load config from environment variables.
 * Variables are prefixed with STUDYRAG_ and use underscores for nesting.
 * Examples:
 *   STUDYRAG_JUDGE_PROVIDER=openai
 *   STUDYRAG_EMBEDDING_DIMENSION=3072
 *   STUDYRAG_STORAGE_DB_PATH=~/.studyrag/index.db
 */
function loadEnvConfig(): ExternalConfig {
  const env = process.env;

  const provider = env.STUDYRAG_EMBEDDING_PROVIDER;
  if (provider && !isEmbeddingProvider(provider)) {
    log.warn('Ignoring STUDYRAG_EMBEDDING_PROVIDER', { provider });
  }
  const judgeProvider = env.STUDYRAG_JUDGE_PROVIDER;
  if (judgeProvider && !isJudgeProvider(judgeProvider)) {
    log.warn('Ignoring STUDYRAG_JUDGE_PROVIDER', { provider: judgeProvider });
  }

  return {
    embedding: {
      provider: isEmbeddingProvider(provider) ? provider : undefined,
      model: env.STUDYRAG_EMBEDDING_MODEL || undefined,
      dimension: envInt('STUDYRAG_EMBEDDING_DIMENSION'),
      baseUrl: env.STUDYRAG_EMBEDDING_BASE_URL || undefined,
    },
    judge: {
      provider: isJudgeProvider(judgeProvider) ? judgeProvider : undefined,
      model: env.STUDYRAG_JUDGE_MODEL || undefined,
      maxTokens: envInt('STUDYRAG_JUDGE_MAX_TOKENS'),
      rateLimitPerMin: envInt('STUDYRAG_JUDGE_RATE_LIMIT'),
      baseUrl: env.STUDYRAG_JUDGE_BASE_URL || undefined,
    },
    storage: {
      dbPath: env.STUDYRAG_STORAGE_DB_PATH || undefined,
      collection: env.STUDYRAG_STORAGE_COLLECTION || undefined,
    },
    retrieval: {
      defaultK: envInt('STUDYRAG_RETRIEVAL_DEFAULT_K'),
      rerankCandidates: envInt('STUDYRAG_RETRIEVAL_RERANK_CANDIDATES'),
      scenarioK: envInt('STUDYRAG_RETRIEVAL_SCENARIO_K'),
      scenarioCap: envInt('STUDYRAG_RETRIEVAL_SCENARIO_CAP'),
      optionMinK: envInt('STUDYRAG_RETRIEVAL_OPTION_MIN_K'),
    },
  };
}

/**
 * Copy of `section` without undefined values, so spreading it never
 * clobbers a lower-priority value.
 */
function defined<T extends object>(section: T | undefined): Partial<T> {
  if (!section) return {};
  const result: Partial<T> = {};
  for (const key of Object.keys(section) as (keyof T)[]) {
    if (section[key] !== undefined) {
      result[key] = section[key];
    }
  }
  return result;
}

/**
 * Merge a partial config over a resolved one, section by section.
 */
function mergeConfig(target: ResolvedConfig, source: ExternalConfig): ResolvedConfig {
  return {
    embedding: { ...target.embedding, ...defined(source.embedding) },
    judge: { ...target.judge, ...defined(source.judge) },
    storage: { ...target.storage, ...defined(source.storage) },
    retrieval: { ...target.retrieval, ...defined(source.retrieval) },
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  const positiveInt = (value: number | undefined, name: string): void => {
    if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
      errors.push(`${name} must be a positive integer`);
    }
  };

  positiveInt(config.embedding?.dimension, 'embedding.dimension');
  positiveInt(config.judge?.maxTokens, 'judge.maxTokens');
  positiveInt(config.retrieval?.defaultK, 'retrieval.defaultK');
  positiveInt(config.retrieval?.rerankCandidates, 'retrieval.rerankCandidates');
  positiveInt(config.retrieval?.scenarioK, 'retrieval.scenarioK');
  positiveInt(config.retrieval?.scenarioCap, 'retrieval.scenarioCap');
  positiveInt(config.retrieval?.optionMinK, 'retrieval.optionMinK');

  if (config.judge?.rateLimitPerMin !== undefined && config.judge.rateLimitPerMin < 0) {
    errors.push('judge.rateLimitPerMin must be >= 0 (0 = unlimited)');
  }

  if (config.storage?.collection !== undefined && !/^[A-Za-z0-9_-]+$/.test(config.storage.collection)) {
    errors.push('storage.collection may only contain letters, digits, "_" and "-"');
  }

  const { defaultK, rerankCandidates } = config.retrieval ?? {};
  if (defaultK !== undefined && rerankCandidates !== undefined && rerankCandidates < defaultK) {
    errors.push('retrieval.rerankCandidates should be at least retrieval.defaultK');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (cliOverrides)
 * 2. Environment variables (STUDYRAG_*)
 * 3. Project config file (./studyrag.config.json)
 * 4. User config file (~/.studyrag/config.json)
 * 5. Built-in defaults
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  let config: ResolvedConfig = mergeConfig(EXTERNAL_DEFAULTS, {});

  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? '~/.studyrag/config.json');
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  if (!options.skipProjectConfig) {
    const projectConfig = loadConfigFile(
      options.projectConfigPath ?? join(process.cwd(), 'studyrag.config.json'),
    );
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig());
  }

  if (options.cliOverrides) {
    config = mergeConfig(config, options.cliOverrides);
  }

  return config;
}

/**
 * Get the resolved database path.
 */
export function getResolvedDbPath(config: ResolvedConfig): string {
  return resolvePath(config.storage.dbPath);
}

/**
 * Convert ResolvedConfig to RetrievalConfig (the runtime format).
 */
export function toRuntimeConfig(external: ResolvedConfig): RetrievalConfig {
  return {
    ...DEFAULT_CONFIG,

    embeddingProvider: external.embedding.provider,
    embeddingModel: external.embedding.model,
    embeddingDimension: external.embedding.dimension,
    embeddingBaseUrl: external.embedding.baseUrl,

    judgeProvider: external.judge.provider,
    judgeModel: external.judge.model,
    judgeMaxTokens: external.judge.maxTokens,
    judgeRateLimitPerMin: external.judge.rateLimitPerMin,
    judgeBaseUrl: external.judge.baseUrl,

    dbPath: external.storage.dbPath,
    collection: external.storage.collection,

    defaultK: external.retrieval.defaultK,
    rerankCandidateK: external.retrieval.rerankCandidates,
    scenarioK: external.retrieval.scenarioK,
    scenarioResultCap: external.retrieval.scenarioCap,
    optionMinK: external.retrieval.optionMinK,
  };
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };
