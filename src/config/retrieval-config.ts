/**
 * Runtime configuration for the retrieval engine.
 */

/** Embedding backends the engine can be built with. */
export const EMBEDDING_PROVIDERS = ['openai'] as const;
export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

/** Judgment-model backends used for reranking. */
export const JUDGE_PROVIDERS = ['anthropic', 'openai'] as const;
export type JudgeProviderName = (typeof JUDGE_PROVIDERS)[number];

export function isEmbeddingProvider(value: unknown): value is EmbeddingProviderName {
  return EMBEDDING_PROVIDERS.some((p) => p === value);
}

export function isJudgeProvider(value: unknown): value is JudgeProviderName {
  return JUDGE_PROVIDERS.some((p) => p === value);
}

/**
 * Complete engine configuration.
 */
export interface RetrievalConfig {
  // Query embedding
  embeddingProvider: EmbeddingProviderName;
  /** Provider model id, e.g. text-embedding-3-small */
  embeddingModel: string;
  /** Vector dimension shared by the embedder and the index */
  embeddingDimension: number;
  /** Optional API base URL override for OpenAI-compatible servers */
  embeddingBaseUrl?: string;

  // Reranking judge
  judgeProvider: JudgeProviderName;
  judgeModel: string;
  /** Output cap for the index-list answer; the list is short */
  judgeMaxTokens: number;
  /** Calls per minute, 0 = no limit */
  judgeRateLimitPerMin: number;
  /** Optional API base URL override (proxy or OpenAI-compatible server) */
  judgeBaseUrl?: string;

  // Storage
  /** Path to SQLite database file (~ expanded) */
  dbPath: string;
  /** One collection per corpus */
  collection: string;

  // Retrieval
  /** k for simple queries */
  defaultK: number;
  /** Oversampled pool size handed to the reranker */
  rerankCandidateK: number;
  /** k for the main query of a scenario question */
  scenarioK: number;
  /** Upper bound on merged scenario results */
  scenarioResultCap: number;
  /** Floor for per-option k: max(optionMinK, floor(k / 2)) */
  optionMinK: number;
}

/**
 * Default configuration values.
 * k values follow the tuning used against the ~2.3k passage study corpus:
 * 3 for chat answers, 20 candidates before reranking, 10 for exam scenarios.
 */
export const DEFAULT_CONFIG: RetrievalConfig = {
  embeddingProvider: 'openai',
  embeddingModel: 'text-embedding-3-small',
  embeddingDimension: 1536,

  judgeProvider: 'anthropic',
  judgeModel: 'claude-3-haiku-20240307',
  judgeMaxTokens: 50,
  judgeRateLimitPerMin: 0,

  dbPath: '~/.studyrag/index.db',
  collection: 'study_corpus',

  defaultK: 3,
  rerankCandidateK: 20,
  scenarioK: 10,
  scenarioResultCap: 12,
  optionMinK: 3,
};

/**
 * Get configuration with overrides applied.
 */
export function getConfig(overrides: Partial<RetrievalConfig> = {}): RetrievalConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

function isPositiveInt(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

/**
 * Validate configuration values.
 */
export function validateConfig(config: RetrievalConfig): string[] {
  const errors: string[] = [];

  if (!isPositiveInt(config.embeddingDimension)) {
    errors.push('embeddingDimension must be a positive integer');
  }
  if (!config.embeddingModel) {
    errors.push('embeddingModel is required');
  }
  if (!config.judgeModel) {
    errors.push('judgeModel is required');
  }
  if (!isPositiveInt(config.judgeMaxTokens)) {
    errors.push('judgeMaxTokens must be a positive integer');
  }
  if (config.judgeRateLimitPerMin < 0) {
    errors.push('judgeRateLimitPerMin cannot be negative');
  }
  if (!config.collection) {
    errors.push('collection is required');
  }
  for (const key of ['defaultK', 'rerankCandidateK', 'scenarioK', 'scenarioResultCap', 'optionMinK'] as const) {
    if (!isPositiveInt(config[key])) {
      errors.push(`${key} must be a positive integer`);
    }
  }
  if (config.rerankCandidateK < config.defaultK) {
    errors.push('rerankCandidateK should be at least defaultK');
  }

  return errors;
}
