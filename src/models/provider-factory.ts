/**
 * Builds the embedder and judge named by configuration.
 */

import type { RetrievalConfig } from '../config/retrieval-config.js';
import { ConfigError } from '../utils/errors.js';
import { OpenAIEmbedder, type Embedder } from './embedder.js';
import { AnthropicJudge, OpenAIJudge, type Judge } from './judge.js';
import { findModel } from './model-registry.js';
import type { UsageTracker } from './usage-tracker.js';

export interface ProviderOptions {
  usage?: UsageTracker;
  /** Environment to read API keys from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

function requireKey(env: NodeJS.ProcessEnv, name: string, purpose: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`No API key for ${purpose}. Set the ${name} environment variable.`, 'MISSING_API_KEY');
  }
  return value;
}

/**
 * Create the query embedder.
 *
 * @throws ConfigError if the model's known dimension disagrees with the
 *   configured one, or the API key is missing
 */
export function createEmbedder(config: RetrievalConfig, options: ProviderOptions = {}): Embedder {
  const env = options.env ?? process.env;

  const known = findModel(config.embeddingModel);
  if (known && known.dims !== config.embeddingDimension) {
    throw new ConfigError(
      `Model ${config.embeddingModel} produces ${known.dims}-dimension vectors, ` +
        `but embeddingDimension is ${config.embeddingDimension}`,
      'CONFIG_INVALID',
    );
  }

  switch (config.embeddingProvider) {
    case 'openai':
      return new OpenAIEmbedder({
        model: config.embeddingModel,
        dimension: config.embeddingDimension,
        apiKey: requireKey(env, 'OPENAI_API_KEY', 'query embedding'),
        baseUrl: config.embeddingBaseUrl,
        usage: options.usage,
      });
  }
}

/**
 * Create the reranking judge.
 */
export function createJudge(config: RetrievalConfig, options: ProviderOptions = {}): Judge {
  const env = options.env ?? process.env;
  const common = {
    model: config.judgeModel,
    rateLimitPerMin: config.judgeRateLimitPerMin,
    baseUrl: config.judgeBaseUrl,
    usage: options.usage,
  };

  switch (config.judgeProvider) {
    case 'anthropic':
      return new AnthropicJudge({ ...common, apiKey: requireKey(env, 'ANTHROPIC_API_KEY', 'reranking') });
    case 'openai':
      return new OpenAIJudge({ ...common, apiKey: requireKey(env, 'OPENAI_API_KEY', 'reranking') });
  }
}
