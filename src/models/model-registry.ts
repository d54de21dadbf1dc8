/**
 * Known query-embedding models.
 *
 * The index is built offline with one of these; the query embedder must use
 * the same model, so the configured dimension is checked against this table.
 */

import type { EmbeddingProviderName } from '../config/retrieval-config.js';

export interface EmbeddingModelConfig {
  /** Provider model id. */
  id: string;
  provider: EmbeddingProviderName;
  /** Embedding dimensions. */
  dims: number;
  /** Input limit in tokens. */
  contextTokens: number;
  /** Notes about the model. */
  notes: string;
}

export const MODEL_REGISTRY: Record<string, EmbeddingModelConfig> = {
  'text-embedding-3-small': {
    id: 'text-embedding-3-small',
    provider: 'openai',
    dims: 1536,
    contextTokens: 8191,
    notes: 'Default. Used to build the study corpus index.',
  },
  'text-embedding-3-large': {
    id: 'text-embedding-3-large',
    provider: 'openai',
    dims: 3072,
    contextTokens: 8191,
    notes: 'Higher quality, double the storage per passage.',
  },
  'text-embedding-ada-002': {
    id: 'text-embedding-ada-002',
    provider: 'openai',
    dims: 1536,
    contextTokens: 8191,
    notes: 'Legacy.',
  },
};

/**
 * Look up a model; undefined for models this table does not know, which
 * are allowed (e.g. behind an OpenAI-compatible base URL).
 */
export function findModel(id: string): EmbeddingModelConfig | undefined {
  return Object.prototype.hasOwnProperty.call(MODEL_REGISTRY, id) ? MODEL_REGISTRY[id] : undefined;
}

export function getAllModelIds(): string[] {
  return Object.keys(MODEL_REGISTRY);
}
