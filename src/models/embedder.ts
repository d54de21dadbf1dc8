/**
 * Query embedding.
 *
 * The retriever depends only on the `Embedder` capability. The OpenAI
 * variant is a thin adapter over the embeddings endpoint: one text in,
 * one vector out, failures surfaced as `EmbeddingError` without retry.
 */

import OpenAI from 'openai';
import { EmbeddingError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { UsageTracker } from './usage-tracker.js';

const log = createLogger('embedder');

/**
 * Turns query text into a vector of the deployment's dimension.
 */
export interface Embedder {
  readonly name: string;
  readonly model: string;
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
}

export interface OpenAIEmbedderOptions {
  model: string;
  dimension: number;
  apiKey?: string;
  baseUrl?: string;
  /** Receives token counts for every call */
  usage?: UsageTracker;
  /** Prebuilt client; one is created from apiKey/baseUrl when omitted */
  client?: OpenAI;
}

export class OpenAIEmbedder implements Embedder {
  readonly name = 'openai';
  readonly model: string;
  readonly dimension: number;

  private readonly client: OpenAI;
  private readonly usage?: UsageTracker;

  constructor(options: OpenAIEmbedderOptions) {
    this.model = options.model;
    this.dimension = options.dimension;
    this.usage = options.usage;
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        // Callers own retry policy
        maxRetries: 0,
      });

    log.debug(`Initialized with model: ${this.model} (${this.dimension} dim)`);
  }

  async embed(text: string): Promise<number[]> {
    const trimmed = text.trim();
    if (!trimmed) {
      throw new EmbeddingError('Cannot embed empty query', 'EMPTY_QUERY');
    }

    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create({
        model: this.model,
        input: trimmed,
      });
    } catch (error) {
      this.usage?.recordFailure('embedding');
      throw new EmbeddingError(`Query embedding failed: ${errorMessage(error)}`, 'EMBED_FAILED', error);
    }

    const first = response.data[0];
    if (!first || first.embedding.length === 0) {
      this.usage?.recordFailure('embedding');
      throw new EmbeddingError('Embedding response carried no vector', 'BAD_RESPONSE');
    }

    this.usage?.recordSuccess('embedding', response.usage.total_tokens);
    return first.embedding;
  }
}
