/**
 * Single-query retrieval: embed → search → assemble.
 *
 * Deterministic for a fixed index, filter and embedder output. Embedding
 * and index failures propagate unchanged.
 */

import type { Embedder } from '../models/embedder.js';
import type { VectorIndex } from '../storage/vector-index.js';
import type { SearchFilter, SearchResult } from '../storage/types.js';
import { createLogger } from '../utils/logger.js';
import { formatContext } from './context-format.js';
import type { RetrievalResult, Searcher } from './types.js';
import { assertValidK, assertValidThreshold } from './validation.js';

const log = createLogger('base-retriever');

export class BaseRetriever implements Searcher {
  constructor(
    private readonly embedder: Embedder,
    private readonly index: VectorIndex,
  ) {}

  /**
   * Top-k passages for a query, without context assembly.
   */
  async search(queryText: string, k: number, filter: SearchFilter = {}): Promise<SearchResult[]> {
    assertValidK(k);
    const startTime = Date.now();

    const queryVector = await this.embedder.embed(queryText);
    const results = await this.index.search(queryVector, k, filter);

    log.debug('Search complete', {
      k,
      returned: results.length,
      filtered: filter.chapterNum !== undefined || filter.contentType !== undefined,
      durationMs: Date.now() - startTime,
    });
    return results;
  }

  /**
   * Top-k passages and their context.
   *
   * @throws RetrievalError INVALID_K when k is not a positive integer
   * @throws EmbeddingError when the query cannot be embedded
   * @throws IndexUnavailableError when the index cannot be read
   * @throws DimensionMismatchError when embedder and index disagree
   */
  async retrieve(queryText: string, k: number, filter: SearchFilter = {}): Promise<RetrievalResult> {
    const results = await this.search(queryText, k, filter);
    return { results, context: formatContext(results) };
  }

  /**
   * Top-k passages scoring at or above a threshold.
   */
  async retrieveWithScores(
    queryText: string,
    k: number,
    scoreThreshold = 0,
    filter: SearchFilter = {},
  ): Promise<SearchResult[]> {
    assertValidThreshold(scoreThreshold);
    const results = await this.search(queryText, k, filter);
    return results.filter((r) => r.score >= scoreThreshold);
  }
}
