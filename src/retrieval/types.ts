/**
 * Shared retrieval types.
 */

import type { SearchFilter, SearchResult } from '../storage/types.js';

/**
 * Ranked results with their assembled context.
 */
export interface RetrievalResult {
  results: readonly SearchResult[];
  /** Concatenated `<document>` blocks in result order */
  context: string;
}

/**
 * How a rerank call ended.
 *
 * - `skipped`: nothing to choose between (no candidates, or no more than k)
 * - `reranked`: the judge's order was applied
 * - `degraded`: the judge failed or gave no usable indices; upstream order kept
 */
export type RerankOutcome = 'skipped' | 'reranked' | 'degraded';

export interface RerankResult {
  results: readonly SearchResult[];
  outcome: RerankOutcome;
  /** Why reranking degraded */
  reason?: string;
}

export interface RerankedRetrievalResult extends RetrievalResult {
  outcome: RerankOutcome;
  /** Size of the pool handed to the reranker */
  candidateCount: number;
}

/**
 * An exam-style question. Options are an ordered list; mapping them to
 * letters is up to the caller.
 */
export interface ScenarioQuery {
  scenario: string;
  question: string;
  options: readonly string[];
}

/**
 * Anything that can run a single vector query.
 */
export interface Searcher {
  search(queryText: string, k: number, filter?: SearchFilter): Promise<SearchResult[]>;
}
