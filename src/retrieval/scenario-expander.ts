/**
 * Query expansion for scenario-style exam questions.
 *
 * One main query (scenario + question) and one query per answer option
 * (question + option) run concurrently. Their results are merged in a fixed
 * order, deduplicated by chunkId, stable-sorted by score and capped.
 */

import type { SearchFilter, SearchResult } from '../storage/types.js';
import { createLogger } from '../utils/logger.js';
import { formatContext } from './context-format.js';
import type { RetrievalResult, ScenarioQuery, Searcher } from './types.js';
import { assertValidK } from './validation.js';

const log = createLogger('scenario-expander');

export interface ScenarioExpanderOptions {
  /** Floor for per-option k (default 3) */
  optionMinK?: number;
  /** Upper bound on merged results (default 12) */
  resultCap?: number;
}

/**
 * Per-option k: half the main k, but never fewer than the floor.
 */
export function optionK(k: number, optionMinK: number): number {
  return Math.max(optionMinK, Math.floor(k / 2));
}

/**
 * Merge result lists in order, keeping the first occurrence of each
 * chunkId, then stable-sort by descending score and cap.
 */
export function mergeResults(lists: readonly (readonly SearchResult[])[], cap: number): SearchResult[] {
  const seen = new Set<string>();
  const merged: SearchResult[] = [];
  for (const list of lists) {
    for (const result of list) {
      if (seen.has(result.chunkId)) continue;
      seen.add(result.chunkId);
      merged.push(result);
    }
  }
  // Array.prototype.sort is stable, so equal scores keep merge order
  merged.sort((a, b) => b.score - a.score);
  return merged.slice(0, cap);
}

export class ScenarioExpander {
  private readonly optionMinK: number;
  private readonly resultCap: number;

  constructor(
    private readonly searcher: Searcher,
    options: ScenarioExpanderOptions = {},
  ) {
    this.optionMinK = options.optionMinK ?? 3;
    this.resultCap = options.resultCap ?? 12;
    assertValidK(this.optionMinK, 'optionMinK');
    assertValidK(this.resultCap, 'resultCap');
  }

  /**
   * Retrieve context covering the scenario and every option.
   *
   * @throws RetrievalError INVALID_K when k is not a positive integer
   */
  async retrieveForScenario(
    query: ScenarioQuery,
    k: number,
    filter: SearchFilter = {},
  ): Promise<RetrievalResult> {
    assertValidK(k);
    const perOption = optionK(k, this.optionMinK);

    const mainQuery = `${query.scenario} ${query.question}`;
    const lists = await Promise.all([
      this.searcher.search(mainQuery, k, filter),
      ...query.options.map((option) => this.searcher.search(`${query.question} ${option}`, perOption, filter)),
    ]);

    const results = mergeResults(lists, this.resultCap);
    log.debug('Scenario retrieval complete', {
      options: query.options.length,
      k,
      perOption,
      pulled: lists.reduce((n, l) => n + l.length, 0),
      returned: results.length,
    });
    return { results, context: formatContext(results) };
  }
}
