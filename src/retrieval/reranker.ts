/**
 * Judgment-model reranking of an oversampled candidate pool.
 *
 * The judge sees each candidate's section header and summary (never its
 * full content) under a bracketed index, and answers with the indices of
 * the best k. Any judge failure or unusable answer degrades to the
 * upstream order; reranking never fails a query.
 *
 * ## Scores
 *
 * Reranked results get synthetic scores `1.0 - rank * 0.05`. Only their
 * strict descent matters; they are not comparable to cosine scores.
 */

import type { Judge } from '../models/judge.js';
import type { SearchResult } from '../storage/types.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { RerankResult } from './types.js';
import { assertValidK } from './validation.js';

const log = createLogger('reranker');

export const INDICES_OPEN = '<relevant_indices>';
export const INDICES_CLOSE = '</relevant_indices>';

/** Score step between consecutive reranked positions */
export const RANK_SCORE_STEP = 0.05;

export interface RerankerOptions {
  /** Output cap for the judge's answer */
  maxTokens?: number;
}

export function rankScore(rank: number): number {
  return 1.0 - rank * RANK_SCORE_STEP;
}

/**
 * Build the judge prompt for a query and its candidates.
 */
export function buildRerankPrompt(query: string, candidates: readonly SearchResult[], k: number): string {
  const summaries = candidates
    .map((c, i) => `[${i}] Section: ${c.sectionHeader}\nSummary: ${c.summary}`)
    .join('\n\n');

  return `Query: ${query}

You are given ${candidates.length} documents, each with an index number [0-${candidates.length - 1}] in square brackets.

Your task: Select the ${k} MOST relevant documents that would best help answer the query.

Consider:
- Direct relevance to the query topic
- Information completeness
- Accuracy and specificity
- Complementary information (avoid redundancy)

<documents>
${summaries}
</documents>

Output ONLY the indices of the ${k} most relevant documents, in order of relevance (most relevant first).
Format: comma-separated numbers, no spaces, inside ${INDICES_OPEN} XML tags.`;
}

/**
 * Parse the judge's answer into distinct in-range indices, in answer order.
 *
 * When the opening marker is present only the text between the markers is
 * read, so a lead-in before the tag is ignored. Non-numeric parts,
 * out-of-range and repeated indices are dropped. At most k are kept.
 */
export function parseIndices(text: string, candidateCount: number, k: number): number[] {
  const start = text.indexOf(INDICES_OPEN);
  const inner = start === -1 ? text : text.slice(start + INDICES_OPEN.length);
  const body = inner.split(INDICES_CLOSE)[0];
  const indices: number[] = [];
  const seen = new Set<number>();

  for (const part of body.split(',')) {
    const trimmed = part.trim();
    if (!/^\d+$/.test(trimmed)) continue;
    const idx = Number.parseInt(trimmed, 10);
    if (idx >= candidateCount || seen.has(idx)) continue;
    seen.add(idx);
    indices.push(idx);
    if (indices.length === k) break;
  }
  return indices;
}

export class Reranker {
  private readonly maxTokens: number;

  constructor(
    private readonly judge: Judge,
    options: RerankerOptions = {},
  ) {
    this.maxTokens = options.maxTokens ?? 50;
  }

  /**
   * Select the best k candidates. See {@link rerankWithOutcome}.
   */
  async rerank(query: string, candidates: readonly SearchResult[], k: number): Promise<readonly SearchResult[]> {
    return (await this.rerankWithOutcome(query, candidates, k)).results;
  }

  /**
   * Select the best k candidates and report how the selection was made.
   *
   * - No candidates: `[]`, skipped.
   * - At most k candidates: the input list itself, skipped.
   * - Otherwise the judge's choices with synthetic scores, topped up from
   *   upstream order when it named fewer than k; or, when the judge fails,
   *   the first k candidates with their scores untouched.
   *
   * @throws RetrievalError INVALID_K when k is not a positive integer
   */
  async rerankWithOutcome(
    query: string,
    candidates: readonly SearchResult[],
    k: number,
  ): Promise<RerankResult> {
    assertValidK(k);

    if (candidates.length === 0) {
      return { results: [], outcome: 'skipped' };
    }
    if (candidates.length <= k) {
      return { results: candidates, outcome: 'skipped' };
    }

    let indices: number[];
    try {
      const response = await this.judge.complete({
        prompt: buildRerankPrompt(query, candidates, k),
        prefill: INDICES_OPEN,
        stopSequence: INDICES_CLOSE,
        maxTokens: this.maxTokens,
      });
      indices = parseIndices(response.text, candidates.length, k);
    } catch (error) {
      return this.degrade(candidates, k, `judge error: ${errorMessage(error)}`);
    }

    if (indices.length === 0) {
      return this.degrade(candidates, k, 'no usable indices in judge response');
    }

    const chosen = new Set(indices);
    for (let i = 0; i < candidates.length && indices.length < k; i++) {
      if (!chosen.has(i)) {
        chosen.add(i);
        indices.push(i);
      }
    }

    const results = indices.map((idx, rank) => ({ ...candidates[idx], score: rankScore(rank) }));
    log.debug('Reranked candidates', { candidates: candidates.length, k, order: indices.join(',') });
    return { results, outcome: 'reranked' };
  }

  private degrade(candidates: readonly SearchResult[], k: number, reason: string): RerankResult {
    log.warn('Reranking degraded, keeping vector order', { reason });
    return { results: candidates.slice(0, k), outcome: 'degraded', reason };
  }
}
