/**
 * Long-lived retrieval service.
 *
 * Wires the embedder, vector index, reranker and scenario expander over one
 * database handle. Build it once at startup and pass it to whatever serves
 * queries; there is no module-level instance.
 *
 * ```typescript
 * const engine = createRetrievalEngine(toRuntimeConfig(loadConfig()));
 * const { results, context } = await engine.retrieveWithReranking('What is a SAN?', 3);
 * engine.close();
 * ```
 */

import type Database from 'better-sqlite3';
import type { RetrievalConfig } from '../config/retrieval-config.js';
import type { Embedder } from '../models/embedder.js';
import type { Judge } from '../models/judge.js';
import { createEmbedder, createJudge } from '../models/provider-factory.js';
import { UsageTracker, type UsageStats } from '../models/usage-tracker.js';
import { closeDb, openDb } from '../storage/db.js';
import type { IndexDescription, SearchFilter, SearchResult } from '../storage/types.js';
import { VectorIndex } from '../storage/vector-index.js';
import { RetrievalError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { BaseRetriever } from './base-retriever.js';
import { formatContext } from './context-format.js';
import { Reranker } from './reranker.js';
import { ScenarioExpander } from './scenario-expander.js';
import type { RerankedRetrievalResult, RetrievalResult, ScenarioQuery } from './types.js';
import { assertValidK } from './validation.js';

const log = createLogger('retrieval-engine');

export interface EngineDescription {
  index: IndexDescription;
  embeddingModel: string;
  judgeModel: string;
}

export interface RetrievalEngineDeps {
  config: RetrievalConfig;
  db: Database.Database;
  embedder: Embedder;
  judge: Judge;
  /** Shared with the adapters so their token counts land here */
  usage?: UsageTracker;
  /** Built over db when omitted */
  index?: VectorIndex;
}

export class RetrievalEngine {
  readonly config: RetrievalConfig;
  readonly index: VectorIndex;

  private readonly db: Database.Database;
  private readonly embedder: Embedder;
  private readonly judge: Judge;
  private readonly usage: UsageTracker;
  private readonly retriever: BaseRetriever;
  private readonly reranker: Reranker;
  private readonly expander: ScenarioExpander;

  constructor(deps: RetrievalEngineDeps) {
    this.config = deps.config;
    this.db = deps.db;
    this.embedder = deps.embedder;
    this.judge = deps.judge;
    this.usage = deps.usage ?? new UsageTracker();
    this.index =
      deps.index ??
      new VectorIndex(deps.db, { collection: deps.config.collection, dimension: deps.config.embeddingDimension });

    this.retriever = new BaseRetriever(this.embedder, this.index);
    this.reranker = new Reranker(this.judge, { maxTokens: deps.config.judgeMaxTokens });
    this.expander = new ScenarioExpander(this.retriever, {
      optionMinK: deps.config.optionMinK,
      resultCap: deps.config.scenarioResultCap,
    });
  }

  /**
   * Plain vector retrieval.
   */
  async retrieve(query: string, k = this.config.defaultK, filter: SearchFilter = {}): Promise<RetrievalResult> {
    return this.retriever.retrieve(query, k, filter);
  }

  /**
   * Vector retrieval keeping only results at or above scoreThreshold.
   */
  async retrieveWithScores(
    query: string,
    k = this.config.defaultK,
    scoreThreshold = 0,
    filter: SearchFilter = {},
  ): Promise<SearchResult[]> {
    return this.retriever.retrieveWithScores(query, k, scoreThreshold, filter);
  }

  /**
   * Pull candidateK passages, let the judge pick the best k, assemble.
   *
   * Judge failures degrade to vector order and show up as
   * `outcome: 'degraded'`; embedding and index failures propagate.
   *
   * @throws RetrievalError INVALID_K when k or candidateK is invalid, or candidateK < k
   */
  async retrieveWithReranking(
    query: string,
    k = this.config.defaultK,
    candidateK = this.config.rerankCandidateK,
    filter: SearchFilter = {},
  ): Promise<RerankedRetrievalResult> {
    assertValidK(k);
    assertValidK(candidateK, 'candidateK');
    if (candidateK < k) {
      throw new RetrievalError(`candidateK (${candidateK}) must be at least k (${k})`, 'INVALID_K');
    }

    const candidates = await this.retriever.search(query, candidateK, filter);
    const { results, outcome } = await this.reranker.rerankWithOutcome(query, candidates, k);

    log.debug('Reranked retrieval complete', { k, candidates: candidates.length, outcome });
    return { results, context: formatContext(results), outcome, candidateCount: candidates.length };
  }

  /**
   * Scenario question retrieval with per-option expansion.
   */
  async retrieveForScenario(
    query: ScenarioQuery,
    k = this.config.scenarioK,
    filter: SearchFilter = {},
  ): Promise<RetrievalResult> {
    return this.expander.retrieveForScenario(query, k, filter);
  }

  async describe(): Promise<EngineDescription> {
    return {
      index: await this.index.describe(),
      embeddingModel: this.embedder.model,
      judgeModel: this.judge.model,
    };
  }

  async listChapters(): Promise<string[]> {
    return this.index.listChapters();
  }

  getUsageStats(): UsageStats {
    return this.usage.getStats();
  }

  close(): void {
    closeDb(this.db);
  }
}

export interface CreateEngineOptions {
  /** Environment to read API keys from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Open the database without schema setup */
  readonly?: boolean;
}

/**
 * Build an engine from configuration: open the database and construct the
 * configured providers.
 *
 * @throws ConfigError when a provider key is missing or the model dimension disagrees
 * @throws IndexUnavailableError when the database cannot be opened
 */
export function createRetrievalEngine(config: RetrievalConfig, options: CreateEngineOptions = {}): RetrievalEngine {
  const usage = new UsageTracker();
  const embedder = createEmbedder(config, { usage, env: options.env });
  const judge = createJudge(config, { usage, env: options.env });
  const db = openDb(config.dbPath, { readonly: options.readonly });

  log.info('Retrieval engine ready', {
    collection: config.collection,
    embeddingModel: config.embeddingModel,
    judgeModel: config.judgeModel,
  });
  return new RetrievalEngine({ config, db, embedder, judge, usage });
}
