/**
 * Retrieval exports.
 */

export { BaseRetriever } from './base-retriever.js';
export { Reranker, buildRerankPrompt, parseIndices, rankScore, INDICES_OPEN, INDICES_CLOSE } from './reranker.js';
export type { RerankerOptions } from './reranker.js';
export { ScenarioExpander, mergeResults, optionK } from './scenario-expander.js';
export type { ScenarioExpanderOptions } from './scenario-expander.js';
export { RetrievalEngine, createRetrievalEngine } from './retrieval-engine.js';
export type { EngineDescription, RetrievalEngineDeps, CreateEngineOptions } from './retrieval-engine.js';
export { formatContext, formatDocument, parseContext } from './context-format.js';
export { parseExamQuestion, toScenarioQuery } from './exam-question-parser.js';
export type { ExamQuestion } from './exam-question-parser.js';
export type {
  RetrievalResult,
  RerankOutcome,
  RerankResult,
  RerankedRetrievalResult,
  ScenarioQuery,
  Searcher,
} from './types.js';
