/**
 * Provider adapters: query embedding and judgment model.
 */

export { OpenAIEmbedder } from './embedder.js';
export type { Embedder, OpenAIEmbedderOptions } from './embedder.js';
export { AnthropicJudge, OpenAIJudge } from './judge.js';
export type { Judge, JudgeRequest, JudgeResponse, JudgeOptions } from './judge.js';
export { createEmbedder, createJudge } from './provider-factory.js';
export type { ProviderOptions } from './provider-factory.js';
export { MODEL_REGISTRY, findModel, getAllModelIds } from './model-registry.js';
export type { EmbeddingModelConfig } from './model-registry.js';
export { UsageTracker } from './usage-tracker.js';
export type { UsageStats, UsageCounters, UsageComponent } from './usage-tracker.js';
