/**
 * Types for the storage layer.
 *
 * - **Passages**: indexed units of study material with a precomputed summary
 * - **Search results**: passage payload plus a per-stage relevance score
 * - **Filters**: equality predicates over chapter and content type
 *
 * @module storage/types
 */

/**
 * Kind of source a passage was cut from.
 *
 * | Type | Source |
 * |------|--------|
 * | `video` | Lecture transcript |
 * | `text` | Book section |
 * | `chapter_intro` | Chapter overview page |
 */
export type ContentType = 'video' | 'text' | 'chapter_intro';

export const CONTENT_TYPES: readonly ContentType[] = ['video', 'text', 'chapter_intro'];

export function isContentType(value: unknown): value is ContentType {
  return CONTENT_TYPES.some((t) => t === value);
}

/**
 * Structured metadata used for filtering.
 */
export interface PassageMetadata {
  /** Chapter number as a string, e.g. "2" */
  readonly chapterNum: string;
  /** Section number within the chapter, e.g. "2.3" */
  readonly sectionNum: string;
  readonly contentType: ContentType;
  /** Any other metadata the corpus carries, kept verbatim */
  readonly extra?: Readonly<Record<string, unknown>>;
}

/**
 * Passage fields returned to callers.
 */
export interface PassagePayload {
  /** Globally unique, stable across re-indexing */
  readonly chunkId: string;
  /** Full passage text */
  readonly content: string;
  /** Short precomputed abstract; used in rerank prompts instead of content */
  readonly summary: string;
  /** Human-readable label */
  readonly sectionHeader: string;
  readonly metadata: PassageMetadata;
}

/**
 * A passage as supplied at index-build time.
 */
export interface Passage extends PassagePayload {
  /** Fixed-dimension vector produced externally */
  readonly embedding: readonly number[];
}

/**
 * A passage matched by a query.
 *
 * `score` is cosine similarity when it comes from the index and a synthetic
 * rank score after reranking. Within one returned list it never increases.
 */
export interface SearchResult extends PassagePayload {
  readonly score: number;
}

/**
 * Conjunction of equality predicates. An absent field is no constraint.
 */
export interface SearchFilter {
  readonly chapterNum?: string;
  readonly contentType?: ContentType;
}

/** Health of the index as reported by describe(). */
export type IndexStatus = 'ready' | 'empty' | 'unavailable';

/**
 * Read-only introspection for health checks.
 */
export interface IndexDescription {
  collection: string;
  count: number;
  dimension: number;
  distanceMetric: 'cosine';
  status: IndexStatus;
}

/**
 * Outcome of an upsert batch.
 */
export interface UpsertResult {
  inserted: number;
  updated: number;
}
