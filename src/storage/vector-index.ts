/**
 * Vector index over study passages with SQLite persistence.
 *
 * Vectors are stored as Float32Array blobs in SQLite and loaded into memory
 * on first access for brute-force cosine search. Passage payloads stay in
 * SQLite and are read back for the results a search returns.
 *
 * ## Architecture
 *
 * ```
 * ┌──────────────────────────────────────────────────────────────┐
 * │                        VectorIndex                           │
 * │  ┌──────────────────────────┐   ┌─────────────────────────┐  │
 * │  │  In-Memory               │   │  SQLite Persistence     │  │
 * │  │  id → vector, norm       │◄──┤  passages (id, chunk_id,│  │
 * │  │  chapter → Set<id>       │   │    payload, embedding)  │  │
 * │  │  contentType → Set<id>   │   │  idx on chapter_num,    │  │
 * │  └──────────────────────────┘   │         content_type    │  │
 * │                                 └─────────────────────────┘  │
 * └──────────────────────────────────────────────────────────────┘
 * ```
 *
 * ## Usage
 *
 * ```typescript
 * const index = new VectorIndex(openDb(path), { collection: 'study_corpus', dimension: 1536 });
 * await index.upsert(passages);
 * const results = await index.search(queryVector, 5, { chapterNum: '2' });
 * ```
 *
 * ## Ordering
 *
 * Results are ordered by descending cosine similarity. Equal scores keep
 * insertion order (ascending internal id), so a fixed index state and a
 * fixed query vector always give the same list.
 *
 * ## Performance Notes
 *
 * - Initial load: O(n) to deserialize all vectors
 * - Filter lookup: O(1) per predicate via the in-memory secondary indexes
 * - Search: O(m) over the m passages that pass the filter
 * - Memory: ~6KB per 1536-dimension vector
 *
 * @module storage/vector-index
 */

import type Database from 'better-sqlite3';
import { cosineWithNorm, norm } from '../utils/vector-math.js';
import { serializeEmbedding, deserializeEmbedding } from '../utils/embedding-utils.js';
import { DimensionMismatchError, IndexUnavailableError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  isContentType,
  type IndexDescription,
  type Passage,
  type PassageMetadata,
  type SearchFilter,
  type SearchResult,
  type UpsertResult,
} from './types.js';


export interface VectorIndexOptions {
  /** Collection (corpus) name */
  collection: string;
  /** Embedding dimension for this deployment */
  dimension: number;
}

interface IndexEntry {
  id: number;
  vector: Float32Array;
  norm: number;
}

interface PassageRow {
  id: number;
  chunk_id: string;
  content: string;
  summary: string;
  section_header: string;
  chapter_num: string;
  section_num: string;
  content_type: string;
  metadata_extra: string | null;
}

interface VectorRow {
  id: number;
  chunk_id: string;
  chapter_num: string;
  content_type: string;
  embedding: Buffer;
}

const PAYLOAD_COLUMNS =
  'id, chunk_id, content, summary, section_header, chapter_num, section_num, content_type, metadata_extra';

/**
 * In-memory vector index backed by SQLite.
 *
 * Lazy-loads on first operation. Reads may interleave freely; writes are
 * expected as offline batches before the index starts serving.
 */
export class VectorIndex {
  readonly collection: string;
  readonly dimension: number;

  /** id → vector, iterated in ascending id (insertion) order */
  private entries: Map<number, IndexEntry> = new Map();
  private chunkIds: Map<string, number> = new Map();
  /** chapter_num → ids */
  private chapterIndex: Map<string, Set<number>> = new Map();
  /** content_type → ids */
  private contentTypeIndex: Map<string, Set<number>> = new Map();
  private loaded = false;
  private readonly log: Logger;

  constructor(
    private readonly db: Database.Database,
    options: VectorIndexOptions,
  ) {
    if (!Number.isInteger(options.dimension) || options.dimension < 1) {
      throw new RangeError(`dimension must be a positive integer, got ${options.dimension}`);
    }
    this.collection = options.collection;
    this.dimension = options.dimension;
    this.log = createLogger('vector-index').child({ collection: options.collection });
  }

  /**
   * Register the collection (or check its dimension) and load vectors.
   */
  async load(): Promise<void> {
    if (this.loaded) return;

    this.ensureOpen();
    try {
      const existing = this.db
        .prepare('SELECT dimension FROM collections WHERE name = ?')
        .get(this.collection) as { dimension: number } | undefined;

      if (existing && existing.dimension !== this.dimension) {
        throw new DimensionMismatchError(
          existing.dimension,
          this.dimension,
          `collection "${this.collection}"`,
        );
      }
      if (!existing) {
        this.db
          .prepare("INSERT INTO collections (name, dimension, distance_metric) VALUES (?, ?, 'cosine')")
          .run(this.collection, this.dimension);
        this.log.info('Created collection', { dimension: this.dimension });
      }

      const rows = this.db
        .prepare(
          'SELECT id, chunk_id, chapter_num, content_type, embedding FROM passages WHERE collection = ? ORDER BY id',
        )
        .all(this.collection) as VectorRow[];

      for (const row of rows) {
        this.chunkIds.set(row.chunk_id, row.id);
        this.indexRow(row.id, row.chapter_num, row.content_type, deserializeEmbedding(row.embedding));
      }
    } catch (error) {
      throw this.storeError('load', error);
    }

    this.loaded = true;
    this.log.debug('Index loaded', { count: this.entries.size });
  }

  /**
   * Insert or replace passages, keyed by chunkId.
   *
   * A passage that already exists keeps its internal id, so re-indexing
   * does not change tie-break order. Runs as one transaction.
   *
   * @throws DimensionMismatchError if any embedding has the wrong length
   */
  async upsert(passages: readonly Passage[]): Promise<UpsertResult> {
    await this.load();

    for (const passage of passages) {
      this.assertVector(passage.embedding, `passage "${passage.chunkId}"`);
    }

    const stmt = this.db.prepare(`
      INSERT INTO passages (
        collection, chunk_id, content, summary, section_header,
        chapter_num, section_num, content_type, metadata_extra, embedding
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(collection, chunk_id) DO UPDATE SET
        content = excluded.content,
        summary = excluded.summary,
        section_header = excluded.section_header,
        chapter_num = excluded.chapter_num,
        section_num = excluded.section_num,
        content_type = excluded.content_type,
        metadata_extra = excluded.metadata_extra,
        embedding = excluded.embedding,
        updated_at = CURRENT_TIMESTAMP
      RETURNING id
    `);

    const result: UpsertResult = { inserted: 0, updated: 0 };
    const written: Array<{ id: number; passage: Passage }> = [];

    const upsertMany = this.db.transaction((batch: readonly Passage[]) => {
      for (const passage of batch) {
        const { metadata } = passage;
        const row = stmt.get(
          this.collection,
          passage.chunkId,
          passage.content,
          passage.summary,
          passage.sectionHeader,
          metadata.chapterNum,
          metadata.sectionNum,
          metadata.contentType,
          metadata.extra ? JSON.stringify(metadata.extra) : null,
          serializeEmbedding(passage.embedding),
        ) as { id: number };
        written.push({ id: row.id, passage });
      }
    });

    try {
      upsertMany(passages);
    } catch (error) {
      throw this.storeError('upsert', error);
    }

    // Memory is updated only after the transaction commits
    for (const { id, passage } of written) {
      const previous = this.chunkIds.get(passage.chunkId);
      if (previous === undefined) {
        result.inserted++;
      } else {
        result.updated++;
        this.unindex(previous);
      }
      this.chunkIds.set(passage.chunkId, id);
      this.indexRow(
        id,
        passage.metadata.chapterNum,
        passage.metadata.contentType,
        new Float32Array(passage.embedding),
      );
    }

    // Keep ascending-id iteration order after updates re-inserted entries
    this.entries = new Map([...this.entries.entries()].sort((a, b) => a[0] - b[0]));

    this.log.info('Upserted passages', { ...result });
    return result;
  }

  /**
   * Find the passages most similar to a query vector.
   *
   * @param queryVector - Must match the collection dimension
   * @param topK - Maximum number of results (caller guarantees >= 1)
   * @param filter - Optional chapter / content type predicates
   * @returns Results by descending cosine similarity, ties by insertion order
   */
  async search(
    queryVector: readonly number[],
    topK: number,
    filter: SearchFilter = {},
  ): Promise<SearchResult[]> {
    await this.load();
    this.ensureOpen();
    this.assertVector(queryVector, 'query vector');

    const queryNorm = norm(queryVector);
    const scored: Array<{ id: number; score: number }> = [];

    for (const entry of this.candidates(filter)) {
      scored.push({ id: entry.id, score: cosineWithNorm(queryVector, queryNorm, entry.vector, entry.norm) });
    }

    scored.sort((a, b) => b.score - a.score || a.id - b.id);
    const top = scored.slice(0, Math.max(0, topK));
    if (top.length === 0) {
      return [];
    }

    const payloads = this.fetchPayloads(top.map((s) => s.id));
    const results: SearchResult[] = [];
    for (const { id, score } of top) {
      const payload = payloads.get(id);
      if (!payload) {
        // Row vanished underneath us; the in-memory view is stale
        this.log.warn('Indexed passage missing from store', { id });
        continue;
      }
      results.push({ ...payload, score });
    }
    return results;
  }

  /**
   * Get a passage (without its vector) by chunkId.
   */
  async get(chunkId: string): Promise<SearchResult | null> {
    await this.load();
    const id = this.chunkIds.get(chunkId);
    if (id === undefined) return null;
    const payload = this.fetchPayloads([id]).get(id);
    return payload ? { ...payload, score: 0 } : null;
  }

  /**
   * Number of passages in the collection.
   */
  async count(): Promise<number> {
    await this.load();
    return this.entries.size;
  }

  /**
   * Distinct chapter numbers, in numeric order where they are numeric.
   */
  async listChapters(): Promise<string[]> {
    await this.load();
    return [...this.chapterIndex.keys()].sort((a, b) =>
      a.localeCompare(b, undefined, { numeric: true }),
    );
  }

  /**
   * Introspection for health checks. Never throws.
   */
  async describe(): Promise<IndexDescription> {
    const base = {
      collection: this.collection,
      dimension: this.dimension,
      distanceMetric: 'cosine' as const,
    };

    try {
      await this.load();
      this.ensureOpen();
    } catch (error) {
      this.log.warn('Index unavailable', { error: errorMessage(error) });
      return { ...base, count: this.entries.size, status: 'unavailable' };
    }

    const count = this.entries.size;
    return { ...base, count, status: count === 0 ? 'empty' : 'ready' };
  }

  /**
   * Delete every passage in the collection.
   */
  async clear(): Promise<number> {
    await this.load();
    let removed: number;
    try {
      removed = this.db.prepare('DELETE FROM passages WHERE collection = ?').run(this.collection).changes;
    } catch (error) {
      throw this.storeError('clear', error);
    }
    this.entries.clear();
    this.chunkIds.clear();
    this.chapterIndex.clear();
    this.contentTypeIndex.clear();
    return removed;
  }

  /**
   * Drop in-memory state so the next call reloads from SQLite.
   */
  reset(): void {
    this.entries.clear();
    this.chunkIds.clear();
    this.chapterIndex.clear();
    this.contentTypeIndex.clear();
    this.loaded = false;
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private ensureOpen(): void {
    if (!this.db.open) {
      throw new IndexUnavailableError(`Index database for "${this.collection}" is closed`);
    }
  }

  private storeError(operation: string, error: unknown): Error {
    if (error instanceof DimensionMismatchError || error instanceof IndexUnavailableError) {
      return error;
    }
    return new IndexUnavailableError(
      `Vector index ${operation} failed: ${errorMessage(error)}`,
      'INDEX_UNAVAILABLE',
      error,
    );
  }

  private assertVector(vector: readonly number[], context: string): void {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length, context);
    }
  }

  private indexRow(id: number, chapterNum: string, contentType: string, vector: Float32Array): void {
    this.entries.set(id, { id, vector, norm: norm(vector) });
    addToIndex(this.chapterIndex, chapterNum, id);
    addToIndex(this.contentTypeIndex, contentType, id);
  }

  private unindex(id: number): void {
    this.entries.delete(id);
    removeFromIndex(this.chapterIndex, id);
    removeFromIndex(this.contentTypeIndex, id);
  }

  /**
   * Entries passing the filter, in ascending id order.
   */
  private candidates(filter: SearchFilter): IndexEntry[] {
    const sets: Set<number>[] = [];
    if (filter.chapterNum !== undefined) {
      sets.push(this.chapterIndex.get(filter.chapterNum) ?? new Set());
    }
    if (filter.contentType !== undefined) {
      sets.push(this.contentTypeIndex.get(filter.contentType) ?? new Set());
    }

    if (sets.length === 0) {
      return [...this.entries.values()];
    }

    sets.sort((a, b) => a.size - b.size);
    const [smallest, ...rest] = sets;
    const ids = [...smallest].filter((id) => rest.every((s) => s.has(id))).sort((a, b) => a - b);

    const result: IndexEntry[] = [];
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry) result.push(entry);
    }
    return result;
  }

  private fetchPayloads(ids: number[]): Map<number, Omit<SearchResult, 'score'>> {
    this.ensureOpen();
    const placeholders = ids.map(() => '?').join(',');
    let rows: PassageRow[];
    try {
      rows = this.db
        .prepare(`SELECT ${PAYLOAD_COLUMNS} FROM passages WHERE id IN (${placeholders})`)
        .all(...ids) as PassageRow[];
    } catch (error) {
      throw this.storeError('read', error);
    }

    const payloads = new Map<number, Omit<SearchResult, 'score'>>();
    for (const row of rows) {
      payloads.set(row.id, rowToPayload(row));
    }
    return payloads;
  }
}

function addToIndex(index: Map<string, Set<number>>, key: string, id: number): void {
  let ids = index.get(key);
  if (!ids) {
    ids = new Set();
    index.set(key, ids);
  }
  ids.add(id);
}

function removeFromIndex(index: Map<string, Set<number>>, id: number): void {
  for (const [key, ids] of index) {
    if (ids.delete(id) && ids.size === 0) {
      index.delete(key);
    }
  }
}

function parseExtra(raw: string | null): Record<string, unknown> | undefined {
  if (!raw) return undefined;
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  return { ...parsed };
}

function rowToPayload(row: PassageRow): Omit<SearchResult, 'score'> {
  const extra = parseExtra(row.metadata_extra);
  const metadata: PassageMetadata = {
    chapterNum: row.chapter_num,
    sectionNum: row.section_num,
    // Rows are only written from validated passages
    contentType: isContentType(row.content_type) ? row.content_type : 'text',
    ...(extra ? { extra } : {}),
  };
  return {
    chunkId: row.chunk_id,
    content: row.content,
    summary: row.summary,
    sectionHeader: row.section_header,
    metadata,
  };
}
