/**
 * Tests for single-query retrieval.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { BaseRetriever } from '../../src/retrieval/base-retriever.js';
import { formatDocument } from '../../src/retrieval/context-format.js';
import type { VectorIndex } from '../../src/storage/vector-index.js';
import {
  DimensionMismatchError,
  EmbeddingError,
  IndexUnavailableError,
  RetrievalError,
} from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';
import { createTestDb, createTestIndex, makePassage } from '../storage/test-utils.js';
import { FakeEmbedder } from './fakes.js';

describe('BaseRetriever', () => {
  let db: Database.Database;
  let index: VectorIndex;
  let embedder: FakeEmbedder;
  let retriever: BaseRetriever;

  beforeEach(async () => {
    setLogLevel('silent');
    db = createTestDb();
    index = createTestIndex(db);
    await index.upsert([
      makePassage('A', [0.9, Math.sqrt(1 - 0.81), 0], { chapterNum: '1' }),
      makePassage('B', [0.8, 0.6, 0], { chapterNum: '2' }),
      makePassage('C', [0.7, Math.sqrt(1 - 0.49), 0], { chapterNum: '2', contentType: 'video' }),
    ]);
    embedder = new FakeEmbedder({
      'what is pooling': [1, 0, 0],
      'wrong size': [1, 0],
    });
    retriever = new BaseRetriever(embedder, index);
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  it('returns the top k in score order with their context', async () => {
    const { results, context } = await retriever.retrieve('what is pooling', 2);

    expect(results.map((r) => r.chunkId)).toEqual(['A', 'B']);
    expect(results[0].score).toBeCloseTo(0.9, 5);
    expect(results[1].score).toBeCloseTo(0.8, 5);
    expect(context).toBe(formatDocument(results[0]) + formatDocument(results[1]));
    expect(context.split('<document>')).toHaveLength(3);
  });

  it('embeds the query exactly once', async () => {
    await retriever.retrieve('what is pooling', 3);

    expect(embedder.calls).toEqual(['what is pooling']);
  });

  it('applies the filter', async () => {
    const { results } = await retriever.retrieve('what is pooling', 3, { chapterNum: '2' });

    expect(results.map((r) => r.chunkId)).toEqual(['B', 'C']);
  });

  it('returns empty results and context when nothing matches', async () => {
    const result = await retriever.retrieve('what is pooling', 3, { chapterNum: '2', contentType: 'chapter_intro' });

    expect(result).toEqual({ results: [], context: '' });
  });

  it('is deterministic', async () => {
    const first = await retriever.retrieve('what is pooling', 3);
    const second = await retriever.retrieve('what is pooling', 3);

    expect(second).toEqual(first);
  });

  it('rejects k below 1', async () => {
    await expect(retriever.retrieve('what is pooling', 0)).rejects.toThrow(RetrievalError);
    await expect(retriever.retrieve('what is pooling', 1.5)).rejects.toThrow('k must be a positive integer, got 1.5');
    expect(embedder.calls).toEqual([]);
  });

  it('propagates embedding failures', async () => {
    await expect(retriever.retrieve('unknown query', 2)).rejects.toThrow(EmbeddingError);
  });

  it('propagates dimension mismatches', async () => {
    await expect(retriever.retrieve('wrong size', 2)).rejects.toThrow(DimensionMismatchError);
  });

  it('propagates index unavailability', async () => {
    db.close();

    await expect(retriever.retrieve('what is pooling', 2)).rejects.toThrow(IndexUnavailableError);
  });

  describe('retrieveWithScores', () => {
    it('keeps results at or above the threshold', async () => {
      const results = await retriever.retrieveWithScores('what is pooling', 3, 0.75);

      expect(results.map((r) => r.chunkId)).toEqual(['A', 'B']);
    });

    it('keeps everything at the default threshold', async () => {
      expect(await retriever.retrieveWithScores('what is pooling', 3)).toHaveLength(3);
    });

    it('rejects a threshold outside [-1, 1]', async () => {
      await expect(retriever.retrieveWithScores('what is pooling', 3, 1.5)).rejects.toMatchObject({
        code: 'INVALID_THRESHOLD',
      });
    });
  });
});
