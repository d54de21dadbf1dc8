/**
 * Tests for the SQLite-backed vector index.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { VectorIndex } from '../../src/storage/vector-index.js';
import { DimensionMismatchError, IndexUnavailableError } from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';
import { createTestDb, createTestIndex, makePassage } from './test-utils.js';

describe('VectorIndex', () => {
  let db: Database.Database;
  let index: VectorIndex;

  beforeEach(() => {
    setLogLevel('silent');
    db = createTestDb();
    index = createTestIndex(db);
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  describe('upsert', () => {
    it('inserts new passages', async () => {
      const result = await index.upsert([makePassage('a', [1, 0, 0]), makePassage('b', [0, 1, 0])]);

      expect(result).toEqual({ inserted: 2, updated: 0 });
      expect(await index.count()).toBe(2);
    });

    it('is idempotent per chunkId', async () => {
      await index.upsert([makePassage('a', [1, 0, 0])]);
      const result = await index.upsert([makePassage('a', [0, 1, 0], { summary: 'Rewritten' })]);

      expect(result).toEqual({ inserted: 0, updated: 1 });
      expect(await index.count()).toBe(1);
      expect((await index.get('a'))?.summary).toBe('Rewritten');
    });

    it('keeps the internal id of an updated passage', async () => {
      await index.upsert([makePassage('a', [1, 0, 0]), makePassage('b', [1, 0, 0])]);
      await index.upsert([makePassage('a', [1, 0, 0], { summary: 'Updated' })]);

      const results = await index.search([1, 0, 0], 2);

      expect(results.map((r) => r.chunkId)).toEqual(['a', 'b']);
    });

    it('rejects an embedding of the wrong length', async () => {
      await expect(index.upsert([makePassage('a', [1, 0])])).rejects.toThrow(DimensionMismatchError);
      expect(await index.count()).toBe(0);
    });

    it('writes nothing when any passage in the batch is invalid', async () => {
      await expect(
        index.upsert([makePassage('a', [1, 0, 0]), makePassage('b', [1, 0, 0, 0])]),
      ).rejects.toThrow('Dimension mismatch for passage "b": expected 3, got 4');
      expect(await index.count()).toBe(0);
    });

    it('persists passages across index instances', async () => {
      await index.upsert([makePassage('a', [1, 0, 0], { extra: { title: 'Pools' } })]);

      const reopened = createTestIndex(db);
      const result = await reopened.get('a');

      expect(await reopened.count()).toBe(1);
      expect(result?.metadata).toEqual({
        chapterNum: '1',
        sectionNum: '1.1',
        contentType: 'text',
        extra: { title: 'Pools' },
      });
    });

    it('counts a reloaded passage as an update', async () => {
      await index.upsert([makePassage('a', [1, 0, 0])]);

      const reopened = createTestIndex(db);

      expect(await reopened.upsert([makePassage('a', [0, 0, 1])])).toEqual({ inserted: 0, updated: 1 });
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await index.upsert([
        makePassage('A', [1, 0, 0], { chapterNum: '2', contentType: 'text' }),
        makePassage('B', [0.8, 0.6, 0], { chapterNum: '2', contentType: 'video' }),
        makePassage('C', [0, 1, 0], { chapterNum: '3', contentType: 'text' }),
        makePassage('D', [0, 0, 1], { chapterNum: '10', contentType: 'chapter_intro' }),
      ]);
    });

    it('orders by descending cosine similarity', async () => {
      const results = await index.search([1, 0, 0], 3);

      expect(results.map((r) => r.chunkId)).toEqual(['A', 'B', 'C']);
      expect(results[0].score).toBeCloseTo(1, 6);
      expect(results[1].score).toBeCloseTo(0.8, 6);
      expect(results[2].score).toBe(0);
    });

    it('returns at most topK results', async () => {
      expect(await index.search([1, 0, 0], 2)).toHaveLength(2);
      expect(await index.search([1, 0, 0], 10)).toHaveLength(4);
    });

    it('breaks ties by insertion order', async () => {
      await index.upsert([makePassage('E', [1, 0, 0])]);

      const results = await index.search([1, 0, 0], 2);

      expect(results.map((r) => r.chunkId)).toEqual(['A', 'E']);
    });

    it('filters by chapter', async () => {
      const results = await index.search([1, 0, 0], 10, { chapterNum: '2' });

      expect(results.map((r) => r.chunkId)).toEqual(['A', 'B']);
    });

    it('filters by content type', async () => {
      const results = await index.search([1, 0, 0], 10, { contentType: 'text' });

      expect(results.map((r) => r.chunkId)).toEqual(['A', 'C']);
    });

    it('combines filters conjunctively', async () => {
      const results = await index.search([0, 1, 0], 10, { chapterNum: '2', contentType: 'video' });

      expect(results.map((r) => r.chunkId)).toEqual(['B']);
    });

    it('returns an empty list when the filter matches nothing', async () => {
      expect(await index.search([1, 0, 0], 5, { chapterNum: '99' })).toEqual([]);
    });

    it('updates filter indexes when a passage moves chapter', async () => {
      await index.upsert([makePassage('A', [1, 0, 0], { chapterNum: '3' })]);

      const chapter2 = await index.search([1, 0, 0], 10, { chapterNum: '2' });
      const chapter3 = await index.search([1, 0, 0], 10, { chapterNum: '3' });

      expect(chapter2.map((r) => r.chunkId)).toEqual(['B']);
      expect(chapter3.map((r) => r.chunkId)).toEqual(['A', 'C']);
    });

    it('returns full payloads', async () => {
      const [top] = await index.search([0, 0, 1], 1);

      expect(top).toEqual({
        chunkId: 'D',
        content: 'Content of D',
        summary: 'Summary of D',
        sectionHeader: 'Section D',
        metadata: { chapterNum: '10', sectionNum: '1.1', contentType: 'chapter_intro' },
        score: 1,
      });
    });

    it('throws DimensionMismatchError for a query of the wrong length', async () => {
      await expect(index.search([1, 0], 3)).rejects.toThrow(DimensionMismatchError);
    });

    it('throws IndexUnavailableError when the database is closed', async () => {
      db.close();

      await expect(index.search([1, 0, 0], 3)).rejects.toThrow(IndexUnavailableError);
    });
  });

  describe('collections', () => {
    it('keeps collections apart', async () => {
      const other = createTestIndex(db, 'other_corpus');
      await index.upsert([makePassage('a', [1, 0, 0])]);
      await other.upsert([makePassage('a', [0, 1, 0]), makePassage('b', [0, 0, 1])]);

      expect(await index.count()).toBe(1);
      expect(await other.count()).toBe(2);
    });

    it('refuses to open a collection with a different dimension', async () => {
      await index.upsert([makePassage('a', [1, 0, 0])]);
      const wider = new VectorIndex(db, { collection: 'test_corpus', dimension: 4 });

      await expect(wider.count()).rejects.toThrow(
        'Dimension mismatch for collection "test_corpus": expected 3, got 4',
      );
    });

    it('rejects a non-positive dimension', () => {
      expect(() => new VectorIndex(db, { collection: 'x', dimension: 0 })).toThrow(RangeError);
    });
  });

  describe('describe', () => {
    it('reports an empty index', async () => {
      expect(await index.describe()).toEqual({
        collection: 'test_corpus',
        count: 0,
        dimension: 3,
        distanceMetric: 'cosine',
        status: 'empty',
      });
    });

    it('reports a ready index', async () => {
      await index.upsert([makePassage('a', [1, 0, 0])]);

      expect(await index.describe()).toMatchObject({ count: 1, status: 'ready' });
    });

    it('reports unavailable instead of throwing', async () => {
      db.close();

      expect(await index.describe()).toMatchObject({ count: 0, status: 'unavailable' });
    });
  });

  describe('listChapters', () => {
    it('lists distinct chapters in numeric order', async () => {
      await index.upsert([
        makePassage('a', [1, 0, 0], { chapterNum: '10' }),
        makePassage('b', [1, 0, 0], { chapterNum: '2' }),
        makePassage('c', [1, 0, 0], { chapterNum: '2' }),
        makePassage('d', [1, 0, 0], { chapterNum: '1' }),
      ]);

      expect(await index.listChapters()).toEqual(['1', '2', '10']);
    });
  });

  describe('get', () => {
    it('returns null for an unknown chunkId', async () => {
      expect(await index.get('missing')).toBeNull();
    });
  });

  describe('clear', () => {
    it('removes every passage in the collection', async () => {
      await index.upsert([makePassage('a', [1, 0, 0]), makePassage('b', [0, 1, 0])]);

      expect(await index.clear()).toBe(2);
      expect(await index.count()).toBe(0);
      expect(await index.search([1, 0, 0], 5)).toEqual([]);
      expect(await index.listChapters()).toEqual([]);
    });
  });

  describe('reset', () => {
    it('reloads from SQLite on next use', async () => {
      await index.upsert([makePassage('a', [1, 0, 0])]);
      db.prepare('DELETE FROM passages').run();

      index.reset();

      expect(await index.count()).toBe(0);
    });
  });
});
