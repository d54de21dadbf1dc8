/**
 * Test utilities for storage and retrieval tests.
 */

import type Database from 'better-sqlite3';
import { openDb } from '../../src/storage/db.js';
import type { ContentType, Passage } from '../../src/storage/types.js';
import { VectorIndex } from '../../src/storage/vector-index.js';

/**
 * Create an in-memory database with the production schema.
 */
export function createTestDb(): Database.Database {
  return openDb(':memory:');
}

export interface PassageOverrides {
  chapterNum?: string;
  sectionNum?: string;
  contentType?: ContentType;
  summary?: string;
  content?: string;
  sectionHeader?: string;
  extra?: Record<string, unknown>;
}

/**
 * Build a passage whose text fields are derived from its id.
 */
export function makePassage(chunkId: string, embedding: number[], overrides: PassageOverrides = {}): Passage {
  return {
    chunkId,
    content: overrides.content ?? `Content of ${chunkId}`,
    summary: overrides.summary ?? `Summary of ${chunkId}`,
    sectionHeader: overrides.sectionHeader ?? `Section ${chunkId}`,
    metadata: {
      chapterNum: overrides.chapterNum ?? '1',
      sectionNum: overrides.sectionNum ?? '1.1',
      contentType: overrides.contentType ?? 'text',
      ...(overrides.extra ? { extra: overrides.extra } : {}),
    },
    embedding,
  };
}

/**
 * A 3-dimension index over a fresh in-memory database.
 */
export function createTestIndex(db: Database.Database = createTestDb(), collection = 'test_corpus'): VectorIndex {
  return new VectorIndex(db, { collection, dimension: 3 });
}
