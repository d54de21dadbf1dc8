/**
 * Reads an embeddings file into passages for index build.
 *
 * File layout (snake_case, as written by the embedding job):
 *
 * ```json
 * {
 *   "embedding_dimension": 1536,
 *   "chunks": [
 *     {
 *       "chunk_id": "2.3_chunk_1",
 *       "content": "...",
 *       "summary": "...",
 *       "section_header": "2.3 Resource Pooling",
 *       "metadata": { "chapter_num": "2", "section_num": "2.3", "content_type": "text" },
 *       "embedding": [0.01, ...]
 *     }
 *   ]
 * }
 * ```
 *
 * Metadata keys other than the three filter fields are kept in `extra`.
 */

import { readFileSync } from 'node:fs';
import { LoadError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { isContentType, type Passage, type PassageMetadata } from './types.js';

const log = createLogger('passage-loader');

const FILTER_KEYS = new Set(['chapter_num', 'section_num', 'content_type']);

export interface LoadedPassages {
  passages: Passage[];
  /** Declared dimension, or the length of the first vector when undeclared */
  dimension: number | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value === 'string') return value;
  // Chapter numbers sometimes arrive as bare numbers
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  throw new LoadError(`${where}: "${key}" must be a string`, 'INVALID_PASSAGE');
}

function parseEmbedding(value: unknown, where: string): number[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new LoadError(`${where}: "embedding" must be a non-empty array`, 'INVALID_PASSAGE');
  }
  const vector: number[] = [];
  for (const component of value) {
    if (typeof component !== 'number' || !Number.isFinite(component)) {
      throw new LoadError(`${where}: "embedding" contains a non-finite value`, 'INVALID_PASSAGE');
    }
    vector.push(component);
  }
  return vector;
}

function parseMetadata(value: unknown, where: string): PassageMetadata {
  if (!isRecord(value)) {
    throw new LoadError(`${where}: "metadata" must be an object`, 'INVALID_PASSAGE');
  }
  const contentType = value.content_type;
  if (!isContentType(contentType)) {
    throw new LoadError(
      `${where}: unknown content_type ${JSON.stringify(contentType)}`,
      'INVALID_PASSAGE',
    );
  }

  const extra: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    if (!FILTER_KEYS.has(key)) extra[key] = v;
  }

  return {
    chapterNum: requireString(value, 'chapter_num', where),
    sectionNum: requireString(value, 'section_num', where),
    contentType,
    ...(Object.keys(extra).length > 0 ? { extra } : {}),
  };
}

/**
 * Validate a parsed embeddings document.
 *
 * @throws LoadError on the first malformed record
 */
export function parsePassageFile(raw: unknown): LoadedPassages {
  if (!isRecord(raw) || !Array.isArray(raw.chunks)) {
    throw new LoadError('Embeddings file must contain a "chunks" array', 'LOAD_FAILED');
  }

  const declared = raw.embedding_dimension;
  let dimension: number | null = null;
  if (declared !== undefined) {
    if (typeof declared !== 'number' || !Number.isInteger(declared) || declared < 1) {
      throw new LoadError('"embedding_dimension" must be a positive integer', 'LOAD_FAILED');
    }
    dimension = declared;
  }

  const passages: Passage[] = [];
  const seen = new Set<string>();

  raw.chunks.forEach((chunk: unknown, i: number) => {
    const where = `chunks[${i}]`;
    if (!isRecord(chunk)) {
      throw new LoadError(`${where}: must be an object`, 'INVALID_PASSAGE');
    }

    const chunkId = requireString(chunk, 'chunk_id', where);
    if (seen.has(chunkId)) {
      throw new LoadError(`${where}: duplicate chunk_id "${chunkId}"`, 'INVALID_PASSAGE');
    }
    seen.add(chunkId);

    const embedding = parseEmbedding(chunk.embedding, where);
    dimension ??= embedding.length;
    if (embedding.length !== dimension) {
      throw new LoadError(
        `${where}: embedding has ${embedding.length} dimensions, expected ${dimension}`,
        'INVALID_PASSAGE',
      );
    }

    passages.push({
      chunkId,
      content: requireString(chunk, 'content', where),
      summary: requireString(chunk, 'summary', where),
      sectionHeader: requireString(chunk, 'section_header', where),
      metadata: parseMetadata(chunk.metadata, where),
      embedding,
    });
  });

  return { passages, dimension };
}

/**
 * Read and validate an embeddings file from disk.
 */
export function loadPassageFile(path: string): LoadedPassages {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new LoadError(`Cannot read embeddings file ${path}: ${errorMessage(error)}`, 'LOAD_FAILED', error);
  }

  const loaded = parsePassageFile(raw);
  log.info('Loaded embeddings file', { path, passages: loaded.passages.length, dimension: loaded.dimension });
  return loaded;
}
