/**
 * Tests for reading embeddings files.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadPassageFile, parsePassageFile } from '../../src/storage/passage-loader.js';
import { LoadError } from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';

function chunk(id: string, embedding: unknown = [0.1, 0.2, 0.3], metadata: unknown = undefined): Record<string, unknown> {
  return {
    chunk_id: id,
    content: `Content ${id}`,
    summary: `Summary ${id}`,
    section_header: `Header ${id}`,
    metadata: metadata ?? { chapter_num: '2', section_num: '2.3', content_type: 'video' },
    embedding,
  };
}

describe('parsePassageFile', () => {
  it('maps snake_case records to passages', () => {
    const { passages, dimension } = parsePassageFile({ embedding_dimension: 3, chunks: [chunk('2.3_chunk_1')] });

    expect(dimension).toBe(3);
    expect(passages).toEqual([
      {
        chunkId: '2.3_chunk_1',
        content: 'Content 2.3_chunk_1',
        summary: 'Summary 2.3_chunk_1',
        sectionHeader: 'Header 2.3_chunk_1',
        metadata: { chapterNum: '2', sectionNum: '2.3', contentType: 'video' },
        embedding: [0.1, 0.2, 0.3],
      },
    ]);
  });

  it('keeps other metadata keys in extra', () => {
    const { passages } = parsePassageFile({
      chunks: [chunk('a', [1, 0], { chapter_num: 4, section_num: '4.1', content_type: 'text', title: 'Cloud' })],
    });

    expect(passages[0].metadata).toEqual({
      chapterNum: '4',
      sectionNum: '4.1',
      contentType: 'text',
      extra: { title: 'Cloud' },
    });
  });

  it('infers the dimension from the first vector', () => {
    expect(parsePassageFile({ chunks: [chunk('a', [1, 2])] }).dimension).toBe(2);
    expect(parsePassageFile({ chunks: [] }).dimension).toBeNull();
  });

  it('rejects a document without chunks', () => {
    expect(() => parsePassageFile({ data: [] })).toThrow('Embeddings file must contain a "chunks" array');
  });

  it('rejects vectors that disagree on dimension', () => {
    expect(() => parsePassageFile({ chunks: [chunk('a', [1, 2, 3]), chunk('b', [1, 2])] })).toThrow(
      'chunks[1]: embedding has 2 dimensions, expected 3',
    );
  });

  it('rejects vectors that disagree with the declared dimension', () => {
    expect(() => parsePassageFile({ embedding_dimension: 4, chunks: [chunk('a')] })).toThrow(
      'chunks[0]: embedding has 3 dimensions, expected 4',
    );
  });

  it('rejects non-finite vector components', () => {
    expect(() => parsePassageFile({ chunks: [chunk('a', [1, 'x', 3])] })).toThrow(
      'chunks[0]: "embedding" contains a non-finite value',
    );
  });

  it('rejects an unknown content type', () => {
    let caught: unknown;
    try {
      parsePassageFile({ chunks: [chunk('a', [1], { chapter_num: '1', section_num: '1.1', content_type: 'podcast' })] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(LoadError);
    expect(caught).toMatchObject({ code: 'INVALID_PASSAGE', message: 'chunks[0]: unknown content_type "podcast"' });
  });

  it('rejects duplicate chunk ids', () => {
    expect(() => parsePassageFile({ chunks: [chunk('a'), chunk('a')] })).toThrow('chunks[1]: duplicate chunk_id "a"');
  });

  it('rejects a missing summary', () => {
    const record = chunk('a');
    delete record.summary;

    expect(() => parsePassageFile({ chunks: [record] })).toThrow('chunks[0]: "summary" must be a string');
  });
});

describe('loadPassageFile', () => {
  let dir: string;

  beforeEach(() => {
    setLogLevel('silent');
    dir = mkdtempSync(join(tmpdir(), 'studyrag-load-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a file from disk', () => {
    const path = join(dir, 'embeddings.json');
    writeFileSync(path, JSON.stringify({ embedding_dimension: 3, chunks: [chunk('a'), chunk('b')] }));

    const { passages } = loadPassageFile(path);

    expect(passages.map((p) => p.chunkId)).toEqual(['a', 'b']);
  });

  it('wraps unreadable files in LoadError', () => {
    expect(() => loadPassageFile(join(dir, 'missing.json'))).toThrow(LoadError);
  });

  it('wraps invalid JSON in LoadError with LOAD_FAILED', () => {
    const path = join(dir, 'bad.json');
    writeFileSync(path, '{');

    let caught: unknown;
    try {
      loadPassageFile(path);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(LoadError);
    expect(caught).toMatchObject({ code: 'LOAD_FAILED' });
  });
});
