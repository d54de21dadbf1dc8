/**
 * Tests for database setup.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { closeDb, getSchemaVersion, openDb, runMigrations, SCHEMA_VERSION } from '../../src/storage/db.js';
import { loadSchema, parseSchema, splitStatements } from '../../src/storage/schema-loader.js';
import { IndexUnavailableError } from '../../src/utils/errors.js';
import { setLogLevel } from '../../src/utils/logger.js';

describe('db', () => {
  beforeEach(() => {
    setLogLevel('silent');
  });

  it('creates the schema on open', () => {
    const db = openDb(':memory:');
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all() as { name: string }[];

    expect(tables.map((t) => t.name)).toEqual(['collections', 'passages', 'schema_version']);
    expect(getSchemaVersion(db)).toBe(SCHEMA_VERSION);
    closeDb(db);
  });

  it('creates the filter indexes', () => {
    const db = openDb(':memory:');
    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'index' AND name LIKE 'idx_%' ORDER BY name")
      .all() as { name: string }[];

    expect(indexes.map((i) => i.name)).toEqual(['idx_passages_chapter', 'idx_passages_content_type']);
    closeDb(db);
  });

  it('running migrations twice is harmless', () => {
    const db = openDb(':memory:');
    runMigrations(db);

    expect(getSchemaVersion(db)).toBe(1);
    closeDb(db);
  });

  it('reports version 0 for an empty database', async () => {
    const { default: Database } = await import('better-sqlite3');
    const raw = new Database(':memory:');

    expect(getSchemaVersion(raw)).toBe(0);
    raw.close();
  });

  it('closeDb is safe to call twice', () => {
    const db = openDb(':memory:');
    closeDb(db);
    closeDb(db);

    expect(db.open).toBe(false);
  });

  it('creates parent directories for file databases', () => {
    const dir = mkdtempSync(join(tmpdir(), 'studyrag-db-'));
    try {
      const db = openDb(join(dir, 'nested', 'index.db'));
      expect(db.open).toBe(true);
      closeDb(db);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('throws IndexUnavailableError when the file must exist and does not', () => {
    const dir = mkdtempSync(join(tmpdir(), 'studyrag-db-'));
    try {
      expect(() => openDb(join(dir, 'missing.db'), { fileMustExist: true })).toThrow(IndexUnavailableError);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('splitStatements', () => {
  it('skips comments and blank lines and strips semicolons', () => {
    const sql = '-- header\n\nCREATE TABLE a (x INTEGER);\n-- note\nCREATE INDEX i ON a(x);\n';

    expect(splitStatements(sql)).toEqual(['CREATE TABLE a (x INTEGER)', 'CREATE INDEX i ON a(x)']);
  });

  it('joins multi-line statements', () => {
    const sql = 'CREATE TABLE a (\n  x INTEGER\n);\nSELECT 1';

    expect(splitStatements(sql)).toEqual(['CREATE TABLE a (\n  x INTEGER\n)', 'SELECT 1']);
  });
});

describe('parseSchema', () => {
  it('reads the version from the schema_version insert', () => {
    const schema = parseSchema('CREATE TABLE t (x);\nINSERT OR IGNORE INTO schema_version (version) VALUES (7);\n');

    expect(schema.version).toBe(7);
    expect(schema.statements).toHaveLength(2);
  });

  it('rejects a schema without a version row', () => {
    expect(() => parseSchema('CREATE TABLE t (x);')).toThrow('Schema does not insert a schema_version row');
  });

  it('finds version 1 in the bundled schema', () => {
    expect(loadSchema().version).toBe(1);
    expect(SCHEMA_VERSION).toBe(1);
  });
});
