/**
 * SQLite database connection and schema setup.
 *
 * There is no process-wide connection: callers open a handle, hand it to
 * the VectorIndex they construct, and close it when they are done.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { resolvePath } from '../config/retrieval-config.js';
import { IndexUnavailableError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { loadSchema } from './schema-loader.js';

const log = createLogger('db');

/** Schema version written by schema.sql */
export const SCHEMA_VERSION = loadSchema().version;

export interface OpenDbOptions {
  /** Open for serving only; skips schema setup */
  readonly?: boolean;
  /** Fail instead of creating a new database file */
  fileMustExist?: boolean;
}

function isMemoryPath(path: string): boolean {
  return path === ':memory:' || path === '';
}

/**
 * Open (and if needed create and migrate) an index database.
 *
 * @throws IndexUnavailableError if the file cannot be opened
 */
export function openDb(dbPath: string, options: OpenDbOptions = {}): Database.Database {
  const resolvedPath = isMemoryPath(dbPath) ? ':memory:' : resolvePath(dbPath);

  if (resolvedPath !== ':memory:' && !options.readonly && !options.fileMustExist) {
    const dir = dirname(resolvedPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  let db: Database.Database;
  try {
    db = new Database(resolvedPath, {
      readonly: options.readonly ?? false,
      fileMustExist: options.fileMustExist ?? false,
    });
  } catch (error) {
    throw new IndexUnavailableError(
      `Cannot open index database at ${resolvedPath}: ${errorMessage(error)}`,
      'INDEX_UNAVAILABLE',
      error,
    );
  }

  db.pragma('foreign_keys = ON');

  if (!options.readonly) {
    if (resolvedPath !== ':memory:') {
      // WAL lets readers proceed while an offline batch write runs
      db.pragma('journal_mode = WAL');
    }
    runMigrations(db);
  }

  log.debug('Database opened', { path: resolvedPath, readonly: options.readonly ?? false });
  return db;
}

/**
 * Close a database handle. Safe to call twice.
 */
export function closeDb(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}

/**
 * Current schema version, 0 for a database that was never migrated.
 */
export function getSchemaVersion(db: Database.Database): number {
  try {
    const row = db.prepare('SELECT MAX(version) as version FROM schema_version').get() as
      | { version: number | null }
      | undefined;
    return row?.version ?? 0;
  } catch {
    // schema_version does not exist before the first migration
    return 0;
  }
}

/**
 * Apply schema.sql. Every statement is idempotent.
 */
export function runMigrations(db: Database.Database): void {
  const currentVersion = getSchemaVersion(db);
  if (currentVersion >= SCHEMA_VERSION) {
    return;
  }

  const { statements } = loadSchema();
  const apply = db.transaction(() => {
    for (const statement of statements) {
      db.exec(statement);
    }
  });
  apply();

  log.info('Schema migrated', { from: currentVersion, to: SCHEMA_VERSION });
}
