/**
 * Storage layer exports.
 */

// Database
export { openDb, closeDb, getSchemaVersion, runMigrations, SCHEMA_VERSION } from './db.js';
export type { OpenDbOptions } from './db.js';

// Types
export type {
  ContentType,
  PassageMetadata,
  PassagePayload,
  Passage,
  SearchResult,
  SearchFilter,
  IndexStatus,
  IndexDescription,
  UpsertResult,
} from './types.js';
export { CONTENT_TYPES, isContentType } from './types.js';

// Vector index
export { VectorIndex } from './vector-index.js';
export type { VectorIndexOptions } from './vector-index.js';

// Embeddings file
export { loadPassageFile, parsePassageFile } from './passage-loader.js';
export type { LoadedPassages } from './passage-loader.js';
