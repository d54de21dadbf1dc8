/**
 * studyrag
 *
 * Retrieval and reranking over a certification study corpus.
 *
 * @packageDocumentation
 */

// Configuration
export * from './config/index.js';

// Storage
export * from './storage/index.js';

// Providers
export * from './models/index.js';

// Retrieval
export * from './retrieval/index.js';

// Utils
export * from './utils/errors.js';
export { createLogger, configureLogging, setLogLevel, getLogLevel, setJsonMode } from './utils/logger.js';
export type { Logger, LogLevel, LogEntry } from './utils/logger.js';
