/**
 * Standardized error types for studyrag.
 *
 * All errors extend from RagError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * ## Usage
 *
 * ```typescript
 * import { EmbeddingError, IndexUnavailableError } from './errors.js';
 *
 * try {
 *   await client.embeddings.create({ model, input });
 * } catch (err) {
 *   throw new EmbeddingError('Query embedding failed', 'EMBED_FAILED', err);
 * }
 * ```
 *
 * Retrieval-path errors (embedding, index, dimension) propagate to the
 * caller. Judge errors are absorbed by the reranker and never reach it.
 *
 * @module utils/errors
 */

/**
 * Base error class for all studyrag errors.
 *
 * Provides:
 * - `code`: Programmatic error identifier (e.g., 'INDEX_UNAVAILABLE')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'EmbeddingError')
 */
export class RagError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    // Capture stack trace (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof RagError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval-path Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The query embedding call failed. Not retried inside the engine.
 *
 * Common codes:
 * - `EMBED_FAILED`: Provider call failed
 * - `EMPTY_QUERY`: Nothing to embed
 * - `BAD_RESPONSE`: Provider returned no vector
 */
export class EmbeddingError extends RagError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * The vector store cannot be reached or read.
 *
 * Common codes:
 * - `INDEX_UNAVAILABLE`: Database closed, missing, or query failed
 */
export class IndexUnavailableError extends RagError {
  constructor(message: string, code: string = 'INDEX_UNAVAILABLE', cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * A vector's length disagrees with the collection dimension.
 * Signals an embedder/index misconfiguration and is never recovered.
 */
export class DimensionMismatchError extends RagError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, context: string = 'query vector') {
    super(
      `Dimension mismatch for ${context}: expected ${expected}, got ${actual}`,
      'DIMENSION_MISMATCH',
    );
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Caller contract violations at the retrieval boundary.
 *
 * Common codes:
 * - `INVALID_K`: k is not a positive integer
 * - `INVALID_THRESHOLD`: score threshold outside [-1, 1]
 */
export class RetrievalError extends RagError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Judge Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from judgment-model adapters.
 *
 * Common codes:
 * - `JUDGE_FAILED`: API call failed
 * - `JUDGE_EMPTY_RESPONSE`: Response carried no text
 */
export class JudgeError extends RagError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration / Load Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `MISSING_API_KEY`: Provider key not set
 */
export class ConfigError extends RagError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * Errors reading a passage/embeddings file for index build.
 *
 * Common codes:
 * - `LOAD_FAILED`: File missing or not JSON
 * - `INVALID_PASSAGE`: A record is missing fields or has a bad vector
 */
export class LoadError extends RagError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a studyrag error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof RagError && error.code === code;
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

export function isIndexUnavailableError(error: unknown): error is IndexUnavailableError {
  return error instanceof IndexUnavailableError;
}

export function isDimensionMismatchError(error: unknown): error is DimensionMismatchError {
  return error instanceof DimensionMismatchError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error in a RagError.
 *
 * If the error is already a RagError, returns it unchanged.
 * Otherwise wraps it in a new RagError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): RagError {
  if (error instanceof RagError) {
    return error;
  }

  return new RagError(message ?? errorMessage(error), 'UNKNOWN', error);
}
