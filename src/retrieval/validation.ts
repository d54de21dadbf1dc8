import { RetrievalError } from '../utils/errors.js';

/**
 * @throws RetrievalError INVALID_K unless k is a positive integer
 */
export function assertValidK(k: number, name = 'k'): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new RetrievalError(`${name} must be a positive integer, got ${k}`, 'INVALID_K');
  }
}

/**
 * Cosine scores live in [-1, 1]; a threshold outside that range is a bug.
 *
 * @throws RetrievalError INVALID_THRESHOLD
 */
export function assertValidThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < -1 || threshold > 1) {
    throw new RetrievalError(`scoreThreshold must be within [-1, 1], got ${threshold}`, 'INVALID_THRESHOLD');
  }
}
