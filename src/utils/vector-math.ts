/**
 * Vector math for embedding comparison.
 *
 * The index ranks by cosine similarity in [-1, 1], 1 = same direction.
 */

/**
 * Compute the dot product of two vectors.
 */
export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Compute the L2 norm of a vector.
 */
export function norm(a: ArrayLike<number>): number {
  return Math.sqrt(dot(a, a));
}

/**
 * Cosine similarity between two vectors. Returns [-1, 1].
 * A zero vector has similarity 0 with everything.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const d = dot(a, b);
  const na = norm(a);
  const nb = norm(b);
  if (na === 0 || nb === 0) return 0;
  // Clamp to [-1, 1] to handle floating point errors
  return Math.max(-1, Math.min(1, d / (na * nb)));
}

/**
 * Cosine similarity against a vector whose norm is already known.
 * Used by the index, which caches passage norms at load time.
 */
export function cosineWithNorm(
  query: ArrayLike<number>,
  queryNorm: number,
  vector: ArrayLike<number>,
  vectorNorm: number,
): number {
  if (queryNorm === 0 || vectorNorm === 0) return 0;
  return Math.max(-1, Math.min(1, dot(query, vector) / (queryNorm * vectorNorm)));
}
