/**
 * Embedding serialization for SQLite BLOB storage.
 */

/**
 * Serialize an embedding to a Buffer for SQLite storage.
 *
 * Uses Float32Array (4 bytes per dimension), so a 1536-dimension
 * embedding takes 6KB.
 */
export function serializeEmbedding(embedding: readonly number[]): Buffer {
  return Buffer.from(new Float32Array(embedding).buffer);
}

/**
 * Deserialize an embedding from a SQLite Buffer.
 *
 * The bytes are copied first: a Buffer may be a view into a pooled
 * ArrayBuffer at an offset that is not 4-byte aligned.
 */
export function deserializeEmbedding(buffer: Buffer): Float32Array {
  const copy = new Uint8Array(buffer);
  return new Float32Array(copy.buffer, 0, copy.length / Float32Array.BYTES_PER_ELEMENT);
}
