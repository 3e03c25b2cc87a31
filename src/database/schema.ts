/**
 * Embedding BLOB conversion.
 *
 * Tables (see migrate.ts, row schemas in validation.ts):
 * - courses: one row per ingested course, with its title embedding
 * - lessons: lessons of a course, keyed by (course_title, lesson_number)
 * - chunks:  context-prefixed lesson text and its embedding
 */

/**
 * Convert an embedding to a Buffer for BLOB storage.
 *
 * @example
 * ```ts
 * db.prepare('INSERT INTO chunks (embedding) VALUES (?)').run(embeddingToBlob(vector));
 * ```
 */
export function embeddingToBlob(embedding: Float32Array | number[]): Buffer {
  const vector = embedding instanceof Float32Array ? embedding : Float32Array.from(embedding);
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

/**
 * Convert a BLOB back to a Float32Array.
 *
 * The bytes are copied: better-sqlite3 may hand back a Buffer whose offset is
 * not 4-byte aligned, which Float32Array views reject.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer, 0, Math.floor(blob.byteLength / 4));
}
