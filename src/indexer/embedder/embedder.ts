/**
 * Embedder
 *
 * Embeds texts in batches through an SDK EmbeddingProvider and returns
 * Float32Array vectors for BLOB storage. A failed batch is retried one text
 * at a time; a text that still fails aborts the whole call, so a course is
 * never stored with missing chunk vectors.
 */

import type { EmbeddingProvider } from '@contextaisdk/rag';
import { CLIError } from '../../errors/index.js';
import type { EmbedderOptions } from './types.js';

export const DEFAULT_BATCH_SIZE = 32;
export const DEFAULT_EMBEDDING_TIMEOUT_MS = 120000;

/**
 * An embedding call did not finish within the configured timeout.
 *
 * Exit code 9
 */
export class EmbeddingTimeoutError extends CLIError {
  constructor(timeoutMs: number) {
    super(
      `Embedding operation timed out after ${timeoutMs}ms`,
      'The model may still be downloading on first run. Raise embedding.timeout_ms in ~/.cqa/config.toml',
      9
    );
    this.name = 'EmbeddingTimeoutError';
  }
}

/**
 * Run `operation` with a timeout. The timer is cleared either way so it
 * never keeps the process alive.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number | undefined): Promise<T> {
  if (!timeoutMs) {
    return operation;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new EmbeddingTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function toVector(embedding: number[] | undefined, text: string): Float32Array {
  if (!embedding || embedding.length === 0) {
    throw new Error(`Empty embedding returned for text "${text.slice(0, 40)}"`);
  }
  return Float32Array.from(embedding);
}

async function embedBatch(provider: EmbeddingProvider, texts: string[], timeout?: number): Promise<Float32Array[]> {
  const results = await withTimeout(provider.embedBatch(texts), timeout);
  if (results.length !== texts.length) {
    throw new Error(`Provider returned ${results.length} embeddings for ${texts.length} texts`);
  }
  return results.map((result, i) => toVector(result.embedding, texts[i] ?? ''));
}

/**
 * Embed every text, in order.
 *
 * @example
 * ```typescript
 * const vectors = await embedTexts(provider, chunks.map((c) => c.text), {
 *   batchSize: 32,
 *   onProgress: (done, total) => spinner.text = `${done}/${total} chunks embedded`,
 * });
 * ```
 * @throws the provider's error (or EmbeddingTimeoutError) for the first text that cannot be embedded
 */
export async function embedTexts(
  provider: EmbeddingProvider,
  texts: string[],
  options: EmbedderOptions = {}
): Promise<Float32Array[]> {
  const { batchSize = DEFAULT_BATCH_SIZE, timeout, onProgress } = options;
  const vectors: Float32Array[] = [];

  for (let i = 0; i < texts.length; i += batchSize) {
    const batch = texts.slice(i, i + batchSize);

    try {
      vectors.push(...(await embedBatch(provider, batch, timeout)));
    } catch (batchError) {
      if (batchError instanceof EmbeddingTimeoutError) {
        throw batchError;
      }
      // Isolate the failing text
      for (const text of batch) {
        const result = await withTimeout(provider.embed(text), timeout);
        vectors.push(toVector(result.embedding, text));
      }
    }

    onProgress?.(vectors.length, texts.length);
  }

  const dimensions = vectors[0]?.length;
  const mismatch = vectors.findIndex((v) => v.length !== dimensions);
  if (mismatch !== -1) {
    throw new Error(
      `Embedding dimension mismatch: text ${mismatch} has ${vectors[mismatch]?.length} dimensions, expected ${dimensions}`
    );
  }

  return vectors;
}

/**
 * Embed a single text (queries, course titles).
 */
export async function embedText(provider: EmbeddingProvider, text: string, timeout?: number): Promise<Float32Array> {
  const result = await withTimeout(provider.embed(text), timeout);
  return toVector(result.embedding, text);
}
