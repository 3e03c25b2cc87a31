/**
 * Deterministic embedding provider for tests.
 *
 * Each lowercase word is hashed (FNV-1a) into one of `dimensions` buckets;
 * the bucket counts are L2-normalised. Texts that share words therefore have
 * a higher cosine similarity, without downloading a model.
 */

import type { EmbeddingProvider, EmbeddingResult } from '@contextaisdk/rag';

export interface HashingProviderOptions {
  dimensions?: number;
  /** Throw from embed/embedBatch whenever a text contains this marker */
  failOn?: string;
  /** Make embedBatch reject; embed still works */
  failBatches?: boolean;
  available?: boolean;
}

function fnv1a(word: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < word.length; i++) {
    hash ^= word.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

export function hashEmbedding(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const word of tokenize(text)) {
    const bucket = fnv1a(word) % dimensions;
    vector[bucket] = (vector[bucket] ?? 0) + 1;
  }
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector : vector.map((v) => v / norm);
}

export function createHashingEmbeddingProvider(options: HashingProviderOptions = {}): EmbeddingProvider & {
  calls: { embed: string[]; embedBatch: string[][] };
} {
  const { dimensions = 256, failOn, failBatches = false, available = true } = options;
  const calls: { embed: string[]; embedBatch: string[][] } = { embed: [], embedBatch: [] };

  const embedOne = (text: string): EmbeddingResult => {
    if (failOn && text.includes(failOn)) {
      throw new Error(`embedding failed for "${text}"`);
    }
    return { embedding: hashEmbedding(text, dimensions), tokenCount: tokenize(text).length, model: 'hashing-test' };
  };

  return {
    name: 'HashingTestProvider',
    dimensions,
    maxBatchSize: 32,
    calls,

    async embed(text: string): Promise<EmbeddingResult> {
      calls.embed.push(text);
      return embedOne(text);
    },

    async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
      calls.embedBatch.push(texts);
      if (failBatches) {
        throw new Error('batch embedding failed');
      }
      return texts.map(embedOne);
    },

    async isAvailable(): Promise<boolean> {
      return available;
    },
  };
}
