/**
 * Embedder Types
 *
 * SDK providers return `number[]`; the index stores Float32Array BLOBs.
 */

export type { EmbeddingProvider, EmbeddingResult } from '@contextaisdk/rag';

import type { EmbeddingProvider } from '@contextaisdk/rag';
import type { Config } from '../../config/schema.js';
import type { Logger } from '../../utils/index.js';

/**
 * The [embedding] section of config.toml
 */
export type EmbeddingConfig = Config['embedding'];

export interface EmbedderOptions {
  /**
   * Texts per embedBatch call.
   * @default 32
   */
  batchSize?: number;

  /**
   * Milliseconds one batch may take before it fails.
   * @default 120000
   */
  timeout?: number;

  /** Fired after each batch with the number of texts embedded so far */
  onProgress?: (processed: number, total: number) => void;
}

/**
 * Model download/loading progress from the HuggingFace provider
 */
export interface ModelLoadProgress {
  status: string;
  /** Percentage (0-100), when known */
  progress?: number;
}

export interface ProviderOptions {
  onProgress?: (progress: ModelLoadProgress) => void;
  logger?: Logger;
}

/**
 * A provider plus the model that actually answered (primary or fallback)
 */
export interface EmbeddingProviderResult {
  /** Wrapped with CachedEmbeddingProvider */
  provider: EmbeddingProvider;
  model: string;
  dimensions: number;
}
