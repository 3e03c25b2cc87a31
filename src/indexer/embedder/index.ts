/**
 * Embedder Module
 */

export { createEmbeddingProvider, getModelDimensions } from './provider.js';
export {
  embedTexts,
  embedText,
  withTimeout,
  EmbeddingTimeoutError,
  DEFAULT_BATCH_SIZE,
  DEFAULT_EMBEDDING_TIMEOUT_MS,
} from './embedder.js';
export type {
  EmbeddingProvider,
  EmbeddingResult,
  EmbeddingConfig,
  EmbedderOptions,
  ModelLoadProgress,
  ProviderOptions,
  EmbeddingProviderResult,
} from './types.js';
