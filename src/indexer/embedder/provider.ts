/**
 * Embedding Provider Factory
 *
 * Builds the configured @contextaisdk/rag embedding provider, falling back to
 * the secondary provider when the primary is unavailable, and wraps the
 * result in CachedEmbeddingProvider.
 */

import {
  HuggingFaceEmbeddingProvider,
  OllamaEmbeddingProvider,
  CachedEmbeddingProvider,
  type EmbeddingProvider,
} from '@contextaisdk/rag';

import { IndexUnavailableError, toError } from '../../errors/index.js';
import { getOllamaHost } from '../../config/env.js';
import type { EmbeddingProviderType } from '../../config/schema.js';
import type { EmbeddingConfig, ProviderOptions, EmbeddingProviderResult } from './types.js';

/**
 * transformers.js loads sentence-transformers models from the Xenova mirror.
 */
function normalizeHuggingFaceModel(model: string): string {
  if (model.startsWith('sentence-transformers/')) {
    return model.replace('sentence-transformers/', 'Xenova/');
  }
  if (model.startsWith('BAAI/')) {
    return model.replace('BAAI/', 'Xenova/');
  }
  return model;
}

function createProvider(
  type: EmbeddingProviderType,
  model: string,
  options?: ProviderOptions
): EmbeddingProvider {
  switch (type) {
    case 'huggingface': {
      const onProgress = options?.onProgress;
      return new HuggingFaceEmbeddingProvider({
        model: normalizeHuggingFaceModel(model),
        normalize: true,
        onProgress: onProgress
          ? (progress: { status: string; progress?: number }) =>
              onProgress({ status: progress.status, progress: progress.progress })
          : undefined,
      });
    }
    case 'ollama':
      return new OllamaEmbeddingProvider({
        model,
        baseUrl: getOllamaHost(),
        normalize: true,
      });
    default: {
      const exhaustiveCheck: never = type;
      throw new Error(`Unknown embedding provider: ${String(exhaustiveCheck)}`);
    }
  }
}

async function isProviderAvailable(provider: EmbeddingProvider, options?: ProviderOptions): Promise<boolean> {
  try {
    return await provider.isAvailable();
  } catch (error) {
    options?.logger?.debug?.(`Embedding availability check failed: ${toError(error).message}`);
    return false;
  }
}

/**
 * Create the embedding provider named in config.toml.
 *
 * @example
 * ```typescript
 * const { provider, model } = await createEmbeddingProvider(config.embedding);
 * const result = await provider.embed('What is a vector index?');
 * ```
 * @throws IndexUnavailableError when neither provider can be used, or when
 *   primary and fallback models disagree on dimensions
 */
export async function createEmbeddingProvider(
  config: EmbeddingConfig,
  options?: ProviderOptions
): Promise<EmbeddingProviderResult> {
  const candidates: Array<{ type: EmbeddingProviderType; model: string }> = [
    { type: config.provider, model: config.model },
  ];

  if (config.fallback_provider && config.fallback_model) {
    const primaryDims = getModelDimensions(config.model);
    const fallbackDims = getModelDimensions(config.fallback_model);
    if (primaryDims !== fallbackDims) {
      throw new IndexUnavailableError(
        `primary embedding model '${config.model}' has ${primaryDims} dimensions but fallback ` +
          `'${config.fallback_model}' has ${fallbackDims}; update ~/.cqa/config.toml`
      );
    }
    candidates.push({ type: config.fallback_provider, model: config.fallback_model });
  }

  let lastError: Error | undefined;
  for (const [i, candidate] of candidates.entries()) {
    try {
      const provider = createProvider(candidate.type, candidate.model, options);
      if (await isProviderAvailable(provider, options)) {
        if (i > 0) {
          options?.logger?.warn(`Using fallback embedding provider: ${candidate.type} (${candidate.model})`);
        }
        return {
          provider: new CachedEmbeddingProvider({ provider }),
          model: candidate.model,
          dimensions: getModelDimensions(candidate.model),
        };
      }
      options?.logger?.debug?.(`Embedding provider ${candidate.type} is not available`);
    } catch (error) {
      lastError = toError(error);
      options?.logger?.debug?.(`Embedding provider ${candidate.type} failed: ${lastError.message}`);
    }
  }

  const tried = candidates.map((c) => c.type).join(', ');
  throw new IndexUnavailableError(
    `no embedding provider available (tried: ${tried})` +
      (config.provider === 'ollama' ? '. Make sure Ollama is running (ollama serve) and the model is pulled' : ''),
    lastError
  );
}

/**
 * Expected embedding dimensions for a model name.
 */
export function getModelDimensions(model: string): number {
  const normalizedModel = model.toLowerCase();

  if (normalizedModel.includes('minilm')) return 384;
  if (normalizedModel.includes('bge-large')) return 1024;
  if (normalizedModel.includes('bge-base')) return 768;
  if (normalizedModel.includes('bge-small')) return 384;
  if (normalizedModel.includes('nomic-embed')) return 768;
  if (normalizedModel.includes('mxbai-embed')) return 1024;

  return 1024;
}
