/**
 * LLM Provider Factory
 *
 * Creates the answering model's provider from config.default_provider, falling
 * back through config.llm.fallback_providers (or a default chain) when the
 * primary cannot be created.
 *
 * ```typescript
 * const config = loadConfig();
 * const { provider, name, model } = await createLLMProvider(config);
 * ```
 */

import type { LLMProvider } from '@contextaisdk/core';
import type { Config, LLMProviderType } from '../config/schema.js';
import { ModelUnavailableError, toError } from '../errors/index.js';
import { createAnthropicProvider, type AnthropicProviderOptions, DEFAULT_ANTHROPIC_MODEL } from './anthropic.js';
import { createOpenAIProvider, type OpenAIProviderOptions, DEFAULT_OPENAI_MODEL } from './openai.js';
import { createOllamaProvider, type OllamaProviderOptions, DEFAULT_OLLAMA_MODEL } from './ollama.js';

// ============================================================================
// TYPES
// ============================================================================

export type ProviderType = LLMProviderType;

export interface LLMProviderResult {
  provider: LLMProvider;
  name: ProviderType;
  /** e.g. 'claude-sonnet-4-20250514', 'gpt-4o', 'llama3.1' */
  model: string;
}

/**
 * A failed provider creation, kept for diagnostics
 */
export interface ProviderAttempt {
  provider: ProviderType;
  error: Error;
  timestamp: Date;
}

export interface LLMProviderResultWithFallback extends LLMProviderResult {
  usedFallback: boolean;
  requestedProvider: ProviderType;
  /** Empty when the primary succeeded */
  failedAttempts: ProviderAttempt[];
}

export interface FallbackOptions {
  onFallback?: (from: ProviderType, to: ProviderType, reason: string) => void;
  onProviderFailed?: (provider: ProviderType, error: Error) => void;
  /** Fail on the primary without trying the chain */
  disableFallback?: boolean;
}

/**
 * Every provider in the chain failed.
 *
 * Exit code 10
 */
export class AllProvidersFailedError extends ModelUnavailableError {
  constructor(public readonly attempts: ProviderAttempt[]) {
    const tried = attempts.map((a) => `${a.provider} (${a.error.message})`).join('; ');
    super(`all providers failed. Tried: ${tried}`, attempts[attempts.length - 1]?.error);
    this.name = 'AllProvidersFailedError';
  }

  get lastError(): Error | undefined {
    return this.attempts[this.attempts.length - 1]?.error;
  }
}

export interface LLMProviderOptions {
  /** Takes precedence over config.default_model */
  model?: string;

  /** @default false */
  skipAvailabilityCheck?: boolean;

  anthropic?: Omit<AnthropicProviderOptions, 'model' | 'skipAvailabilityCheck'>;
  openai?: Omit<OpenAIProviderOptions, 'model' | 'skipAvailabilityCheck'>;
  ollama?: Omit<OllamaProviderOptions, 'model' | 'skipAvailabilityCheck'>;

  fallback?: FallbackOptions;
}

// ============================================================================
// FALLBACK CHAIN
// ============================================================================

const DEFAULT_FALLBACK_CHAINS: Record<ProviderType, ProviderType[]> = {
  anthropic: ['openai', 'ollama'],
  openai: ['anthropic', 'ollama'],
  ollama: ['anthropic', 'openai'],
};

const DEFAULT_MODELS: Record<ProviderType, string> = {
  anthropic: DEFAULT_ANTHROPIC_MODEL,
  openai: DEFAULT_OPENAI_MODEL,
  ollama: DEFAULT_OLLAMA_MODEL,
};

export function getFallbackChain(config: Config, primary: ProviderType): ProviderType[] {
  const chain = config.llm?.fallback_providers ?? DEFAULT_FALLBACK_CHAINS[primary];
  return chain.filter((p) => p !== primary);
}

function getFallbackModel(config: Config, provider: ProviderType): string {
  return config.llm?.fallback_models?.[provider] ?? DEFAULT_MODELS[provider];
}

async function tryCreateProvider(
  providerType: ProviderType,
  model: string,
  options: LLMProviderOptions
): Promise<LLMProviderResult> {
  const skipAvailabilityCheck = options.skipAvailabilityCheck ?? false;

  switch (providerType) {
    case 'anthropic': {
      const result = await createAnthropicProvider({ model, skipAvailabilityCheck, ...options.anthropic });
      return { provider: result.provider, name: result.name, model: result.model };
    }

    case 'openai': {
      const result = await createOpenAIProvider({ model, skipAvailabilityCheck, ...options.openai });
      return { provider: result.provider, name: result.name, model: result.model };
    }

    case 'ollama': {
      const result = await createOllamaProvider({ model, skipAvailabilityCheck, ...options.ollama });
      return { provider: result.provider, name: result.name, model: result.model };
    }

    default: {
      const _exhaustiveCheck: never = providerType;
      throw new Error(`Unknown provider type: ${String(_exhaustiveCheck)}`);
    }
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create the configured LLM provider, trying fallbacks in order.
 *
 * @throws AllProvidersFailedError if every provider fails
 *
 * @example
 * ```typescript
 * const { provider, name, usedFallback } = await createLLMProvider(config, {
 *   fallback: {
 *     onFallback: (from, to, reason) => ctx.warn(`Falling back from ${from} to ${to}: ${reason}`),
 *   },
 * });
 * ```
 */
export async function createLLMProvider(
  config: Config,
  options: LLMProviderOptions = {}
): Promise<LLMProviderResultWithFallback> {
  const primaryProvider = config.default_provider;
  const primaryModel = options.model ?? config.default_model;
  const failedAttempts: ProviderAttempt[] = [];

  const recordFailure = (provider: ProviderType, error: unknown): void => {
    const err = toError(error);
    failedAttempts.push({ provider, error: err, timestamp: new Date() });
    options.fallback?.onProviderFailed?.(provider, err);
  };

  try {
    const result = await tryCreateProvider(primaryProvider, primaryModel, options);
    return { ...result, usedFallback: false, requestedProvider: primaryProvider, failedAttempts: [] };
  } catch (error) {
    recordFailure(primaryProvider, error);
  }

  if (options.fallback?.disableFallback) {
    throw new AllProvidersFailedError(failedAttempts);
  }

  for (const fallbackProvider of getFallbackChain(config, primaryProvider)) {
    const lastError = failedAttempts[failedAttempts.length - 1]?.error;
    options.fallback?.onFallback?.(primaryProvider, fallbackProvider, lastError?.message ?? 'Unknown error');

    try {
      const result = await tryCreateProvider(fallbackProvider, getFallbackModel(config, fallbackProvider), options);
      return { ...result, usedFallback: true, requestedProvider: primaryProvider, failedAttempts };
    } catch (error) {
      recordFailure(fallbackProvider, error);
    }
  }

  throw new AllProvidersFailedError(failedAttempts);
}
