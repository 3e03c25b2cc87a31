/**
 * OpenAI GPT LLM Provider
 *
 * Also serves OpenAI-compatible endpoints when OPENAI_BASE_URL is set.
 */

import type { LLMProvider } from '@contextaisdk/core';
import { OpenAIProvider } from '@contextaisdk/provider-openai';
import { getEnv } from '../config/env.js';
import { APIKeyError } from '../errors/index.js';
import { validateOpenAIKey, getProviderKey } from './validation.js';

export interface OpenAIProviderOptions {
  /** @default 'gpt-4o' */
  model?: string;

  /** Custom endpoint; defaults to OPENAI_BASE_URL when set */
  baseURL?: string;

  /** Request timeout in milliseconds */
  timeout?: number;

  /** @default 2 */
  maxRetries?: number;

  /** @default false */
  skipAvailabilityCheck?: boolean;
}

export interface OpenAIProviderResult {
  provider: LLMProvider;
  name: 'openai';
  model: string;
}

export const DEFAULT_OPENAI_MODEL = 'gpt-4o';

/**
 * @throws APIKeyError if OPENAI_API_KEY is missing or malformed
 * @throws Error if the availability check fails
 */
export async function createOpenAIProvider(options: OpenAIProviderOptions = {}): Promise<OpenAIProviderResult> {
  const validation = validateOpenAIKey();
  if (!validation.valid) {
    throw new APIKeyError('openai');
  }

  const model = options.model ?? DEFAULT_OPENAI_MODEL;
  const provider = new OpenAIProvider({
    apiKey: getProviderKey('openai'),
    model,
    baseURL: options.baseURL ?? getEnv('OPENAI_BASE_URL'),
    timeout: options.timeout,
    maxRetries: options.maxRetries,
  });

  if (!options.skipAvailabilityCheck && !(await provider.isAvailable())) {
    throw new Error('OpenAI API is not available. Check your API key and internet connection.');
  }

  return { provider, name: 'openai', model };
}
