/**
 * Anthropic Claude LLM Provider
 *
 * Creates an AnthropicProvider once the API key has been validated. The key
 * never appears in error messages.
 */

import type { LLMProvider } from '@contextaisdk/core';
import { AnthropicProvider } from '@contextaisdk/provider-anthropic';
import { APIKeyError } from '../errors/index.js';
import { validateAnthropicKey, getProviderKey } from './validation.js';

export interface AnthropicProviderOptions {
  /** @default 'claude-sonnet-4-20250514' */
  model?: string;

  /**
   * Request timeout in milliseconds.
   * @default 60000
   */
  timeout?: number;

  /** @default 2 */
  maxRetries?: number;

  /**
   * Skip the availability request after creation.
   * @default false
   */
  skipAvailabilityCheck?: boolean;
}

export interface AnthropicProviderResult {
  provider: LLMProvider;
  name: 'anthropic';
  model: string;
}

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

/**
 * @throws APIKeyError if ANTHROPIC_API_KEY is missing or malformed
 * @throws Error if the availability check fails
 *
 * @example
 * ```typescript
 * const { provider, model } = await createAnthropicProvider({ model: 'claude-sonnet-4-20250514' });
 * ```
 */
export async function createAnthropicProvider(
  options: AnthropicProviderOptions = {}
): Promise<AnthropicProviderResult> {
  const validation = validateAnthropicKey();
  if (!validation.valid) {
    throw new APIKeyError('anthropic');
  }

  const model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
  const provider = new AnthropicProvider({
    apiKey: getProviderKey('anthropic'),
    model,
    timeout: options.timeout,
    maxRetries: options.maxRetries,
  });

  if (!options.skipAvailabilityCheck && !(await provider.isAvailable())) {
    throw new Error('Anthropic API is not available. Check your API key and internet connection.');
  }

  return { provider, name: 'anthropic', model };
}
