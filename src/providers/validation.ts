/**
 * API Key Validators
 *
 * Check provider keys for presence and format. Key values are never logged
 * or returned in a result; only getProviderKey hands one out.
 */

import { z } from 'zod';
import { getEnv, SETUP_INSTRUCTIONS } from '../config/env.js';
import { APIKeyError } from '../errors/index.js';

/**
 * When valid: { valid: true }
 * When invalid: { valid: false, error, setupInstructions }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

/**
 * Anthropic keys start with sk-ant- (only the prefix is checked)
 */
export const AnthropicKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine((key) => key.startsWith('sk-ant-'), 'Invalid Anthropic API key format (should start with "sk-ant-")');

/**
 * OpenAI keys (legacy, project and service-account) all start with sk-
 */
export const OpenAIKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine((key) => key.startsWith('sk-'), 'Invalid OpenAI API key format (should start with "sk-")');

export const OllamaHostSchema = z
  .string()
  .url('Invalid Ollama host URL')
  .refine((url) => url.startsWith('http://') || url.startsWith('https://'), 'Ollama host must be an HTTP(S) URL');

function validateKey(
  provider: 'anthropic' | 'openai',
  key: string | undefined,
  schema: z.ZodType<string>
): ValidationResult {
  const envVar = provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY';
  if (!key?.trim()) {
    return {
      valid: false,
      error: `${envVar} environment variable is not set`,
      setupInstructions: SETUP_INSTRUCTIONS[provider],
    };
  }

  const result = schema.safeParse(key.trim());
  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid API key format',
      setupInstructions: SETUP_INSTRUCTIONS[provider],
    };
  }

  return { valid: true };
}

export function validateAnthropicKey(): ValidationResult {
  return validateKey('anthropic', getEnv('ANTHROPIC_API_KEY'), AnthropicKeySchema);
}

export function validateOpenAIKey(): ValidationResult {
  return validateKey('openai', getEnv('OPENAI_API_KEY'), OpenAIKeySchema);
}

/**
 * Validate an Ollama host URL (from options, or OLLAMA_HOST).
 */
export function validateOllamaHostUrl(host: string = getEnv('OLLAMA_HOST')): ValidationResult {
  const result = OllamaHostSchema.safeParse(host);

  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid Ollama host URL',
      setupInstructions: SETUP_INSTRUCTIONS.ollama,
    };
  }

  return { valid: true };
}

/**
 * @example
 * ```typescript
 * const result = validateProviderKey(config.default_provider);
 * if (!result.valid) {
 *   ctx.error(result.error);
 *   ctx.log(result.setupInstructions);
 * }
 * ```
 */
export function validateProviderKey(provider: 'anthropic' | 'openai' | 'ollama'): ValidationResult {
  switch (provider) {
    case 'anthropic':
      return validateAnthropicKey();
    case 'openai':
      return validateOpenAIKey();
    case 'ollama':
      return validateOllamaHostUrl();
  }
}

/**
 * The provider's key, after validation. Use it only to construct a client.
 *
 * @throws APIKeyError when the key is missing or malformed
 */
export function getProviderKey(provider: 'anthropic' | 'openai'): string {
  const validation = validateProviderKey(provider);
  const key = provider === 'anthropic' ? getEnv('ANTHROPIC_API_KEY') : getEnv('OPENAI_API_KEY');
  if (!validation.valid || key === undefined) {
    throw new APIKeyError(provider);
  }
  return key.trim();
}
