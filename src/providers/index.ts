/**
 * Providers Module
 *
 * Creates the LLM provider that answers questions, with key validation and
 * a fallback chain.
 *
 * ```typescript
 * import { createLLMProvider } from './providers/index.js';
 * const { provider, name, model } = await createLLMProvider(config);
 * ```
 */

export {
  validateProviderKey,
  validateAnthropicKey,
  validateOpenAIKey,
  validateOllamaHostUrl,
  getProviderKey,
  AnthropicKeySchema,
  OpenAIKeySchema,
  OllamaHostSchema,
  type ValidationResult,
} from './validation.js';

export {
  createLLMProvider,
  getFallbackChain,
  AllProvidersFailedError,
  type LLMProviderResult,
  type LLMProviderResultWithFallback,
  type LLMProviderOptions,
  type ProviderAttempt,
  type FallbackOptions,
  type ProviderType,
} from './llm.js';

export {
  createAnthropicProvider,
  type AnthropicProviderOptions,
  type AnthropicProviderResult,
  DEFAULT_ANTHROPIC_MODEL,
} from './anthropic.js';

export {
  createOpenAIProvider,
  type OpenAIProviderOptions,
  type OpenAIProviderResult,
  DEFAULT_OPENAI_MODEL,
} from './openai.js';

export {
  createOllamaProvider,
  type OllamaProviderOptions,
  type OllamaProviderResult,
  DEFAULT_OLLAMA_MODEL,
  DEFAULT_OLLAMA_TIMEOUT,
} from './ollama.js';
