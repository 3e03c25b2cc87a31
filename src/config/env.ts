/**
 * Environment Variable Handler
 *
 * Loads provider secrets from the environment (and a local .env file via
 * dotenv). Keys are never logged or included in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

// ============================================================================
// SCHEMA
// ============================================================================

/**
 * All keys are optional at load time; a provider checks its own key when it
 * is created.
 */
export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OLLAMA_HOST: z.string().default('http://localhost:11434'),
});

export type EnvVars = z.infer<typeof EnvSchema>;

let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (parsed once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OPENAI_BASE_URL: process.env.OPENAI_BASE_URL || undefined,
    OLLAMA_HOST: process.env.OLLAMA_HOST || undefined,
  };
  const result = EnvSchema.safeParse(raw);

  // An unparseable OPENAI_BASE_URL is dropped
  _envCache = result.success
    ? result.data
    : { ...raw, OPENAI_BASE_URL: undefined, OLLAMA_HOST: raw.OLLAMA_HOST ?? 'http://localhost:11434' };

  return _envCache;
}

export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Whether a provider's API key is set (non-empty), without exposing it
 */
export function hasApiKey(provider: 'anthropic' | 'openai'): boolean {
  const env = loadEnv();
  switch (provider) {
    case 'anthropic':
      return Boolean(env.ANTHROPIC_API_KEY?.trim());
    case 'openai':
      return Boolean(env.OPENAI_API_KEY?.trim());
  }
}

export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * FOR TESTING ONLY
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when a required API key is missing
 */
export const SETUP_INSTRUCTIONS: Record<'anthropic' | 'openai' | 'ollama', string> = {
  anthropic: `
To answer with Anthropic (Claude) models:

1. Create an API key at https://console.anthropic.com/
2. Export it, or put it in a .env file next to where you run cqa:

   export ANTHROPIC_API_KEY="<your key>"
`.trim(),

  openai: `
To answer with OpenAI models:

1. Create an API key at https://platform.openai.com/api-keys
2. Export it, or put it in a .env file next to where you run cqa:

   export OPENAI_API_KEY="<your key>"

3. (Optional) Point at an OpenAI-compatible endpoint:

   export OPENAI_BASE_URL="https://example.com/v1"
`.trim(),

  ollama: `
To answer with a local Ollama model:

1. Install Ollama from https://ollama.com/ and run: ollama serve
2. Pull a model that supports tool calling, e.g.: ollama pull llama3.1
3. (Optional) Set a custom host:

   export OLLAMA_HOST="http://localhost:11434"
`.trim(),
};
