/**
 * Ollama Local LLM Provider
 *
 * No API key; the server at OLLAMA_HOST must be running and the model pulled.
 * The model must support tool calling to use the course tools.
 */

import type { LLMProvider } from '@contextaisdk/core';
import { OllamaProvider } from '@contextaisdk/provider-ollama';
import { validateOllamaHostUrl } from './validation.js';
import { getOllamaHost } from '../config/env.js';

export interface OllamaProviderOptions {
  /** @default 'llama3.1' */
  model?: string;

  /**
   * Reads OLLAMA_HOST when not given.
   * @default 'http://localhost:11434'
   */
  host?: string;

  /**
   * Local models can be slow, especially on first load.
   * @default 120000
   */
  timeout?: number;

  /** How long the model stays loaded, e.g. '5m'; '0' unloads immediately */
  keepAlive?: string;

  /** @default false */
  skipAvailabilityCheck?: boolean;
}

export interface OllamaProviderResult {
  provider: LLMProvider;
  name: 'ollama';
  model: string;
  host: string;
}

export const DEFAULT_OLLAMA_MODEL = 'llama3.1';

export const DEFAULT_OLLAMA_TIMEOUT = 120000;

/**
 * @throws Error if the host URL is invalid, or the server is not running
 *   (unless skipAvailabilityCheck)
 */
export async function createOllamaProvider(options: OllamaProviderOptions = {}): Promise<OllamaProviderResult> {
  const host = options.host ?? getOllamaHost();

  const validation = validateOllamaHostUrl(host);
  if (!validation.valid) {
    throw new Error(`${validation.error}\n\n${validation.setupInstructions}`);
  }

  const model = options.model ?? DEFAULT_OLLAMA_MODEL;
  const provider = new OllamaProvider({
    model,
    host,
    timeout: options.timeout ?? DEFAULT_OLLAMA_TIMEOUT,
    keepAlive: options.keepAlive,
  });

  if (!options.skipAvailabilityCheck && !(await provider.isAvailable())) {
    throw new Error(
      `Ollama server is not available at ${host}.\n\n` +
        'To fix this:\n' +
        '1. Start the server: ollama serve\n' +
        `2. Pull the model: ollama pull ${model}`
    );
  }

  return { provider, name: 'ollama', model, host };
}
