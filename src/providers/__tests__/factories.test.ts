/**
 * Provider Factory Tests
 *
 * SDK provider classes are mocked; only construction arguments and the
 * availability check are verified.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const sdk = vi.hoisted(() => {
  const constructed: Array<{ kind: string; config: unknown }> = [];
  return { available: true, constructed };
});

vi.mock('@contextaisdk/provider-anthropic', () => ({
  AnthropicProvider: class {
    constructor(config: unknown) {
      sdk.constructed.push({ kind: 'anthropic', config });
    }
    isAvailable(): Promise<boolean> {
      return Promise.resolve(sdk.available);
    }
  },
}));

vi.mock('@contextaisdk/provider-openai', () => ({
  OpenAIProvider: class {
    constructor(config: unknown) {
      sdk.constructed.push({ kind: 'openai', config });
    }
    isAvailable(): Promise<boolean> {
      return Promise.resolve(sdk.available);
    }
  },
}));

vi.mock('@contextaisdk/provider-ollama', () => ({
  OllamaProvider: class {
    constructor(config: unknown) {
      sdk.constructed.push({ kind: 'ollama', config });
    }
    isAvailable(): Promise<boolean> {
      return Promise.resolve(sdk.available);
    }
  },
}));

import { createAnthropicProvider } from '../anthropic.js';
import { createOpenAIProvider } from '../openai.js';
import { createOllamaProvider, DEFAULT_OLLAMA_TIMEOUT } from '../ollama.js';
import { _clearEnvCache } from '../../config/env.js';
import { APIKeyError } from '../../errors/index.js';

beforeEach(() => {
  sdk.available = true;
  sdk.constructed.length = 0;
  _clearEnvCache();
  vi.stubEnv('ANTHROPIC_API_KEY', '');
  vi.stubEnv('OPENAI_API_KEY', '');
  vi.stubEnv('OPENAI_BASE_URL', '');
  vi.stubEnv('OLLAMA_HOST', '');
});

afterEach(() => {
  vi.unstubAllEnvs();
  _clearEnvCache();
});

describe('createAnthropicProvider', () => {
  it('throws APIKeyError before constructing a client when the key is missing', async () => {
    await expect(createAnthropicProvider()).rejects.toThrow(APIKeyError);
    expect(sdk.constructed).toEqual([]);
  });

  it('constructs the client with the validated key and default model', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-placeholder');

    const result = await createAnthropicProvider({ timeout: 1000 });

    expect(result.name).toBe('anthropic');
    expect(result.model).toBe('claude-sonnet-4-20250514');
    expect(sdk.constructed).toEqual([
      {
        kind: 'anthropic',
        config: {
          apiKey: 'sk-ant-test-placeholder',
          model: 'claude-sonnet-4-20250514',
          timeout: 1000,
          maxRetries: undefined,
        },
      },
    ]);
  });

  it('fails when the API is not available', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-placeholder');
    sdk.available = false;

    await expect(createAnthropicProvider()).rejects.toThrow('Anthropic API is not available');
  });

  it('skips the availability check on request', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-placeholder');
    sdk.available = false;

    await expect(createAnthropicProvider({ skipAvailabilityCheck: true })).resolves.toMatchObject({
      name: 'anthropic',
    });
  });
});

describe('createOpenAIProvider', () => {
  it('reads OPENAI_BASE_URL for compatible endpoints', async () => {
    vi.stubEnv('OPENAI_API_KEY', 'sk-test-placeholder');
    vi.stubEnv('OPENAI_BASE_URL', 'http://localhost:8080/v1');

    await createOpenAIProvider({ model: 'local-model' });

    expect(sdk.constructed[0]?.config).toEqual({
      apiKey: 'sk-test-placeholder',
      model: 'local-model',
      baseURL: 'http://localhost:8080/v1',
      timeout: undefined,
      maxRetries: undefined,
    });
  });

  it('throws APIKeyError for a malformed key', async () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');

    await expect(createOpenAIProvider()).rejects.toThrow('openai API key not configured');
  });
});

describe('createOllamaProvider', () => {
  it('uses OLLAMA_HOST and the default timeout', async () => {
    vi.stubEnv('OLLAMA_HOST', 'http://gpu-box:11434');

    const result = await createOllamaProvider();

    expect(result.host).toBe('http://gpu-box:11434');
    expect(sdk.constructed[0]?.config).toEqual({
      model: 'llama3.1',
      host: 'http://gpu-box:11434',
      timeout: DEFAULT_OLLAMA_TIMEOUT,
      keepAlive: undefined,
    });
  });

  it('rejects an invalid host with setup instructions', async () => {
    await expect(createOllamaProvider({ host: 'nope' })).rejects.toThrow('Invalid Ollama host URL');
  });

  it('explains how to start the server when it is down', async () => {
    sdk.available = false;

    await expect(createOllamaProvider({ model: 'qwen2.5' })).rejects.toThrow('ollama pull qwen2.5');
  });
});
