/**
 * API Key Validation Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  validateAnthropicKey,
  validateOpenAIKey,
  validateOllamaHostUrl,
  validateProviderKey,
  getProviderKey,
  AnthropicKeySchema,
  OpenAIKeySchema,
} from '../validation.js';
import { _clearEnvCache } from '../../config/env.js';
import { APIKeyError } from '../../errors/index.js';

beforeEach(() => {
  _clearEnvCache();
  vi.stubEnv('ANTHROPIC_API_KEY', '');
  vi.stubEnv('OPENAI_API_KEY', '');
  vi.stubEnv('OLLAMA_HOST', '');
});

afterEach(() => {
  vi.unstubAllEnvs();
  _clearEnvCache();
});

describe('validateAnthropicKey', () => {
  it('accepts a key with the sk-ant- prefix', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-test-placeholder');

    expect(validateAnthropicKey()).toEqual({ valid: true });
  });

  it('rejects a key without the prefix and points at the console', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');

    const result = validateAnthropicKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('Invalid Anthropic API key format (should start with "sk-ant-")');
      expect(result.setupInstructions).toContain('console.anthropic.com');
    }
  });

  it('reports a missing key as not set', () => {
    const result = validateAnthropicKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('ANTHROPIC_API_KEY environment variable is not set');
    }
  });

  it('treats a whitespace-only key as missing', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '   ');

    const result = validateAnthropicKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toContain('not set');
    }
  });
});

describe('validateOpenAIKey', () => {
  it('accepts sk- keys', () => {
    vi.stubEnv('OPENAI_API_KEY', 'sk-test-placeholder');

    expect(validateOpenAIKey().valid).toBe(true);
  });

  it('rejects other prefixes', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');

    const result = validateOpenAIKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.setupInstructions).toContain('OPENAI_API_KEY');
    }
  });
});

describe('validateOllamaHostUrl', () => {
  it('accepts the default host', () => {
    expect(validateOllamaHostUrl()).toEqual({ valid: true });
  });

  it('accepts an explicit http URL', () => {
    expect(validateOllamaHostUrl('http://192.168.1.20:11434').valid).toBe(true);
  });

  it('rejects a non-URL', () => {
    const result = validateOllamaHostUrl('not a url');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('Invalid Ollama host URL');
      expect(result.setupInstructions).toContain('ollama serve');
    }
  });

  it('rejects non-HTTP schemes', () => {
    const result = validateOllamaHostUrl('ftp://localhost:11434');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('Ollama host must be an HTTP(S) URL');
    }
  });
});

describe('validateProviderKey', () => {
  it('dispatches by provider', () => {
    vi.stubEnv('OPENAI_API_KEY', 'sk-test-placeholder');

    expect(validateProviderKey('anthropic').valid).toBe(false);
    expect(validateProviderKey('openai').valid).toBe(true);
    expect(validateProviderKey('ollama').valid).toBe(true);
  });
});

describe('getProviderKey', () => {
  it('returns the trimmed key when valid', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '  sk-ant-test-placeholder  ');

    expect(getProviderKey('anthropic')).toBe('sk-ant-test-placeholder');
  });

  it('throws APIKeyError without echoing the key', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');

    expect(() => getProviderKey('openai')).toThrow(APIKeyError);
    expect(() => getProviderKey('openai')).toThrow('openai API key not configured');
  });
});

describe('key schemas', () => {
  it('reject empty strings with a specific message', () => {
    const result = AnthropicKeySchema.safeParse('');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('API key cannot be empty');
    }
  });

  it('accept OpenAI project keys', () => {
    expect(OpenAIKeySchema.safeParse('sk-proj-placeholder').success).toBe(true);
  });
});
