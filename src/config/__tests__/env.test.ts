/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() so the real environment is never touched.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, hasApiKey, getOllamaHost, _clearEnvCache, SETUP_INSTRUCTIONS } from '../env.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    vi.stubEnv('OPENAI_API_KEY', '');
    vi.stubEnv('OPENAI_BASE_URL', '');
    vi.stubEnv('OLLAMA_HOST', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('loadEnv()', () => {
    it('loads API keys when set', () => {
      vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
      vi.stubEnv('OPENAI_API_KEY', 'test-openai-secret');

      const env = loadEnv();

      expect(env.ANTHROPIC_API_KEY).toBe('test-secret');
      expect(env.OPENAI_API_KEY).toBe('test-openai-secret');
    });

    it('provides the default OLLAMA_HOST when unset', () => {
      expect(loadEnv().OLLAMA_HOST).toBe('http://localhost:11434');
    });

    it('drops an invalid OPENAI_BASE_URL and keeps the rest', () => {
      vi.stubEnv('OPENAI_BASE_URL', 'not a url');
      vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');

      const env = loadEnv();

      expect(env.OPENAI_BASE_URL).toBeUndefined();
      expect(env.ANTHROPIC_API_KEY).toBe('test-secret');
      expect(env.OLLAMA_HOST).toBe('http://localhost:11434');
    });

    it('caches values until the cache is cleared', () => {
      vi.stubEnv('ANTHROPIC_API_KEY', 'initial-value');
      loadEnv();
      vi.stubEnv('ANTHROPIC_API_KEY', 'changed-value');

      expect(loadEnv().ANTHROPIC_API_KEY).toBe('initial-value');

      _clearEnvCache();
      expect(loadEnv().ANTHROPIC_API_KEY).toBe('changed-value');
    });
  });

  describe('getEnv()', () => {
    it('returns the value for a specific key', () => {
      vi.stubEnv('OPENAI_BASE_URL', 'https://example.com/v1');

      expect(getEnv('OPENAI_BASE_URL')).toBe('https://example.com/v1');
    });
  });

  describe('hasApiKey()', () => {
    it('is true when the key exists', () => {
      vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');

      expect(hasApiKey('anthropic')).toBe(true);
      expect(hasApiKey('openai')).toBe(false);
    });

    it('is false for whitespace-only keys', () => {
      vi.stubEnv('OPENAI_API_KEY', '   ');

      expect(hasApiKey('openai')).toBe(false);
    });
  });

  describe('getOllamaHost()', () => {
    it('returns the configured host', () => {
      vi.stubEnv('OLLAMA_HOST', 'http://ollama.internal:11434');

      expect(getOllamaHost()).toBe('http://ollama.internal:11434');
    });
  });

  it('has setup instructions for every provider', () => {
    expect(SETUP_INSTRUCTIONS.anthropic).toContain('ANTHROPIC_API_KEY');
    expect(SETUP_INSTRUCTIONS.openai).toContain('OPENAI_API_KEY');
    expect(SETUP_INSTRUCTIONS.ollama).toContain('OLLAMA_HOST');
  });
});
