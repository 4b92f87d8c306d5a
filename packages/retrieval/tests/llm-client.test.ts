/**
 * Tests for createLLMClient — env fallbacks and explicit options.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import OpenAI from 'openai';
import { createLLMClient } from '../src/llm-client.js';

describe('createLLMClient', () => {
  beforeEach(() => {
    vi.stubEnv('LITELLM_PROXY_URL', '');
    vi.stubEnv('LITELLM_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('returns an OpenAI instance', () => {
    expect(createLLMClient()).toBeInstanceOf(OpenAI);
  });

  it('uses localhost:4000 as default baseURL', () => {
    expect(createLLMClient().baseURL).toBe('http://localhost:4000/v1');
  });

  it('reads LITELLM_PROXY_URL and LITELLM_API_KEY from env', () => {
    vi.stubEnv('LITELLM_PROXY_URL', 'https://proxy.example.com/v1');
    vi.stubEnv('LITELLM_API_KEY', 'test-key');
    const client = createLLMClient();
    expect(client.baseURL).toBe('https://proxy.example.com/v1');
    expect(client.apiKey).toBe('test-key');
  });

  it('explicit options override env vars', () => {
    vi.stubEnv('LITELLM_API_KEY', 'env-key');
    const client = createLLMClient({ baseURL: 'http://embeddings.local/v1', apiKey: 'explicit-key' });
    expect(client.baseURL).toBe('http://embeddings.local/v1');
    expect(client.apiKey).toBe('explicit-key');
  });

  it('defaults apiKey to empty string when nothing set', () => {
    expect(createLLMClient().apiKey).toBe('');
  });
});
