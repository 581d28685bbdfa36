/**
 * ClaudeProvider Unit Tests
 *
 * fetch is replaced with a mock; no request leaves the process.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ClaudeProvider, mapClaudeRole } from './ClaudeProvider.js';
import { RateLimitedError, RequestFailedError } from '../errors.js';
import type { LlmRequest, ProviderConfig } from '../../types/index.js';

const mockFetch = vi.fn<typeof fetch>();

const createConfig = (overrides: Partial<ProviderConfig> = {}): ProviderConfig => ({
  apiKey: 'test-key',
  baseUrl: 'https://api.test/v1',
  model: 'claude-test-model',
  maxTokens: 4096,
  timeoutMs: 30000,
  ...overrides,
});

const createRequest = (overrides: Partial<LlmRequest> = {}): LlmRequest => ({
  id: 'req-1',
  taskType: 'PLAN',
  messages: [
    { role: 'system', content: 'You plan work.' },
    { role: 'user', content: 'Plan the release' },
    { role: 'assistant', content: 'Sure.' },
  ],
  ...overrides,
});

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('ClaudeProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('availability', () => {
    it('should be available with a real key', () => {
      expect(new ClaudeProvider(createConfig()).isAvailable()).toBe(true);
    });

    it('should be unavailable with an empty key', () => {
      expect(new ClaudeProvider(createConfig({ apiKey: '' })).isAvailable()).toBe(false);
    });

    it('should be unavailable with an unexpanded placeholder', () => {
      expect(new ClaudeProvider(createConfig({ apiKey: '${ANTHROPIC_API_KEY}' })).isAvailable()).toBe(false);
    });

    it('should report its name', () => {
      expect(new ClaudeProvider(createConfig()).providerName()).toBe('claude');
    });
  });

  describe('role mapping', () => {
    it('should fold system into user', () => {
      expect(mapClaudeRole('user')).toBe('user');
      expect(mapClaudeRole('assistant')).toBe('assistant');
      expect(mapClaudeRole('system')).toBe('user');
    });
  });

  describe('buildRequestBody', () => {
    it('should prefer request temperature and max tokens', () => {
      const provider = new ClaudeProvider(createConfig());
      const body = provider.buildRequestBody(createRequest({ temperature: 0.3, maxTokens: 2000 }));

      expect(body.model).toBe('claude-test-model');
      expect(body.max_tokens).toBe(2000);
      expect(body.temperature).toBe(0.3);
      expect(body.messages).toEqual([
        { role: 'user', content: 'You plan work.' },
        { role: 'user', content: 'Plan the release' },
        { role: 'assistant', content: 'Sure.' },
      ]);
    });

    it('should fall back to config max tokens and temperature 0.7', () => {
      const provider = new ClaudeProvider(createConfig());
      const body = provider.buildRequestBody(createRequest());

      expect(body.max_tokens).toBe(4096);
      expect(body.temperature).toBe(0.7);
    });
  });

  describe('generate', () => {
    it('should post to the messages endpoint with the API headers', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({
          model: 'claude-test-model',
          usage: { input_tokens: 10, output_tokens: 5 },
          content: [{ type: 'text', text: 'ok' }],
        })
      );
      const provider = new ClaudeProvider(createConfig({ baseUrl: 'https://api.test/v1/' }));

      await provider.generate(createRequest());

      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://api.test/v1/messages');
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({
        'Content-Type': 'application/json',
        'x-api-key': 'test-key',
        'anthropic-version': '2023-06-01',
      });
    });

    it('should join text blocks and compute usage and cost', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({
          model: 'claude-test-model',
          usage: { input_tokens: 1000, output_tokens: 2000 },
          content: [
            { type: 'text', text: 'Hello' },
            { type: 'tool_use' },
            { type: 'text', text: 'World' },
          ],
        })
      );
      const provider = new ClaudeProvider(createConfig());

      const response = await provider.generate(createRequest());

      expect(response.id).toBe('req-1');
      expect(response.provider).toBe('claude');
      expect(response.model).toBe('claude-test-model');
      expect(response.content).toBe('Hello\nWorld');
      expect(response.usage).toEqual({ promptTokens: 1000, completionTokens: 2000, totalTokens: 3000 });
      expect(response.costCents).toBe(3.3);
      expect(response.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should classify rate_limit_error as RateLimitedError', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ error: { type: 'rate_limit_error', message: 'slow down' } }, 429)
      );
      const provider = new ClaudeProvider(createConfig());

      await expect(provider.generate(createRequest())).rejects.toBeInstanceOf(RateLimitedError);
    });

    it('should classify a bare 429 as RateLimitedError', async () => {
      mockFetch.mockResolvedValue(new Response('Too Many Requests', { status: 429 }));
      const provider = new ClaudeProvider(createConfig());

      await expect(provider.generate(createRequest())).rejects.toThrow('Rate limit exceeded for provider: claude');
    });

    it('should surface the API error message', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ error: { type: 'invalid_request_error', message: 'max_tokens too large' } }, 400)
      );
      const provider = new ClaudeProvider(createConfig());

      await expect(provider.generate(createRequest())).rejects.toThrow(
        'Request failed: Claude API error: max_tokens too large'
      );
    });

    it('should include status and body when the error body is not JSON', async () => {
      mockFetch.mockResolvedValue(new Response('upstream exploded', { status: 502 }));
      const provider = new ClaudeProvider(createConfig());

      await expect(provider.generate(createRequest())).rejects.toThrow(
        'Request failed: Claude API request failed with status 502: upstream exploded'
      );
    });

    it('should wrap network failures in RequestFailedError', async () => {
      mockFetch.mockRejectedValue(new Error('socket hang up'));
      const provider = new ClaudeProvider(createConfig());

      const error = await provider.generate(createRequest()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestFailedError);
      expect(error).toHaveProperty('message', 'Request failed: HTTP request failed: socket hang up');
    });

    it('should reject a success body with the wrong shape', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ model: 'claude-test-model' }));
      const provider = new ClaudeProvider(createConfig());

      await expect(provider.generate(createRequest())).rejects.toThrow('Failed to parse Claude response');
    });
  });
});
