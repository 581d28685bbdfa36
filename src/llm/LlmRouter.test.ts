/**
 * LlmRouter Unit Tests
 *
 * Providers are in-process fakes, backoff uses an injected sleep, and the
 * route log goes to a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { LlmRouter, summarizeRouteLogs } from './LlmRouter.js';
import { ClaudeProvider } from './providers/ClaudeProvider.js';
import { MaxRetriesExceededError, OfflineModeError, RequestFailedError } from './errors.js';
import { parseRouteLog } from '../types/schemas.js';
import type { LlmProvider } from './types.js';
import type { SleepFn } from './RetryPolicy.js';
import type { ActiveProviderName, LlmConfig, LlmRequest, LlmResponse, RouteLog } from '../types/index.js';

class FakeProvider implements LlmProvider {
  readonly generate = vi.fn(async (request: LlmRequest, _signal?: AbortSignal): Promise<LlmResponse> => {
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return {
      id: request.id,
      provider: this.name,
      model: `${this.name}-model`,
      content: `answer from ${this.name}`,
      usage: { promptTokens: 10, completionTokens: 20, totalTokens: 30 },
      durationMs: 1,
      costCents: 0.05,
    };
  });

  constructor(
    private readonly name: ActiveProviderName,
    private available = true,
    private failures: Error[] = []
  ) {}

  providerName(): ActiveProviderName {
    return this.name;
  }

  isAvailable(): boolean {
    return this.available;
  }
}

const createConfig = (overrides: Partial<LlmConfig> = {}): LlmConfig => ({
  defaultProvider: 'claude',
  timeoutMs: 30000,
  maxRetries: 3,
  baseDelayMs: 500,
  providers: {},
  routing: {
    PLAN: { provider: 'claude', temperature: 0.3 },
    STATUS: { provider: 'openrouter', temperature: 0 },
  },
  offlineMode: false,
  ...overrides,
});

const createRequest = (overrides: Partial<LlmRequest> = {}): LlmRequest => ({
  id: 'req-1',
  taskType: 'PLAN',
  messages: [{ role: 'user', content: 'Plan it' }],
  ...overrides,
});

describe('LlmRouter', () => {
  let logDir: string;
  let sleep: Mock<SleepFn>;

  const readLogs = async (): Promise<RouteLog[]> => {
    const content = await fs.readFile(path.join(logDir, 'log.jsonl'), 'utf-8');
    return content.trim().split('\n').map((line) => parseRouteLog(line));
  };

  const createRouter = (config: LlmConfig, providers: Array<[ActiveProviderName, LlmProvider]>): LlmRouter =>
    new LlmRouter(config, { logDirectory: logDir, providers: new Map(providers), sleep });

  beforeEach(async () => {
    logDir = await fs.mkdtemp(path.join(os.tmpdir(), 'deskflow-router-'));
    sleep = vi.fn<SleepFn>().mockResolvedValue(undefined);
  });

  afterEach(async () => {
    await fs.rm(logDir, { recursive: true, force: true });
  });

  describe('offline mode', () => {
    it('should fail without touching any provider and log once', async () => {
      const claude = new FakeProvider('claude');
      const router = createRouter(createConfig({ offlineMode: true }), [['claude', claude]]);

      await expect(router.generate(createRequest())).rejects.toBeInstanceOf(OfflineModeError);

      expect(claude.generate).not.toHaveBeenCalled();
      const logs = await readLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        requestId: 'req-1',
        success: false,
        attemptedProvider: 'claude',
        finalProvider: 'offline',
        retryCount: 0,
        tokensUsed: 0,
        errorMessage: 'Offline mode active',
      });
    });

    it('should toggle offline mode at runtime', () => {
      const router = createRouter(createConfig(), []);

      router.setOfflineMode(true);
      expect(router.isOfflineMode()).toBe(true);
      router.setOfflineMode(false);
      expect(router.isOfflineMode()).toBe(false);
    });
  });

  describe('primary provider', () => {
    it('should return the primary response and log retryCount 0', async () => {
      const claude = new FakeProvider('claude');
      const openrouter = new FakeProvider('openrouter');
      const router = createRouter(createConfig(), [['claude', claude], ['openrouter', openrouter]]);

      const response = await router.generate(createRequest());

      expect(response.provider).toBe('claude');
      expect(openrouter.generate).not.toHaveBeenCalled();
      const logs = await readLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        taskType: 'PLAN',
        attemptedProvider: 'claude',
        finalProvider: 'claude',
        success: true,
        retryCount: 0,
        costCents: 0.05,
        tokensUsed: 30,
      });
    });

    it('should apply the route temperature when the request has none', async () => {
      const claude = new FakeProvider('claude');
      const router = createRouter(createConfig(), [['claude', claude]]);

      await router.generate(createRequest());

      expect(claude.generate.mock.calls[0][0].temperature).toBe(0.3);
    });

    it('should keep an explicit request temperature', async () => {
      const claude = new FakeProvider('claude');
      const router = createRouter(createConfig(), [['claude', claude]]);

      await router.generate(createRequest({ temperature: 0.9 }));

      expect(claude.generate.mock.calls[0][0].temperature).toBe(0.9);
    });
  });

  describe('fallback', () => {
    it('should skip an unavailable primary without calling it and use the fallback', async () => {
      const claudeProvider = new ClaudeProvider({
        apiKey: '${PLACEHOLDER}',
        baseUrl: 'https://api.test/v1',
        model: 'claude-test-model',
        maxTokens: 1024,
        timeoutMs: 1000,
      });
      const generateSpy = vi.spyOn(claudeProvider, 'generate');
      const openrouter = new FakeProvider('openrouter');
      const router = createRouter(createConfig(), [['claude', claudeProvider], ['openrouter', openrouter]]);

      expect(claudeProvider.isAvailable()).toBe(false);
      const response = await router.generate(createRequest());

      expect(generateSpy).not.toHaveBeenCalled();
      expect(response.provider).toBe('openrouter');
      const logs = await readLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({ attemptedProvider: 'claude', finalProvider: 'openrouter', success: true, retryCount: 1 });
    });

    it('should retry the fallback across rounds with doubling backoff', async () => {
      const claude = new FakeProvider('claude', true, [new Error('primary down')]);
      const openrouter = new FakeProvider('openrouter', true, [new Error('busy'), new Error('still busy')]);
      const router = createRouter(createConfig(), [['claude', claude], ['openrouter', openrouter]]);

      const response = await router.generate(createRequest());

      expect(response.provider).toBe('openrouter');
      expect(openrouter.generate).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1000]);
      const logs = await readLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({ finalProvider: 'openrouter', success: true, retryCount: 3 });
    });

    it('should fall back to the default provider for unmapped task types', () => {
      const router = createRouter(createConfig(), []);

      expect(router.getRouteConfig('REVIEW')).toEqual({ provider: 'claude', temperature: 0.7 });
      expect(router.getRouteConfig('STATUS')).toEqual({ provider: 'openrouter', temperature: 0 });
    });
  });

  describe('exhaustion', () => {
    it('should fail with MaxRetriesExceeded when no provider is available', async () => {
      const router = createRouter(createConfig({ maxRetries: 2 }), [
        ['claude', new FakeProvider('claude', false)],
        ['openrouter', new FakeProvider('openrouter', false)],
      ]);

      await expect(router.generate(createRequest())).rejects.toBeInstanceOf(MaxRetriesExceededError);

      const logs = await readLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        success: false,
        finalProvider: 'offline',
        retryCount: 2,
        errorMessage: 'Provider not available: claude',
      });
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should carry the last failure as the cause', async () => {
      const lastFailure = new Error('third strike');
      const router = createRouter(createConfig({ maxRetries: 2 }), [
        ['claude', new FakeProvider('claude', true, [new Error('primary down')])],
        ['openrouter', new FakeProvider('openrouter', true, [new Error('second strike'), lastFailure])],
      ]);

      const error = await router.generate(createRequest()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MaxRetriesExceededError);
      expect(error).toHaveProperty('cause', lastFailure);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500]);
      const logs = await readLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0].errorMessage).toBe('third strike');
    });
  });

  describe('abort', () => {
    it('should stop the fallback loop once the signal aborts', async () => {
      const controller = new AbortController();
      const claude = new FakeProvider('claude', true, [new Error('primary down')]);
      const openrouter = new FakeProvider('openrouter');
      const router = createRouter(createConfig(), [['claude', claude], ['openrouter', openrouter]]);
      claude.generate.mockImplementationOnce(async () => {
        controller.abort();
        throw new Error('aborted mid-flight');
      });

      const error = await router.generate(createRequest(), { signal: controller.signal }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestFailedError);
      expect(error).toHaveProperty('message', 'Request failed: Request aborted');
      expect(openrouter.generate).not.toHaveBeenCalled();
      const logs = await readLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({ success: false, finalProvider: 'offline' });
    });

    it('should fail the call once timeoutMs elapses', async () => {
      const claude = new FakeProvider('claude');
      claude.generate.mockImplementationOnce(
        (_request: LlmRequest, signal?: AbortSignal) =>
          new Promise<LlmResponse>((_resolve, reject) => {
            signal?.addEventListener('abort', () => reject(new Error('aborted by deadline')), { once: true });
          })
      );
      const router = createRouter(createConfig({ timeoutMs: 20 }), [['claude', claude]]);

      const error = await router.generate(createRequest()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestFailedError);
      expect(error).toHaveProperty('message', 'Request failed: Request timed out after 20ms');
      const logs = await readLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({ attemptedProvider: 'claude', finalProvider: 'offline', success: false });
    });
  });

  describe('route log failures', () => {
    it('should still return the response when log.jsonl cannot be written', async () => {
      const blocker = path.join(logDir, 'blocker');
      await fs.writeFile(blocker, 'not a directory');
      const router = new LlmRouter(createConfig(), {
        logDirectory: path.join(blocker, 'logs'),
        providers: new Map<ActiveProviderName, LlmProvider>([['claude', new FakeProvider('claude')]]),
        sleep,
      });

      const response = await router.generate(createRequest());

      expect(response.content).toBe('answer from claude');
    });
  });

  describe('stats', () => {
    it('should list available providers', () => {
      const router = createRouter(createConfig(), [
        ['claude', new FakeProvider('claude', false)],
        ['openrouter', new FakeProvider('openrouter', true)],
      ]);

      expect(router.getAvailableProviders()).toEqual(['openrouter']);
    });

    it('should aggregate the route log', async () => {
      const router = createRouter(createConfig(), [['claude', new FakeProvider('claude')]]);
      await router.generate(createRequest({ id: 'a' }));
      await router.generate(createRequest({ id: 'b' }));
      router.setOfflineMode(true);
      await router.generate(createRequest({ id: 'c' })).catch(() => undefined);

      const stats = await router.getRoutingStats();

      expect(stats.totalRequests).toBe(3);
      expect(stats.successfulRequests).toBe(2);
      expect(stats.failedRequests).toBe(1);
      expect(stats.providerUsage).toEqual({ claude: 2, offline: 1 });
      expect(stats.totalCostCents).toBe(0.1);
    });

    it('should summarize an empty log as zeros', () => {
      expect(summarizeRouteLogs([])).toEqual({
        totalRequests: 0,
        successfulRequests: 0,
        failedRequests: 0,
        providerUsage: {},
        averageDurationMs: 0,
        totalCostCents: 0,
      });
    });
  });
});
