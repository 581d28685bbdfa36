import { describe, it, expect, vi } from 'vitest';
import { LlmTaskExecutor, buildTaskMessages, type GenerationRouter } from './TaskExecutor.js';
import { createTask } from './TaskLifecycle.js';
import type { LlmResponse } from '../types/index.js';

const response: LlmResponse = {
  id: 'req-1',
  provider: 'claude',
  model: 'claude-3-5-sonnet-20241022',
  content: 'Here is the plan',
  usage: { promptTokens: 12, completionTokens: 30, totalTokens: 42 },
  durationMs: 15,
  costCents: 0.05,
};

describe('buildTaskMessages', () => {
  it('should describe the task when no messages are supplied', () => {
    const task = createTask('PLAN', 'Plan the release', null);

    expect(buildTaskMessages(task)).toEqual([
      { role: 'system', content: 'You are assisting with a PLAN task.' },
      { role: 'user', content: 'Plan the release' },
    ]);
  });

  it('should append the payload as pretty JSON', () => {
    const task = createTask('REVIEW', 'Review PR', { pr: 7 });

    expect(buildTaskMessages(task)[1]).toEqual({
      role: 'user',
      content: 'Review PR\n\nPayload:\n{\n  "pr": 7\n}',
    });
  });

  it('should use supplied payload messages as-is', () => {
    const messages = [{ role: 'user', content: 'Just this' }];
    const task = createTask('FOLLOWUP', 'ignored', { messages });

    expect(buildTaskMessages(task)).toEqual(messages);
  });

  it('should fall back when the supplied messages are invalid', () => {
    const task = createTask('STATUS', 'Status please', { messages: [{ role: 'robot', content: 'x' }] });

    expect(buildTaskMessages(task)[0]?.role).toBe('system');
  });
});

describe('LlmTaskExecutor', () => {
  it('should route the task and return a JSON summary of the response', async () => {
    const router: GenerationRouter = { generate: vi.fn<GenerationRouter['generate']>().mockResolvedValue(response) };
    const executor = new LlmTaskExecutor(router);
    const task = createTask('PLAN', 'Plan the release', null);
    const controller = new AbortController();

    const result = await executor.execute(task, controller.signal);

    expect(result).toEqual({
      provider: 'claude',
      model: 'claude-3-5-sonnet-20241022',
      content: 'Here is the plan',
      usage: { promptTokens: 12, completionTokens: 30, totalTokens: 42 },
      costCents: 0.05,
    });
    const [request, options] = vi.mocked(router.generate).mock.calls[0] ?? [];
    expect(request?.taskType).toBe('PLAN');
    expect(request?.messages).toHaveLength(2);
    expect(options?.signal).toBe(controller.signal);
  });

  it('should omit costCents when the provider gives none', async () => {
    const withoutCost: LlmResponse = { ...response, costCents: undefined };
    const router: GenerationRouter = { generate: vi.fn<GenerationRouter['generate']>().mockResolvedValue(withoutCost) };

    const result = await new LlmTaskExecutor(router).execute(createTask('STATUS', 's', null), new AbortController().signal);

    expect(result).not.toHaveProperty('costCents');
  });

  it('should propagate router errors', async () => {
    const router: GenerationRouter = {
      generate: vi.fn<GenerationRouter['generate']>().mockRejectedValue(new Error('Maximum retries exceeded')),
    };

    await expect(
      new LlmTaskExecutor(router).execute(createTask('APPLY', 'a', null), new AbortController().signal)
    ).rejects.toThrow('Maximum retries exceeded');
  });
});
