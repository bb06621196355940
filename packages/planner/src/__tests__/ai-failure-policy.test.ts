import { describe, it, expect, vi } from 'vitest';
import {
  AIServiceError,
  MANUAL_PLAN_DURATION,
  ParsingError,
  PlanValidationError,
} from '@lifeline/core';
import type { TaskPlanDraft } from '@lifeline/core';
import { AIFailurePolicy, FALLBACK_TASK_DURATION } from '../ai-failure-policy.js';
import type { Sleep } from '../ai-failure-policy.js';

const goal = { title: 'Learn the cello', description: 'Play a simple piece by spring' };

const aiDraft: TaskPlanDraft = {
  totalDuration: '3 months',
  isAIGenerated: true,
  tasks: [
    {
      id: 'ai-1',
      title: 'Rent a cello',
      description: 'Find a local shop',
      estimatedDuration: 90,
      timeScope: 'weekly',
      orderIndex: 0,
      isCompleted: false,
      isAIGenerated: true,
    },
  ],
};

function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  const sleep: Sleep = async (ms) => {
    delays.push(ms);
  };
  return { sleep, delays };
}

describe('AIFailurePolicy', () => {
  describe('classify()', () => {
    const policy = new AIFailurePolicy();

    it.each([
      [new AIServiceError('network', 'offline'), 'network', true],
      [new AIServiceError('rate_limited', 'slow down', 429), 'rate_limited', true],
      [new AIServiceError('server_error', 'boom', 503), 'server_error', true],
      [new AIServiceError('unauthorized', 'bad key', 401), 'unauthorized', false],
      [new AIServiceError('bad_request', 'bad body', 400), 'bad_request', false],
      [new ParsingError('not json'), 'parsing', false],
      [new PlanValidationError('no tasks'), 'validation', false],
      [new TypeError('undefined is not a function'), 'unknown', false],
    ])('classifies %s', (error, expected, retryable) => {
      const failure = policy.classify(error);
      expect(failure).toBe(expected);
      expect(policy.isRetryable(failure)).toBe(retryable);
    });
  });

  describe('delayFor()', () => {
    it('doubles from the base delay', () => {
      const policy = new AIFailurePolicy({ baseDelayMs: 1000 });
      expect([1, 2, 3, 4].map((n) => policy.delayFor(n))).toEqual([1000, 2000, 4000, 8000]);
    });
  });

  describe('generateWithFallback()', () => {
    it('returns the AI plan on first success without waiting', async () => {
      const { sleep, delays } = recordingSleep();
      const policy = new AIFailurePolicy({ sleep });
      const generate = vi.fn().mockResolvedValue(aiDraft);

      const outcome = await policy.generateWithFallback(goal, generate);

      expect(outcome).toEqual({ source: 'ai', draft: aiDraft });
      expect(generate).toHaveBeenCalledTimes(1);
      expect(delays).toEqual([]);
    });

    it('waits 1s, 2s, 4s across three transient failures, then falls back on the fourth', async () => {
      const { sleep, delays } = recordingSleep();
      const policy = new AIFailurePolicy({ maxAttempts: 3, baseDelayMs: 1000, sleep });
      const generate = vi.fn().mockRejectedValue(new AIServiceError('server_error', 'unavailable', 503));

      const outcome = await policy.generateWithFallback(goal, generate);

      expect(delays).toEqual([1000, 2000, 4000]);
      expect(generate).toHaveBeenCalledTimes(4);
      expect(outcome.source).toBe('fallback');
      expect(outcome.draft.isAIGenerated).toBe(false);
      expect(outcome.source === 'fallback' && outcome.reason).toBe('server_error');
    });

    it('recovers when a retry succeeds', async () => {
      const { sleep, delays } = recordingSleep();
      const policy = new AIFailurePolicy({ sleep });
      const generate = vi
        .fn()
        .mockRejectedValueOnce(new AIServiceError('rate_limited', 'slow down', 429))
        .mockRejectedValueOnce(new AIServiceError('network', 'reset'))
        .mockResolvedValueOnce(aiDraft);

      const outcome = await policy.generateWithFallback(goal, generate);

      expect(outcome).toEqual({ source: 'ai', draft: aiDraft });
      expect(delays).toEqual([1000, 2000]);
    });

    it.each([
      new AIServiceError('unauthorized', 'bad key', 401),
      new ParsingError('garbage'),
      new PlanValidationError('Task plan must contain at least one task'),
    ])('falls back immediately on non-retryable %s', async (error) => {
      const { sleep, delays } = recordingSleep();
      const policy = new AIFailurePolicy({ sleep });
      const generate = vi.fn().mockRejectedValue(error);

      const outcome = await policy.generateWithFallback(goal, generate);

      expect(generate).toHaveBeenCalledTimes(1);
      expect(delays).toEqual([]);
      expect(outcome.source).toBe('fallback');
      expect(outcome.source === 'fallback' && outcome.error).toBe(error);
    });

    it('starts every invocation with a fresh attempt count', async () => {
      const { sleep, delays } = recordingSleep();
      const policy = new AIFailurePolicy({ maxAttempts: 1, sleep });
      const failing = vi.fn().mockRejectedValue(new AIServiceError('network', 'offline'));

      await policy.generateWithFallback(goal, failing);
      await policy.generateWithFallback(goal, failing);

      expect(failing).toHaveBeenCalledTimes(4);
      expect(delays).toEqual([1000, 1000]);
    });
  });

  describe('createFallbackPlan()', () => {
    it('builds a deterministic single-task manual plan', () => {
      const policy = new AIFailurePolicy();

      const plan = policy.createFallbackPlan(goal);

      expect(plan.totalDuration).toBe(MANUAL_PLAN_DURATION);
      expect(plan.isAIGenerated).toBe(false);
      expect(plan.tasks).toHaveLength(1);
      expect(plan.tasks[0]).toMatchObject({
        title: 'Get started: Learn the cello',
        description: 'Break this goal into concrete steps: Play a simple piece by spring',
        estimatedDuration: FALLBACK_TASK_DURATION,
        timeScope: 'daily',
        orderIndex: 0,
        isCompleted: false,
        isAIGenerated: false,
      });
    });

    it('handles an empty description', () => {
      const plan = new AIFailurePolicy().createFallbackPlan({ title: 'Run', description: '  ' });
      expect(plan.tasks[0].description).toBe('Break this goal into concrete steps.');
    });
  });

  describe('runWithRetry()', () => {
    it('rethrows the last error once retries are exhausted', async () => {
      const { sleep } = recordingSleep();
      const policy = new AIFailurePolicy({ maxAttempts: 2, sleep });
      const last = new AIServiceError('server_error', 'third strike', 500);
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new AIServiceError('server_error', 'first', 500))
        .mockRejectedValueOnce(new AIServiceError('server_error', 'second', 500))
        .mockRejectedValueOnce(last);

      await expect(policy.runWithRetry(operation)).rejects.toBe(last);
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('stops retrying once the signal is aborted', async () => {
      const controller = new AbortController();
      const { sleep, delays } = recordingSleep();
      const policy = new AIFailurePolicy({ sleep });
      const operation = vi.fn().mockImplementation(async () => {
        controller.abort();
        throw new AIServiceError('network', 'aborted mid-flight');
      });

      await expect(policy.runWithRetry(operation, controller.signal)).rejects.toThrow('aborted mid-flight');
      expect(operation).toHaveBeenCalledTimes(1);
      expect(delays).toEqual([]);
    });

    it('passes the signal through to the operation', async () => {
      const controller = new AbortController();
      const policy = new AIFailurePolicy();
      const operation = vi.fn().mockResolvedValue('ok');

      await policy.runWithRetry(operation, controller.signal);

      expect(operation).toHaveBeenCalledWith(controller.signal);
    });

    it('waits with the real timer when no sleep is injected', async () => {
      vi.useFakeTimers();
      try {
        const policy = new AIFailurePolicy({ baseDelayMs: 1000 });
        const operation = vi
          .fn()
          .mockRejectedValueOnce(new AIServiceError('network', 'offline'))
          .mockResolvedValueOnce('ok');

        const pending = policy.runWithRetry(operation);
        await vi.advanceTimersByTimeAsync(999);
        expect(operation).toHaveBeenCalledTimes(1);
        await vi.advanceTimersByTimeAsync(1);

        await expect(pending).resolves.toBe('ok');
        expect(operation).toHaveBeenCalledTimes(2);
      } finally {
        vi.useRealTimers();
      }
    });
  });
});
