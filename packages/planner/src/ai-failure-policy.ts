import {
  AIServiceError,
  MANUAL_PLAN_DURATION,
  ParsingError,
  ValidationError,
  createLogger,
  newId,
  toErrorMessage,
} from '@lifeline/core';
import type { TaskPlanDraft } from '@lifeline/core';
import type { GoalInput } from './types.js';

const log = createLogger('AIFailurePolicy');

export type FailureClass =
  | 'network'
  | 'rate_limited'
  | 'server_error'
  | 'unauthorized'
  | 'bad_request'
  | 'parsing'
  | 'validation'
  | 'unknown';

const RETRYABLE: ReadonlySet<FailureClass> = new Set(['network', 'rate_limited', 'server_error']);

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface AIFailurePolicyOptions {
  /** Retries after the first request. Default 3. */
  maxAttempts?: number;
  /** Delay before the first retry; doubles on each retry after that. Default 1000. */
  baseDelayMs?: number;
  sleep?: Sleep;
}

export type PlanOutcome =
  | { source: 'ai'; draft: TaskPlanDraft }
  | { source: 'fallback'; draft: TaskPlanDraft; reason: FailureClass; error: unknown };

export const FALLBACK_TASK_DURATION = 60;
export const FALLBACK_TASK_TIPS = 'This task was created manually. Adjust its content and schedule to fit your plan.';

const defaultSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class AIFailurePolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  private readonly sleep: Sleep;

  constructor(options: AIFailurePolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  classify(error: unknown): FailureClass {
    if (error instanceof AIServiceError) return error.kind;
    if (error instanceof ParsingError) return 'parsing';
    if (error instanceof ValidationError) return 'validation';
    return 'unknown';
  }

  isRetryable(failure: FailureClass): boolean {
    return RETRYABLE.has(failure);
  }

  /** Delay before the given retry (1-based): base × 2^(retry−1). */
  delayFor(retry: number): number {
    return this.baseDelayMs * 2 ** (retry - 1);
  }

  /**
   * Run `operation`, retrying retryable failures with exponential backoff.
   * The final error, or the first non-retryable one, is rethrown.
   * Every call starts from a fresh attempt count.
   */
  async runWithRetry<T>(operation: (signal?: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let retry = 0; ; retry++) {
      try {
        return await operation(signal);
      } catch (error) {
        if (signal?.aborted) throw error;

        const failure = this.classify(error);
        if (!this.isRetryable(failure)) {
          log.warn(`Not retrying ${failure} failure: ${toErrorMessage(error)}`);
          throw error;
        }
        if (retry >= this.maxAttempts) {
          log.warn(`Giving up after ${retry} retries: ${toErrorMessage(error)}`);
          throw error;
        }

        const wait = this.delayFor(retry + 1);
        log.warn(`${failure} failure, retry ${retry + 1}/${this.maxAttempts} in ${wait}ms`);
        await this.sleep(wait, signal);
      }
    }
  }

  /**
   * Run the generation with retries; when it cannot succeed, return the
   * manual fallback plan instead. Never throws.
   */
  async generateWithFallback(
    goal: GoalInput,
    generate: (signal?: AbortSignal) => Promise<TaskPlanDraft>,
  ): Promise<PlanOutcome> {
    try {
      const draft = await this.runWithRetry(generate);
      return { source: 'ai', draft };
    } catch (error) {
      const reason = this.classify(error);
      log.warn(`Using manual plan for "${goal.title}" after ${reason} failure`);
      return { source: 'fallback', draft: this.createFallbackPlan(goal), reason, error };
    }
  }

  /** Deterministic single-task plan for when AI planning is unavailable. */
  createFallbackPlan(goal: GoalInput): TaskPlanDraft {
    const description = goal.description.trim();
    return {
      totalDuration: MANUAL_PLAN_DURATION,
      isAIGenerated: false,
      tasks: [
        {
          id: newId(),
          title: `Get started: ${goal.title}`,
          description: description
            ? `Break this goal into concrete steps: ${description}`
            : 'Break this goal into concrete steps.',
          estimatedDuration: FALLBACK_TASK_DURATION,
          timeScope: 'daily',
          orderIndex: 0,
          isCompleted: false,
          isAIGenerated: false,
          executionTips: FALLBACK_TASK_TIPS,
        },
      ],
    };
  }
}
