import { createLogger } from '@lifeline/core';
import type { ICompletionProvider, TaskPlanDraft } from '@lifeline/core';
import { buildTaskPlanMessages } from './prompts.js';
import { parseTaskPlanResponse } from './response-parser.js';
import type { GoalInput } from './types.js';

const log = createLogger('TaskPlanGenerator');

export interface TaskPlanGeneratorOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Turns a goal into a validated plan draft with a single completion request.
 *
 * Throws whatever the completion provider throws (AIServiceError, ParsingError),
 * ParsingError when the response cannot be decoded, and PlanValidationError
 * when it decodes to an unusable plan. It never retries.
 */
export class TaskPlanGenerator {
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly completion: ICompletionProvider,
    private readonly options: TaskPlanGeneratorOptions,
  ) {
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 2000;
  }

  async generate(goal: GoalInput, signal?: AbortSignal): Promise<TaskPlanDraft> {
    log.debug(`Requesting task plan for "${goal.title}" from ${this.options.model}`);

    const raw = await this.completion.complete(
      {
        messages: buildTaskPlanMessages(goal),
        model: this.options.model,
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      },
      { signal },
    );

    const draft = parseTaskPlanResponse(raw);
    log.info(`Generated ${draft.tasks.length} tasks for "${goal.title}" (${draft.totalDuration})`);
    return draft;
  }
}
