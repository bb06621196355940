import { z } from 'zod';
import {
  ParsingError,
  PlanValidationError,
  TASK_TIME_SCOPES,
  createLogger,
  newId,
  toErrorMessage,
} from '@lifeline/core';
import type { TaskItem, TaskPlanDraft, TaskTimeScope } from '@lifeline/core';

const log = createLogger('PlanParser');

const AIGeneratedTaskSchema = z.object({
  title: z.string(),
  description: z.string(),
  timeScope: z.string(),
  estimatedDuration: z.number().int(),
  orderIndex: z.number().int(),
  executionTips: z.string().nullish(),
});

const AIGeneratedTaskPlanSchema = z.object({
  totalDuration: z.string(),
  tasks: z.array(AIGeneratedTaskSchema),
});

export type AIGeneratedTask = z.infer<typeof AIGeneratedTaskSchema>;
export type AIGeneratedTaskPlan = z.infer<typeof AIGeneratedTaskPlanSchema>;

/**
 * Cut the JSON object out of a completion: prefer the body of a ``` fence,
 * then keep everything from the first `{` to the last `}`.
 */
export function extractJsonObject(raw: string): string {
  let text = raw.trim();
  const fenceMatch = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenceMatch) {
    text = fenceMatch[1].trim();
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new ParsingError('Response does not contain a JSON object');
  }
  return text.slice(start, end + 1);
}

export function decodeTaskPlan(raw: string): AIGeneratedTaskPlan {
  const json = extractJsonObject(raw);

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw new ParsingError(`Response is not valid JSON: ${toErrorMessage(error)}`, { cause: error });
  }

  const result = AIGeneratedTaskPlanSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ParsingError(`Response does not match the task plan schema: ${issues}`);
  }
  return result.data;
}

export function validateTaskPlan(plan: AIGeneratedTaskPlan): void {
  if (plan.tasks.length === 0) {
    throw new PlanValidationError('Task plan must contain at least one task', 'tasks');
  }
  if (!plan.totalDuration.trim()) {
    throw new PlanValidationError('Total duration must not be empty', 'totalDuration');
  }

  plan.tasks.forEach((task, index) => {
    if (!task.title.trim()) {
      throw new PlanValidationError(`Task ${index} title must not be empty`, `tasks.${index}.title`);
    }
    if (!task.description.trim()) {
      throw new PlanValidationError(`Task ${index} description must not be empty`, `tasks.${index}.description`);
    }
    if (task.estimatedDuration <= 0) {
      throw new PlanValidationError(
        `Task ${index} estimated duration must be positive`,
        `tasks.${index}.estimatedDuration`,
      );
    }
  });
}

/** Unknown scopes fall back to daily instead of failing the whole plan. */
export function normalizeTimeScope(value: string): TaskTimeScope {
  const normalized = value.trim().toLowerCase();
  const scope = TASK_TIME_SCOPES.find((s) => s === normalized);
  if (scope) return scope;

  log.warn(`Unrecognized timeScope "${value}", defaulting to daily`);
  return 'daily';
}

export function toTaskPlanDraft(plan: AIGeneratedTaskPlan): TaskPlanDraft {
  // Array.prototype.sort is stable, so tasks sharing an orderIndex keep the AI's order
  const ordered = [...plan.tasks].sort((a, b) => a.orderIndex - b.orderIndex);

  const tasks = ordered.map((task): TaskItem => {
    const item: TaskItem = {
      id: newId(),
      title: task.title.trim(),
      description: task.description.trim(),
      estimatedDuration: task.estimatedDuration,
      timeScope: normalizeTimeScope(task.timeScope),
      orderIndex: task.orderIndex,
      isCompleted: false,
      isAIGenerated: true,
    };
    const tips = task.executionTips?.trim();
    if (tips) item.executionTips = tips;
    return item;
  });

  return {
    totalDuration: plan.totalDuration.trim(),
    isAIGenerated: true,
    tasks,
  };
}

/** Decode, validate and convert a raw completion into a plan draft. */
export function parseTaskPlanResponse(raw: string): TaskPlanDraft {
  const decoded = decodeTaskPlan(raw);
  validateTaskPlan(decoded);
  return toTaskPlanDraft(decoded);
}
