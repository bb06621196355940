import {
  Events,
  NoTaskPlanError,
  TaskNotFoundError,
  ValidationError,
  createLogger,
  newId,
  orderTasks,
  toErrorMessage,
  withRepository,
} from '@lifeline/core';
import type { IBranchStore, IEventBus, ITaskPlanStore, TaskItem, TaskPlan, TaskTimeScope } from '@lifeline/core';
import type { CommitLedger } from './commit-ledger.js';
import type { ProgressTracker } from './progress-tracker.js';
import { KeyedQueue } from './utils/keyed-queue.js';

const log = createLogger('TaskPlanEditor');

export interface NewTaskInput {
  title: string;
  description?: string;
  /** Minutes */
  estimatedDuration: number;
  timeScope?: TaskTimeScope;
  executionTips?: string;
}

export type TaskChanges = Partial<
  Pick<TaskItem, 'title' | 'description' | 'estimatedDuration' | 'timeScope' | 'executionTips'>
>;

export interface TaskPlanEditorDeps {
  branches: IBranchStore;
  plans: ITaskPlanStore;
  ledger: CommitLedger;
  tracker: ProgressTracker;
  eventBus?: IEventBus;
  queue?: KeyedQueue;
}

function validateTitle(title: string): string {
  const trimmed = title.trim();
  if (!trimmed) {
    throw new ValidationError('Task title must not be empty', 'title');
  }
  return trimmed;
}

function validateDuration(minutes: number): number {
  if (!Number.isInteger(minutes) || minutes <= 0) {
    throw new ValidationError('Estimated duration must be a positive whole number of minutes', 'estimatedDuration');
  }
  return minutes;
}

/** User edits to a branch's task plan. Every edit is one plan update. */
export class TaskPlanEditor {
  private readonly queue: KeyedQueue;

  constructor(private readonly deps: TaskPlanEditorDeps) {
    this.queue = deps.queue ?? new KeyedQueue();
  }

  async addTask(branchId: string, input: NewTaskInput): Promise<TaskItem> {
    const title = validateTitle(input.title);
    const estimatedDuration = validateDuration(input.estimatedDuration);

    return this.queue.run(branchId, async () => {
      const plan = await this.requirePlan(branchId);
      const task: TaskItem = {
        id: newId(),
        title,
        description: input.description?.trim() ?? '',
        estimatedDuration,
        timeScope: input.timeScope ?? 'daily',
        orderIndex: plan.tasks.length,
        isCompleted: false,
        isAIGenerated: false,
        executionTips: input.executionTips?.trim() || undefined,
      };
      await this.save(branchId, plan, { tasks: [...plan.tasks, task] });
      return task;
    });
  }

  async updateTask(branchId: string, taskId: string, changes: TaskChanges): Promise<TaskItem> {
    const checked: TaskChanges = { ...changes };
    if (changes.title !== undefined) checked.title = validateTitle(changes.title);
    if (changes.estimatedDuration !== undefined) {
      checked.estimatedDuration = validateDuration(changes.estimatedDuration);
    }

    return this.queue.run(branchId, async () => {
      const plan = await this.requirePlan(branchId);
      const existing = requireTask(plan, taskId);
      const updated: TaskItem = { ...existing, ...checked, id: existing.id };
      await this.save(branchId, plan, {
        tasks: plan.tasks.map((t) => (t.id === taskId ? updated : t)),
      });
      return updated;
    });
  }

  async removeTask(branchId: string, taskId: string): Promise<TaskPlan> {
    return this.queue.run(branchId, async () => {
      const plan = await this.requirePlan(branchId);
      requireTask(plan, taskId);
      const remaining = orderTasks(plan.tasks.filter((t) => t.id !== taskId));
      return this.save(branchId, plan, {
        tasks: remaining.map((t, i) => ({ ...t, orderIndex: i })),
      });
    });
  }

  /** `orderedIds` must name every task of the plan exactly once. */
  async reorderTasks(branchId: string, orderedIds: string[]): Promise<TaskPlan> {
    return this.queue.run(branchId, async () => {
      const plan = await this.requirePlan(branchId);
      const byId = new Map(plan.tasks.map((t) => [t.id, t]));
      if (orderedIds.length !== byId.size || new Set(orderedIds).size !== orderedIds.length) {
        throw new ValidationError('Task order must list every task exactly once', 'orderedIds');
      }

      const tasks: TaskItem[] = [];
      for (const [index, id] of orderedIds.entries()) {
        const task = byId.get(id);
        if (!task) throw new TaskNotFoundError(id);
        tasks.push({ ...task, orderIndex: index });
      }
      return this.save(branchId, plan, { tasks });
    });
  }

  /** Flips completion; completing a task also records a task_complete commit. */
  async toggleTaskCompletion(branchId: string, taskId: string): Promise<TaskItem> {
    return this.queue.run(branchId, async () => {
      const plan = await this.requirePlan(branchId);
      const existing = requireTask(plan, taskId);
      const isCompleted = !existing.isCompleted;
      const toggled: TaskItem = {
        ...existing,
        isCompleted,
        completedAt: isCompleted ? new Date().toISOString() : undefined,
      };

      await this.save(branchId, plan, {
        tasks: plan.tasks.map((t) => (t.id === taskId ? toggled : t)),
      });
      if (isCompleted) {
        await this.deps.ledger.recordTaskCompletion(branchId, toggled);
      }
      return toggled;
    });
  }

  async updateTotalDuration(branchId: string, totalDuration: string): Promise<TaskPlan> {
    const text = totalDuration.trim();
    if (!text) {
      throw new ValidationError('Total duration must not be empty', 'totalDuration');
    }
    return this.queue.run(branchId, async () => {
      const plan = await this.requirePlan(branchId);
      return this.save(branchId, plan, { totalDuration: text });
    });
  }

  private async requirePlan(branchId: string): Promise<TaskPlan> {
    const plan = await withRepository('plan.findByBranchId', () => this.deps.plans.findByBranchId(branchId));
    if (!plan) {
      throw new NoTaskPlanError(branchId);
    }
    return plan;
  }

  /** Persist the change, then refresh the branch's cached progress when the tasks changed. */
  private async save(
    branchId: string,
    plan: TaskPlan,
    changes: Pick<Partial<TaskPlan>, 'tasks' | 'totalDuration'>,
  ): Promise<TaskPlan> {
    const now = new Date().toISOString();
    const updated = await withRepository('plan.update', () =>
      this.deps.plans.update(plan.id, { ...changes, lastModifiedAt: now }),
    );

    if (changes.tasks) {
      const progress = this.deps.tracker.progress(updated);
      try {
        await this.deps.branches.update(branchId, { progress, updatedAt: now });
        log.debug(`Plan updated, progress ${Math.round(progress * 100)}%`, undefined, branchId);
      } catch (error) {
        // the plan is stored; the cached progress catches up on the next edit
        log.error(`Progress refresh failed after plan update: ${toErrorMessage(error)}`, undefined, branchId);
      }
    }

    this.deps.eventBus?.emit(Events.PLAN_UPDATED, { branchId, plan: updated });
    return updated;
  }
}

function requireTask(plan: TaskPlan, taskId: string): TaskItem {
  const task = plan.tasks.find((t) => t.id === taskId);
  if (!task) {
    throw new TaskNotFoundError(taskId);
  }
  return task;
}
