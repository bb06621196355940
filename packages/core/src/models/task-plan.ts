export type TaskTimeScope = 'daily' | 'weekly' | 'monthly';

export const TASK_TIME_SCOPES: readonly TaskTimeScope[] = ['daily', 'weekly', 'monthly'];

export interface TaskItem {
  id: string;
  title: string;
  description: string;
  /** Minutes */
  estimatedDuration: number;
  timeScope: TaskTimeScope;
  orderIndex: number;
  isCompleted: boolean;
  completedAt?: string;
  isAIGenerated: boolean;
  executionTips?: string;
}

export interface TaskPlan {
  id: string;
  branchId: string;
  /** Human-readable estimate, e.g. "6 weeks" */
  totalDuration: string;
  isAIGenerated: boolean;
  createdAt: string;
  lastModifiedAt?: string;
  tasks: TaskItem[];
}

/** A plan that has been built and validated but not yet attached to a branch. */
export type TaskPlanDraft = Pick<TaskPlan, 'totalDuration' | 'isAIGenerated' | 'tasks'>;

export type PlanState =
  | { kind: 'none' }
  | { kind: 'plan'; plan: TaskPlan };

export function planStateOf(plan: TaskPlan | null): PlanState {
  return plan ? { kind: 'plan', plan } : { kind: 'none' };
}

/** Tasks ordered by orderIndex; equal indices keep their relative order. */
export function orderTasks(tasks: readonly TaskItem[]): TaskItem[] {
  return [...tasks].sort((a, b) => a.orderIndex - b.orderIndex);
}
