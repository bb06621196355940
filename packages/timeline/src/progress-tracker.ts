import type { PlanState, TaskPlan } from '@lifeline/core';

export interface ProgressSummary {
  hasPlan: boolean;
  totalTasks: number;
  completedTasks: number;
  /** 0.0–1.0 */
  progress: number;
  totalDuration: number;
  completedDuration: number;
  remainingDuration: number;
}

const EMPTY_SUMMARY: ProgressSummary = {
  hasPlan: false,
  totalTasks: 0,
  completedTasks: 0,
  progress: 0,
  totalDuration: 0,
  completedDuration: 0,
  remainingDuration: 0,
};

/** Pure derivations over a task plan. Durations are in minutes. */
export class ProgressTracker {
  progress(plan: TaskPlan): number {
    if (plan.tasks.length === 0) return 0;
    return this.completedCount(plan) / plan.tasks.length;
  }

  remainingDuration(plan: TaskPlan): number {
    return plan.tasks
      .filter((t) => !t.isCompleted)
      .reduce((sum, t) => sum + t.estimatedDuration, 0);
  }

  totalDuration(plan: TaskPlan): number {
    return plan.tasks.reduce((sum, t) => sum + t.estimatedDuration, 0);
  }

  completedCount(plan: TaskPlan): number {
    return plan.tasks.filter((t) => t.isCompleted).length;
  }

  summarize(state: PlanState): ProgressSummary {
    if (state.kind === 'none') return { ...EMPTY_SUMMARY };

    const { plan } = state;
    const totalDuration = this.totalDuration(plan);
    const remainingDuration = this.remainingDuration(plan);
    return {
      hasPlan: true,
      totalTasks: plan.tasks.length,
      completedTasks: this.completedCount(plan),
      progress: this.progress(plan),
      totalDuration,
      completedDuration: totalDuration - remainingDuration,
      remainingDuration,
    };
  }
}
