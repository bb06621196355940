import type { TaskPlan } from '../models/task-plan.js';

export interface ITaskPlanStore {
  create(plan: Omit<TaskPlan, 'id'>): Promise<TaskPlan>;
  /** Replaces the given fields in one write; readers see either the old or the new record. */
  update(planId: string, updates: Partial<TaskPlan>): Promise<TaskPlan>;
  delete(planId: string): Promise<void>;
  findById(planId: string): Promise<TaskPlan | null>;
  findAll(): Promise<TaskPlan[]>;
  findByBranchId(branchId: string): Promise<TaskPlan | null>;
}
