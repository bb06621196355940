import type { Branch, BranchStatus } from '../models/branch.js';
import type { TaskPlan } from '../models/task-plan.js';
import type { Commit } from '../models/commit.js';

export interface BranchCreatedEvent {
  branch: Branch;
}

export interface BranchStatusChangedEvent {
  branch: Branch;
  previousStatus: BranchStatus;
}

export interface BranchMergedEvent {
  branch: Branch;
  master: Branch;
  mergeCommit: Commit;
}

export interface BranchDeletedEvent {
  branchId: string;
}

export interface PlanGeneratedEvent {
  branchId: string;
  plan: TaskPlan;
}

export interface PlanFallbackEvent {
  branchId: string;
  plan: TaskPlan;
  /** Failure class that forced the manual plan */
  reason: string;
}

export interface PlanUpdatedEvent {
  branchId: string;
  plan: TaskPlan;
}

export interface CommitCreatedEvent {
  commit: Commit;
}

export const Events = {
  BRANCH_CREATED: 'branch:created',
  BRANCH_COMPLETED: 'branch:completed',
  BRANCH_ABANDONED: 'branch:abandoned',
  BRANCH_REACTIVATED: 'branch:reactivated',
  BRANCH_MERGED: 'branch:merged',
  BRANCH_DELETED: 'branch:deleted',
  PLAN_GENERATED: 'plan:generated',
  PLAN_FALLBACK: 'plan:fallback',
  PLAN_REGENERATED: 'plan:regenerated',
  PLAN_UPDATED: 'plan:updated',
  COMMIT_CREATED: 'commit:created',
} as const;

export interface TimelineEventMap {
  'branch:created': BranchCreatedEvent;
  'branch:completed': BranchStatusChangedEvent;
  'branch:abandoned': BranchStatusChangedEvent;
  'branch:reactivated': BranchStatusChangedEvent;
  'branch:merged': BranchMergedEvent;
  'branch:deleted': BranchDeletedEvent;
  'plan:generated': PlanGeneratedEvent;
  'plan:fallback': PlanFallbackEvent;
  'plan:regenerated': PlanGeneratedEvent;
  'plan:updated': PlanUpdatedEvent;
  'commit:created': CommitCreatedEvent;
}

export type TimelineEventName = keyof TimelineEventMap;
