import {
  BranchNotFoundError,
  COMPLETION_COMMIT_MARKER,
  DEFAULT_MAX_DESCRIPTION_LENGTH,
  DEFAULT_MAX_NAME_LENGTH,
  Events,
  InvalidStateError,
  MASTER_BRANCH_DESCRIPTION,
  MASTER_BRANCH_NAME,
  MERGE_COMMIT_MARKER,
  MasterNotFoundError,
  NoTaskPlanError,
  ValidationError,
  createLogger,
  isMasterBranch,
  isMerged,
  orderTasks,
  planStateOf,
  toErrorMessage,
  withRepository,
} from '@lifeline/core';
import type {
  Branch,
  BranchFilter,
  BranchStatistics,
  BranchStatus,
  Commit,
  IBranchStore,
  IEventBus,
  ITaskPlanStore,
  PlanState,
  TaskItem,
  TaskPlan,
} from '@lifeline/core';
import type { AIFailurePolicy, GoalInput, TaskPlanGenerator } from '@lifeline/planner';
import type { CommitLedger } from './commit-ledger.js';
import type { ProgressTracker } from './progress-tracker.js';
import { KeyedQueue } from './utils/keyed-queue.js';

const log = createLogger('BranchLifecycle');

export interface BranchLimits {
  maxNameLength: number;
  maxDescriptionLength: number;
}

export interface BranchLifecycleDeps {
  branches: IBranchStore;
  plans: ITaskPlanStore;
  ledger: CommitLedger;
  tracker: ProgressTracker;
  generator: Pick<TaskPlanGenerator, 'generate'>;
  policy: AIFailurePolicy;
  eventBus?: IEventBus;
  /** Share with TaskPlanEditor so plan edits and transitions on one branch serialize. */
  queue?: KeyedQueue;
  limits?: Partial<BranchLimits>;
}

export interface CreatedBranch {
  branch: Branch;
  plan: TaskPlan;
  planSource: 'ai' | 'fallback';
}

export interface RegenerateOptions {
  signal?: AbortSignal;
  /** Keep user-added tasks, appended after the new AI tasks. Default replaces everything. */
  preserveManualTasks?: boolean;
}

/**
 * Owns branch status transitions and the lifecycle commits that go with them.
 *
 * Operations take a branch id and reload the branch inside the branch's queue
 * slot, so preconditions are always checked against the stored state.
 */
export class BranchLifecycleManager {
  private readonly branches: IBranchStore;
  private readonly plans: ITaskPlanStore;
  private readonly ledger: CommitLedger;
  private readonly tracker: ProgressTracker;
  private readonly generator: Pick<TaskPlanGenerator, 'generate'>;
  private readonly policy: AIFailurePolicy;
  private readonly eventBus?: IEventBus;
  private readonly queue: KeyedQueue;
  private readonly limits: BranchLimits;

  constructor(deps: BranchLifecycleDeps) {
    this.branches = deps.branches;
    this.plans = deps.plans;
    this.ledger = deps.ledger;
    this.tracker = deps.tracker;
    this.generator = deps.generator;
    this.policy = deps.policy;
    this.eventBus = deps.eventBus;
    this.queue = deps.queue ?? new KeyedQueue();
    this.limits = {
      maxNameLength: deps.limits?.maxNameLength ?? DEFAULT_MAX_NAME_LENGTH,
      maxDescriptionLength: deps.limits?.maxDescriptionLength ?? DEFAULT_MAX_DESCRIPTION_LENGTH,
    };
  }

  /** Returns the master branch, creating it on first run. */
  async ensureMasterBranch(): Promise<Branch> {
    return this.queue.run(MASTER_BRANCH_NAME, async () => {
      const existing = await withRepository('branch.findMaster', () => this.branches.findMaster());
      if (existing) return existing;

      const now = new Date().toISOString();
      const master = await withRepository('branch.create', () =>
        this.branches.create({
          name: MASTER_BRANCH_NAME,
          description: MASTER_BRANCH_DESCRIPTION,
          status: 'master',
          progress: 0,
          createdAt: now,
          updatedAt: now,
        }),
      );
      log.info('Created master branch', undefined, master.id);
      return master;
    });
  }

  async createBranch(name: string, description: string, timeframe?: string): Promise<CreatedBranch> {
    const goal = this.validateGoal(name, description, timeframe);

    // Nothing is stored until the plan is ready, so no branch is visible without one
    const outcome = await this.policy.generateWithFallback(goal, (signal) => this.generator.generate(goal, signal));
    const now = new Date().toISOString();

    const branch = await withRepository('branch.create', () =>
      this.branches.create({
        name: goal.title,
        description: goal.description,
        status: 'active',
        progress: 0,
        createdAt: now,
        updatedAt: now,
      }),
    );

    let plan: TaskPlan;
    try {
      plan = await withRepository('plan.create', () =>
        this.plans.create({ branchId: branch.id, createdAt: now, ...outcome.draft }),
      );
    } catch (error) {
      log.error(`Plan persistence failed, rolling back branch: ${toErrorMessage(error)}`, undefined, branch.id);
      await this.undo('branch.delete', () => this.branches.delete(branch.id));
      throw error;
    }

    log.info(`Created branch "${branch.name}" with ${outcome.source} plan`, undefined, branch.id);
    this.eventBus?.emit(Events.BRANCH_CREATED, { branch });
    if (outcome.source === 'ai') {
      this.eventBus?.emit(Events.PLAN_GENERATED, { branchId: branch.id, plan });
    } else {
      this.eventBus?.emit(Events.PLAN_FALLBACK, { branchId: branch.id, plan, reason: outcome.reason });
    }

    return { branch, plan, planSource: outcome.source };
  }

  async completeBranch(branchId: string): Promise<Branch> {
    return this.queue.run(branchId, async () => {
      const branch = await this.requireBranch(branchId);
      assertStatus(branch, 'complete', 'active');

      const now = new Date().toISOString();
      const completed = await withRepository('branch.update', () =>
        this.branches.update(branchId, { status: 'completed', completedAt: now, updatedAt: now }),
      );

      try {
        await this.ledger.append({
          branchId,
          message: `${COMPLETION_COMMIT_MARKER} ${branch.name}`,
          type: 'milestone',
          timestamp: now,
        });
      } catch (error) {
        log.error(`Completion commit failed, reverting status: ${toErrorMessage(error)}`, undefined, branchId);
        await this.undo('branch.update', () =>
          this.branches.update(branchId, {
            status: branch.status,
            completedAt: branch.completedAt,
            updatedAt: branch.updatedAt,
          }),
        );
        throw error;
      }

      log.info(`Completed branch "${branch.name}"`, undefined, branchId);
      this.eventBus?.emit(Events.BRANCH_COMPLETED, { branch: completed, previousStatus: branch.status });
      return completed;
    });
  }

  async abandonBranch(branchId: string): Promise<Branch> {
    return this.queue.run(branchId, async () => {
      const branch = await this.requireBranch(branchId);
      assertStatus(branch, 'abandon', 'active');

      const now = new Date().toISOString();
      const abandoned = await withRepository('branch.update', () =>
        this.branches.update(branchId, { status: 'abandoned', abandonedAt: now, updatedAt: now }),
      );

      log.info(`Abandoned branch "${branch.name}"`, undefined, branchId);
      this.eventBus?.emit(Events.BRANCH_ABANDONED, { branch: abandoned, previousStatus: branch.status });
      return abandoned;
    });
  }

  async reactivateBranch(branchId: string): Promise<Branch> {
    return this.queue.run(branchId, async () => {
      const branch = await this.requireBranch(branchId);
      assertStatus(branch, 'reactivate', 'abandoned');

      const reactivated = await withRepository('branch.update', () =>
        this.branches.update(branchId, {
          status: 'active',
          abandonedAt: undefined,
          updatedAt: new Date().toISOString(),
        }),
      );

      log.info(`Reactivated branch "${branch.name}"`, undefined, branchId);
      this.eventBus?.emit(Events.BRANCH_REACTIVATED, { branch: reactivated, previousStatus: branch.status });
      return reactivated;
    });
  }

  async mergeBranch(branchId: string): Promise<Branch> {
    return this.queue.run(branchId, async () => {
      const branch = await this.requireBranch(branchId);
      assertStatus(branch, 'merge', 'completed');
      if (isMerged(branch)) {
        throw new InvalidStateError('merge', branch.status, `Branch "${branch.name}" has already been merged`);
      }

      const master = await withRepository('branch.findMaster', () => this.branches.findMaster());
      if (!master) {
        throw new MasterNotFoundError();
      }

      const plan = await withRepository('plan.findByBranchId', () => this.plans.findByBranchId(branchId));
      const achievements = plan ? this.tracker.completedCount(plan) : 0;

      const now = new Date().toISOString();
      const merged = await withRepository('branch.update', () =>
        this.branches.update(branchId, { mergedAt: now, updatedAt: now }),
      );

      let mergeCommit: Commit;
      try {
        mergeCommit = await this.ledger.append({
          branchId: master.id,
          message: `${MERGE_COMMIT_MARKER} ${branch.name} (${achievements} achievements)`,
          type: 'milestone',
          timestamp: now,
        });
      } catch (error) {
        log.error(`Merge commit failed, reverting merge: ${toErrorMessage(error)}`, undefined, branchId);
        await this.undo('branch.update', () =>
          this.branches.update(branchId, { mergedAt: undefined, updatedAt: branch.updatedAt }),
        );
        throw error;
      }

      log.info(`Merged branch "${branch.name}" into master`, { achievements }, branchId);
      this.eventBus?.emit(Events.BRANCH_MERGED, { branch: merged, master, mergeCommit });
      return merged;
    });
  }

  /**
   * Ask the planner for a new plan and swap it in with one update. Transient
   * failures are retried; the final failure, or a cancellation, propagates
   * and leaves the stored plan as it was.
   */
  async regenerateTaskPlan(branchId: string, options: RegenerateOptions = {}): Promise<TaskPlan> {
    const { signal, preserveManualTasks = false } = options;

    return this.queue.run(branchId, async () => {
      const branch = await this.requireBranch(branchId);
      const current = await withRepository('plan.findByBranchId', () => this.plans.findByBranchId(branchId));
      if (!current) {
        throw new NoTaskPlanError(branchId);
      }

      const goal: GoalInput = { title: branch.name, description: branch.description };
      const draft = await this.policy.runWithRetry((s) => this.generator.generate(goal, s), signal);
      signal?.throwIfAborted();

      const tasks = preserveManualTasks ? appendManualTasks(draft.tasks, current.tasks) : draft.tasks;
      const now = new Date().toISOString();
      const plan = await withRepository('plan.update', () =>
        this.plans.update(current.id, {
          totalDuration: draft.totalDuration,
          isAIGenerated: draft.isAIGenerated,
          tasks,
          lastModifiedAt: now,
        }),
      );

      await this.refreshProgress(branchId, plan, now);

      log.info(`Regenerated plan with ${plan.tasks.length} tasks`, undefined, branchId);
      this.eventBus?.emit(Events.PLAN_REGENERATED, { branchId, plan });
      return plan;
    });
  }

  async getStatistics(branchId: string): Promise<BranchStatistics> {
    await this.requireBranch(branchId);
    const [state, commitCount] = await Promise.all([this.getPlanState(branchId), this.ledger.count(branchId)]);
    const summary = this.tracker.summarize(state);

    return {
      commitCount,
      totalTasks: summary.totalTasks,
      completedTasks: summary.completedTasks,
      progress: summary.progress,
      remainingEstimatedDuration: summary.remainingDuration,
      totalEstimatedDuration: summary.totalDuration,
    };
  }

  async getBranch(branchId: string): Promise<Branch> {
    return this.requireBranch(branchId);
  }

  async listBranches(filter?: BranchFilter): Promise<Branch[]> {
    return withRepository('branch.findAll', () => this.branches.findAll(filter));
  }

  async getPlanState(branchId: string): Promise<PlanState> {
    const plan = await withRepository('plan.findByBranchId', () => this.plans.findByBranchId(branchId));
    return planStateOf(plan);
  }

  /** Deletes a goal branch together with its plan and commits. */
  async deleteBranch(branchId: string): Promise<void> {
    return this.queue.run(branchId, async () => {
      const branch = await this.requireBranch(branchId);
      if (isMasterBranch(branch)) {
        throw new InvalidStateError('delete', branch.status, 'The master branch cannot be deleted');
      }

      const plan = await withRepository('plan.findByBranchId', () => this.plans.findByBranchId(branchId));
      if (plan) {
        await withRepository('plan.delete', () => this.plans.delete(plan.id));
      }
      const removed = await this.ledger.purge(branchId);
      await withRepository('branch.delete', () => this.branches.delete(branchId));

      log.info(`Deleted branch "${branch.name}" and ${removed} commits`, undefined, branchId);
      this.eventBus?.emit(Events.BRANCH_DELETED, { branchId });
    });
  }

  private validateGoal(name: string, description: string, timeframe?: string): GoalInput {
    const title = name.trim();
    if (!title) {
      throw new ValidationError('Branch name must not be empty', 'name');
    }
    if (title.length > this.limits.maxNameLength) {
      throw new ValidationError(`Branch name must be at most ${this.limits.maxNameLength} characters`, 'name');
    }
    const trimmedDescription = description.trim();
    if (trimmedDescription.length > this.limits.maxDescriptionLength) {
      throw new ValidationError(
        `Branch description must be at most ${this.limits.maxDescriptionLength} characters`,
        'description',
      );
    }
    return { title, description: trimmedDescription, timeframe };
  }

  private async requireBranch(branchId: string): Promise<Branch> {
    const branch = await withRepository('branch.findById', () => this.branches.findById(branchId));
    if (!branch) {
      throw new BranchNotFoundError(branchId);
    }
    return branch;
  }

  /**
   * `progress` is derived from the plan, which is already stored by now. A
   * failed refresh is logged and repaired by the next plan write.
   */
  private async refreshProgress(branchId: string, plan: TaskPlan, now: string): Promise<void> {
    try {
      await this.branches.update(branchId, { progress: this.tracker.progress(plan), updatedAt: now });
    } catch (error) {
      log.error(`Progress refresh failed after plan update: ${toErrorMessage(error)}`, undefined, branchId);
    }
  }

  /** Best-effort compensation; the original failure is what the caller sees. */
  private async undo(operation: string, call: () => Promise<unknown>): Promise<void> {
    try {
      await call();
    } catch (error) {
      log.error(`Rollback step ${operation} failed: ${toErrorMessage(error)}`);
    }
  }
}

function assertStatus(branch: Branch, operation: string, expected: BranchStatus): void {
  if (branch.status !== expected) {
    throw new InvalidStateError(
      operation,
      branch.status,
      `Cannot ${operation} branch "${branch.name}": status is ${branch.status}, expected ${expected}`,
    );
  }
}

function appendManualTasks(generated: TaskItem[], previous: TaskItem[]): TaskItem[] {
  const manual = orderTasks(previous).filter((t) => !t.isAIGenerated);
  const next = generated.reduce((max, t) => Math.max(max, t.orderIndex + 1), 0);
  return [...generated, ...manual.map((task, i) => ({ ...task, orderIndex: next + i }))];
}
