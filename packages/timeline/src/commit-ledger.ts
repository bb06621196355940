import {
  COMMIT_CATEGORIES,
  Events,
  TASK_COMPLETION_COMMIT_MARKER,
  ValidationError,
  createLogger,
  withRepository,
} from '@lifeline/core';
import type {
  Commit,
  CommitCategory,
  CommitInput,
  CommitStatistics,
  CommitType,
  ICommitStore,
  IEventBus,
  TaskItem,
} from '@lifeline/core';

const log = createLogger('CommitLedger');

const DAY_MS = 24 * 60 * 60 * 1000;
const FREQUENCY_WINDOW_DAYS = 30;

/** Timestamp ascending; ties keep store (insertion) order. */
function chronological(commits: readonly Commit[]): Commit[] {
  return [...commits].sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}

/** UTC calendar day, e.g. "2026-03-14" */
function dayKey(time: number): string {
  return new Date(time).toISOString().slice(0, 10);
}

/**
 * Append-only record of progress entries per branch.
 * Knows nothing about branch status; lifecycle rules live in the manager.
 */
export class CommitLedger {
  constructor(
    private readonly store: ICommitStore,
    private readonly eventBus?: IEventBus,
  ) {}

  async append(input: CommitInput): Promise<Commit> {
    const message = input.message.trim();
    if (!message) {
      throw new ValidationError('Commit message must not be empty', 'message');
    }

    const commit = await withRepository('commit.create', () =>
      this.store.create({
        branchId: input.branchId,
        message,
        type: input.type,
        relatedTaskId: input.relatedTaskId,
        timestamp: input.timestamp ?? new Date().toISOString(),
      }),
    );

    log.debug(`Commit ${commit.type}: ${commit.message}`, undefined, commit.branchId);
    this.eventBus?.emit(Events.COMMIT_CREATED, { commit });
    return commit;
  }

  async recordTaskCompletion(branchId: string, task: Pick<TaskItem, 'id' | 'title'>): Promise<Commit> {
    return this.append({
      branchId,
      message: `${TASK_COMPLETION_COMMIT_MARKER} ${task.title}`,
      type: 'task_complete',
      relatedTaskId: task.id,
    });
  }

  async history(branchId: string): Promise<Commit[]> {
    const commits = await withRepository('commit.findByBranchId', () => this.store.findByBranchId(branchId));
    return chronological(commits);
  }

  async historyByType(branchId: string, type: CommitType): Promise<Commit[]> {
    const commits = await this.history(branchId);
    return commits.filter((c) => c.type === type);
  }

  async count(branchId: string): Promise<number> {
    const commits = await withRepository('commit.findByBranchId', () => this.store.findByBranchId(branchId));
    return commits.length;
  }

  /** Newest first, across all branches. */
  async recent(limit = 10): Promise<Commit[]> {
    const commits = await withRepository('commit.findAll', () => this.store.findAll());
    return chronological(commits).reverse().slice(0, limit);
  }

  /** Removes every commit of a branch. Only for cascading branch deletion. */
  async purge(branchId: string): Promise<number> {
    const commits = await withRepository('commit.findByBranchId', () => this.store.findByBranchId(branchId));
    for (const commit of commits) {
      await withRepository('commit.delete', () => this.store.delete(commit.id));
    }
    return commits.length;
  }

  async statistics(branchId: string, now: Date = new Date()): Promise<CommitStatistics> {
    const commits = await this.history(branchId);

    const countsByType: Partial<Record<CommitType, number>> = {};
    const countsByCategory: Partial<Record<CommitCategory, number>> = {};
    for (const commit of commits) {
      countsByType[commit.type] = (countsByType[commit.type] ?? 0) + 1;
      const category = COMMIT_CATEGORIES[commit.type];
      countsByCategory[category] = (countsByCategory[category] ?? 0) + 1;
    }

    const windowStart = now.getTime() - FREQUENCY_WINDOW_DAYS * DAY_MS;
    const inWindow = commits.filter((c) => {
      const time = Date.parse(c.timestamp);
      return time >= windowStart && time <= now.getTime();
    }).length;

    return {
      totalCommits: commits.length,
      countsByType,
      countsByCategory,
      commitFrequency: inWindow / FREQUENCY_WINDOW_DAYS,
      firstCommitAt: commits[0]?.timestamp,
      lastCommitAt: commits[commits.length - 1]?.timestamp,
    };
  }

  /** Consecutive UTC days with at least one commit, counting back from `now`'s day. */
  async streak(branchId: string, now: Date = new Date()): Promise<number> {
    const commits = await withRepository('commit.findByBranchId', () => this.store.findByBranchId(branchId));
    const days = new Set(commits.map((c) => dayKey(Date.parse(c.timestamp))));

    let streak = 0;
    let cursor = now.getTime();
    while (days.has(dayKey(cursor))) {
      streak++;
      cursor -= DAY_MS;
    }
    return streak;
  }
}
