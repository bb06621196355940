import { newId } from '@lifeline/core';
import type {
  Branch,
  BranchFilter,
  Commit,
  CompletionOptions,
  CompletionRequest,
  IBranchStore,
  ICommitStore,
  ICompletionProvider,
  ITaskPlanStore,
  TaskPlan,
} from '@lifeline/core';
import { EventBus } from '@lifeline/eventbus';
import { AIFailurePolicy, TaskPlanGenerator } from '@lifeline/planner';
import type { Sleep } from '@lifeline/planner';
import { BranchLifecycleManager } from '../branch-lifecycle-manager.js';
import { CommitLedger } from '../commit-ledger.js';
import { ProgressTracker } from '../progress-tracker.js';
import { TaskPlanEditor } from '../task-plan-editor.js';
import { KeyedQueue } from '../utils/keyed-queue.js';

export class InMemoryBranchStore implements IBranchStore {
  readonly records = new Map<string, Branch>();

  async create(input: Omit<Branch, 'id'>): Promise<Branch> {
    const branch: Branch = { ...input, id: newId() };
    this.records.set(branch.id, branch);
    return structuredClone(branch);
  }

  async update(branchId: string, updates: Partial<Branch>): Promise<Branch> {
    const existing = this.records.get(branchId);
    if (!existing) throw new Error(`No branch ${branchId}`);
    const updated: Branch = { ...existing, ...updates, id: branchId };
    this.records.set(branchId, updated);
    return structuredClone(updated);
  }

  async delete(branchId: string): Promise<void> {
    this.records.delete(branchId);
  }

  async findById(branchId: string): Promise<Branch | null> {
    const branch = this.records.get(branchId);
    return branch ? structuredClone(branch) : null;
  }

  async findAll(filter?: BranchFilter): Promise<Branch[]> {
    return [...this.records.values()]
      .filter((b) => !filter?.status || b.status === filter.status)
      .filter((b) => filter?.merged === undefined || (b.mergedAt !== undefined) === filter.merged)
      .map((b) => structuredClone(b));
  }

  async findMaster(): Promise<Branch | null> {
    const master = [...this.records.values()].find((b) => b.status === 'master');
    return master ? structuredClone(master) : null;
  }
}

export class InMemoryTaskPlanStore implements ITaskPlanStore {
  readonly records = new Map<string, TaskPlan>();

  async create(input: Omit<TaskPlan, 'id'>): Promise<TaskPlan> {
    const plan: TaskPlan = { ...input, id: newId() };
    this.records.set(plan.id, plan);
    return structuredClone(plan);
  }

  async update(planId: string, updates: Partial<TaskPlan>): Promise<TaskPlan> {
    const existing = this.records.get(planId);
    if (!existing) throw new Error(`No plan ${planId}`);
    const updated: TaskPlan = { ...existing, ...updates, id: planId };
    this.records.set(planId, updated);
    return structuredClone(updated);
  }

  async delete(planId: string): Promise<void> {
    this.records.delete(planId);
  }

  async findById(planId: string): Promise<TaskPlan | null> {
    const plan = this.records.get(planId);
    return plan ? structuredClone(plan) : null;
  }

  async findAll(): Promise<TaskPlan[]> {
    return [...this.records.values()].map((p) => structuredClone(p));
  }

  async findByBranchId(branchId: string): Promise<TaskPlan | null> {
    const plan = [...this.records.values()].find((p) => p.branchId === branchId);
    return plan ? structuredClone(plan) : null;
  }
}

export class InMemoryCommitStore implements ICommitStore {
  readonly records: Commit[] = [];

  async create(input: Omit<Commit, 'id'>): Promise<Commit> {
    const commit: Commit = { ...input, id: newId() };
    this.records.push(commit);
    return structuredClone(commit);
  }

  async delete(commitId: string): Promise<void> {
    const index = this.records.findIndex((c) => c.id === commitId);
    if (index >= 0) this.records.splice(index, 1);
  }

  async findById(commitId: string): Promise<Commit | null> {
    const commit = this.records.find((c) => c.id === commitId);
    return commit ? structuredClone(commit) : null;
  }

  async findAll(): Promise<Commit[]> {
    return this.records.map((c) => structuredClone(c));
  }

  async findByBranchId(branchId: string): Promise<Commit[]> {
    return this.records.filter((c) => c.branchId === branchId).map((c) => structuredClone(c));
  }
}

/** Answers each request with the next scripted reply; an Error reply is thrown. */
export class ScriptedCompletion implements ICompletionProvider {
  readonly requests: CompletionRequest[] = [];
  private readonly replies: Array<string | Error>;

  constructor(...replies: Array<string | Error>) {
    this.replies = replies;
  }

  async complete(request: CompletionRequest, _options?: CompletionOptions): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('No scripted reply left');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export interface TaskSeed {
  title: string;
  minutes: number;
}

export const THREE_TASKS: TaskSeed[] = [
  { title: 'Pick a course', minutes: 30 },
  { title: 'Finish module one', minutes: 45 },
  { title: 'Build a small project', minutes: 60 },
];

export function planResponse(tasks: TaskSeed[] = THREE_TASKS, totalDuration = '6 weeks'): string {
  return JSON.stringify({
    totalDuration,
    tasks: tasks.map((t, i) => ({
      title: t.title,
      description: `Do: ${t.title}`,
      timeScope: 'weekly',
      estimatedDuration: t.minutes,
      orderIndex: i,
    })),
  });
}

export const noSleep: Sleep = async () => {};

export function createHarness(completion: ICompletionProvider = new ScriptedCompletion()) {
  const branches = new InMemoryBranchStore();
  const plans = new InMemoryTaskPlanStore();
  const commits = new InMemoryCommitStore();
  const eventBus = new EventBus();
  const queue = new KeyedQueue();
  const ledger = new CommitLedger(commits, eventBus);
  const tracker = new ProgressTracker();
  const generator = new TaskPlanGenerator(completion, { model: 'test-model' });
  const policy = new AIFailurePolicy({ sleep: noSleep });
  const manager = new BranchLifecycleManager({
    branches,
    plans,
    ledger,
    tracker,
    generator,
    policy,
    eventBus,
    queue,
  });
  const editor = new TaskPlanEditor({ branches, plans, ledger, tracker, eventBus, queue });

  return { branches, plans, commits, eventBus, queue, ledger, tracker, policy, manager, editor };
}
