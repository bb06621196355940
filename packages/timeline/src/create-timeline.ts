import { createLogger, setLogLevel } from '@lifeline/core';
import type { IBranchStore, ICommitStore, ICompletionProvider, ITaskPlanStore } from '@lifeline/core';
import { EventBus } from '@lifeline/eventbus';
import { AIFailurePolicy, ChatCompletionClient, TaskPlanGenerator } from '@lifeline/planner';
import type { Sleep } from '@lifeline/planner';
import { BranchLifecycleManager } from './branch-lifecycle-manager.js';
import { CommitLedger } from './commit-ledger.js';
import { loadConfig } from './config.js';
import type { LifeLineConfig } from './config.js';
import { ProgressTracker } from './progress-tracker.js';
import { FileBranchStore } from './stores/file-branch-store.js';
import { FileCommitStore } from './stores/file-commit-store.js';
import { FileTaskPlanStore } from './stores/file-task-plan-store.js';
import { TaskPlanEditor } from './task-plan-editor.js';
import { KeyedQueue } from './utils/keyed-queue.js';

const log = createLogger('Timeline');

export interface TimelineStores {
  branches: IBranchStore;
  plans: ITaskPlanStore;
  commits: ICommitStore;
}

export interface TimelineOptions {
  /** Defaults to `loadConfig()` */
  config?: LifeLineConfig;
  /** Replaces the HTTP client built from `config.completion` */
  completion?: ICompletionProvider;
  /** Replaces the file stores under `config.dataDir` */
  stores?: Partial<TimelineStores>;
  eventBus?: EventBus;
  /** Backoff wait used between retries */
  sleep?: Sleep;
}

export interface Timeline {
  config: LifeLineConfig;
  eventBus: EventBus;
  stores: TimelineStores;
  manager: BranchLifecycleManager;
  editor: TaskPlanEditor;
  ledger: CommitLedger;
  tracker: ProgressTracker;
  /** Writes any pending file-store changes. Call before exit. */
  flush(): Promise<void>;
}

/**
 * Wire stores, planner and managers together, and make sure the master
 * branch exists.
 */
export async function createTimeline(options: TimelineOptions = {}): Promise<Timeline> {
  const config = options.config ?? loadConfig();
  setLogLevel(config.logLevel);

  const flushers: Array<() => Promise<void>> = [];
  const branches = options.stores?.branches ?? trackFlush(new FileBranchStore(config.dataDir), flushers);
  const plans = options.stores?.plans ?? trackFlush(new FileTaskPlanStore(config.dataDir), flushers);
  const commits = options.stores?.commits ?? new FileCommitStore(config.dataDir);
  const stores: TimelineStores = { branches, plans, commits };

  if (!options.completion && !config.completion.apiKey) {
    log.warn('No API key configured; new branches will start with a manual plan');
  }
  const completion =
    options.completion ??
    new ChatCompletionClient({
      baseUrl: config.completion.baseUrl,
      apiKey: config.completion.apiKey,
      timeoutMs: config.completion.timeoutMs,
    });

  const eventBus = options.eventBus ?? new EventBus();
  const queue = new KeyedQueue();
  const ledger = new CommitLedger(commits, eventBus);
  const tracker = new ProgressTracker();
  const generator = new TaskPlanGenerator(completion, {
    model: config.completion.model,
    temperature: config.completion.temperature,
    maxTokens: config.completion.maxTokens,
  });
  const policy = new AIFailurePolicy({
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.baseDelayMs,
    sleep: options.sleep,
  });

  const manager = new BranchLifecycleManager({
    branches,
    plans,
    ledger,
    tracker,
    generator,
    policy,
    eventBus,
    queue,
    limits: config.branch,
  });
  const editor = new TaskPlanEditor({ branches, plans, ledger, tracker, eventBus, queue });

  const master = await manager.ensureMasterBranch();
  log.info(`Timeline ready (master ${master.id.slice(0, 8)})`);

  return {
    config,
    eventBus,
    stores,
    manager,
    editor,
    ledger,
    tracker,
    flush: async () => {
      await Promise.all(flushers.map((flush) => flush()));
    },
  };
}

function trackFlush<S extends { flushNow(): Promise<void> }>(store: S, flushers: Array<() => Promise<void>>): S {
  flushers.push(() => store.flushNow());
  return store;
}
