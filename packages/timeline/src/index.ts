export { BranchLifecycleManager } from './branch-lifecycle-manager.js';
export type {
  BranchLifecycleDeps,
  BranchLimits,
  CreatedBranch,
  RegenerateOptions,
} from './branch-lifecycle-manager.js';
export { CommitLedger } from './commit-ledger.js';
export { ProgressTracker } from './progress-tracker.js';
export type { ProgressSummary } from './progress-tracker.js';
export { TaskPlanEditor } from './task-plan-editor.js';
export type { NewTaskInput, TaskChanges, TaskPlanEditorDeps } from './task-plan-editor.js';
export { CONFIG_FILE_NAME, DEFAULT_CONFIG, loadConfig } from './config.js';
export type { BranchConfig, CompletionConfig, FileConfig, LifeLineConfig, RetryConfig } from './config.js';
export { createTimeline } from './create-timeline.js';
export type { Timeline, TimelineOptions, TimelineStores } from './create-timeline.js';
export { FileBranchStore } from './stores/file-branch-store.js';
export { FileTaskPlanStore } from './stores/file-task-plan-store.js';
export { FileCommitStore } from './stores/file-commit-store.js';
export { KeyedQueue } from './utils/keyed-queue.js';
