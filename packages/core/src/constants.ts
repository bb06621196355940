/** Marker that opens the milestone commit written when a branch is completed. */
export const COMPLETION_COMMIT_MARKER = '🎉 Completed goal:';

/** Marker that opens the milestone commit written on master when a branch is merged. */
export const MERGE_COMMIT_MARKER = '🔀 Merged goal:';

export const TASK_COMPLETION_COMMIT_MARKER = '✅ Completed task:';

/** totalDuration sentinel of plans that were not produced by the AI planner */
export const MANUAL_PLAN_DURATION = 'manual';

export const MASTER_BRANCH_NAME = 'master';
export const MASTER_BRANCH_DESCRIPTION = 'Life main line';

export const DEFAULT_MAX_NAME_LENGTH = 100;
export const DEFAULT_MAX_DESCRIPTION_LENGTH = 500;
