export * from './models/branch.js';
export * from './models/task-plan.js';
export * from './models/commit.js';
export type * from './ports/branch-store.js';
export type * from './ports/task-plan-store.js';
export type * from './ports/commit-store.js';
export type * from './ports/completion-provider.js';
export type * from './ports/event-bus.js';
export * from './events/index.js';
export * from './errors.js';
export * from './logger.js';
export * from './constants.js';
export { v4 as newId } from 'uuid';
