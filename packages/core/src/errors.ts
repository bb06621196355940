import type { BranchStatus } from './models/branch.js';

export type ErrorCode =
  | 'validation'
  | 'plan_validation'
  | 'parsing'
  | 'ai_service'
  | 'invalid_state'
  | 'master_not_found'
  | 'no_task_plan'
  | 'branch_not_found'
  | 'task_not_found'
  | 'repository';

/** Base class for every failure the core hands to its callers. */
export abstract class LifeLineError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad user input: name/description length, empty commit message, bad task fields. */
export class ValidationError extends LifeLineError {
  readonly code: ErrorCode = 'validation';

  constructor(message: string, readonly field?: string) {
    super(message);
  }
}

/** The completion response decoded fine but describes an unusable plan. */
export class PlanValidationError extends ValidationError {
  override readonly code: ErrorCode = 'plan_validation';
}

/** The completion response could not be decoded into the plan schema. */
export class ParsingError extends LifeLineError {
  readonly code = 'parsing' as const;
}

export type AIServiceErrorKind =
  | 'network'
  | 'unauthorized'
  | 'rate_limited'
  | 'server_error'
  | 'bad_request';

export class AIServiceError extends LifeLineError {
  readonly code = 'ai_service' as const;

  constructor(
    readonly kind: AIServiceErrorKind,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class InvalidStateError extends LifeLineError {
  readonly code = 'invalid_state' as const;

  constructor(
    readonly operation: string,
    readonly from: BranchStatus,
    message: string,
  ) {
    super(message);
  }
}

export class MasterNotFoundError extends LifeLineError {
  readonly code = 'master_not_found' as const;

  constructor() {
    super('Master branch not found');
  }
}

export class NoTaskPlanError extends LifeLineError {
  readonly code = 'no_task_plan' as const;

  constructor(readonly branchId: string) {
    super(`Branch has no task plan: ${branchId}`);
  }
}

export class BranchNotFoundError extends LifeLineError {
  readonly code = 'branch_not_found' as const;

  constructor(readonly branchId: string) {
    super(`Branch not found: ${branchId}`);
  }
}

export class TaskNotFoundError extends LifeLineError {
  readonly code = 'task_not_found' as const;

  constructor(readonly taskId: string) {
    super(`Task not found: ${taskId}`);
  }
}

/** A persistence call failed. `operation` names the store call, e.g. "branch.update". */
export class RepositoryError extends LifeLineError {
  readonly code = 'repository' as const;

  constructor(readonly operation: string, cause: unknown) {
    super(`${operation} failed: ${toErrorMessage(cause)}`, { cause });
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run a store call, surfacing any failure as RepositoryError.
 * Errors that are already LifeLineErrors pass through untouched.
 */
export async function withRepository<T>(operation: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof LifeLineError) throw error;
    throw new RepositoryError(operation, error);
  }
}
