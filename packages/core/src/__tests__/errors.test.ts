import { describe, it, expect } from 'vitest';
import {
  BranchNotFoundError,
  LifeLineError,
  PlanValidationError,
  RepositoryError,
  ValidationError,
  toErrorMessage,
  withRepository,
} from '../errors.js';

describe('withRepository', () => {
  it('returns the call result', async () => {
    await expect(withRepository('branch.findById', async () => 42)).resolves.toBe(42);
  });

  it('wraps a plain failure in RepositoryError', async () => {
    const cause = new Error('EACCES');

    const error = await withRepository('branch.update', async () => {
      throw cause;
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RepositoryError);
    expect(error).toMatchObject({
      code: 'repository',
      operation: 'branch.update',
      message: 'branch.update failed: EACCES',
      cause,
    });
  });

  it('lets domain errors through unchanged', async () => {
    const original = new BranchNotFoundError('b-1');

    const error = await withRepository('branch.update', async () => {
      throw original;
    }).catch((e: unknown) => e);

    expect(error).toBe(original);
  });
});

describe('error classes', () => {
  it('name themselves after the concrete class', () => {
    const error = new PlanValidationError('Plan has no tasks', 'tasks');

    expect(error.name).toBe('PlanValidationError');
    expect(error.code).toBe('plan_validation');
    expect(error.field).toBe('tasks');
  });

  it('treat a plan validation failure as a validation error', () => {
    const error = new PlanValidationError('Plan has no tasks');

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toBeInstanceOf(LifeLineError);
  });
});

describe('toErrorMessage', () => {
  it.each([
    [new Error('boom'), 'boom'],
    ['plain text', 'plain text'],
    [404, '404'],
  ])('reads %o', (input, expected) => {
    expect(toErrorMessage(input)).toBe(expected);
  });
});
