import type { Commit } from '../models/commit.js';

/** Commits are append-only, so there is no update. */
export interface ICommitStore {
  create(commit: Omit<Commit, 'id'>): Promise<Commit>;
  delete(commitId: string): Promise<void>;
  findById(commitId: string): Promise<Commit | null>;
  /** In insertion order */
  findAll(): Promise<Commit[]>;
  /** In insertion order */
  findByBranchId(branchId: string): Promise<Commit[]>;
}
