export type BranchStatus = 'active' | 'completed' | 'abandoned' | 'master';

export interface Branch {
  id: string;
  name: string;
  description: string;
  status: BranchStatus;
  /** Cached completion ratio of the branch's plan (0.0–1.0). Recomputed, never authoritative. */
  progress: number;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
  abandonedAt?: string;
  /** Set once the branch has been merged into master. Only ever set on completed branches. */
  mergedAt?: string;
}

export interface BranchFilter {
  status?: BranchStatus;
  merged?: boolean;
}

export interface BranchStatistics {
  commitCount: number;
  totalTasks: number;
  completedTasks: number;
  progress: number;
  remainingEstimatedDuration: number;
  totalEstimatedDuration: number;
}

export function isMasterBranch(branch: Branch): boolean {
  return branch.status === 'master';
}

export function isMerged(branch: Branch): boolean {
  return branch.mergedAt !== undefined;
}
