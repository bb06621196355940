export type CommitType =
  | 'task_complete'
  | 'learning'
  | 'reflection'
  | 'milestone'
  | 'habit'
  | 'exercise'
  | 'reading'
  | 'creativity'
  | 'social'
  | 'health'
  | 'finance'
  | 'career'
  | 'relationship'
  | 'travel'
  | 'skill'
  | 'project'
  | 'idea'
  | 'challenge'
  | 'gratitude'
  | 'custom';

export type CommitCategory =
  | 'achievement'
  | 'learning'
  | 'personal'
  | 'lifestyle'
  | 'social'
  | 'experience'
  | 'professional'
  | 'growth'
  | 'other';

export const COMMIT_CATEGORIES: Record<CommitType, CommitCategory> = {
  task_complete: 'achievement',
  milestone: 'achievement',
  project: 'achievement',
  learning: 'learning',
  reading: 'learning',
  skill: 'learning',
  reflection: 'personal',
  idea: 'personal',
  gratitude: 'personal',
  habit: 'lifestyle',
  exercise: 'lifestyle',
  health: 'lifestyle',
  social: 'social',
  relationship: 'social',
  creativity: 'experience',
  travel: 'experience',
  finance: 'professional',
  career: 'professional',
  challenge: 'growth',
  custom: 'other',
};

export interface Commit {
  id: string;
  branchId: string;
  message: string;
  type: CommitType;
  relatedTaskId?: string;
  timestamp: string;
}

export interface CommitInput {
  branchId: string;
  message: string;
  type: CommitType;
  relatedTaskId?: string;
  /** Defaults to now */
  timestamp?: string;
}

export interface CommitStatistics {
  totalCommits: number;
  countsByType: Partial<Record<CommitType, number>>;
  countsByCategory: Partial<Record<CommitCategory, number>>;
  /** Commits per day over the trailing 30 days */
  commitFrequency: number;
  firstCommitAt?: string;
  lastCommitAt?: string;
}
