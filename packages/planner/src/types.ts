export interface GoalInput {
  title: string;
  description: string;
  /** Free-form hint such as "3 months" */
  timeframe?: string;
}
