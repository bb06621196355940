import type { ChatMessage } from '@lifeline/core';
import type { GoalInput } from './types.js';

export function buildSystemPrompt(): string {
  const lines: string[] = [
    'You are a goal-planning assistant. You break large personal goals into concrete, executable task plans.',
    '',
    '## Principles',
    '1. Tasks are specific, measurable and actionable',
    '2. Estimate durations realistically, neither optimistic nor pessimistic',
    '3. Order tasks from easier to harder so difficulty ramps up',
    '4. Give practical execution tips',
    '5. The plan as a whole must be complete and feasible',
    '',
    'Respond with a single JSON object and nothing else:',
    '```json',
    '{',
    '  "totalDuration": "overall estimate, e.g. 6 weeks",',
    '  "tasks": [',
    '    {',
    '      "title": "task title",',
    '      "description": "what to do",',
    '      "timeScope": "daily | weekly | monthly",',
    '      "estimatedDuration": 60,',
    '      "orderIndex": 0,',
    '      "executionTips": "optional advice"',
    '    }',
    '  ]',
    '}',
    '```',
    '`estimatedDuration` is a whole number of minutes. `orderIndex` starts at 0.',
  ];
  return lines.join('\n');
}

export function buildTaskPlanPrompt(goal: GoalInput): string {
  const lines: string[] = [
    'Create a detailed task plan for this goal.',
    '',
    `Goal: ${goal.title}`,
    `Description: ${goal.description || '(none given)'}`,
  ];

  const timeframe = goal.timeframe?.trim();
  if (timeframe) {
    lines.push(`Target timeframe: ${timeframe}`);
  }

  lines.push(
    '',
    'Requirements:',
    '1. Split the goal into concrete, executable tasks',
    '2. Give each task a time scope (daily, weekly or monthly)',
    '3. Estimate each task in minutes',
    '4. Describe each task and add execution tips',
    '5. Keep a logical order between tasks',
    '',
    'Return strictly the JSON object, with no other text.',
  );

  return lines.join('\n');
}

export function buildTaskPlanMessages(goal: GoalInput): ChatMessage[] {
  return [
    { role: 'system', content: buildSystemPrompt() },
    { role: 'user', content: buildTaskPlanPrompt(goal) },
  ];
}
