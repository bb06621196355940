export * from './types.js';
export * from './prompts.js';
export * from './response-parser.js';
export * from './chat-completion-client.js';
export * from './task-plan-generator.js';
export * from './ai-failure-policy.js';
