import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_MAX_DESCRIPTION_LENGTH,
  DEFAULT_MAX_NAME_LENGTH,
  createLogger,
  isLogLevel,
  toErrorMessage,
} from '@lifeline/core';
import type { LogLevel } from '@lifeline/core';

const log = createLogger('Config');

export const CONFIG_FILE_NAME = 'lifeline.config.json';

export interface CompletionConfig {
  baseUrl: string;
  model: string;
  apiKey: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface RetryConfig {
  /** Retries after the first request */
  maxAttempts: number;
  baseDelayMs: number;
}

export interface BranchConfig {
  maxNameLength: number;
  maxDescriptionLength: number;
}

export interface LifeLineConfig {
  completion: CompletionConfig;
  retry: RetryConfig;
  branch: BranchConfig;
  /** Where the file stores keep their data */
  dataDir: string;
  logLevel: LogLevel;
}

const FileConfigSchema = z
  .object({
    completion: z
      .object({
        baseUrl: z.string().url(),
        model: z.string().min(1),
        apiKey: z.string(),
        temperature: z.number().min(0).max(2),
        maxTokens: z.number().int().positive(),
        timeoutMs: z.number().int().positive(),
      })
      .partial(),
    retry: z
      .object({
        maxAttempts: z.number().int().nonnegative(),
        baseDelayMs: z.number().nonnegative(),
      })
      .partial(),
    branch: z
      .object({
        maxNameLength: z.number().int().positive(),
        maxDescriptionLength: z.number().int().positive(),
      })
      .partial(),
    dataDir: z.string().min(1),
    logLevel: z.string(),
  })
  .partial();

/** Shape of `lifeline.config.json`: every section and field is optional. */
export type FileConfig = z.infer<typeof FileConfigSchema>;

export const DEFAULT_CONFIG: LifeLineConfig = {
  completion: {
    baseUrl: 'https://api.deepseek.com/v1',
    model: 'deepseek-chat',
    apiKey: '',
    temperature: 0.7,
    maxTokens: 2000,
    timeoutMs: 30_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1000,
  },
  branch: {
    maxNameLength: DEFAULT_MAX_NAME_LENGTH,
    maxDescriptionLength: DEFAULT_MAX_DESCRIPTION_LENGTH,
  },
  dataDir: join(homedir(), '.lifeline'),
  logLevel: 'info',
};

function readConfigFile(path: string): FileConfig {
  if (!existsSync(path)) {
    log.info(`No config file at ${path}, using defaults`);
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    log.warn(`Failed to parse ${path}, using defaults: ${toErrorMessage(error)}`);
    return {};
  }

  const result = FileConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    log.warn(`Invalid config in ${path}, using defaults: ${issues}`);
    return {};
  }
  log.info(`Loaded config from ${path}`);
  return result.data;
}

/**
 * Resolve configuration: defaults, then `lifeline.config.json`, then
 * environment. The API key comes from LIFELINE_API_KEY, then
 * DEEPSEEK_API_KEY, then the file.
 */
export function loadConfig(
  path: string = join(process.cwd(), CONFIG_FILE_NAME),
  env: NodeJS.ProcessEnv = process.env,
): LifeLineConfig {
  const fileConfig = readConfigFile(path);

  // Section-wise merge so a partial section keeps the remaining defaults
  const merged: LifeLineConfig = {
    completion: { ...DEFAULT_CONFIG.completion, ...fileConfig.completion },
    retry: { ...DEFAULT_CONFIG.retry, ...fileConfig.retry },
    branch: { ...DEFAULT_CONFIG.branch, ...fileConfig.branch },
    dataDir: fileConfig.dataDir ?? DEFAULT_CONFIG.dataDir,
    logLevel: DEFAULT_CONFIG.logLevel,
  };

  if (fileConfig.logLevel !== undefined) {
    if (isLogLevel(fileConfig.logLevel)) {
      merged.logLevel = fileConfig.logLevel;
    } else {
      log.warn(`Ignoring unknown log level "${fileConfig.logLevel}"`);
    }
  }

  const apiKey = env.LIFELINE_API_KEY || env.DEEPSEEK_API_KEY;
  if (apiKey) {
    merged.completion.apiKey = apiKey;
  }
  if (env.LIFELINE_DATA_DIR) {
    merged.dataDir = env.LIFELINE_DATA_DIR;
  }
  if (isLogLevel(env.LIFELINE_LOG_LEVEL)) {
    merged.logLevel = env.LIFELINE_LOG_LEVEL;
  }

  log.info(`Config resolved: model=${merged.completion.model}, dataDir=${merged.dataDir}, logLevel=${merged.logLevel}`);
  return merged;
}
