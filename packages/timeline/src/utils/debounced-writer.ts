import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger, toErrorMessage } from '@lifeline/core';

const log = createLogger('DebouncedWriter');

/**
 * Coalesces bursts of store mutations into one disk write.
 *
 * Trailing-edge debounce: every `schedule()` pushes the flush back by
 * `delayMs`, so the file is written once the burst settles. A failed
 * background flush is logged and leaves the in-memory state authoritative;
 * `flushNow()` surfaces the failure to the caller instead.
 */
export class DebouncedFileWriter {
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly label: string,
    private readonly flush: () => Promise<void>,
    private readonly delayMs: number = 500,
  ) {}

  schedule(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush().catch((error: unknown) => {
        log.error(`Background flush of ${this.label} failed: ${toErrorMessage(error)}`);
      });
    }, this.delayMs);
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Write immediately, cancelling any pending timer. */
  async flushNow(): Promise<void> {
    this.cancel();
    await this.flush();
  }

  get pending(): boolean {
    return this.timer !== null;
  }
}

/** Ensure the parent directory exists, then write pretty-printed JSON. */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Read a JSON array written by `writeJsonFile`. A missing file reads as empty. */
export async function readJsonArray<T>(filePath: string): Promise<T[]> {
  let data: string;
  try {
    data = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw error;
  }
  const parsed: unknown = JSON.parse(data);
  if (!Array.isArray(parsed)) {
    throw new Error(`Expected a JSON array in ${filePath}`);
  }
  return parsed;
}
