import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { createLogger, newId, toErrorMessage } from '@lifeline/core';
import type { Commit, ICommitStore } from '@lifeline/core';
import { isMissingFile } from '../utils/debounced-writer.js';

const log = createLogger('FileCommitStore');

/**
 * Append-only commit log, one JSON object per line.
 *
 * `create` appends a line and only then caches the commit, so a failed write
 * leaves no trace. `delete` is reserved for cascades and rollbacks and
 * rewrites the file. Writes are chained so an append never interleaves with
 * a rewrite. Reads return copies, so a stored commit is never edited in place.
 */
export class FileCommitStore implements ICommitStore {
  private readonly filePath: string;
  private cache: Promise<Commit[]> | null = null;
  private writes: Promise<void> = Promise.resolve();

  constructor(baseDir: string) {
    this.filePath = join(baseDir, 'commits', 'commits.jsonl');
  }

  async create(input: Omit<Commit, 'id'>): Promise<Commit> {
    const commits = await this.loadCache();
    const commit: Commit = structuredClone({ ...input, id: newId() });
    await this.enqueue(async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, JSON.stringify(commit) + '\n', 'utf-8');
      commits.push(commit);
    });
    return structuredClone(commit);
  }

  async delete(commitId: string): Promise<void> {
    const commits = await this.loadCache();
    if (!commits.some((c) => c.id === commitId)) return;

    await this.enqueue(async () => {
      const remaining = commits.filter((c) => c.id !== commitId);
      const body = remaining.map((c) => JSON.stringify(c) + '\n').join('');
      await writeFile(this.filePath, body, 'utf-8');
      commits.splice(0, commits.length, ...remaining);
    });
  }

  async findById(commitId: string): Promise<Commit | null> {
    const commits = await this.loadCache();
    const commit = commits.find((c) => c.id === commitId);
    return commit ? structuredClone(commit) : null;
  }

  async findAll(): Promise<Commit[]> {
    const commits = await this.loadCache();
    return commits.map((c) => structuredClone(c));
  }

  async findByBranchId(branchId: string): Promise<Commit[]> {
    const commits = await this.loadCache();
    return commits.filter((c) => c.branchId === branchId).map((c) => structuredClone(c));
  }

  private enqueue(write: () => Promise<void>): Promise<void> {
    const next = this.writes.then(write);
    // keep the chain alive after a failed write; the caller still sees the rejection
    this.writes = next.catch((error: unknown) => {
      log.error(`Write to ${this.filePath} failed: ${toErrorMessage(error)}`);
    });
    return next;
  }

  private loadCache(): Promise<Commit[]> {
    this.cache ??= this.readLog().catch((error: unknown) => {
      this.cache = null;
      throw error;
    });
    return this.cache;
  }

  private async readLog(): Promise<Commit[]> {
    let data: string;
    try {
      data = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      return [];
    }

    const commits: Commit[] = [];
    const lines = data.split('\n').filter((l) => l.trim());
    for (const [index, line] of lines.entries()) {
      try {
        commits.push(JSON.parse(line));
      } catch (error) {
        log.warn(`Skipping malformed commit on line ${index + 1}: ${toErrorMessage(error)}`);
      }
    }
    return commits;
  }
}
