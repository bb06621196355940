import { join } from 'node:path';
import { BranchNotFoundError, newId } from '@lifeline/core';
import type { Branch, BranchFilter, IBranchStore } from '@lifeline/core';
import { DebouncedFileWriter, readJsonArray, writeJsonFile } from '../utils/debounced-writer.js';

/** Branches in one JSON file. Reads hand out copies; the cache is only changed through the store. */
export class FileBranchStore implements IBranchStore {
  private readonly filePath: string;
  private cache: Promise<Map<string, Branch>> | null = null;
  private readonly writer: DebouncedFileWriter;

  constructor(baseDir: string, flushDelayMs?: number) {
    this.filePath = join(baseDir, 'branches', 'branches.json');
    this.writer = new DebouncedFileWriter('branches', () => this.flush(), flushDelayMs);
  }

  async create(input: Omit<Branch, 'id'>): Promise<Branch> {
    const branches = await this.loadCache();
    const branch: Branch = structuredClone({ ...input, id: newId() });
    branches.set(branch.id, branch);
    this.writer.schedule();
    return structuredClone(branch);
  }

  async update(branchId: string, updates: Partial<Branch>): Promise<Branch> {
    const branches = await this.loadCache();
    const existing = branches.get(branchId);
    if (!existing) {
      throw new BranchNotFoundError(branchId);
    }
    const updated: Branch = structuredClone({ ...existing, ...updates, id: branchId });
    branches.set(branchId, updated);
    this.writer.schedule();
    return structuredClone(updated);
  }

  async delete(branchId: string): Promise<void> {
    const branches = await this.loadCache();
    if (branches.delete(branchId)) {
      this.writer.schedule();
    }
  }

  async findById(branchId: string): Promise<Branch | null> {
    const branches = await this.loadCache();
    const branch = branches.get(branchId);
    return branch ? structuredClone(branch) : null;
  }

  async findAll(filter?: BranchFilter): Promise<Branch[]> {
    const branches = await this.loadCache();
    let result = Array.from(branches.values());

    if (filter) {
      if (filter.status) {
        result = result.filter((b) => b.status === filter.status);
      }
      if (filter.merged !== undefined) {
        result = result.filter((b) => (b.mergedAt !== undefined) === filter.merged);
      }
    }

    return result.map((b) => structuredClone(b));
  }

  async findMaster(): Promise<Branch | null> {
    const branches = await this.loadCache();
    for (const branch of branches.values()) {
      if (branch.status === 'master') return structuredClone(branch);
    }
    return null;
  }

  /** Write pending changes now (e.g. on shutdown). */
  async flushNow(): Promise<void> {
    await this.writer.flushNow();
  }

  private loadCache(): Promise<Map<string, Branch>> {
    this.cache ??= readJsonArray<Branch>(this.filePath).then(
      (arr) => new Map(arr.map((b) => [b.id, b])),
      (error: unknown) => {
        this.cache = null;
        throw error;
      },
    );
    return this.cache;
  }

  private async flush(): Promise<void> {
    if (!this.cache) return;
    const records = await this.cache;
    await writeJsonFile(this.filePath, Array.from(records.values()));
  }
}
