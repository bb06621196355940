import { join } from 'node:path';
import { newId } from '@lifeline/core';
import type { ITaskPlanStore, TaskPlan } from '@lifeline/core';
import { DebouncedFileWriter, readJsonArray, writeJsonFile } from '../utils/debounced-writer.js';

/**
 * Task plans in one JSON file, indexed by id and by owning branch.
 * `update` swaps the whole record in the cache, so a reader never sees a
 * half-replaced task list. Callers always get copies.
 */
export class FileTaskPlanStore implements ITaskPlanStore {
  private readonly filePath: string;
  private cache: Promise<Map<string, TaskPlan>> | null = null;
  private readonly writer: DebouncedFileWriter;

  constructor(baseDir: string, flushDelayMs?: number) {
    this.filePath = join(baseDir, 'plans', 'plans.json');
    this.writer = new DebouncedFileWriter('task plans', () => this.flush(), flushDelayMs);
  }

  async create(input: Omit<TaskPlan, 'id'>): Promise<TaskPlan> {
    const plans = await this.loadCache();
    for (const plan of plans.values()) {
      if (plan.branchId === input.branchId) {
        throw new Error(`Branch ${input.branchId} already has a task plan`);
      }
    }
    const plan: TaskPlan = structuredClone({ ...input, id: newId() });
    plans.set(plan.id, plan);
    this.writer.schedule();
    return structuredClone(plan);
  }

  async update(planId: string, updates: Partial<TaskPlan>): Promise<TaskPlan> {
    const plans = await this.loadCache();
    const existing = plans.get(planId);
    if (!existing) {
      throw new Error(`Task plan not found: ${planId}`);
    }
    const updated: TaskPlan = structuredClone({
      ...existing,
      ...updates,
      id: planId,
      branchId: existing.branchId,
    });
    plans.set(planId, updated);
    this.writer.schedule();
    return structuredClone(updated);
  }

  async delete(planId: string): Promise<void> {
    const plans = await this.loadCache();
    if (plans.delete(planId)) {
      this.writer.schedule();
    }
  }

  async findById(planId: string): Promise<TaskPlan | null> {
    const plans = await this.loadCache();
    const plan = plans.get(planId);
    return plan ? structuredClone(plan) : null;
  }

  async findAll(): Promise<TaskPlan[]> {
    const plans = await this.loadCache();
    return Array.from(plans.values(), (p) => structuredClone(p));
  }

  async findByBranchId(branchId: string): Promise<TaskPlan | null> {
    const plans = await this.loadCache();
    for (const plan of plans.values()) {
      if (plan.branchId === branchId) return structuredClone(plan);
    }
    return null;
  }

  async flushNow(): Promise<void> {
    await this.writer.flushNow();
  }

  private loadCache(): Promise<Map<string, TaskPlan>> {
    this.cache ??= readJsonArray<TaskPlan>(this.filePath).then(
      (arr) => new Map(arr.map((p) => [p.id, p])),
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
