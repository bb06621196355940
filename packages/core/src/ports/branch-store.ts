import type { Branch, BranchFilter } from '../models/branch.js';

export interface IBranchStore {
  create(branch: Omit<Branch, 'id'>): Promise<Branch>;
  update(branchId: string, updates: Partial<Branch>): Promise<Branch>;
  delete(branchId: string): Promise<void>;
  findById(branchId: string): Promise<Branch | null>;
  findAll(filter?: BranchFilter): Promise<Branch[]>;
  findMaster(): Promise<Branch | null>;
}
