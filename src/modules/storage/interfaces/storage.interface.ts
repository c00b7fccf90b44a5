// src/modules/storage/interfaces/storage.interface.ts

export interface MediaFileEntry {
  path: string;
  sizeBytes: number;
  mtimeMs: number;
}

export interface FailedDeletion {
  path: string;
  reason: string;
}

/** Outcome of one reclamation pass; recomputed from disk every time. */
export interface ReclaimResult {
  budgetBytes: number;
  totalBefore: number;
  totalAfter: number;
  /** Every file removed by the pass, idle purge included */
  deleted: string[];
  /** Files removed by the idle purge because of their age */
  expired: string[];
  failed: FailedDeletion[];
  protectedPath: string | null;
  overBudget: boolean;
}

export interface StorageUsage {
  usedBytes: number;
  budgetBytes: number;
  fileCount: number;
  percentUsed: number;
}
