// src/modules/storage/events/storage.events.ts
// Emitted via EventEmitter2 with STORAGE_EVENTS.RECLAIMED.

export interface StorageReclaimedEvent {
  deletedCount: number;
  expiredCount: number;
  failedCount: number;
  freedBytes: number;
  totalAfter: number;
  overBudget: boolean;
}
