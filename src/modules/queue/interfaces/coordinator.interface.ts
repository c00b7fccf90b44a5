// src/modules/queue/interfaces/coordinator.interface.ts
import type { QueueItem } from './queue-item.interface';

export interface LoopError {
  message: string;
  at: string;
}

export interface CoordinatorSnapshot {
  running: boolean;
  stopping: boolean;
  currentItem: QueueItem | null;
  /** Items the coordinator has seen and not yet settled */
  items: QueueItem[];
  lastReclaimAt: string | null;
  lastError: LoopError | null;
  consecutiveErrors: number;
}
