// src/modules/queue/interfaces/queue-item.interface.ts

export type QueueItemState =
  | 'QUEUED'
  | 'ACQUIRING'
  | 'STREAMING'
  | 'COMPLETED'
  | 'FAILED';

export const TERMINAL_STATES: readonly QueueItemState[] = ['COMPLETED', 'FAILED'];

export interface QueueItem {
  id: string;
  name: string;
  /** Free text; a plain integer here is the playback duration in seconds */
  description: string;
  /** Order within the source; lower plays first */
  position: number;
  state: QueueItemState;
  attempts: number;
  lastAttemptAt: Date | null;
}
