// src/modules/queue/events/queue.events.ts
// Emitted via EventEmitter2 with QUEUE_EVENTS.ITEM_STATE_CHANGED.
import type { QueueItemState } from '../interfaces/queue-item.interface';

export interface ItemStateChangedEvent {
  itemId: string;
  name: string;
  from: QueueItemState;
  to: QueueItemState;
  attempts: number;
  detail?: string;
  at: string;
}
