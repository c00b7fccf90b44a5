// src/modules/queue/interfaces/queue-source.interface.ts
import type { AttachmentRef } from '../../../common/interfaces/attachment.interface';
import type { QueueItem, QueueItemState } from './queue-item.interface';

export const QUEUE_SOURCE = Symbol('QUEUE_SOURCE');

/**
 * The board that holds the queue. It owns list membership; the
 * coordinator owns states and attempt counts.
 */
export interface QueueSource {
  /** Items waiting to play, in source order. */
  listEligibleItems(): Promise<QueueItem[]>;
  /** Mirrors a transition; `detail` carries the failure reason. */
  reportState(
    item: QueueItem,
    state: QueueItemState,
    detail?: string,
  ): Promise<void>;
  getAttachment(item: QueueItem): Promise<AttachmentRef | null>;
}
