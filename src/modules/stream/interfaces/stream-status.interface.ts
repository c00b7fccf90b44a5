// src/modules/stream/interfaces/stream-status.interface.ts
import type { StorageReclaimedEvent } from '../../storage/events/storage.events';
import type { SupervisorSnapshot } from '../../transcode/interfaces/stream-session.interface';
import type { SessionEndedEvent } from '../../transcode/events/transcode.events';
import type { ItemStateChangedEvent } from '../../queue/events/queue.events';
import type { QueueItemState } from '../../queue/interfaces/queue-item.interface';

export interface CurrentItemStatus {
  id: string;
  name: string;
  state: QueueItemState;
  attempts: number;
}

export interface StreamStatus {
  running: boolean;
  currentItem: CurrentItemStatus | null;
  session: SupervisorSnapshot;
  currentMediaPath: string | null;
  /** Set only while a verified session is serving segments */
  playlistUrl: string | null;
  lastSession: SessionEndedEvent | null;
  lastReclaim: (StorageReclaimedEvent & { at: string }) | null;
  lastError: string | null;
  /** Newest first */
  recentTransitions: ItemStateChangedEvent[];
}
