// src/modules/stream/services/stream-status.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  QUEUE_EVENTS,
  STORAGE_EVENTS,
  STREAM_EVENTS,
} from '../../../common/constants/stream.constant';
import type { ItemStateChangedEvent } from '../../queue/events/queue.events';
import { QueueCoordinatorService } from '../../queue/services/queue-coordinator.service';
import type { StorageReclaimedEvent } from '../../storage/events/storage.events';
import type {
  SessionEndedEvent,
  SessionStartedEvent,
} from '../../transcode/events/transcode.events';
import { TranscodeSupervisorService } from '../../transcode/services/transcode-supervisor.service';
import type { StreamStatus } from '../interfaces/stream-status.interface';
import { StreamFilesService } from './stream-files.service';

const RECENT_TRANSITIONS = 20;

/**
 * Read model for `GET /status`: live queries to the coordinator and the
 * supervisor, plus what the domain events left behind.
 */
@Injectable()
export class StreamStatusService {
  private readonly logger = new Logger(StreamStatusService.name);
  private readonly transitions: ItemStateChangedEvent[] = [];
  private lastSession: SessionEndedEvent | null = null;
  private lastReclaim: StreamStatus['lastReclaim'] = null;

  constructor(
    private readonly coordinator: QueueCoordinatorService,
    private readonly supervisor: TranscodeSupervisorService,
    private readonly files: StreamFilesService,
  ) {}

  @OnEvent(QUEUE_EVENTS.ITEM_STATE_CHANGED)
  handleItemStateChanged(event: ItemStateChangedEvent): void {
    this.transitions.unshift(event);
    if (this.transitions.length > RECENT_TRANSITIONS) {
      this.transitions.pop();
    }
  }

  @OnEvent(STREAM_EVENTS.SESSION_STARTED)
  handleSessionStarted(event: SessionStartedEvent): void {
    this.logger.log(`Now streaming ${event.kind}: ${event.mediaPath}`);
  }

  @OnEvent(STREAM_EVENTS.SESSION_ENDED)
  handleSessionEnded(event: SessionEndedEvent): void {
    this.lastSession = event;
  }

  @OnEvent(STORAGE_EVENTS.RECLAIMED)
  handleStorageReclaimed(event: StorageReclaimedEvent): void {
    this.lastReclaim = { ...event, at: new Date().toISOString() };
  }

  getStatus(): StreamStatus {
    const coordinator = this.coordinator.snapshot();
    const session = this.supervisor.snapshot();
    const item = coordinator.currentItem;

    return {
      running: coordinator.running,
      currentItem: item
        ? {
            id: item.id,
            name: item.name,
            state: item.state,
            attempts: item.attempts,
          }
        : null,
      session,
      currentMediaPath: this.supervisor.currentMediaPath(),
      playlistUrl: session.state === 'ACTIVE' ? this.files.playlistUrl : null,
      lastSession: this.lastSession,
      lastReclaim: this.lastReclaim,
      lastError: coordinator.lastError?.message ?? null,
      recentTransitions: [...this.transitions],
    };
  }
}
