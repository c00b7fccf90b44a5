// src/modules/queue/services/queue-coordinator.service.ts
import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import coordinatorConfig from '../../../config/coordinator.config';
import { QUEUE_EVENTS } from '../../../common/constants/stream.constant';
import { parseDurationOverride } from '../../../common/utils/duration.util';
import { sleep, withTimeout } from '../../../common/utils/sleep.util';
import {
  AcquisitionFailureError,
  getErrorMessage,
  NoAttachmentError,
  SessionStoppedError,
  toStreamError,
  TranscodeRuntimeError,
  TranscodeStartFailureError,
} from '../../../shared/errors';
import { MediaDownloaderService } from '../../media/services/media-downloader.service';
import { StorageReclaimerService } from '../../storage/services/storage-reclaimer.service';
import {
  describeExit,
  isAbnormalExit,
} from '../../transcode/interfaces/process-handle.interface';
import type { SessionEnd } from '../../transcode/interfaces/stream-session.interface';
import { ActiveAssetRegistry } from '../../transcode/services/active-asset.registry';
import { TranscodeSupervisorService } from '../../transcode/services/transcode-supervisor.service';
import type { ItemStateChangedEvent } from '../events/queue.events';
import type {
  CoordinatorSnapshot,
  LoopError,
} from '../interfaces/coordinator.interface';
import {
  QueueItem,
  QueueItemState,
  TERMINAL_STATES,
} from '../interfaces/queue-item.interface';
import { QUEUE_SOURCE, QueueSource } from '../interfaces/queue-source.interface';

const SHUTDOWN_DETAIL = 'Interrupted by shutdown';

/**
 * Drives the queue: one item at a time, from the board's queue list into
 * a single stream session.
 *
 * Item lifecycle: QUEUED → ACQUIRING → STREAMING → COMPLETED | FAILED.
 * Retryable failures go back to QUEUED and consume an attempt; the
 * attempt that reaches `maxAttempts` fails the item for good.
 */
@Injectable()
export class QueueCoordinatorService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(QueueCoordinatorService.name);

  /** State tags keyed by item id; the board only knows list membership */
  private readonly items = new Map<string, QueueItem>();
  /** Terminal states the board has not acknowledged yet, with their detail */
  private readonly unacknowledged = new Map<string, string | undefined>();

  private abort = new AbortController();
  private loop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private currentItem: QueueItem | null = null;
  private lastReclaimAt: Date | null = null;
  private lastError: LoopError | null = null;
  private consecutiveErrors = 0;

  constructor(
    @Inject(coordinatorConfig.KEY)
    private readonly config: ConfigType<typeof coordinatorConfig>,
    @Inject(QUEUE_SOURCE)
    private readonly source: QueueSource,
    private readonly downloader: MediaDownloaderService,
    private readonly supervisor: TranscodeSupervisorService,
    private readonly activeAssets: ActiveAssetRegistry,
    private readonly reclaimer: StorageReclaimerService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  onApplicationBootstrap() {
    if (this.config.autoStart) {
      this.start();
    } else {
      this.logger.log('Autostart disabled, coordinator idle');
    }
  }

  async onApplicationShutdown() {
    await this.stop();
  }

  /** Launches the loop in the background. No-op while it runs. */
  start(): void {
    if (this.loop) return;

    this.abort = new AbortController();
    this.loop = this.runLoop().finally(() => {
      this.loop = null;
    });
  }

  /**
   * Stops the loop, the in-flight download and the live session.
   * Returns once the loop ended or `stopTimeoutMs` elapsed.
   */
  stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return Promise.resolve();

    if (!this.stopping) {
      this.stopping = this.shutdown(loop).finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  /** Ends the current session early; the item counts as played. */
  async skip(): Promise<boolean> {
    const end = await this.supervisor.stop();
    if (end) {
      this.logger.log(
        `Skipped ${this.currentItem ? `'${this.currentItem.name}'` : 'current session'}`,
      );
    }
    return end !== null;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  snapshot(): CoordinatorSnapshot {
    return {
      running: this.loop !== null,
      stopping: this.stopping !== null,
      currentItem: this.currentItem ? { ...this.currentItem } : null,
      items: [...this.items.values()].map((item) => ({ ...item })),
      lastReclaimAt: this.lastReclaimAt?.toISOString() ?? null,
      lastError: this.lastError,
      consecutiveErrors: this.consecutiveErrors,
    };
  }

  // ========================================
  // LOOP
  // ========================================

  async runLoop(): Promise<void> {
    const { signal } = this.abort;
    this.logger.log('Queue coordinator started');

    while (!signal.aborted) {
      let delay = this.config.pollIntervalMs;
      try {
        await this.tick();
        this.consecutiveErrors = 0;
      } catch (error) {
        delay = this.config.errorBackoffMs;
        this.consecutiveErrors++;
        this.lastError = {
          message: getErrorMessage(error),
          at: new Date().toISOString(),
        };
        this.logger.error(
          `Queue iteration failed (${this.consecutiveErrors} in a row): ${this.lastError.message}`,
          error instanceof Error ? error.stack : undefined,
        );
      }
      await sleep(delay, signal);
    }

    this.logger.log('Queue coordinator stopped');
  }

  private async tick(): Promise<void> {
    const eligible = await this.refresh();

    if (!this.supervisor.isActive()) {
      const head = eligible.find((item) => item.state === 'QUEUED');
      if (head) {
        await this.processItem(head);
      }
    }
    if (this.abort.signal.aborted) return;

    const now = Date.now();
    if (
      !this.lastReclaimAt ||
      now - this.lastReclaimAt.getTime() >= this.config.cleanupIntervalMs
    ) {
      await this.reclaimer.reclaim();
      this.lastReclaimAt = new Date(now);
    }
  }

  /** Merges the board's queue list into the tracked tags, in board order. */
  private async refresh(): Promise<QueueItem[]> {
    const listed = await this.source.listEligibleItems();
    const seen = new Set<string>();

    const eligible = listed.map((fresh) => {
      seen.add(fresh.id);
      const tracked = this.items.get(fresh.id);
      if (!tracked) {
        this.items.set(fresh.id, fresh);
        return fresh;
      }
      tracked.name = fresh.name;
      tracked.description = fresh.description;
      tracked.position = fresh.position;
      return tracked;
    });

    // Settled cards have left the queue list, so retry by id
    for (const [id, detail] of [...this.unacknowledged]) {
      const item = this.items.get(id);
      if (item) {
        await this.reportTerminal(item, detail);
      } else {
        this.unacknowledged.delete(id);
      }
    }

    // Cards removed from the board by hand
    for (const [id, item] of this.items) {
      if (!seen.has(id) && item.state === 'QUEUED' && item !== this.currentItem) {
        this.items.delete(id);
      }
    }

    return eligible;
  }

  // ========================================
  // ITEM PROCESSING
  // ========================================

  async processItem(item: QueueItem): Promise<void> {
    const { signal } = this.abort;
    this.currentItem = item;
    this.logger.log(`Processing '${item.name}' (attempt ${item.attempts + 1})`);

    try {
      await this.transition(item, 'ACQUIRING');

      const attachment = await this.source.getAttachment(item);
      if (!attachment) {
        throw new NoAttachmentError(item.name);
      }

      const acquired = await this.downloader.acquire(attachment, signal);
      if (signal.aborted) {
        await this.transition(item, 'QUEUED', SHUTDOWN_DETAIL);
        return;
      }
      if (!acquired.ok) {
        throw new AcquisitionFailureError(acquired.reason, { itemId: item.id });
      }

      const { asset } = acquired;
      this.activeAssets.protect(asset.path);
      try {
        await this.transition(item, 'STREAMING');
        if (signal.aborted) {
          await this.transition(item, 'QUEUED', SHUTDOWN_DETAIL);
          return;
        }

        const session = await this.supervisor.start(
          asset,
          parseDurationOverride(item.description),
        );
        // stop() may have run while the start was queued behind the lock
        if (signal.aborted) {
          await this.supervisor.stop();
        }

        await this.settle(item, await session.finished);
      } finally {
        this.activeAssets.release(asset.path);
      }
    } catch (error) {
      await this.handleFailure(item, error);
    } finally {
      this.currentItem = null;
    }
  }

  private async settle(item: QueueItem, end: SessionEnd): Promise<void> {
    switch (end.reason) {
      case 'stopped':
        if (this.abort.signal.aborted) {
          await this.transition(item, 'QUEUED', SHUTDOWN_DETAIL);
        } else {
          await this.transition(item, 'COMPLETED');
        }
        return;

      case 'failed':
        throw new TranscodeStartFailureError('Session failed', {
          itemId: item.id,
        });

      case 'exit':
        if (end.exit && isAbnormalExit(end.exit)) {
          const tail = end.diagnostics[end.diagnostics.length - 1];
          throw new TranscodeRuntimeError(
            `Transcoder exited abnormally (${describeExit(end.exit)})` +
              (tail ? `: ${tail}` : ''),
            { itemId: item.id, diagnostics: end.diagnostics },
          );
        }
        await this.transition(item, 'COMPLETED');
        return;

      case 'duration':
        await this.transition(item, 'COMPLETED');
        return;
    }
  }

  private async handleFailure(item: QueueItem, error: unknown): Promise<void> {
    const failure = toStreamError(error, 'Item processing failed', {
      itemId: item.id,
    });

    if (failure instanceof SessionStoppedError) {
      // The start was interrupted: a skip or our own shutdown
      if (this.abort.signal.aborted) {
        await this.transition(item, 'QUEUED', SHUTDOWN_DETAIL);
      } else {
        await this.transition(item, 'COMPLETED');
      }
      return;
    }

    if (!failure.retryable) {
      this.logger.error(`'${item.name}' failed: ${failure.message}`);
      await this.transition(item, 'FAILED', failure.message);
      return;
    }

    item.attempts++;
    item.lastAttemptAt = new Date();

    if (item.attempts >= this.config.maxAttempts) {
      this.logger.error(
        `'${item.name}' failed after ${item.attempts} attempts: ${failure.message}`,
      );
      await this.transition(
        item,
        'FAILED',
        `Failed after ${item.attempts} attempts: ${failure.message}`,
      );
      return;
    }

    this.logger.warn(
      `'${item.name}' attempt ${item.attempts}/${this.config.maxAttempts} failed (${failure.code}): ${failure.message}`,
    );
    await this.transition(item, 'QUEUED', failure.message);
  }

  // ========================================
  // TRANSITIONS
  // ========================================

  private async transition(
    item: QueueItem,
    to: QueueItemState,
    detail?: string,
  ): Promise<void> {
    const from = item.state;
    item.state = to;

    if (TERMINAL_STATES.includes(to)) {
      await this.reportTerminal(item, detail);
    } else {
      try {
        await this.source.reportState(item, to, detail);
      } catch (error) {
        this.logger.error(
          `Failed to report ${to} for '${item.name}': ${getErrorMessage(error)}`,
        );
      }
    }

    const event: ItemStateChangedEvent = {
      itemId: item.id,
      name: item.name,
      from,
      to,
      attempts: item.attempts,
      detail,
      at: new Date().toISOString(),
    };
    this.eventEmitter.emit(QUEUE_EVENTS.ITEM_STATE_CHANGED, event);
  }

  /** The tag is dropped once the board has the card in its final list. */
  private async reportTerminal(
    item: QueueItem,
    detail: string | undefined,
  ): Promise<void> {
    try {
      await this.source.reportState(item, item.state, detail);
      this.unacknowledged.delete(item.id);
      this.items.delete(item.id);
    } catch (error) {
      this.unacknowledged.set(item.id, detail);
      this.logger.error(
        `Failed to report ${item.state} for '${item.name}', will retry: ${getErrorMessage(error)}`,
      );
    }
  }

  // ========================================
  // SHUTDOWN
  // ========================================

  private async shutdown(loop: Promise<void>): Promise<void> {
    this.logger.log('Stopping queue coordinator');
    this.abort.abort();

    await this.supervisor.stop();

    const joined = await withTimeout(loop, this.config.stopTimeoutMs);
    if (!joined.done) {
      this.logger.warn(
        `Queue loop did not finish within ${this.config.stopTimeoutMs}ms`,
      );
    }
  }
}
