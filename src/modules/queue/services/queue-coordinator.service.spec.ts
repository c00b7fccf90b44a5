import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Test } from '@nestjs/testing';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { QueueCoordinatorService } from './queue-coordinator.service';
import coordinatorConfig from '../../../config/coordinator.config';
import { QUEUE_EVENTS } from '../../../common/constants/stream.constant';
import type { AttachmentRef } from '../../../common/interfaces/attachment.interface';
import type { MediaAsset } from '../../../common/interfaces/media-asset.interface';
import { TranscodeStartFailureError } from '../../../shared/errors';
import type { AcquisitionResult } from '../../media/services/media-downloader.service';
import { MediaDownloaderService } from '../../media/services/media-downloader.service';
import { StorageReclaimerService } from '../../storage/services/storage-reclaimer.service';
import type {
  SessionEnd,
  StreamSession,
} from '../../transcode/interfaces/stream-session.interface';
import { ActiveAssetRegistry } from '../../transcode/services/active-asset.registry';
import { TranscodeSupervisorService } from '../../transcode/services/transcode-supervisor.service';
import type { QueueItem, QueueItemState } from '../interfaces/queue-item.interface';
import { QUEUE_SOURCE, QueueSource } from '../interfaces/queue-source.interface';

const ASSET: MediaAsset = {
  path: '/tmp/media/song_a1.mp3',
  kind: 'audio',
  format: 'audio/mpeg',
  sizeBytes: 4096,
};

const ATTACHMENT: AttachmentRef = {
  id: 'a1',
  name: 'song.mp3',
  url: 'https://files.test/song.mp3',
  headers: {},
};

const NORMAL_EXIT: SessionEnd = {
  reason: 'exit',
  exit: { code: 0, signal: null },
  diagnostics: [],
};

const card = (id: string, name: string, description = ''): QueueItem => ({
  id,
  name,
  description,
  position: 1,
  state: 'QUEUED',
  attempts: 0,
  lastAttemptAt: null,
});

/** In-memory board: moves follow the same list rules as the real one. */
class FakeSource implements QueueSource {
  queue: QueueItem[] = [];
  reports: [string, QueueItemState, string | undefined][] = [];
  attachment: AttachmentRef | null = ATTACHMENT;
  /** Next report of this state fails before reaching the board */
  rejectNext: QueueItemState | null = null;

  listEligibleItems = vi.fn(async () => this.queue.map((item) => ({ ...item })));

  getAttachment = vi.fn(async () => this.attachment);

  async reportState(item: QueueItem, state: QueueItemState, detail?: string) {
    if (state === this.rejectNext) {
      this.rejectNext = null;
      throw new Error('Request failed with status code 502');
    }
    this.reports.push([item.id, state, detail]);
    const existing = this.queue.find((queued) => queued.id === item.id);
    this.queue = this.queue.filter((queued) => queued.id !== item.id);
    if (state === 'QUEUED') {
      this.queue.push(existing ?? { ...item, state: 'QUEUED' });
    }
  }

  states(): QueueItemState[] {
    return this.reports.map(([, state]) => state);
  }
}

const createAcquire = () =>
  vi.fn(async (): Promise<AcquisitionResult> => ({ ok: true, asset: ASSET }));

type Outcome = SessionEnd | Error | 'hold';

/** Stands in for the transcoder; each start consumes the next outcome. */
class FakeSupervisor {
  outcomes: Outcome[] = [];
  private endSession: ((end: SessionEnd) => void) | null = null;

  start = vi.fn(
    async (asset: MediaAsset, durationOverrideSec?: number): Promise<StreamSession> => {
      const outcome = this.outcomes.shift() ?? NORMAL_EXIT;
      if (outcome instanceof Error) throw outcome;

      let resolve: (end: SessionEnd) => void = () => undefined;
      const finished = new Promise<SessionEnd>((r) => {
        resolve = r;
      });
      this.endSession = (end) => {
        this.endSession = null;
        resolve(end);
      };
      if (outcome !== 'hold') this.endSession(outcome);

      return {
        id: 'session-1',
        asset,
        startedAt: new Date(),
        durationOverrideSec,
        status: 'ACTIVE',
        finished,
      };
    },
  );

  stop = vi.fn(async (): Promise<SessionEnd | null> => {
    if (!this.endSession) return null;
    const end: SessionEnd = { reason: 'stopped', diagnostics: [] };
    this.endSession(end);
    return end;
  });

  isActive = () => this.endSession !== null;
}

describe('QueueCoordinatorService', () => {
  let coordinator: QueueCoordinatorService;
  let source: FakeSource;
  let supervisor: FakeSupervisor;
  let registry: ActiveAssetRegistry;
  let acquire: ReturnType<typeof createAcquire>;
  let reclaim: ReturnType<typeof vi.fn>;
  let emit: ReturnType<typeof vi.fn>;

  beforeEach(async () => {
    source = new FakeSource();
    supervisor = new FakeSupervisor();
    registry = new ActiveAssetRegistry();
    acquire = createAcquire();
    reclaim = vi.fn(async () => ({}));
    emit = vi.fn();

    const module = await Test.createTestingModule({
      providers: [
        QueueCoordinatorService,
        {
          provide: coordinatorConfig.KEY,
          useValue: {
            pollIntervalMs: 5,
            errorBackoffMs: 5,
            maxAttempts: 3,
            cleanupIntervalMs: 60_000,
            stopTimeoutMs: 1000,
            autoStart: false,
          },
        },
        { provide: QUEUE_SOURCE, useValue: source },
        { provide: MediaDownloaderService, useValue: { acquire } },
        { provide: TranscodeSupervisorService, useValue: supervisor },
        { provide: ActiveAssetRegistry, useValue: registry },
        { provide: StorageReclaimerService, useValue: { reclaim } },
        { provide: EventEmitter2, useValue: { emit } },
      ],
    }).compile();

    coordinator = module.get(QueueCoordinatorService);
  });

  afterEach(async () => {
    await coordinator.stop();
  });

  const stateEvents = () =>
    emit.mock.calls
      .filter(([name]) => name === QUEUE_EVENTS.ITEM_STATE_CHANGED)
      .map(([, event]) => event);

  it('streams the head of the queue and completes it', async () => {
    source.queue = [card('a', 'First'), card('b', 'Second')];

    coordinator.start();
    await vi.waitFor(() => expect(source.states()).toHaveLength(6));

    expect(source.reports).toEqual([
      ['a', 'ACQUIRING', undefined],
      ['a', 'STREAMING', undefined],
      ['a', 'COMPLETED', undefined],
      ['b', 'ACQUIRING', undefined],
      ['b', 'STREAMING', undefined],
      ['b', 'COMPLETED', undefined],
    ]);
    expect(acquire).toHaveBeenCalledWith(ATTACHMENT, expect.any(AbortSignal));
    expect(supervisor.start).toHaveBeenCalledWith(ASSET, undefined);
    expect(coordinator.snapshot().items).toEqual([]);
  });

  it('passes a numeric description as the duration override', async () => {
    source.queue = [card('a', 'First', ' 45 ')];

    coordinator.start();
    await vi.waitFor(() => expect(supervisor.start).toHaveBeenCalled());

    expect(supervisor.start).toHaveBeenCalledWith(ASSET, 45);
  });

  it('fails an item without attachment at once, without acquiring', async () => {
    source.queue = [card('a', 'First')];
    source.attachment = null;

    coordinator.start();
    await vi.waitFor(() => expect(source.states()).toContain('FAILED'));

    expect(source.reports).toEqual([
      ['a', 'ACQUIRING', undefined],
      ['a', 'FAILED', 'No attachment found on item: First'],
    ]);
    expect(acquire).not.toHaveBeenCalled();
    expect(stateEvents().at(-1)).toMatchObject({
      itemId: 'a',
      from: 'ACQUIRING',
      to: 'FAILED',
      attempts: 0,
    });
  });

  it('fails an item for good on the third failed attempt', async () => {
    source.queue = [card('a', 'First')];
    acquire.mockResolvedValue({ ok: false, reason: 'Network error: HTTP 500' });

    coordinator.start();
    await vi.waitFor(() => expect(source.states()).toContain('FAILED'));
    await coordinator.stop();

    expect(source.reports).toEqual([
      ['a', 'ACQUIRING', undefined],
      ['a', 'QUEUED', 'Network error: HTTP 500'],
      ['a', 'ACQUIRING', undefined],
      ['a', 'QUEUED', 'Network error: HTTP 500'],
      ['a', 'ACQUIRING', undefined],
      ['a', 'FAILED', 'Failed after 3 attempts: Network error: HTTP 500'],
    ]);
    expect(acquire).toHaveBeenCalledTimes(3);
    expect(stateEvents().at(-1)).toMatchObject({ to: 'FAILED', attempts: 3 });
  });

  it('requeues an item whose stream fails verification', async () => {
    source.queue = [card('a', 'First')];
    supervisor.outcomes = [
      new TranscodeStartFailureError('No HLS segments were written'),
      NORMAL_EXIT,
    ];

    coordinator.start();
    await vi.waitFor(() => expect(source.states()).toContain('COMPLETED'));

    expect(source.states()).toEqual([
      'ACQUIRING',
      'STREAMING',
      'QUEUED',
      'ACQUIRING',
      'STREAMING',
      'COMPLETED',
    ]);
    expect(stateEvents()[2]).toMatchObject({
      itemId: 'a',
      from: 'STREAMING',
      to: 'QUEUED',
      attempts: 1,
      detail: 'No HLS segments were written',
    });
  });

  it('counts an abnormal transcoder exit as a failed attempt', async () => {
    source.queue = [card('a', 'First')];
    supervisor.outcomes = [
      {
        reason: 'exit',
        exit: { code: 1, signal: null },
        diagnostics: ['Invalid data found when processing input'],
      },
    ];

    coordinator.start();
    await vi.waitFor(() => expect(source.states()).toContain('QUEUED'));

    expect(source.reports[2]).toEqual([
      'a',
      'QUEUED',
      'Transcoder exited abnormally (code 1): Invalid data found when processing input',
    ]);
  });

  it('retries a terminal report the board rejected once', async () => {
    source.queue = [card('a', 'First')];
    source.rejectNext = 'COMPLETED';

    coordinator.start();
    await vi.waitFor(() => expect(source.states()).toContain('COMPLETED'));

    expect(source.reports).toEqual([
      ['a', 'ACQUIRING', undefined],
      ['a', 'STREAMING', undefined],
      ['a', 'COMPLETED', undefined],
    ]);
    await vi.waitFor(() => expect(coordinator.snapshot().items).toEqual([]));
    expect(supervisor.start).toHaveBeenCalledTimes(1);
  });

  it('retries a rejected failure report with its reason', async () => {
    source.queue = [card('a', 'First')];
    source.attachment = null;
    source.rejectNext = 'FAILED';

    coordinator.start();
    await vi.waitFor(() => expect(source.states()).toContain('FAILED'));

    expect(source.reports.at(-1)).toEqual([
      'a',
      'FAILED',
      'No attachment found on item: First',
    ]);
    expect(source.getAttachment).toHaveBeenCalledTimes(1);
  });

  it('protects the asset while it streams and releases it afterwards', async () => {
    source.queue = [card('a', 'First')];
    supervisor.outcomes = ['hold'];

    coordinator.start();
    await vi.waitFor(() => expect(supervisor.start).toHaveBeenCalled());
    expect(registry.isProtected(ASSET.path)).toBe(true);

    await coordinator.skip();
    await vi.waitFor(() => expect(source.states()).toContain('COMPLETED'));
    expect(registry.current()).toBeNull();
  });

  it('completes an item that is skipped', async () => {
    source.queue = [card('a', 'First')];
    supervisor.outcomes = ['hold'];

    coordinator.start();
    await vi.waitFor(() => expect(supervisor.isActive()).toBe(true));

    await expect(coordinator.skip()).resolves.toBe(true);
    await vi.waitFor(() =>
      expect(source.reports.at(-1)).toEqual(['a', 'COMPLETED', undefined]),
    );
  });

  it('requeues the current item without an attempt when stopped mid-stream', async () => {
    source.queue = [card('a', 'First')];
    supervisor.outcomes = ['hold'];

    coordinator.start();
    await vi.waitFor(() => expect(supervisor.isActive()).toBe(true));

    await coordinator.stop();

    expect(source.reports.at(-1)).toEqual(['a', 'QUEUED', 'Interrupted by shutdown']);
    expect(stateEvents().at(-1)).toMatchObject({ to: 'QUEUED', attempts: 0 });
    expect(coordinator.isRunning()).toBe(false);
  });

  it('keeps looping after a failed iteration', async () => {
    source.queue = [card('a', 'First')];
    source.listEligibleItems.mockRejectedValueOnce(
      new Error('Request failed with status code 503'),
    );

    coordinator.start();
    await vi.waitFor(() => expect(source.states()).toContain('COMPLETED'));

    const snapshot = coordinator.snapshot();
    expect(snapshot.running).toBe(true);
    expect(snapshot.lastError?.message).toBe('Request failed with status code 503');
    expect(snapshot.consecutiveErrors).toBe(0);
  });

  it('reclaims storage on the first iteration and then per interval', async () => {
    coordinator.start();
    await vi.waitFor(() =>
      expect(source.listEligibleItems.mock.calls.length).toBeGreaterThan(3),
    );

    expect(reclaim).toHaveBeenCalledTimes(1);
    expect(coordinator.snapshot().lastReclaimAt).not.toBeNull();
  });

  it('treats stop as idempotent', async () => {
    coordinator.start();
    coordinator.start();

    await Promise.all([coordinator.stop(), coordinator.stop()]);
    await coordinator.stop();

    expect(coordinator.isRunning()).toBe(false);
    expect(supervisor.stop).toHaveBeenCalledTimes(1);
  });
});
