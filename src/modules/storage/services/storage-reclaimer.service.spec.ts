import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Test } from '@nestjs/testing';
import { EventEmitter2 } from '@nestjs/event-emitter';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StorageReclaimerService } from './storage-reclaimer.service';
import { ActiveAssetRegistry } from '../../transcode/services/active-asset.registry';
import storageConfig from '../../../config/storage.config';
import { STORAGE_EVENTS } from '../../../common/constants/stream.constant';

describe('StorageReclaimerService', () => {
  let mediaDir: string;
  let registry: ActiveAssetRegistry;
  let eventEmitter: { emit: ReturnType<typeof vi.fn> };

  const createService = async (budgetBytes: number, maxMediaAgeHours = 0) => {
    const module = await Test.createTestingModule({
      providers: [
        StorageReclaimerService,
        { provide: ActiveAssetRegistry, useValue: registry },
        { provide: EventEmitter2, useValue: eventEmitter },
        {
          provide: storageConfig.KEY,
          useValue: {
            mediaDir,
            segmentDir: path.join(mediaDir, '..', 'hls'),
            maxStorageBytes: budgetBytes,
            maxMediaAgeHours,
          },
        },
      ],
    }).compile();
    return module.get(StorageReclaimerService);
  };

  /** Writes `size` bytes with an mtime of `mtimeSec` seconds since the epoch. */
  const writeFile = async (name: string, size: number, mtimeSec: number) => {
    const filePath = path.join(mediaDir, name);
    await fs.promises.writeFile(filePath, Buffer.alloc(size));
    await fs.promises.utimes(filePath, mtimeSec, mtimeSec);
    return filePath;
  };

  const remaining = () => fs.readdirSync(mediaDir).sort();

  beforeEach(async () => {
    const root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'reclaim-'));
    mediaDir = path.join(root, 'media');
    await fs.promises.mkdir(mediaDir);
    registry = new ActiveAssetRegistry();
    eventEmitter = { emit: vi.fn() };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(path.dirname(mediaDir), { recursive: true, force: true });
  });

  it('does nothing while under budget', async () => {
    await writeFile('a.mp4', 40, 1000);
    await writeFile('b.mp4', 40, 2000);
    const service = await createService(100);

    const result = await service.reclaim();

    expect(result).toMatchObject({
      totalBefore: 80,
      totalAfter: 80,
      deleted: [],
      failed: [],
      overBudget: false,
    });
    expect(remaining()).toEqual(['a.mp4', 'b.mp4']);
  });

  it('deletes oldest first and stops once within budget', async () => {
    const oldest = await writeFile('a.mp4', 40, 1000);
    await writeFile('b.mp4', 40, 2000);
    const playing = await writeFile('c.mp4', 40, 3000);
    registry.protect(playing);
    const service = await createService(100);

    const result = await service.reclaim();

    expect(result.deleted).toEqual([oldest]);
    expect(result.totalBefore).toBe(120);
    expect(result.totalAfter).toBe(80);
    expect(result.overBudget).toBe(false);
    expect(result.protectedPath).toBe(playing);
    expect(remaining()).toEqual(['b.mp4', 'c.mp4']);
  });

  it('never deletes the active asset even when it is the oldest', async () => {
    const playing = await writeFile('a.mp4', 40, 1000);
    const next = await writeFile('b.mp4', 40, 2000);
    await writeFile('c.mp4', 40, 3000);
    registry.protect(playing);
    const service = await createService(100);

    const result = await service.reclaim();

    expect(result.deleted).toEqual([next]);
    expect(remaining()).toEqual(['a.mp4', 'c.mp4']);
  });

  it('reports over budget when only the active asset is left', async () => {
    const playing = await writeFile('a.mp4', 40, 1000);
    await writeFile('b.mp4', 40, 2000);
    registry.protect(playing);
    const service = await createService(30);

    const result = await service.reclaim();

    expect(result.totalAfter).toBe(40);
    expect(result.overBudget).toBe(true);
    expect(remaining()).toEqual(['a.mp4']);
  });

  it('logs a failed delete and continues with the next file', async () => {
    const stuck = await writeFile('a.mp4', 40, 1000);
    const second = await writeFile('b.mp4', 40, 2000);
    const third = await writeFile('c.mp4', 40, 3000);
    vi.spyOn(fs.promises, 'unlink').mockRejectedValueOnce(
      new Error('EBUSY: resource busy or locked'),
    );
    const service = await createService(50);

    const result = await service.reclaim();

    expect(result.failed).toEqual([
      { path: stuck, reason: 'EBUSY: resource busy or locked' },
    ]);
    expect(result.deleted).toEqual([second, third]);
    expect(result.totalAfter).toBe(40);
    expect(result.overBudget).toBe(false);
    expect(remaining()).toEqual(['a.mp4']);
  });

  it('purges idle files older than the max age, except the active asset', async () => {
    const stale = await writeFile('a.mp4', 10, 1000);
    const playing = await writeFile('b.mp4', 10, 2000);
    const nowSec = Math.floor(Date.now() / 1000);
    await writeFile('c.mp4', 10, nowSec);
    registry.protect(playing);
    const service = await createService(1000, 1);

    const result = await service.reclaim();

    expect(result.expired).toEqual([stale]);
    expect(result.deleted).toEqual([stale]);
    expect(remaining()).toEqual(['b.mp4', 'c.mp4']);
  });

  it('ignores partial downloads and directories', async () => {
    await writeFile('a.mp4', 40, 1000);
    await writeFile('b.mp4.part', 500, 500);
    await fs.promises.mkdir(path.join(mediaDir, 'nested'));
    const service = await createService(100);

    const result = await service.reclaim();

    expect(result.totalBefore).toBe(40);
    expect(result.deleted).toEqual([]);
    expect(remaining()).toEqual(['a.mp4', 'b.mp4.part', 'nested']);
  });

  it('emits the reclamation summary', async () => {
    await writeFile('a.mp4', 40, 1000);
    await writeFile('b.mp4', 40, 2000);
    const service = await createService(50);

    await service.reclaim();

    expect(eventEmitter.emit).toHaveBeenCalledWith(STORAGE_EVENTS.RECLAIMED, {
      deletedCount: 1,
      expiredCount: 0,
      failedCount: 0,
      freedBytes: 40,
      totalAfter: 40,
      overBudget: false,
    });
  });

  it('reports usage against the budget', async () => {
    await writeFile('a.mp4', 30, 1000);
    await writeFile('b.mp4', 20, 2000);
    const service = await createService(200);

    await expect(service.usage()).resolves.toEqual({
      usedBytes: 50,
      budgetBytes: 200,
      fileCount: 2,
      percentUsed: 25,
    });
  });
});
