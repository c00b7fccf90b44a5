import { describe, it, expect, vi } from 'vitest';
import { Test } from '@nestjs/testing';
import { StorageHealthIndicator } from './storage.indicator';
import { StorageReclaimerService } from '../../storage/services/storage-reclaimer.service';
import type { StorageUsage } from '../../storage/interfaces/storage.interface';

const createIndicator = async (usage: () => Promise<StorageUsage>) => {
  const module = await Test.createTestingModule({
    providers: [
      StorageHealthIndicator,
      { provide: StorageReclaimerService, useValue: { usage: vi.fn(usage) } },
    ],
  }).compile();
  return module.get(StorageHealthIndicator);
};

describe('StorageHealthIndicator', () => {
  it('is up within the budget', async () => {
    const indicator = await createIndicator(async () => ({
      usedBytes: 512,
      budgetBytes: 1024,
      fileCount: 2,
      percentUsed: 50,
    }));

    await expect(indicator.isHealthy('storage')).resolves.toEqual({
      storage: {
        status: 'up',
        usedBytes: 512,
        budgetBytes: 1024,
        fileCount: 2,
        percentUsed: 50,
      },
    });
  });

  it('is down while usage exceeds the budget between reclamation passes', async () => {
    const indicator = await createIndicator(async () => ({
      usedBytes: 2048,
      budgetBytes: 1024,
      fileCount: 3,
      percentUsed: 200,
    }));

    const result = await indicator.isHealthy('storage');

    expect(result.storage.status).toBe('down');
  });

  it('is down when the media directory cannot be read', async () => {
    const indicator = await createIndicator(async () => {
      throw new Error('EACCES: permission denied');
    });

    await expect(indicator.isHealthy('storage')).resolves.toEqual({
      storage: { status: 'down', message: 'EACCES: permission denied' },
    });
  });
});
