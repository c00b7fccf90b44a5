import { Injectable } from '@nestjs/common';
import { HealthIndicatorResult } from '@nestjs/terminus';
import { StorageReclaimerService } from '../../storage/services/storage-reclaimer.service';

@Injectable()
export class StorageHealthIndicator {
  constructor(private readonly reclaimer: StorageReclaimerService) {}

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    try {
      const usage = await this.reclaimer.usage();

      return {
        [key]: {
          // Usage can exceed the budget between reclamation passes
          status: usage.usedBytes <= usage.budgetBytes ? 'up' : 'down',
          ...usage,
        },
      };
    } catch (error) {
      return {
        [key]: {
          status: 'down',
          message: error instanceof Error ? error.message : 'Unknown error',
        },
      };
    }
  }
}
