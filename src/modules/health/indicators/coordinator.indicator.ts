import { Injectable } from '@nestjs/common';
import { HealthIndicatorResult } from '@nestjs/terminus';
import { QueueCoordinatorService } from '../../queue/services/queue-coordinator.service';

@Injectable()
export class CoordinatorHealthIndicator {
  constructor(private readonly coordinator: QueueCoordinatorService) {}

  isHealthy(key: string): HealthIndicatorResult {
    const { running, stopping, currentItem, lastError, consecutiveErrors } =
      this.coordinator.snapshot();

    return {
      [key]: {
        status: running && !stopping ? 'up' : 'down',
        currentItem: currentItem?.name ?? null,
        consecutiveErrors,
        lastError: lastError?.message ?? null,
      },
    };
  }
}
