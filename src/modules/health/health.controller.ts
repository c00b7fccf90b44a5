import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';

import { CoordinatorHealthIndicator } from './indicators/coordinator.indicator';
import { StorageHealthIndicator } from './indicators/storage.indicator';
import { TranscoderHealthIndicator } from './indicators/transcoder.indicator';

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly coordinatorIndicator: CoordinatorHealthIndicator,
    private readonly storageIndicator: StorageHealthIndicator,
    private readonly transcoderIndicator: TranscoderHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.coordinatorIndicator.isHealthy('coordinator'),
      () => this.storageIndicator.isHealthy('storage'),
      () => this.transcoderIndicator.isHealthy('transcoder'),
    ]);
  }

  @Get('coordinator')
  @HealthCheck()
  checkCoordinator() {
    return this.health.check([
      () => this.coordinatorIndicator.isHealthy('coordinator'),
    ]);
  }

  @Get('storage')
  @HealthCheck()
  checkStorage() {
    return this.health.check([() => this.storageIndicator.isHealthy('storage')]);
  }

  @Get('transcoder')
  @HealthCheck()
  checkTranscoder() {
    return this.health.check([
      () => this.transcoderIndicator.isHealthy('transcoder'),
    ]);
  }
}
