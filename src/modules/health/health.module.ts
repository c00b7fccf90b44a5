import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { CoordinatorHealthIndicator } from './indicators/coordinator.indicator';
import { StorageHealthIndicator } from './indicators/storage.indicator';
import { TranscoderHealthIndicator } from './indicators/transcoder.indicator';
import { QueueModule } from '../queue/queue.module';
import { StorageModule } from '../storage/storage.module';
import { TranscodeModule } from '../transcode/transcode.module';

@Module({
  imports: [TerminusModule, QueueModule, StorageModule, TranscodeModule],
  controllers: [HealthController],
  providers: [
    CoordinatorHealthIndicator,
    StorageHealthIndicator,
    TranscoderHealthIndicator,
  ],
})
export class HealthModule {}
