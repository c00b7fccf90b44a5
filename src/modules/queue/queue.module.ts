// src/modules/queue/queue.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import coordinatorConfig from '../../config/coordinator.config';
import trelloConfig from '../../config/trello.config';
import { MediaModule } from '../media/media.module';
import { StorageModule } from '../storage/storage.module';
import { TranscodeModule } from '../transcode/transcode.module';
import { QUEUE_SOURCE } from './interfaces/queue-source.interface';
import { QueueCoordinatorService } from './services/queue-coordinator.service';
import { TrelloQueueSource } from './sources/trello-queue-source.service';

@Module({
  imports: [
    ConfigModule.forFeature(coordinatorConfig),
    ConfigModule.forFeature(trelloConfig),
    MediaModule,
    TranscodeModule,
    StorageModule,
  ],
  providers: [
    QueueCoordinatorService,
    { provide: QUEUE_SOURCE, useClass: TrelloQueueSource },
  ],
  exports: [QueueCoordinatorService],
})
export class QueueModule {}
