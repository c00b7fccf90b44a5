// src/modules/stream/stream.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import serverConfig from '../../config/server.config';
import { QueueModule } from '../queue/queue.module';
import { TranscodeModule } from '../transcode/transcode.module';
import { StreamFilesService } from './services/stream-files.service';
import { StreamStatusService } from './services/stream-status.service';
import { StreamController } from './stream.controller';

@Module({
  imports: [ConfigModule.forFeature(serverConfig), QueueModule, TranscodeModule],
  controllers: [StreamController],
  providers: [StreamFilesService, StreamStatusService],
})
export class StreamModule {}
