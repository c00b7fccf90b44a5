import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';

import { HealthModule } from './modules/health/health.module';
import { MediaModule } from './modules/media/media.module';
import { QueueModule } from './modules/queue/queue.module';
import { StorageModule } from './modules/storage/storage.module';
import { StreamModule } from './modules/stream/stream.module';
import { TranscodeModule } from './modules/transcode/transcode.module';

// Configs
import coordinatorConfig from './config/coordinator.config';
import serverConfig from './config/server.config';
import storageConfig from './config/storage.config';
import transcodeConfig from './config/transcode.config';
import trelloConfig from './config/trello.config';
import { validateEnvironment } from './config/env.validation';

@Module({
  imports: [
    // ========================================================================
    // 1. INFRASTRUCTURE & CONFIGURATION
    // ========================================================================
    ConfigModule.forRoot({
      isGlobal: true,
      load: [
        coordinatorConfig,
        serverConfig,
        storageConfig,
        transcodeConfig,
        trelloConfig,
      ],
      envFilePath: '.env',
      validate: validateEnvironment,
    }),

    // Domain events: queue transitions, session lifecycle, reclamation
    EventEmitterModule.forRoot({
      global: true,
      wildcard: false,
      delimiter: '.',
      maxListeners: 20,
      verboseMemoryLeak: true,
    }),

    // ========================================================================
    // 2. STREAMING CORE
    // ========================================================================
    TranscodeModule,
    MediaModule,
    StorageModule,
    QueueModule,

    // ========================================================================
    // 3. HTTP SURFACE
    // ========================================================================
    StreamModule,
    HealthModule,
  ],
})
export class AppModule {}
