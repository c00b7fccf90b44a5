import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import helmet from 'helmet';
import { AppModule } from './app.module';
import serverConfig from './config/server.config';
import { resolveLogLevels } from './config/env.validation';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  const server = app.get<ConfigType<typeof serverConfig>>(serverConfig.KEY);

  //Security headers; the player page loads HLS.js from a CDN and plays blob: media
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          'script-src': ["'self'", "'unsafe-inline'", 'https://cdn.jsdelivr.net'],
          'media-src': ["'self'", 'blob:'],
          'worker-src': ["'self'", 'blob:'],
        },
      },
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    }),
  );
  //CORS configuration
  app.enableCors({
    origin: server.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  // SIGINT/SIGTERM stop the coordinator and the transcoder
  app.enableShutdownHooks();

  await app.listen(server.port);
  logger.log(`🎵 Player: http://localhost:${server.port}/`);
  logger.log(`📺 Stream: http://localhost:${server.port}/stream/playlist.m3u8`);
  logger.log(`📊 Status: http://localhost:${server.port}/status`);
  logger.log(`🏥 Health Check: http://localhost:${server.port}/health`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start application',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
