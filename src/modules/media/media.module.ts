// src/modules/media/media.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import storageConfig from '../../config/storage.config';
import { FileValidationService } from './services/file-validation.service';
import { MediaDownloaderService } from './services/media-downloader.service';

@Module({
  imports: [ConfigModule.forFeature(storageConfig)],
  providers: [FileValidationService, MediaDownloaderService],
  exports: [MediaDownloaderService],
})
export class MediaModule {}
