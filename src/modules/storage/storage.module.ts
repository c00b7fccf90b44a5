// src/modules/storage/storage.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import storageConfig from '../../config/storage.config';
import { TranscodeModule } from '../transcode/transcode.module';
import { StorageReclaimerService } from './services/storage-reclaimer.service';

@Module({
  imports: [ConfigModule.forFeature(storageConfig), TranscodeModule],
  providers: [StorageReclaimerService],
  exports: [StorageReclaimerService],
})
export class StorageModule {}
