// src/modules/transcode/transcode.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import transcodeConfig from '../../config/transcode.config';
import storageConfig from '../../config/storage.config';
import { ActiveAssetRegistry } from './services/active-asset.registry';
import { SegmentDirectoryService } from './services/segment-directory.service';
import { TranscodeSupervisorService } from './services/transcode-supervisor.service';
import { FfmpegProcessLauncher } from './ffmpeg/ffmpeg-process.handle';
import { PROCESS_LAUNCHER } from './interfaces/process-handle.interface';

@Module({
  imports: [
    ConfigModule.forFeature(transcodeConfig),
    ConfigModule.forFeature(storageConfig),
  ],
  providers: [
    ActiveAssetRegistry,
    SegmentDirectoryService,
    TranscodeSupervisorService,
    FfmpegProcessLauncher,
    // Abstract token used by the supervisor; tests swap in a fake process
    { provide: PROCESS_LAUNCHER, useExisting: FfmpegProcessLauncher },
  ],
  exports: [
    ActiveAssetRegistry,
    SegmentDirectoryService,
    TranscodeSupervisorService,
    FfmpegProcessLauncher,
  ],
})
export class TranscodeModule {}
