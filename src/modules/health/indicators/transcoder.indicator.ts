import { Injectable } from '@nestjs/common';
import { HealthIndicatorResult } from '@nestjs/terminus';
import { FfmpegProcessLauncher } from '../../transcode/ffmpeg/ffmpeg-process.handle';
import { TranscodeSupervisorService } from '../../transcode/services/transcode-supervisor.service';

@Injectable()
export class TranscoderHealthIndicator {
  constructor(
    private readonly launcher: FfmpegProcessLauncher,
    private readonly supervisor: TranscodeSupervisorService,
  ) {}

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const available = await this.launcher.isAvailable();
    const { state, sessionId } = this.supervisor.snapshot();

    return {
      [key]: {
        status: available ? 'up' : 'down',
        ffmpeg: available ? 'reachable' : 'not found',
        state,
        sessionId,
      },
    };
  }
}
