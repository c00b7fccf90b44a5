// src/config/transcode.config.ts
import { registerAs } from '@nestjs/config';

export default registerAs('transcode', () => ({
  // Empty means "whatever fluent-ffmpeg finds on PATH / FFMPEG_PATH"
  ffmpegPath: process.env.FFMPEG_PATH || '',
  ffprobePath: process.env.FFPROBE_PATH || '',

  verifyDelayMs: parseInt(process.env.TRANSCODE_VERIFY_DELAY_MS || '2000', 10),
  gracePeriodMs: parseInt(process.env.TRANSCODE_GRACE_PERIOD_MS || '5000', 10),

  // Number of stderr lines kept for failure reasons
  diagnosticTailLines: 20,

  hls: {
    segmentSeconds: parseInt(process.env.HLS_SEGMENT_SECONDS || '6', 10),
    listSize: parseInt(process.env.HLS_LIST_SIZE || '15', 10),
    initSeconds: 4,
    // File names the stream server depends on verbatim
    playlistName: 'playlist.m3u8',
    segmentPattern: 'segment_%03d.ts',
  },
}));
