// src/modules/transcode/ffmpeg/ffmpeg-presets.ts
import * as path from 'path';
import { WIDE_PROBE_FORMATS } from '../../../common/constants/media.constant';
import type { MediaAsset } from '../../../common/interfaces/media-asset.interface';
import type { TranscodeInvocation } from '../interfaces/process-handle.interface';

export interface HlsOptions {
  segmentSeconds: number;
  listSize: number;
  initSeconds: number;
  playlistName: string;
  segmentPattern: string;
}

const VIDEO_OUTPUT = [
  '-c:v', 'libx264',
  '-preset', 'veryfast',
  '-tune', 'zerolatency',
  '-profile:v', 'main',
  '-level', '3.1',
  '-crf', '23',
  '-bufsize', '8192k',
  '-maxrate', '4096k',
  '-c:a', 'aac',
  '-b:a', '128k',
  '-ar', '44100',
];

// VBR MP3 needs a wider probe window, and resampling to keep audio in sync
const WIDE_PROBE_INPUT = ['-analyzeduration', '10M', '-probesize', '10M'];

const WIDE_PROBE_AUDIO_OUTPUT = [
  '-c:a', 'aac',
  '-b:a', '192k',
  '-ar', '44100',
  '-af', 'aresample=async=1000',
  '-ac', '2',
  '-map', '0:a',
];

const AUDIO_OUTPUT = ['-c:a', 'aac', '-b:a', '192k', '-ar', '44100', '-vn'];

export const buildHlsOptions = (
  segmentDir: string,
  hls: HlsOptions,
): string[] => [
  '-f', 'hls',
  '-hls_time', String(hls.segmentSeconds),
  '-hls_list_size', String(hls.listSize),
  '-hls_flags', 'delete_segments+independent_segments+append_list',
  '-hls_segment_type', 'mpegts',
  '-hls_init_time', String(hls.initSeconds),
  '-hls_playlist_type', 'event',
  '-hls_segment_filename', path.join(segmentDir, hls.segmentPattern),
];

/**
 * Builds the ffmpeg invocation for one asset.
 * Output names are fixed: the stream server serves them verbatim.
 */
export function buildTranscodeInvocation(
  asset: MediaAsset,
  segmentDir: string,
  hls: HlsOptions,
): TranscodeInvocation {
  const wideProbe =
    asset.kind === 'audio' && WIDE_PROBE_FORMATS.includes(asset.format);

  let codecOptions: string[];
  if (asset.kind === 'video') {
    codecOptions = VIDEO_OUTPUT;
  } else if (wideProbe) {
    codecOptions = WIDE_PROBE_AUDIO_OUTPUT;
  } else {
    codecOptions = AUDIO_OUTPUT;
  }

  return {
    inputPath: asset.path,
    inputOptions: wideProbe ? [...WIDE_PROBE_INPUT] : [],
    outputOptions: [...codecOptions, ...buildHlsOptions(segmentDir, hls)],
    outputPath: path.join(segmentDir, hls.playlistName),
  };
}
