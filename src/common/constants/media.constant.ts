// src/common/constants/media.constant.ts

export type MediaKind = 'video' | 'audio';

// MIME types accepted for streaming, as reported by magic-number sniffing.
// Several formats have more than one spelling across detectors.
export const SUPPORTED_FORMATS: Record<MediaKind, readonly string[]> = {
  video: [
    'video/mp4',
    'video/mpeg',
    'video/MP2P',
    'video/mp2t',
    'video/avi',
    'video/vnd.avi',
    'video/x-msvideo',
    'video/x-matroska',
    'video/webm',
    'video/quicktime',
    'video/x-flv',
  ],
  audio: [
    'audio/mpeg',
    'audio/wav',
    'audio/vnd.wave',
    'audio/x-wav',
    'audio/aac',
    'audio/ogg',
    'audio/opus',
    'audio/flac',
    'audio/x-flac',
    'audio/x-m4a',
    'audio/mp4',
  ],
};

/** Formats whose duration metadata is unreliable (VBR MP3). */
export const WIDE_PROBE_FORMATS: readonly string[] = ['audio/mpeg'];

export const HLS_CONTENT_TYPES = {
  PLAYLIST: 'application/vnd.apple.mpegurl',
  SEGMENT: 'video/mp2t',
} as const;

export const PLAYLIST_HEADER = '#EXTM3U';

// Normalized error messages
export const ERROR_MESSAGES = {
  FFMPEG_NOT_FOUND: 'Cannot find ffmpeg',
  FFPROBE_NOT_FOUND: 'Cannot find ffprobe',
  UNSUPPORTED_FORMAT: 'Unsupported media type',
  UNKNOWN_SIGNATURE: 'Unknown file signature',
};

export function getMediaKind(mimeType: string): MediaKind | null {
  if (SUPPORTED_FORMATS.video.includes(mimeType)) return 'video';
  if (SUPPORTED_FORMATS.audio.includes(mimeType)) return 'audio';
  return null;
}
