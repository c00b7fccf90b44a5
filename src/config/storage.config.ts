// src/config/storage.config.ts
import * as path from 'path';
import { registerAs } from '@nestjs/config';

export default registerAs('storage', () => ({
  mediaDir: path.resolve(process.env.MEDIA_DIR || 'downloaded_media'),
  segmentDir: path.resolve(process.env.HLS_DIR || 'hls_segments'),
  maxStorageBytes:
    parseInt(process.env.MAX_STORAGE_MB || '5000', 10) * 1024 * 1024,
  // 0 disables the age-based purge
  maxMediaAgeHours: parseInt(process.env.MAX_MEDIA_AGE_HOURS || '0', 10),
}));
