// src/modules/transcode/services/segment-directory.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import storageConfig from '../../../config/storage.config';
import transcodeConfig from '../../../config/transcode.config';
import { PLAYLIST_HEADER } from '../../../common/constants/media.constant';
import { getErrorMessage } from '../../../shared/errors';
import { isMissingFile } from '../../../common/utils/fs.util';

const OUTPUT_EXTENSIONS = ['.ts', '.m3u8', '.tmp'];

export interface SegmentVerification {
  ok: boolean;
  segmentCount: number;
  reason?: string;
}

/**
 * The directory ffmpeg writes HLS output into and the stream server reads from.
 */
@Injectable()
export class SegmentDirectoryService {
  private readonly logger = new Logger(SegmentDirectoryService.name);

  constructor(
    @Inject(storageConfig.KEY)
    private readonly storage: ConfigType<typeof storageConfig>,
    @Inject(transcodeConfig.KEY)
    private readonly transcode: ConfigType<typeof transcodeConfig>,
  ) {}

  get directory(): string {
    return this.storage.segmentDir;
  }

  get playlistPath(): string {
    return path.join(this.directory, this.transcode.hls.playlistName);
  }

  async ensureExists(): Promise<void> {
    await fs.promises.mkdir(this.directory, { recursive: true });
  }

  /**
   * Removes playlist and segment files. Returns how many were removed.
   * A file that cannot be removed is logged; the sweep carries on.
   */
  async clear(): Promise<number> {
    await this.ensureExists();
    const entries = await fs.promises.readdir(this.directory);
    let removed = 0;

    for (const entry of entries) {
      if (!OUTPUT_EXTENSIONS.includes(path.extname(entry))) continue;

      try {
        await fs.promises.rm(path.join(this.directory, entry), { force: true });
        removed++;
      } catch (error) {
        this.logger.warn(
          `Failed to remove ${entry}: ${getErrorMessage(error)}`,
        );
      }
    }

    if (removed > 0) {
      this.logger.debug(`Cleared ${removed} HLS files from ${this.directory}`);
    }
    return removed;
  }

  async listOutputFiles(): Promise<string[]> {
    try {
      const entries = await fs.promises.readdir(this.directory);
      return entries.filter((entry) =>
        OUTPUT_EXTENSIONS.includes(path.extname(entry)),
      );
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }

  /** At least one segment and a playlist that starts with the HLS header. */
  async verify(): Promise<SegmentVerification> {
    const files = await this.listOutputFiles();
    const segmentCount = files.filter((f) => f.endsWith('.ts')).length;

    if (segmentCount === 0) {
      return { ok: false, segmentCount, reason: 'No HLS segments were written' };
    }

    let playlist: string;
    try {
      playlist = await fs.promises.readFile(this.playlistPath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { ok: false, segmentCount, reason: 'Playlist was not written' };
      }
      throw error;
    }

    if (!playlist.trimStart().startsWith(PLAYLIST_HEADER)) {
      return { ok: false, segmentCount, reason: 'Playlist header is malformed' };
    }
    return { ok: true, segmentCount };
  }
}
