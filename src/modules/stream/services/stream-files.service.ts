// src/modules/stream/services/stream-files.service.ts
import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import serverConfig from '../../../config/server.config';
import { HLS_CONTENT_TYPES } from '../../../common/constants/media.constant';
import { isMissingFile } from '../../../common/utils/fs.util';
import { SegmentDirectoryService } from '../../transcode/services/segment-directory.service';

// Plain names only: no separators, no leading dot
const SAFE_FILE_NAME = /^[\w-][\w.-]*$/;

const PLAYLIST_URL_PLACEHOLDER = /\{\{\s*playlistUrl\s*\}\}/g;

export interface StreamFile {
  path: string;
  sizeBytes: number;
  contentType: string;
  headers: Record<string, string>;
}

@Injectable()
export class StreamFilesService {
  private readonly logger = new Logger(StreamFilesService.name);

  constructor(
    @Inject(serverConfig.KEY)
    private readonly config: ConfigType<typeof serverConfig>,
    private readonly segments: SegmentDirectoryService,
  ) {}

  get playlistName(): string {
    return path.basename(this.segments.playlistPath);
  }

  get playlistUrl(): string {
    return `/stream/${this.playlistName}`;
  }

  /**
   * Maps a requested name to a playlist or segment file in the segment
   * directory. Anything else is rejected before the disk is touched.
   */
  async resolve(filename: string): Promise<StreamFile> {
    if (!SAFE_FILE_NAME.test(filename)) {
      throw new BadRequestException('Invalid file name');
    }

    let contentType: string;
    const headers: Record<string, string> = {
      'Access-Control-Allow-Origin': '*',
    };
    if (filename === this.playlistName) {
      contentType = HLS_CONTENT_TYPES.PLAYLIST;
      headers['Content-Disposition'] = 'inline';
      headers['Cache-Control'] = 'no-cache';
    } else if (path.extname(filename) === '.ts') {
      contentType = HLS_CONTENT_TYPES.SEGMENT;
    } else {
      throw new BadRequestException(`Unsupported stream file: ${filename}`);
    }
    headers['Content-Type'] = contentType;

    const directory = path.resolve(this.segments.directory);
    const filePath = path.join(directory, filename);
    if (path.dirname(filePath) !== directory) {
      throw new BadRequestException('Invalid file name');
    }

    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundException(`Stream file not found: ${filename}`);
      }
      throw error;
    }
    if (!stats.isFile()) {
      throw new NotFoundException(`Stream file not found: ${filename}`);
    }

    return { path: filePath, sizeBytes: stats.size, contentType, headers };
  }

  /** The player page with the playlist URL filled in. */
  async renderPlayer(): Promise<string> {
    let template: string;
    try {
      template = await fs.promises.readFile(this.config.playerTemplatePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.error(
          `Player template missing: ${this.config.playerTemplatePath}`,
        );
        throw new NotFoundException('Player page not found');
      }
      throw error;
    }
    return template.replace(PLAYLIST_URL_PLACEHOLDER, this.playlistUrl);
  }
}
