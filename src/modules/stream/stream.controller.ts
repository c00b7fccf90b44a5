// src/modules/stream/stream.controller.ts
import {
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Res,
  StreamableFile,
} from '@nestjs/common';
import type { Response } from 'express';
import * as fs from 'fs';
import { QueueCoordinatorService } from '../queue/services/queue-coordinator.service';
import type { StreamStatus } from './interfaces/stream-status.interface';
import { StreamFilesService } from './services/stream-files.service';
import { StreamStatusService } from './services/stream-status.service';

type HeaderSink = Pick<Response, 'set'>;

@Controller()
export class StreamController {
  constructor(
    private readonly files: StreamFilesService,
    private readonly status: StreamStatusService,
    private readonly coordinator: QueueCoordinatorService,
  ) {}

  /**
   * Browser player (HLS.js). VLC and other players can open the
   * playlist URL directly.
   */
  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  player(): Promise<string> {
    return this.files.renderPlayer();
  }

  /**
   * Playlist and segments of the live session.
   * @param filename  `playlist.m3u8` or a `.ts` segment
   */
  @Get('stream/:filename')
  async serveStreamFile(
    @Param('filename') filename: string,
    @Res({ passthrough: true }) res: HeaderSink,
  ): Promise<StreamableFile> {
    const file = await this.files.resolve(filename);
    res.set(file.headers);
    return new StreamableFile(fs.createReadStream(file.path), {
      type: file.contentType,
      length: file.sizeBytes,
    });
  }

  @Get('status')
  getStatus(): StreamStatus {
    return this.status.getStatus();
  }

  /** Ends the current session; the item counts as played. */
  @Post('stream/skip')
  @HttpCode(HttpStatus.OK)
  async skip(): Promise<{ skipped: boolean }> {
    const skipped = await this.coordinator.skip();
    return { skipped };
  }
}
