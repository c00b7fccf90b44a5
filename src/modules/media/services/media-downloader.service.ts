// src/modules/media/services/media-downloader.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import axios from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import storageConfig from '../../../config/storage.config';
import type { AttachmentRef } from '../../../common/interfaces/attachment.interface';
import type { MediaAsset } from '../../../common/interfaces/media-asset.interface';
import { isMissingFile } from '../../../common/utils/fs.util';
import { getErrorMessage } from '../../../shared/errors';
import { FileValidationService } from './file-validation.service';

export type AcquisitionResult =
  | { ok: true; asset: MediaAsset }
  | { ok: false; reason: string };

// Progress is logged every 10% above this size
const PROGRESS_LOG_THRESHOLD = 10 * 1024 * 1024;

/** Keeps alphanumerics and `._- `, suffixes the attachment id so names never collide. */
export function buildSafeFileName(attachment: AttachmentRef): string {
  const ext = path.extname(attachment.name).replace(/[^A-Za-z0-9.]/g, '');
  const stem = path
    .basename(attachment.name, path.extname(attachment.name))
    .replace(/[^A-Za-z0-9._\- ]/g, '')
    .trim();
  const id = attachment.id.replace(/[^A-Za-z0-9]/g, '');

  return `${stem || 'attachment'}_${id}${ext}`;
}

@Injectable()
export class MediaDownloaderService {
  private readonly logger = new Logger(MediaDownloaderService.name);

  constructor(
    @Inject(storageConfig.KEY)
    private readonly config: ConfigType<typeof storageConfig>,
    private readonly fileValidation: FileValidationService,
  ) {}

  /**
   * Downloads and validates an attachment. Never throws: failures come back
   * as `{ ok: false, reason }`.
   */
  async acquire(
    attachment: AttachmentRef,
    signal?: AbortSignal,
  ): Promise<AcquisitionResult> {
    const filePath = path.join(
      this.config.mediaDir,
      buildSafeFileName(attachment),
    );

    try {
      await fs.promises.mkdir(this.config.mediaDir, { recursive: true });

      const cached = await this.reuseExisting(filePath, attachment);
      if (!cached) {
        await this.download(attachment, filePath, signal);
      }

      return await this.validate(filePath);
    } catch (error) {
      const reason = this.describeFailure(error, signal);
      this.logger.error(`Failed to acquire ${attachment.name}: ${reason}`);
      return { ok: false, reason };
    }
  }

  /**
   * A complete copy from an earlier attempt is reused; touching it keeps
   * it away from the oldest-first reclamation.
   */
  private async reuseExisting(
    filePath: string,
    attachment: AttachmentRef,
  ): Promise<boolean> {
    let size: number;
    try {
      size = (await fs.promises.stat(filePath)).size;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }

    if (size === 0 || (attachment.bytes !== undefined && attachment.bytes !== size)) {
      return false;
    }

    const now = new Date();
    await fs.promises.utimes(filePath, now, now);
    this.logger.log(`Reusing downloaded file: ${path.basename(filePath)}`);
    return true;
  }

  private async download(
    attachment: AttachmentRef,
    filePath: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const partPath = `${filePath}.part`;
    this.logger.log(`Downloading attachment: ${attachment.name}`);

    try {
      const response = await axios.get<Readable>(attachment.url, {
        responseType: 'stream',
        headers: attachment.headers,
        signal,
      });

      const total = Number(response.headers['content-length'] ?? 0);
      if (total > PROGRESS_LOG_THRESHOLD) {
        this.trackProgress(response.data, total, attachment.name);
      }

      await pipeline(response.data, fs.createWriteStream(partPath));
      await fs.promises.rename(partPath, filePath);
    } catch (error) {
      await fs.promises.rm(partPath, { force: true });
      throw error;
    }
  }

  private trackProgress(stream: Readable, total: number, name: string): void {
    let downloaded = 0;
    let nextMark = 10;

    stream.on('data', (chunk: Buffer) => {
      downloaded += chunk.length;
      const percent = (downloaded / total) * 100;
      if (percent >= nextMark) {
        this.logger.log(`Download progress ${name}: ${Math.floor(percent)}%`);
        nextMark = Math.floor(percent / 10) * 10 + 10;
      }
    });
  }

  private async validate(filePath: string): Promise<AcquisitionResult> {
    const result = await this.fileValidation.validateFile(filePath);

    if (!result.isValid || !result.kind || !result.mimeType) {
      await fs.promises.rm(filePath, { force: true });
      return {
        ok: false,
        reason: result.reason ?? 'Downloaded file failed validation',
      };
    }

    const { size } = await fs.promises.stat(filePath);
    this.logger.log(
      `Successfully downloaded and validated: ${path.basename(filePath)} (${result.mimeType})`,
    );
    return {
      ok: true,
      asset: {
        path: path.resolve(filePath),
        kind: result.kind,
        format: result.mimeType,
        sizeBytes: size,
      },
    };
  }

  private describeFailure(error: unknown, signal?: AbortSignal): string {
    if (signal?.aborted) return 'Download aborted';

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === 401) {
        return 'Network error: HTTP 401, authentication failed. Verify TRELLO_API_KEY and TRELLO_TOKEN.';
      }
      if (status) return `Network error: HTTP ${status}`;
      return `Network error: ${error.message}`;
    }
    return `Error downloading attachment: ${getErrorMessage(error)}`;
  }
}
