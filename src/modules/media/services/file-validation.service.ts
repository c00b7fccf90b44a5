// src/modules/media/services/file-validation.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { fromFile } from 'file-type';
import Ffmpeg, { FfprobeData } from 'fluent-ffmpeg';
import {
  ERROR_MESSAGES,
  getMediaKind,
  MediaKind,
} from '../../../common/constants/media.constant';
import { getErrorMessage } from '../../../shared/errors';

export interface FileMetadata {
  duration?: number;
  codec?: string;
}

export interface ValidationResult {
  isValid: boolean;
  mimeType?: string;
  kind?: MediaKind;
  metadata?: FileMetadata;
  reason?: string;
}

@Injectable()
export class FileValidationService {
  private readonly logger = new Logger(FileValidationService.name);

  /**
   * MAIN ENTRY: magic-number sniffing, then a stream check with ffprobe.
   */
  async validateFile(filePath: string): Promise<ValidationResult> {
    try {
      const type = await fromFile(filePath);
      if (!type) {
        return { isValid: false, reason: ERROR_MESSAGES.UNKNOWN_SIGNATURE };
      }

      const kind = getMediaKind(type.mime);
      if (!kind) {
        return {
          isValid: false,
          mimeType: type.mime,
          reason: `${ERROR_MESSAGES.UNSUPPORTED_FORMAT}: ${type.mime}`,
        };
      }

      return await this.probeStreams(filePath, type.mime, kind);
    } catch (error) {
      this.logger.error(`Disk validation failed: ${filePath}`, error);
      return {
        isValid: false,
        reason: `Disk validation error: ${getErrorMessage(error)}`,
      };
    }
  }

  /**
   * Requires a stream of the detected kind. Without ffprobe on the
   * system the magic number alone decides.
   */
  private probeStreams(
    filePath: string,
    mime: string,
    kind: MediaKind,
  ): Promise<ValidationResult> {
    return new Promise((resolve) => {
      Ffmpeg(filePath).ffprobe((err: unknown, data: FfprobeData) => {
        if (err) {
          const errorMsg = getErrorMessage(err);

          if (
            errorMsg.includes(ERROR_MESSAGES.FFPROBE_NOT_FOUND) ||
            errorMsg.includes(ERROR_MESSAGES.FFMPEG_NOT_FOUND)
          ) {
            this.logger.warn(
              `FFprobe not available, accepting ${filePath} on magic number only`,
            );
            resolve({ isValid: true, mimeType: mime, kind });
            return;
          }

          this.logger.warn(`FFprobe ${kind} error: ${errorMsg}`);
          resolve({
            isValid: false,
            mimeType: mime,
            kind,
            reason: `${kind === 'video' ? 'Video' : 'Audio'} validation failed: ${errorMsg}`,
          });
          return;
        }

        const stream = data.streams?.find((s) => s.codec_type === kind);
        if (!stream) {
          resolve({
            isValid: false,
            mimeType: mime,
            kind,
            reason: `No ${kind} stream found`,
          });
          return;
        }

        resolve({
          isValid: true,
          mimeType: mime,
          kind,
          metadata: {
            duration: data.format?.duration,
            codec: stream.codec_name,
          },
        });
      });
    });
  }
}
