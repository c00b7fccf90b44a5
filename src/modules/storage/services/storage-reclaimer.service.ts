// src/modules/storage/services/storage-reclaimer.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import * as fs from 'fs';
import * as path from 'path';
import storageConfig from '../../../config/storage.config';
import { STORAGE_EVENTS } from '../../../common/constants/stream.constant';
import { isMissingFile } from '../../../common/utils/fs.util';
import {
  getErrorMessage,
  ReclamationPartialFailureError,
} from '../../../shared/errors';
import { ActiveAssetRegistry } from '../../transcode/services/active-asset.registry';
import type { StorageReclaimedEvent } from '../events/storage.events';
import type {
  FailedDeletion,
  MediaFileEntry,
  ReclaimResult,
  StorageUsage,
} from '../interfaces/storage.interface';

// In-flight downloads; they become assets only once renamed
const PARTIAL_SUFFIX = '.part';

const HOUR_MS = 60 * 60 * 1000;

@Injectable()
export class StorageReclaimerService {
  private readonly logger = new Logger(StorageReclaimerService.name);

  constructor(
    @Inject(storageConfig.KEY)
    private readonly config: ConfigType<typeof storageConfig>,
    private readonly activeAssets: ActiveAssetRegistry,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * One reclamation pass over the media directory.
   *
   * 1. Idle purge: files older than `maxMediaAgeHours` (when enabled).
   * 2. Budget: oldest-first deletion until the total fits the budget.
   *
   * The active asset is checked before every deletion and never removed.
   * Sizes come from enumeration and are not re-read during the pass.
   */
  async reclaim(): Promise<ReclaimResult> {
    const files = await this.enumerate();
    const budgetBytes = this.config.maxStorageBytes;
    const totalBefore = sumSizes(files);

    let total = totalBefore;
    const deleted: string[] = [];
    const expired: string[] = [];
    const failed: FailedDeletion[] = [];
    const handled = new Set<string>();

    // Oldest first for both passes
    const ordered = [...files].sort((a, b) => a.mtimeMs - b.mtimeMs);

    if (this.config.maxMediaAgeHours > 0) {
      const cutoff = Date.now() - this.config.maxMediaAgeHours * HOUR_MS;

      for (const file of ordered) {
        if (file.mtimeMs >= cutoff) break;
        if (this.activeAssets.isProtected(file.path)) continue;

        handled.add(file.path);
        if (await this.remove(file, failed)) {
          total -= file.sizeBytes;
          deleted.push(file.path);
          expired.push(file.path);
        }
      }
    }

    if (total > budgetBytes) {
      for (const file of ordered) {
        if (total <= budgetBytes) break;
        if (handled.has(file.path)) continue;
        if (this.activeAssets.isProtected(file.path)) {
          this.logger.debug(`Skipping active asset: ${file.path}`);
          continue;
        }

        handled.add(file.path);
        if (await this.remove(file, failed)) {
          total -= file.sizeBytes;
          deleted.push(file.path);
        }
      }
    }

    const result: ReclaimResult = {
      budgetBytes,
      totalBefore,
      totalAfter: total,
      deleted,
      expired,
      failed,
      protectedPath: this.activeAssets.current(),
      overBudget: total > budgetBytes,
    };
    this.report(result);
    return result;
  }

  async usage(): Promise<StorageUsage> {
    const files = await this.enumerate();
    const usedBytes = sumSizes(files);
    const budgetBytes = this.config.maxStorageBytes;

    return {
      usedBytes,
      budgetBytes,
      fileCount: files.length,
      percentUsed:
        budgetBytes > 0 ? Math.round((usedBytes / budgetBytes) * 1000) / 10 : 0,
    };
  }

  /** Regular files in the media directory, partial downloads excluded. */
  async enumerate(): Promise<MediaFileEntry[]> {
    const dir = this.config.mediaDir;
    await fs.promises.mkdir(dir, { recursive: true });

    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    const files: MediaFileEntry[] = [];

    for (const entry of entries) {
      if (!entry.isFile() || entry.name.endsWith(PARTIAL_SUFFIX)) continue;

      const filePath = path.join(dir, entry.name);
      try {
        const stats = await fs.promises.stat(filePath);
        files.push({
          path: filePath,
          sizeBytes: stats.size,
          mtimeMs: stats.mtimeMs,
        });
      } catch (error) {
        // Removed between readdir and stat
        if (isMissingFile(error)) continue;
        throw error;
      }
    }
    return files;
  }

  private async remove(
    file: MediaFileEntry,
    failed: FailedDeletion[],
  ): Promise<boolean> {
    try {
      await fs.promises.unlink(file.path);
      this.logger.log(
        `Deleted ${path.basename(file.path)} (${formatMb(file.sizeBytes)})`,
      );
      return true;
    } catch (error) {
      if (isMissingFile(error)) return true;

      const reason = getErrorMessage(error);
      this.logger.error(`Failed to delete ${file.path}: ${reason}`);
      failed.push({ path: file.path, reason });
      return false;
    }
  }

  private report(result: ReclaimResult): void {
    if (result.overBudget) {
      const warning = new ReclamationPartialFailureError(
        `Storage still over budget after reclamation: ${formatMb(result.totalAfter)} of ${formatMb(result.budgetBytes)}`,
        { failed: result.failed.length },
      );
      this.logger.warn(warning.message);
    }

    if (result.deleted.length > 0 || result.failed.length > 0) {
      this.logger.log(
        `Reclamation removed ${result.deleted.length} files ` +
          `(${result.expired.length} expired), ${result.failed.length} failed, ` +
          `${formatMb(result.totalBefore)} → ${formatMb(result.totalAfter)}`,
      );
    }

    const event: StorageReclaimedEvent = {
      deletedCount: result.deleted.length,
      expiredCount: result.expired.length,
      failedCount: result.failed.length,
      freedBytes: result.totalBefore - result.totalAfter,
      totalAfter: result.totalAfter,
      overBudget: result.overBudget,
    };
    this.eventEmitter.emit(STORAGE_EVENTS.RECLAIMED, event);
  }
}

function sumSizes(files: MediaFileEntry[]): number {
  return files.reduce((sum, file) => sum + file.sizeBytes, 0);
}

function formatMb(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}
