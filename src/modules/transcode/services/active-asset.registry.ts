// src/modules/transcode/services/active-asset.registry.ts
import { Injectable, Logger } from '@nestjs/common';
import * as path from 'path';

/**
 * Holds the single path that storage reclamation must not touch.
 *
 * Reads and writes are synchronous, so a caller that protects a path before
 * its first `await` is guaranteed that no reclamation pass observes a gap.
 */
@Injectable()
export class ActiveAssetRegistry {
  private readonly logger = new Logger(ActiveAssetRegistry.name);
  private activePath: string | null = null;

  protect(filePath: string): void {
    const resolved = path.resolve(filePath);
    if (this.activePath && this.activePath !== resolved) {
      this.logger.debug(`Protection moved from ${this.activePath} to ${resolved}`);
    }
    this.activePath = resolved;
  }

  /** Clears the reference only while it still holds `filePath`. */
  release(filePath: string): boolean {
    if (this.activePath !== path.resolve(filePath)) return false;
    this.activePath = null;
    return true;
  }

  current(): string | null {
    return this.activePath;
  }

  isProtected(filePath: string): boolean {
    return this.activePath !== null && this.activePath === path.resolve(filePath);
  }
}
