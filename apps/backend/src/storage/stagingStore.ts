import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { pipeline } from 'node:stream/promises';
import type { Readable } from 'node:stream';
import { getSafeExtension, validatePathWithinDirectory } from '../utils/pathSecurity.js';
import { errorMeta, logger as defaultLogger, type Logger } from '../utils/logger.js';
import { StagingError, type StagedFile } from './types.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type StagingStoreOptions = {
  scratchDir: string;
  logger?: Logger;
};

/**
 * Writes request bodies to uniquely named files under one scratch directory.
 */
export class StagingStore {
  private readonly scratchDir: string;
  private readonly logger: Logger;

  constructor(options: StagingStoreOptions) {
    this.scratchDir = path.resolve(options.scratchDir);
    this.logger = options.logger ?? defaultLogger;
  }

  get directory(): string {
    return this.scratchDir;
  }

  async stage(originalFileName: string, contentStream: Readable): Promise<StagedFile> {
    const stagedName = `${randomUUID()}${getSafeExtension(originalFileName)}`;
    const absolutePath = validatePathWithinDirectory(stagedName, this.scratchDir);

    try {
      await fs.promises.mkdir(this.scratchDir, { recursive: true });
    } catch (error) {
      throw new StagingError(`Failed to prepare upload directory: ${messageOf(error)}`, { cause: error });
    }

    try {
      await pipeline(contentStream, fs.createWriteStream(absolutePath, { flags: 'wx' }));
      const stats = await fs.promises.stat(absolutePath);
      this.logger.debug('staging.stored', { path: absolutePath, size: stats.size });
      return { absolutePath, originalFileName, size: stats.size };
    } catch (error) {
      await this.removeFile(absolutePath);
      throw new StagingError(`Failed to store upload: ${messageOf(error)}`, { cause: error });
    }
  }

  /**
   * Best-effort removal. Never throws: the caller's outcome is already decided.
   */
  async release(stagedFile: StagedFile): Promise<void> {
    let absolutePath: string;
    try {
      absolutePath = validatePathWithinDirectory(stagedFile.absolutePath, this.scratchDir);
    } catch (error) {
      this.logger.warn('staging.release_rejected', { path: stagedFile.absolutePath, ...errorMeta(error) });
      return;
    }

    if (await this.removeFile(absolutePath)) {
      this.logger.debug('staging.released', { path: absolutePath });
    }
  }

  /**
   * Delete files left behind by a previous process. Returns how many were removed.
   */
  async purgeOrphans(): Promise<number> {
    await fs.promises.mkdir(this.scratchDir, { recursive: true });
    const entries = await fs.promises.readdir(this.scratchDir, { withFileTypes: true });

    let removed = 0;
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      if (await this.removeFile(path.join(this.scratchDir, entry.name))) removed += 1;
    }

    if (removed > 0) {
      this.logger.info('staging.orphans_purged', { directory: this.scratchDir, removed });
    }
    return removed;
  }

  private async removeFile(absolutePath: string): Promise<boolean> {
    try {
      await fs.promises.unlink(absolutePath);
      return true;
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.warn('staging.release_failed', { path: absolutePath, ...errorMeta(error) });
      }
      return false;
    }
  }
}
