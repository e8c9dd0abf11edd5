import path from 'node:path';
import type { Request } from 'express';
import type multer from 'multer';
import { ApiError } from '../shared/apiError.js';
import { ERROR_CODES } from '../shared/errors.js';
import type { StagingStore } from './stagingStore.js';

type HandleFileCallback = (error?: unknown, info?: Partial<Express.Multer.File>) => void;

/**
 * multer storage engine that streams the file part into the staging store.
 * multer calls `_removeFile` itself when a parse is aborted after a file was written.
 */
export class StagingStorageEngine implements multer.StorageEngine {
  constructor(private readonly store: StagingStore) {}

  _handleFile(_req: Request, file: Express.Multer.File, callback: HandleFileCallback): void {
    if (!file.originalname) {
      callback(new ApiError({ status: 400, errorCode: ERROR_CODES.MISSING_FILE_NAME }));
      return;
    }

    void this.store.stage(file.originalname, file.stream).then(
      (staged) =>
        callback(null, {
          destination: this.store.directory,
          filename: path.basename(staged.absolutePath),
          path: staged.absolutePath,
          size: staged.size,
        }),
      (error: unknown) => callback(error)
    );
  }

  _removeFile(_req: Request, file: Express.Multer.File, callback: (error: Error | null) => void): void {
    if (!file.path) {
      callback(null);
      return;
    }

    void this.store
      .release({ absolutePath: file.path, originalFileName: file.originalname, size: file.size })
      .then(() => callback(null));
  }
}
