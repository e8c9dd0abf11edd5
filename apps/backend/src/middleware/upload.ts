import multer from 'multer';
import type { Request, Response } from 'express';
import type { StagedFile } from '../storage/types.js';
import type { StagingStore } from '../storage/stagingStore.js';
import { StagingStorageEngine } from '../storage/multerStagingEngine.js';

export const UPLOAD_FIELD_NAME = 'file';

export type FileReceiver = (req: Request, res: Response) => Promise<StagedFile | null>;

/**
 * Build a one-file multipart reader that streams the `file` part into the
 * staging store. Resolves `null` when no named file part was sent.
 */
export function createFileReceiver(store: StagingStore, maxFileSize: number): FileReceiver {
  const single = multer({
    storage: new StagingStorageEngine(store),
    // Clients send raw UTF-8 in `filename="..."`; multer would read it as latin1.
    defParamCharset: 'utf8',
    limits: {
      fileSize: maxFileSize,
      files: 1,
    },
  }).single(UPLOAD_FIELD_NAME);

  return (req, res) =>
    new Promise<StagedFile | null>((resolve, reject) => {
      single(req, res, (err?: unknown) => {
        if (err) {
          reject(err);
          return;
        }

        const file = req.file;
        if (!file) {
          resolve(null);
          return;
        }

        resolve({ absolutePath: file.path, originalFileName: file.originalname, size: file.size });
      });
    });
}
