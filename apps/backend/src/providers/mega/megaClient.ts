import fs from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { Storage, type MutableFile } from 'megajs';
import type { LoginCredentials, RemoteStorageClient } from '../types.js';

/**
 * MEGA account client backed by `megajs`. Holds the logged-in storage handle
 * for the lifetime of the process.
 */
export class MegaRemoteClient implements RemoteStorageClient<MutableFile> {
  private storage: Storage | null = null;

  async login(credentials: LoginCredentials): Promise<void> {
    const storage = new Storage({ email: credentials.email, password: credentials.password });
    await storage.ready;
    this.storage = storage;
  }

  async upload(filePath: string, remoteName: string): Promise<MutableFile> {
    const storage = this.storage;
    if (!storage) {
      throw new Error('MEGA session is not established');
    }

    const { size } = await fs.promises.stat(filePath);
    const upload = storage.upload({ name: remoteName, size });
    const [, file] = await Promise.all([pipeline(fs.createReadStream(filePath), upload), upload.complete]);
    return file;
  }

  async getLink(file: MutableFile): Promise<string> {
    return await file.link({ noKey: false });
  }
}
