import fs from 'node:fs/promises';
import type { LoginCredentials, RemoteStorageClient } from '../../src/providers/types.js';

export type FakeRemoteClientOptions = {
  link?: string;
  loginError?: Error;
  uploadError?: Error;
  linkError?: Error;
  /** Keeps every login pending until `releaseLogin()` is called. */
  holdLogin?: boolean;
};

export type RecordedUpload = {
  filePath: string;
  remoteName: string;
  content: string;
};

/**
 * In-process stand-in for a remote storage account.
 */
export class FakeRemoteClient implements RemoteStorageClient<string> {
  loginCalls: LoginCredentials[] = [];
  uploads: RecordedUpload[] = [];
  linkRequests: string[] = [];
  activeCalls = 0;
  maxActiveCalls = 0;

  private readonly options: FakeRemoteClientOptions;
  private loginGate: Promise<void> = Promise.resolve();
  private openLoginGate: () => void = () => {};

  constructor(options: FakeRemoteClientOptions = {}) {
    this.options = options;
    if (options.holdLogin) {
      this.loginGate = new Promise<void>((resolve) => {
        this.openLoginGate = resolve;
      });
    }
  }

  releaseLogin(): void {
    this.openLoginGate();
  }

  async login(credentials: LoginCredentials): Promise<void> {
    this.loginCalls.push(credentials);
    await this.track(async () => {
      await this.loginGate;
      if (this.options.loginError) throw this.options.loginError;
    });
  }

  async upload(filePath: string, remoteName: string): Promise<string> {
    return await this.track(async () => {
      const content = await fs.readFile(filePath, 'utf8');
      this.uploads.push({ filePath, remoteName, content });
      if (this.options.uploadError) throw this.options.uploadError;
      return `handle:${remoteName}`;
    });
  }

  async getLink(handle: string): Promise<string> {
    return await this.track(async () => {
      this.linkRequests.push(handle);
      if (this.options.linkError) throw this.options.linkError;
      return this.options.link ?? 'https://mega.nz/file/abc123';
    });
  }

  private async track<T>(fn: () => Promise<T>): Promise<T> {
    this.activeCalls += 1;
    this.maxActiveCalls = Math.max(this.maxActiveCalls, this.activeCalls);
    try {
      // Yield so overlapping callers can be observed.
      await new Promise((resolve) => setImmediate(resolve));
      return await fn();
    } finally {
      this.activeCalls -= 1;
    }
  }
}
