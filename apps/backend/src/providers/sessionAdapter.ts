import { Semaphore } from '../utils/semaphore.js';
import { errorMeta, logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { ProviderCredentials } from '../config/env.js';
import type { StagedFile } from '../storage/types.js';
import { ProviderError } from './errors.js';
import type { ProviderClientAdapter, RemoteStorageClient } from './types.js';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type ProviderSession = {
  isAuthenticated: boolean;
};

export type SessionAdapterOptions<THandle> = {
  /** Registry key, e.g. "mega". */
  name: string;
  /** Name used in error messages, e.g. "MEGA". */
  displayName: string;
  client: RemoteStorageClient<THandle>;
  credentials: ProviderCredentials;
  /** Upper bound on remote calls in flight through this adapter. */
  concurrency: number;
  logger?: Logger;
};

/**
 * Wraps a stateful remote client that logs in once and reuses its session.
 *
 * Every remote call runs through a bounded pool; the check-then-login sequence
 * runs under a per-adapter lock, and callers arriving during a login share
 * that attempt's outcome. Once authenticated the session is kept for the
 * adapter's lifetime.
 */
export class SessionProviderAdapter<THandle> implements ProviderClientAdapter {
  readonly name: string;
  private readonly displayName: string;
  private readonly client: RemoteStorageClient<THandle>;
  private readonly credentials: ProviderCredentials;
  private readonly pool: Semaphore;
  private readonly loginLock = new Semaphore(1);
  private readonly logger: Logger;
  private readonly session: ProviderSession = { isAuthenticated: false };
  private pendingLogin: Promise<void> | null = null;

  constructor(options: SessionAdapterOptions<THandle>) {
    this.name = options.name;
    this.displayName = options.displayName;
    this.client = options.client;
    this.credentials = options.credentials;
    this.pool = new Semaphore(options.concurrency);
    this.logger = options.logger ?? defaultLogger;
  }

  get isAuthenticated(): boolean {
    return this.session.isAuthenticated;
  }

  async ensureSession(): Promise<void> {
    if (this.session.isAuthenticated) return;
    if (this.pendingLogin) return await this.pendingLogin;

    const attempt = this.loginLock.use(() => this.login());
    this.pendingLogin = attempt;
    try {
      await attempt;
    } finally {
      if (this.pendingLogin === attempt) this.pendingLogin = null;
    }
  }

  async uploadAndLink(stagedFile: StagedFile): Promise<string> {
    await this.ensureSession();

    this.logger.info('provider.upload_started', { provider: this.name, path: stagedFile.absolutePath });

    let handle: THandle;
    try {
      handle = await this.pool.use(() => this.client.upload(stagedFile.absolutePath, stagedFile.originalFileName));
    } catch (error) {
      this.logger.error('provider.upload_failed', { provider: this.name, ...errorMeta(error) });
      throw new ProviderError({
        kind: 'UPLOAD_FAILED',
        provider: this.name,
        message: `Failed to upload file to ${this.displayName}: ${messageOf(error)}`,
        cause: error,
      });
    }

    let link: string;
    try {
      link = await this.pool.use(() => this.client.getLink(handle));
    } catch (error) {
      this.logger.error('provider.link_failed', { provider: this.name, ...errorMeta(error) });
      throw new ProviderError({
        kind: 'LINK_FETCH_FAILED',
        provider: this.name,
        message: `Failed to get public link from ${this.displayName}: ${messageOf(error)}`,
        cause: error,
      });
    }

    if (!link) {
      throw new ProviderError({
        kind: 'LINK_FETCH_FAILED',
        provider: this.name,
        message: `${this.displayName} returned an empty link`,
      });
    }

    this.logger.info('provider.upload_completed', { provider: this.name, link });
    return link;
  }

  private async login(): Promise<void> {
    // Another holder of the lock may have finished logging in meanwhile.
    if (this.session.isAuthenticated) return;

    const { email, password } = this.credentials;
    if (!email || !password) {
      this.logger.error('provider.credentials_missing', { provider: this.name });
      throw new ProviderError({
        kind: 'MISSING_CREDENTIALS',
        provider: this.name,
        message: `${this.displayName} credentials not provided`,
      });
    }

    try {
      await this.pool.use(() => this.client.login({ email, password }));
    } catch (error) {
      this.logger.error('provider.login_failed', { provider: this.name, ...errorMeta(error) });
      throw new ProviderError({
        kind: 'REMOTE_REJECTED',
        provider: this.name,
        message: `Failed to login to ${this.displayName}: ${messageOf(error)}`,
        cause: error,
      });
    }

    this.session.isAuthenticated = true;
    this.logger.info('provider.login_succeeded', { provider: this.name });
  }
}
