import type { StagedFile } from '../storage/types.js';

export type LoginCredentials = {
  email: string;
  password: string;
};

/**
 * Narrow contract of a stateful remote-storage client. Implementations keep
 * their own session state after `login`; the library types behind them stay
 * inside the implementing module.
 */
export interface RemoteStorageClient<THandle> {
  login(credentials: LoginCredentials): Promise<void>;
  upload(filePath: string, remoteName: string): Promise<THandle>;
  getLink(handle: THandle): Promise<string>;
}

/**
 * Request-safe face of a provider: the only surface the upload pipeline sees.
 */
export interface ProviderClientAdapter {
  readonly name: string;
  readonly isAuthenticated: boolean;
  ensureSession(): Promise<void>;
  uploadAndLink(stagedFile: StagedFile): Promise<string>;
}
