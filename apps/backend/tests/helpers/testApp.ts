import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { Express } from 'express';
import { createApp } from '../../src/app.js';
import type { ProviderCredentials } from '../../src/config/env.js';
import { ServiceRegistry } from '../../src/providers/registry.js';
import { SessionProviderAdapter } from '../../src/providers/sessionAdapter.js';
import { StagingStore } from '../../src/storage/stagingStore.js';
import type { Logger } from '../../src/utils/logger.js';
import { FakeRemoteClient } from './fakeRemoteClient.js';

export const TEST_TOKEN = 'default-secret-token';

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export async function makeTempDir(prefix = 'upload-gateway-'): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Files currently in a scratch directory; a missing directory counts as empty. */
export async function listScratch(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
    throw error;
  }
}

export type TestAppOptions = {
  scratchDir: string;
  client?: FakeRemoteClient;
  credentials?: ProviderCredentials;
  authToken?: string;
  maxFileSize?: number;
  concurrency?: number;
};

export type TestApp = {
  app: Express;
  client: FakeRemoteClient;
  registry: ServiceRegistry;
  stagingStore: StagingStore;
};

export function buildTestApp(options: TestAppOptions): TestApp {
  const client = options.client ?? new FakeRemoteClient();
  const stagingStore = new StagingStore({ scratchDir: options.scratchDir, logger: silentLogger });
  const registry = new ServiceRegistry({
    mega: () =>
      new SessionProviderAdapter({
        name: 'mega',
        displayName: 'MEGA',
        client,
        credentials: options.credentials ?? { email: 'user@example.com', password: 'test-password' },
        concurrency: options.concurrency ?? 4,
        logger: silentLogger,
      }),
  });

  const app = createApp({
    config: {
      authToken: options.authToken ?? TEST_TOKEN,
      tempUploadDir: options.scratchDir,
      maxFileSize: options.maxFileSize ?? 1024 * 1024,
    },
    registry,
    stagingStore,
    logger: silentLogger,
  });

  return { app, client, registry, stagingStore };
}
