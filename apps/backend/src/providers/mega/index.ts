import type { AppConfig } from '../../config/env.js';
import type { Logger } from '../../utils/logger.js';
import { SessionProviderAdapter } from '../sessionAdapter.js';
import type { ProviderClientAdapter } from '../types.js';
import { MegaRemoteClient } from './megaClient.js';

export function createMegaAdapter(config: AppConfig, logger?: Logger): ProviderClientAdapter {
  return new SessionProviderAdapter({
    name: 'mega',
    displayName: 'MEGA',
    client: new MegaRemoteClient(),
    credentials: config.mega,
    concurrency: config.providerConcurrency,
    logger,
  });
}
