import './config/loadEnv.js';
import { createServer } from 'node:http';
import { createApp } from './app.js';
import { APP_NAME, APP_VERSION } from './config/appInfo.js';
import { validateEnv } from './config/env.js';
import { createServiceRegistry } from './providers/registry.js';
import { setupShutdownHandlers } from './server/shutdown.js';
import { StagingStore } from './storage/stagingStore.js';
import { createLogger, errorMeta } from './utils/logger.js';

const config = validateEnv();
const logger = createLogger(config.logLevel);

async function startServer() {
  logger.info('server.starting', { service: APP_NAME, version: APP_VERSION });

  const stagingStore = new StagingStore({ scratchDir: config.tempUploadPath, logger });
  await stagingStore.purgeOrphans();
  logger.info('server.temp_dir', { directory: stagingStore.directory });

  if (!config.mega.email || !config.mega.password) {
    logger.warn('server.mega_credentials_missing', { hint: 'set MEGA_EMAIL and MEGA_PASSWORD' });
  }

  const registry = createServiceRegistry(config, logger);
  const app = createApp({ config, registry, stagingStore, logger });
  const httpServer = createServer(app);

  // Uploads can stream for a while; keep idle sockets bounded.
  httpServer.requestTimeout = 300_000;
  httpServer.keepAliveTimeout = 65_000;
  httpServer.headersTimeout = 66_000;

  httpServer.on('error', (err: NodeJS.ErrnoException) => {
    logger.error('server.listen_failed', { host: config.host, port: config.port, code: err.code, ...errorMeta(err) });
    process.exit(1);
  });

  setupShutdownHandlers({ httpServer, shutdownTimeoutMs: config.shutdownTimeoutMs, logger });

  httpServer.listen(config.port, config.host, () => {
    logger.info('server.started', { host: config.host, port: config.port });
  });
}

startServer().catch((error: unknown) => {
  logger.error('server.start_failed', errorMeta(error));
  process.exit(1);
});
