import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { AppConfig } from './config/env.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { createRequestContext } from './middleware/requestContext.js';
import { createFileReceiver } from './middleware/upload.js';
import { AUTH_TOKEN_HEADER_NAME } from './auth/tokenGate.js';
import type { ServiceRegistry } from './providers/registry.js';
import { setupRoutes } from './routes/index.js';
import { UploadOrchestrator } from './services/UploadOrchestrator.js';
import { sendError } from './shared/apiError.js';
import { ERROR_CODES, ERROR_MESSAGES } from './shared/errors.js';
import type { StagingStore } from './storage/stagingStore.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';

export type AppDeps = {
  config: Pick<AppConfig, 'authToken' | 'tempUploadDir' | 'maxFileSize'>;
  registry: ServiceRegistry;
  stagingStore: StagingStore;
  logger?: Logger;
};

export function createApp(deps: AppDeps): Express {
  const logger = deps.logger ?? defaultLogger;
  const app = express();

  app.disable('x-powered-by');
  app.use(createRequestContext(logger));
  app.use(helmet());
  app.use(
    cors({
      allowedHeaders: ['Content-Type', AUTH_TOKEN_HEADER_NAME, 'X-Request-Id'],
      exposedHeaders: ['X-Request-Id'],
    })
  );

  const orchestrator = new UploadOrchestrator({
    authToken: deps.config.authToken,
    registry: deps.registry,
    stagingStore: deps.stagingStore,
    logger,
  });

  setupRoutes(app, {
    tempUploadDir: deps.config.tempUploadDir,
    registry: deps.registry,
    orchestrator,
    receiveFile: createFileReceiver(deps.stagingStore, deps.config.maxFileSize),
  });

  app.use((_req, res) => {
    sendError(res, 404, ERROR_MESSAGES[ERROR_CODES.NOT_FOUND]);
  });

  app.use(createErrorHandler(logger));

  return app;
}
