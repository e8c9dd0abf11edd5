import type { Router } from 'express';
import type { PingResponse, StatusResponse } from '@upload-gateway/api-contracts';
import { APP_NAME, APP_VERSION } from '../config/appInfo.js';
import type { ServiceRegistry } from '../providers/registry.js';

export type SystemRouteDeps = {
  tempUploadDir: string;
  registry: ServiceRegistry;
};

export function registerSystemRoutes(app: Router, deps: SystemRouteDeps) {
  app.get('/ping', (_req, res) => {
    const body: PingResponse = { message: 'Server running' };
    res.json(body);
  });

  app.get('/status', (_req, res) => {
    const body: StatusResponse = {
      status: 'healthy',
      version: APP_VERSION,
      service: APP_NAME,
      temp_dir: deps.tempUploadDir,
      supported_services: deps.registry.supportedServices(),
    };
    res.json(body);
  });
}
