import type { Express } from 'express';
import { registerSystemRoutes, type SystemRouteDeps } from './systemRoutes.js';
import { registerUploadRoutes, type UploadRouteDeps } from './uploadRoutes.js';

export type RouteDeps = SystemRouteDeps & UploadRouteDeps;

export function setupRoutes(app: Express, deps: RouteDeps) {
  registerSystemRoutes(app, deps);
  registerUploadRoutes(app, deps);
}
