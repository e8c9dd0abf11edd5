import type { Router } from 'express';
import type { UploadResponse } from '@upload-gateway/api-contracts';
import { AUTH_TOKEN_HEADER_NAME } from '../auth/tokenGate.js';
import type { FileReceiver } from '../middleware/upload.js';
import type { UploadOrchestrator } from '../services/UploadOrchestrator.js';

export type UploadRouteDeps = {
  orchestrator: UploadOrchestrator;
  receiveFile: FileReceiver;
};

export function registerUploadRoutes(app: Router, deps: UploadRouteDeps) {
  app.post('/upload', async (req, res, next) => {
    try {
      const outcome = await deps.orchestrator.run({
        credentialToken: req.header(AUTH_TOKEN_HEADER_NAME),
        serviceName: req.query.service,
        requestId: typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined,
        receiveFile: () => deps.receiveFile(req, res),
      });

      const body: UploadResponse = {
        status: 'success',
        message: 'File uploaded successfully',
        filename: outcome.fileName,
        service: outcome.service,
        link: outcome.link,
      };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });
}
