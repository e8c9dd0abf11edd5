import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

function getOrCreateRequestId(req: Request): string {
  const incoming = req.headers['x-request-id'] || req.headers['x-correlation-id'];
  const fromHeader = Array.isArray(incoming) ? incoming[0] : incoming;
  if (fromHeader && fromHeader.trim().length > 0) return fromHeader.trim().slice(0, 128);
  return randomUUID();
}

/**
 * Attach a request id (echoed as `X-Request-Id`) and log each finished request.
 */
export function createRequestContext(logger: Logger = defaultLogger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = getOrCreateRequestId(req);
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    const start = process.hrtime.bigint();

    res.on('finish', () => {
      const durationMs = Math.round(Number(process.hrtime.bigint() - start) / 1_000_000);
      const base = {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs,
      };

      // Always log 5xx at error level.
      if (res.statusCode >= 500) {
        logger.error('http.request', base);
        return;
      }
      logger.info('http.request', base);
    });

    next();
  };
}
