import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { isApiError, sendError } from '../shared/apiError.js';
import { ERROR_CODES, ERROR_MESSAGES } from '../shared/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

type ErrorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => void;

function multerStatus(err: multer.MulterError): { status: number; detail: string } {
  switch (err.code) {
    case 'LIMIT_FILE_SIZE':
      return { status: 413, detail: ERROR_MESSAGES[ERROR_CODES.FILE_TOO_LARGE] };
    case 'LIMIT_UNEXPECTED_FILE':
      return { status: 400, detail: 'Unexpected file field' };
    case 'LIMIT_FILE_COUNT':
    case 'LIMIT_PART_COUNT':
      return { status: 400, detail: 'Too many files' };
    default:
      return { status: 400, detail: err.message || ERROR_MESSAGES[ERROR_CODES.BAD_REQUEST] };
  }
}

/**
 * Outermost error boundary. Handled errors render as `{ detail }`; anything
 * else becomes the generic 500 body and never takes the process down.
 */
export function createErrorHandler(logger: Logger = defaultLogger): ErrorHandler {
  return (err, req, res, next) => {
    const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;

    if (res.headersSent) {
      logger.warn('http.error.headersSent', { requestId, method: req.method, path: req.path });
      next(err);
      return;
    }

    if (isApiError(err)) {
      const meta = { requestId, method: req.method, path: req.path, status: err.status, errorCode: err.errorCode };
      if (err.status >= 500) {
        logger.error('http.error', { ...meta, errorMessage: err.message });
      } else {
        logger.info('http.rejected', meta);
      }
      sendError(res, err.status, err.message);
      return;
    }

    if (err instanceof multer.MulterError) {
      const { status, detail } = multerStatus(err);
      logger.info('http.rejected', { requestId, method: req.method, path: req.path, status, multerCode: err.code });
      sendError(res, status, detail);
      return;
    }

    const error = err instanceof Error ? err : new Error(String(err));
    logger.error('http.unhandled_error', {
      requestId,
      method: req.method,
      path: req.path,
      errorName: error.name,
      errorMessage: error.message,
      // Stack can contain sensitive paths; keep it only outside production.
      ...(process.env.NODE_ENV === 'production' ? {} : { stack: error.stack }),
    });

    res.status(500).json({
      status: 'error',
      message: ERROR_MESSAGES[ERROR_CODES.INTERNAL_ERROR],
      detail: error.message,
    });
  };
}
