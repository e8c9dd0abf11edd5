import type { Response } from 'express';
import { ERROR_MESSAGES, type ApiErrorResponse, type ErrorCode } from './errors.js';

export class ApiError extends Error {
  public readonly status: number;
  public readonly errorCode: ErrorCode;

  constructor(params: { status: number; errorCode: ErrorCode; message?: string; cause?: unknown }) {
    super(params.message || ERROR_MESSAGES[params.errorCode], { cause: params.cause });
    this.name = 'ApiError';
    this.status = params.status;
    this.errorCode = params.errorCode;
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function sendError(res: Response, status: number, detail: string) {
  const body: ApiErrorResponse = { detail };
  return res.status(status).json(body);
}
