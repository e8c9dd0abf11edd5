export const ERROR_CODES = {
  BAD_REQUEST: 'BAD_REQUEST',
  MISSING_CREDENTIAL: 'MISSING_CREDENTIAL',
  INVALID_CREDENTIAL: 'INVALID_CREDENTIAL',
  NOT_FOUND: 'NOT_FOUND',
  // Upload validation
  MISSING_FILE_NAME: 'MISSING_FILE_NAME',
  UNSUPPORTED_SERVICE: 'UNSUPPORTED_SERVICE',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  // Staging / delegation
  STAGING_FAILED: 'STAGING_FAILED',
  UPLOAD_FAILED: 'UPLOAD_FAILED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  BAD_REQUEST: 'Bad request',
  MISSING_CREDENTIAL: 'Missing authentication token',
  INVALID_CREDENTIAL: 'Invalid authentication token',
  NOT_FOUND: 'Not Found',
  MISSING_FILE_NAME: 'No filename provided',
  UNSUPPORTED_SERVICE: 'Unsupported service',
  FILE_TOO_LARGE: 'File too large',
  STAGING_FAILED: 'Upload failed',
  UPLOAD_FAILED: 'Upload failed',
  INTERNAL_ERROR: 'Internal server error',
};

export type ApiErrorResponse = {
  detail: string;
};
