import { createHash, timingSafeEqual } from 'node:crypto';
import { ApiError } from '../shared/apiError.js';
import { ERROR_CODES } from '../shared/errors.js';

export const AUTH_TOKEN_HEADER_NAME = 'X-Auth-Token';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Constant-time string equality. Both sides are hashed first so the comparison
 * never depends on the presented token's length.
 */
export function tokensMatch(presented: string, secret: string): boolean {
  return timingSafeEqual(digest(presented), digest(secret));
}

/**
 * Check a presented credential against the configured secret.
 * Throws `MISSING_CREDENTIAL` (401) or `INVALID_CREDENTIAL` (403).
 */
export function verifyAuthToken(presented: string | undefined | null, secret: string): void {
  if (!presented) {
    throw new ApiError({ status: 401, errorCode: ERROR_CODES.MISSING_CREDENTIAL });
  }

  if (!tokensMatch(presented, secret)) {
    throw new ApiError({ status: 403, errorCode: ERROR_CODES.INVALID_CREDENTIAL });
  }
}
