import { describe, expect, it } from 'vitest';
import { tokensMatch, verifyAuthToken } from '../src/auth/tokenGate.js';
import { ApiError } from '../src/shared/apiError.js';

function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('verifyAuthToken', () => {
  it('accepts the configured token', () => {
    expect(() => verifyAuthToken('test-secret', 'test-secret')).not.toThrow();
  });

  it.each([undefined, null, ''])('rejects a missing token (%s) with 401', (presented) => {
    const error = captureError(() => verifyAuthToken(presented, 'test-secret'));

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      status: 401,
      errorCode: 'MISSING_CREDENTIAL',
      message: 'Missing authentication token',
    });
  });

  it('rejects a different token with 403', () => {
    const error = captureError(() => verifyAuthToken('test-secre', 'test-secret'));

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      status: 403,
      errorCode: 'INVALID_CREDENTIAL',
      message: 'Invalid authentication token',
    });
  });
});

describe('tokensMatch', () => {
  it('compares values of any length', () => {
    expect(tokensMatch('abc', 'abc')).toBe(true);
    expect(tokensMatch('abc', 'abcd')).toBe(false);
    expect(tokensMatch('', 'abc')).toBe(false);
  });
});
