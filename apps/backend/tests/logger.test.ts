import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, errorMeta, parseLogLevel } from '../src/utils/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

function captureStreams() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });
  return { stdout, stderr };
}

describe('parseLogLevel', () => {
  it('accepts the standard names in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' info ')).toBe('info');
    expect(parseLogLevel('warning')).toBe('warn');
    expect(parseLogLevel('CRITICAL')).toBe('error');
    expect(parseLogLevel('loud')).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });
});

describe('createLogger', () => {
  it('writes JSON lines at or above the threshold', () => {
    const { stdout, stderr } = captureStreams();
    const logger = createLogger('warn');

    logger.info('ignored');
    logger.warn('staging.release_failed', { path: '/tmp/x' });
    logger.error('http.error', { status: 500 });

    expect(stdout).toHaveLength(1);
    expect(stderr).toHaveLength(1);
    expect(JSON.parse(stdout[0])).toMatchObject({ level: 'warn', event: 'staging.release_failed', path: '/tmp/x' });
    expect(JSON.parse(stderr[0])).toMatchObject({ level: 'error', event: 'http.error', status: 500 });
    expect(stdout[0].endsWith('\n')).toBe(true);
  });

  it('reads a dynamic threshold on every call', () => {
    const { stdout } = captureStreams();
    let level: 'debug' | 'error' = 'error';
    const logger = createLogger(() => level);

    logger.info('first');
    level = 'debug';
    logger.info('second');

    expect(stdout.map((line) => JSON.parse(line).event)).toEqual(['second']);
  });
});

describe('errorMeta', () => {
  it('describes errors and other thrown values', () => {
    expect(errorMeta(new TypeError('bad input'))).toEqual({ errorName: 'TypeError', errorMessage: 'bad input' });
    expect(errorMeta('plain')).toEqual({ errorMessage: 'plain' });
  });
});
