export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(event: string, meta?: LogMeta): void;
  info(event: string, meta?: LogMeta): void;
  warn(event: string, meta?: LogMeta): void;
  error(event: string, meta?: LogMeta): void;
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw: unknown): LogLevel | null {
  const value = String(raw ?? '')
    .trim()
    .toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value;
  if (value === 'warning') return 'warn';
  if (value === 'critical') return 'error';
  return null;
}

function levelFromEnv(): LogLevel {
  return parseLogLevel(process.env.LOG_LEVEL) ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug');
}

function safeJsonStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return JSON.stringify({ error: 'LOG_SERIALIZATION_FAILED' });
  }
}

/**
 * JSON-lines logger. `minLevel` may be a function so the threshold can follow
 * the environment at call time.
 */
export function createLogger(minLevel: LogLevel | (() => LogLevel)): Logger {
  const threshold = typeof minLevel === 'function' ? minLevel : () => minLevel;

  const log = (level: LogLevel, event: string, meta: LogMeta = {}): void => {
    if (levelOrder[level] < levelOrder[threshold()]) return;

    const payload = {
      ts: new Date().toISOString(),
      level,
      event,
      ...meta,
    };

    const line = safeJsonStringify(payload) + '\n';

    // Use stdout/stderr directly so logs are not affected by console overrides.
    if (level === 'error') {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  };

  return {
    debug: (event, meta) => log('debug', event, meta),
    info: (event, meta) => log('info', event, meta),
    warn: (event, meta) => log('warn', event, meta),
    error: (event, meta) => log('error', event, meta),
  };
}

export const logger: Logger = createLogger(levelFromEnv);

export function errorMeta(error: unknown): LogMeta {
  if (error instanceof Error) {
    return { errorName: error.name, errorMessage: error.message };
  }
  return { errorMessage: String(error) };
}
