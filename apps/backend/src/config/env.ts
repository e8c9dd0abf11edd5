import path from 'node:path';
import { z } from 'zod';
import { logger, parseLogLevel, type LogLevel } from '../utils/logger.js';

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
  z.string().optional()
);

const envSchema = z.object({
  AUTH_TOKEN: z.string().min(1).optional().default('default-secret-token'),
  HOST: z.string().min(1).optional().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).optional().default(8080),

  MEGA_EMAIL: optionalString,
  MEGA_PASSWORD: optionalString,

  TEMP_UPLOAD_DIR: z.string().min(1).optional().default('temp_uploads'),
  MAX_FILE_SIZE: z.coerce.number().int().positive().optional().default(500 * 1024 * 1024),
  PROVIDER_CONCURRENCY: z.coerce.number().int().positive().optional().default(4),

  LOG_LEVEL: z
    .string()
    .optional()
    .default('info')
    .refine((value) => parseLogLevel(value) !== null, { message: 'LOG_LEVEL must be debug, info, warn or error' }),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().optional().default(10_000),
});

export type Env = z.infer<typeof envSchema>;

export type ProviderCredentials = {
  email?: string;
  password?: string;
};

/**
 * Static process configuration handed to the app at startup.
 */
export type AppConfig = {
  authToken: string;
  host: string;
  port: number;
  /** Scratch directory exactly as configured (reported by /status). */
  tempUploadDir: string;
  /** Absolute scratch directory used for staging. */
  tempUploadPath: string;
  maxFileSize: number;
  providerConcurrency: number;
  logLevel: LogLevel;
  shutdownTimeoutMs: number;
  mega: ProviderCredentials;
};

export function toAppConfig(env: Env, cwd: string = process.cwd()): AppConfig {
  return {
    authToken: env.AUTH_TOKEN,
    host: env.HOST,
    port: env.PORT,
    tempUploadDir: env.TEMP_UPLOAD_DIR,
    tempUploadPath: path.resolve(cwd, env.TEMP_UPLOAD_DIR),
    maxFileSize: env.MAX_FILE_SIZE,
    providerConcurrency: env.PROVIDER_CONCURRENCY,
    logLevel: parseLogLevel(env.LOG_LEVEL) ?? 'info',
    shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    mega: {
      email: env.MEGA_EMAIL,
      password: env.MEGA_PASSWORD,
    },
  };
}

export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

export function validateEnv(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = parseEnv(source);
  if (!result.success) {
    logger.error('env.invalid', { errors: result.error.format() });
    process.exit(1);
  }
  return toAppConfig(result.data);
}
