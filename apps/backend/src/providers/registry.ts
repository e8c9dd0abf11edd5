import type { ServiceName } from '@upload-gateway/api-contracts';
import type { AppConfig } from '../config/env.js';
import { ApiError } from '../shared/apiError.js';
import { ERROR_CODES } from '../shared/errors.js';
import type { Logger } from '../utils/logger.js';
import { createMegaAdapter } from './mega/index.js';
import type { ProviderClientAdapter } from './types.js';

export const SUPPORTED_SERVICES: readonly ServiceName[] = ['mega'];

export type AdapterFactories = Record<ServiceName, () => ProviderClientAdapter>;

export function normalizeServiceName(raw: unknown): string {
  return String(raw ?? '')
    .trim()
    .toLowerCase();
}

export function isSupportedService(name: string): name is ServiceName {
  return SUPPORTED_SERVICES.some((service) => service === name);
}

/**
 * Maps provider names to lazily built, cached adapters. One instance is
 * created at startup and passed to the app.
 */
export class ServiceRegistry {
  private readonly factories: AdapterFactories;
  private readonly adapters = new Map<ServiceName, ProviderClientAdapter>();

  constructor(factories: AdapterFactories) {
    this.factories = factories;
  }

  supportedServices(): ServiceName[] {
    return [...SUPPORTED_SERVICES];
  }

  /**
   * Normalize and check a requested name without building anything.
   * Throws `UNSUPPORTED_SERVICE` (400) for unknown names.
   */
  assertSupported(rawName: unknown): ServiceName {
    const name = normalizeServiceName(rawName);
    if (!isSupportedService(name)) {
      throw new ApiError({
        status: 400,
        errorCode: ERROR_CODES.UNSUPPORTED_SERVICE,
        message: `Unsupported service: ${name}. Supported services: ${SUPPORTED_SERVICES.join(', ')}`,
      });
    }
    return name;
  }

  resolve(rawName: unknown): ProviderClientAdapter {
    const name = this.assertSupported(rawName);

    const cached = this.adapters.get(name);
    if (cached) return cached;

    const adapter = this.factories[name]();
    this.adapters.set(name, adapter);
    return adapter;
  }
}

export function createServiceRegistry(config: AppConfig, logger?: Logger): ServiceRegistry {
  return new ServiceRegistry({
    mega: () => createMegaAdapter(config, logger),
  });
}
