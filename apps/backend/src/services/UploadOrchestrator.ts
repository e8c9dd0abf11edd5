import type { ServiceName } from '@upload-gateway/api-contracts';
import multer from 'multer';
import { verifyAuthToken } from '../auth/tokenGate.js';
import { isProviderError } from '../providers/errors.js';
import type { ServiceRegistry } from '../providers/registry.js';
import { ApiError, isApiError } from '../shared/apiError.js';
import { ERROR_CODES } from '../shared/errors.js';
import type { StagingStore } from '../storage/stagingStore.js';
import type { StagedFile } from '../storage/types.js';
import { errorMeta, logger as defaultLogger, type Logger } from '../utils/logger.js';

export type UploadState = 'received' | 'authenticated' | 'validated' | 'staged' | 'delegated' | 'completed' | 'failed';

export type IncomingUpload = {
  credentialToken?: string | null;
  /** Requested provider name, before normalization. Defaults to "mega". */
  serviceName?: unknown;
  /**
   * Reads the request body into the staging store. Resolves `null` when the
   * request carries no named file. Only called once auth and service checks pass.
   */
  receiveFile: () => Promise<StagedFile | null>;
  requestId?: string;
};

export type UploadOutcome = {
  fileName: string;
  service: ServiceName;
  link: string;
};

export type UploadOrchestratorDeps = {
  authToken: string;
  registry: ServiceRegistry;
  stagingStore: StagingStore;
  logger?: Logger;
};

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function uploadFailed(error: unknown, errorCode: typeof ERROR_CODES.STAGING_FAILED | typeof ERROR_CODES.UPLOAD_FAILED) {
  return new ApiError({ status: 500, errorCode, message: `Upload failed: ${messageOf(error)}`, cause: error });
}

/**
 * Request-level upload pipeline:
 * received → authenticated → validated → staged → delegated → completed.
 *
 * Any step may exit to `failed`. Once a file is staged it is released exactly
 * once, after delegation settles and before the outcome is returned.
 */
export class UploadOrchestrator {
  private readonly authToken: string;
  private readonly registry: ServiceRegistry;
  private readonly stagingStore: StagingStore;
  private readonly logger: Logger;

  constructor(deps: UploadOrchestratorDeps) {
    this.authToken = deps.authToken;
    this.registry = deps.registry;
    this.stagingStore = deps.stagingStore;
    this.logger = deps.logger ?? defaultLogger;
  }

  async run(input: IncomingUpload): Promise<UploadOutcome> {
    const requestId = input.requestId;
    let state: UploadState = 'received';
    this.logger.debug('upload.started', { requestId });

    try {
      verifyAuthToken(input.credentialToken, this.authToken);
      state = 'authenticated';

      const service = this.registry.assertSupported(input.serviceName ?? 'mega');
      state = 'validated';

      const staged = await this.receive(input);
      state = 'staged';
      this.logger.info('upload.staged', {
        requestId,
        service,
        fileName: staged.originalFileName,
        size: staged.size,
      });

      let link: string;
      try {
        state = 'delegated';
        link = await this.delegate(service, staged);
      } finally {
        await this.stagingStore.release(staged);
      }

      state = 'completed';
      this.logger.info('upload.completed', { requestId, service, fileName: staged.originalFileName, link });
      return { fileName: staged.originalFileName, service, link };
    } catch (error) {
      this.logger.warn('upload.failed', {
        requestId,
        state,
        errorCode: isApiError(error) ? error.errorCode : undefined,
        providerErrorKind: isApiError(error) && isProviderError(error.cause) ? error.cause.kind : undefined,
        ...errorMeta(error),
      });
      throw error;
    }
  }

  private async receive(input: IncomingUpload): Promise<StagedFile> {
    let staged: StagedFile | null;
    try {
      staged = await input.receiveFile();
    } catch (error) {
      // Client-facing parse errors keep their own mapping.
      if (isApiError(error) || error instanceof multer.MulterError) throw error;
      throw uploadFailed(error, ERROR_CODES.STAGING_FAILED);
    }

    if (!staged || !staged.originalFileName) {
      if (staged) await this.stagingStore.release(staged);
      throw new ApiError({ status: 400, errorCode: ERROR_CODES.MISSING_FILE_NAME });
    }
    return staged;
  }

  private async delegate(service: ServiceName, staged: StagedFile): Promise<string> {
    try {
      const adapter = this.registry.resolve(service);
      return await adapter.uploadAndLink(staged);
    } catch (error) {
      throw uploadFailed(error, ERROR_CODES.UPLOAD_FAILED);
    }
  }
}
