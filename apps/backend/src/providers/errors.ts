export type ProviderErrorKind = 'MISSING_CREDENTIALS' | 'REMOTE_REJECTED' | 'UPLOAD_FAILED' | 'LINK_FETCH_FAILED';

export class ProviderError extends Error {
  public readonly kind: ProviderErrorKind;
  public readonly provider: string;

  constructor(params: { kind: ProviderErrorKind; provider: string; message: string; cause?: unknown }) {
    super(params.message, { cause: params.cause });
    this.name = 'ProviderError';
    this.kind = params.kind;
    this.provider = params.provider;
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}
