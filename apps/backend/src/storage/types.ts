/**
 * An uploaded body written to the scratch directory. Owned by one request and
 * released exactly once.
 */
export type StagedFile = {
  absolutePath: string;
  originalFileName: string;
  size: number;
};

export class StagingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StagingError';
  }
}
