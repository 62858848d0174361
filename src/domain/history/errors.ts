export type ResultLogErrorCode = 'UNSUPPORTED_VERSION' | 'INVALID_RECORD' | 'WRITE_FAILED';

/**
 * Raised when a result log cannot be loaded or appended to
 */
export class ResultLogError extends Error {
  constructor(
    message: string,
    public readonly code: ResultLogErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ResultLogError';
  }
}
