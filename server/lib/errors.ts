export type PoolDataErrorCode =
  | 'SCHEMA_MISMATCH'
  | 'TIMESTAMP_PARSE_FAILURE'
  | 'REPEATED_DIGEST'
  | 'AGGREGATOR_FINALIZED'
  | 'INVALID_SELECTOR'
  | 'INVALID_LIMIT'
  | 'EMPTY_SNAPSHOT'
  | 'NO_SNAPSHOTS'
  | 'DUPLICATE_SAMPLE'
  | 'INPUT_NOT_FOUND'
  | 'INVALID_CONFIG';

export interface PoolDataErrorOptions {
  filePath?: string;
  cause?: unknown;
}

export class PoolDataError extends Error {
  readonly code: PoolDataErrorCode;
  readonly filePath?: string;

  constructor(code: PoolDataErrorCode, message: string, options: PoolDataErrorOptions = {}) {
    super(options.filePath ? `${message} (${options.filePath})` : message, { cause: options.cause });
    this.name = 'PoolDataError';
    this.code = code;
    this.filePath = options.filePath;
  }
}

// Caller mistakes rather than bad input data.
const REQUEST_ERROR_CODES = new Set<PoolDataErrorCode>(['INVALID_SELECTOR', 'INVALID_LIMIT', 'INVALID_CONFIG']);

export function isPoolDataError(error: unknown, code?: PoolDataErrorCode): error is PoolDataError {
  return error instanceof PoolDataError && (code === undefined || error.code === code);
}

export function isRequestError(error: unknown): boolean {
  return error instanceof PoolDataError && REQUEST_ERROR_CODES.has(error.code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
