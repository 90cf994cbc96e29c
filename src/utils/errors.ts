export enum ErrorCode {
  // Network errors (1xxx)
  NETWORK_ERROR = 1001,
  REQUEST_TIMEOUT = 1002,
  RATE_LIMITED = 1003,
  SERVER_ERROR = 1004,
  EMPTY_RESPONSE = 1005,
  INVALID_ARCHIVE = 1006,

  // Remote archive errors (2xxx)
  RESOURCE_NOT_FOUND = 2001,

  // Configuration errors (3xxx)
  INVALID_CONFIGURATION = 3001,
  INVALID_SYMBOL = 3002,
  INVALID_INTERVAL = 3003,
  INVALID_DATE_RANGE = 3004,

  // Local storage errors (4xxx)
  LOCAL_IO_ERROR = 4001,

  // System errors (6xxx)
  SYSTEM_ERROR = 6001,
}

/**
 * How a failed transfer is reported in a FetchOutcome.
 * `InvalidConfiguration` never reaches an outcome: it aborts the run.
 */
export type ErrorKind = 'InvalidConfiguration' | 'Transient' | 'NotFound' | 'LocalIOError';

export type FetchErrorKind = Exclude<ErrorKind, 'InvalidConfiguration'>;

export class ArchiveError extends Error {
  public readonly code: ErrorCode;
  public readonly kind: ErrorKind;
  public readonly details?: Record<string, unknown>;
  public readonly isRetryable: boolean;
  public readonly timestamp: Date;

  constructor(
    code: ErrorCode,
    kind: ErrorKind,
    message: string,
    details?: Record<string, unknown>,
    isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'ArchiveError';
    this.code = code;
    this.kind = kind;
    this.details = details;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ArchiveError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      details: this.details,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export class TransientError extends ArchiveError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCode.NETWORK_ERROR) {
    super(code, 'Transient', message, details, true);
    this.name = 'TransientError';
  }
}

export class RateLimitError extends ArchiveError {
  public readonly retryAfter: number;

  constructor(retryAfter: number, details?: Record<string, unknown>) {
    super(ErrorCode.RATE_LIMITED, 'Transient', `Rate limited. Retry after ${retryAfter}ms`, details, true);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

export class NotFoundError extends ArchiveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.RESOURCE_NOT_FOUND, 'NotFound', message, details, false);
    this.name = 'NotFoundError';
  }
}

export class LocalIOError extends ArchiveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.LOCAL_IO_ERROR, 'LocalIOError', message, details, false);
    this.name = 'LocalIOError';
  }
}

export class InvalidConfigurationError extends ArchiveError {
  public readonly field?: string;

  constructor(
    message: string,
    field?: string,
    details?: Record<string, unknown>,
    code: ErrorCode = ErrorCode.INVALID_CONFIGURATION
  ) {
    super(code, 'InvalidConfiguration', message, { ...details, field }, false);
    this.name = 'InvalidConfigurationError';
    this.field = field;
  }
}

// Filesystem failures that retrying the download will not fix
const LOCAL_IO_CODES = new Set([
  'ENOSPC',
  'EACCES',
  'EPERM',
  'EROFS',
  'EISDIR',
  'ENOTDIR',
  'EMFILE',
  'ENFILE',
  'EDQUOT',
  'EEXIST',
]);

function errnoCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isLocalIoFailure(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = errnoCode(error);
  return code !== undefined && LOCAL_IO_CODES.has(code);
}

/**
 * Normalise anything thrown during a transfer into an ArchiveError.
 * Unrecognised failures are treated as transient.
 */
export function toArchiveError(error: unknown): ArchiveError {
  if (error instanceof ArchiveError) {
    return error;
  }

  if (error instanceof Error) {
    const code = errnoCode(error);
    if (isLocalIoFailure(error)) {
      return new LocalIOError(error.message, { errno: code });
    }
    if (code === 'ETIMEDOUT' || code === 'ECONNABORTED' || error.message.toLowerCase().includes('timeout')) {
      return new TransientError(error.message, { errno: code }, ErrorCode.REQUEST_TIMEOUT);
    }
    return new TransientError(error.message, { errno: code, originalError: error.name });
  }

  return new TransientError('Unknown error occurred', { error: String(error) });
}

export function isArchiveError(error: unknown): error is ArchiveError {
  return error instanceof ArchiveError;
}
