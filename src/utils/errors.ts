export enum ErrorCode {
  // Source errors (1xxx)
  SOURCE_FETCH_ERROR = 1001,
  SOURCE_TIMEOUT = 1002,

  // Validation errors (3xxx)
  VALIDATION_ERROR = 3001,
  ACCOUNT_CONFLICT = 3002,

  // Storage errors (5xxx)
  DB_CONNECTION_ERROR = 5001,
  DB_QUERY_ERROR = 5002,
  DB_TRANSACTION_ERROR = 5003,

  // System errors (6xxx)
  SYSTEM_ERROR = 6001,
  CONFIG_ERROR = 6002,
}

export class TrackerError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly isRetryable: boolean;
  public readonly timestamp: Date;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    isRetryable: boolean = false
  ) {
    super(message);
    this.name = 'TrackerError';
    this.code = code;
    this.details = details;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TrackerError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/** Missing credentials or malformed administrative input. Always fatal. */
export class ConfigurationError extends TrackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFIG_ERROR, message, details, false);
    this.name = 'ConfigurationError';
  }
}

/**
 * A profile page could not be retrieved. Scoped to one account; the next
 * cycle retries it naturally, so nothing retries it in-cycle.
 */
export interface SourceFailure {
  // HTTP status of a response that arrived; absent for transport failures
  status?: number;
  timedOut?: boolean;
}

export class SourceFetchError extends TrackerError {
  public readonly owner: string;
  public readonly status?: number;

  constructor(owner: string, message: string, failure: SourceFailure = {}, details?: Record<string, unknown>) {
    super(
      failure.timedOut ? ErrorCode.SOURCE_TIMEOUT : ErrorCode.SOURCE_FETCH_ERROR,
      message,
      { ...details, owner, status: failure.status },
      true
    );
    this.name = 'SourceFetchError';
    this.owner = owner;
    this.status = failure.status;
  }
}

export class StorageError extends TrackerError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCode.DB_QUERY_ERROR) {
    super(code, message, details, code === ErrorCode.DB_CONNECTION_ERROR);
    this.name = 'StorageError';
  }
}

export class ConflictError extends TrackerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.ACCOUNT_CONFLICT, message, details, false);
    this.name = 'ConflictError';
  }
}

export class ValidationError extends TrackerError {
  public readonly field?: string;

  constructor(message: string, field?: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, { ...details, field }, false);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// pg reports constraint violations through a SQLSTATE code on the error object
export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function handleError(error: unknown): TrackerError {
  if (isTrackerError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new TrackerError(ErrorCode.SYSTEM_ERROR, error.message, { originalError: error.name });
  }

  return new TrackerError(ErrorCode.SYSTEM_ERROR, 'Unknown error occurred', { error: String(error) });
}

export function isTrackerError(error: unknown): error is TrackerError {
  return error instanceof TrackerError;
}
