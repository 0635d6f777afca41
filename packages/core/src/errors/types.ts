// ============================================
// depsync Error Types
// ============================================

/**
 * Categorized error codes.
 *
 * Categories:
 * - 1xxx: Configuration and versions file errors
 * - 2xxx: Registry errors
 * - 3xxx: Checksum errors
 * - 5xxx: System errors
 */
export enum ErrorCode {
  // 1xxx - Configuration / versions file
  CONFIG_INVALID = 1001,
  VERSIONS_FILE_NOT_FOUND = 1004,
  PIN_NOT_FOUND = 1005,

  // 2xxx - Registry
  FETCH_FAILED = 2001,
  NETWORK_ERROR = 2002,
  NOT_FOUND = 2003,
  NO_STABLE_TAGS = 2004,
  INVALID_RESPONSE = 2005,
  REQUEST_TIMEOUT = 2006,

  // 3xxx - Checksum
  CHECKSUM_DOWNLOAD_FAILED = 3001,

  // 5xxx - System
  SYSTEM_IO_ERROR = 5001,
}

/**
 * Error severity levels that determine handling strategy.
 */
export enum ErrorSeverity {
  /** Can retry automatically */
  RECOVERABLE = "recoverable",
  /** User needs to fix something */
  USER_ACTION = "user_action",
  /** Cannot continue */
  FATAL = "fatal",
}

/**
 * Infers the appropriate severity level from an error code.
 *
 * - Transport failures and timeouts → RECOVERABLE
 * - Registry data and pin problems → USER_ACTION
 * - Missing versions file → FATAL
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.FETCH_FAILED:
    case ErrorCode.NETWORK_ERROR:
    case ErrorCode.REQUEST_TIMEOUT:
    case ErrorCode.SYSTEM_IO_ERROR:
      return ErrorSeverity.RECOVERABLE;

    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.PIN_NOT_FOUND:
    case ErrorCode.NOT_FOUND:
    case ErrorCode.NO_STABLE_TAGS:
    case ErrorCode.INVALID_RESPONSE:
    case ErrorCode.CHECKSUM_DOWNLOAD_FAILED:
      return ErrorSeverity.USER_ACTION;

    default:
      return ErrorSeverity.FATAL;
  }
}

/**
 * Options for creating a DepsyncError.
 */
export interface DepsyncErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
  /** Whether this error can be retried */
  isRetryable?: boolean;
}

/**
 * Base error class for all depsync errors.
 *
 * Provides:
 * - Categorized error codes
 * - Automatic severity inference
 * - Retry configuration
 * - Error cause chaining
 */
export class DepsyncError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  private readonly _isRetryable?: boolean;

  constructor(message: string, code: ErrorCode, options?: DepsyncErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "DepsyncError";
    this.code = code;
    this.context = options?.context;
    this._isRetryable = options?.isRetryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * The severity level of this error, inferred from the error code.
   */
  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Whether this error can be retried.
   * If not explicitly set, defaults to true for RECOVERABLE severity.
   */
  get isRetryable(): boolean {
    if (this._isRetryable !== undefined) {
      return this._isRetryable;
    }
    return this.severity === ErrorSeverity.RECOVERABLE;
  }
}

/**
 * Checks if an error is retryable.
 * Returns true if error is a DepsyncError with isRetryable=true.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof DepsyncError && error.isRetryable;
}

/**
 * Extract a printable message from any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
