// ============================================
// depsync Errors - Barrel Export
// ============================================

export {
  FetchError,
  getNetworkErrorCode,
  isNetworkError,
  NETWORK_ERROR_CODES,
  NetworkError,
  type NetworkErrorCode,
  wrapNetworkError,
} from "./network.js";
export { AbortError, type RetryOptions, withRetry } from "./retry.js";
export {
  ChecksumDownloadError,
  NoStableTagsFoundError,
  PinNotFoundError,
  VersionsFileNotFoundError,
} from "./sync.js";
export {
  DepsyncError,
  type DepsyncErrorOptions,
  describeError,
  ErrorCode,
  ErrorSeverity,
  inferSeverity,
  isRetryableError,
} from "./types.js";
