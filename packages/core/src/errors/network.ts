// ============================================
// depsync Network Error Detection and Wrapping
// ============================================

import { DepsyncError, type DepsyncErrorOptions, ErrorCode } from "./types.js";

/**
 * Known network error codes that indicate transient network failures.
 */
export const NETWORK_ERROR_CODES = [
  "ECONNRESET", // Connection reset by peer
  "ETIMEDOUT", // Connection timed out
  "ENOTFOUND", // DNS lookup failed
  "ECONNREFUSED", // Connection refused
  "ENETUNREACH", // Network is unreachable
  "EAI_AGAIN", // DNS lookup timed out (temporary failure)
  "EPIPE", // Broken pipe
  "ECONNABORTED", // Connection aborted
  "EHOSTUNREACH", // Host is unreachable
  "UND_ERR_SOCKET", // undici socket error
  "UND_ERR_CONNECT_TIMEOUT", // undici connect timeout
  "UND_ERR_HEADERS_TIMEOUT", // undici headers timeout
  "UND_ERR_BODY_TIMEOUT", // undici body timeout
] as const;

export type NetworkErrorCode = (typeof NETWORK_ERROR_CODES)[number];

const NETWORK_ERROR_MESSAGES: Record<NetworkErrorCode, string> = {
  ECONNRESET: "Connection was reset by the server",
  ETIMEDOUT: "Connection timed out",
  ENOTFOUND: "Could not resolve hostname",
  ECONNREFUSED: "Connection refused by the server",
  ENETUNREACH: "Network is unreachable",
  EAI_AGAIN: "DNS lookup timed out",
  EPIPE: "Connection was closed unexpectedly",
  ECONNABORTED: "Connection was aborted",
  EHOSTUNREACH: "Host is unreachable",
  UND_ERR_SOCKET: "Socket closed unexpectedly",
  UND_ERR_CONNECT_TIMEOUT: "Connection timed out",
  UND_ERR_HEADERS_TIMEOUT: "Server did not send headers in time",
  UND_ERR_BODY_TIMEOUT: "Server stopped sending the body",
};

function isNetworkErrorCode(code: unknown): code is NetworkErrorCode {
  return typeof code === "string" && (NETWORK_ERROR_CODES as readonly string[]).includes(code);
}

function readCode(value: unknown): unknown {
  if (typeof value === "object" && value !== null && "code" in value) {
    return value.code;
  }
  return undefined;
}

/**
 * Gets the network error code from an error, if present.
 * undici's fetch rejects with `TypeError("fetch failed")` and keeps the
 * system error on `cause`, so both levels are inspected.
 */
export function getNetworkErrorCode(error: unknown): NetworkErrorCode | null {
  if (!(error instanceof Error)) {
    return null;
  }
  const direct = readCode(error);
  if (isNetworkErrorCode(direct)) {
    return direct;
  }
  const nested = readCode(error.cause);
  if (isNetworkErrorCode(nested)) {
    return nested;
  }
  return null;
}

/**
 * Checks if an error is a network-related error.
 */
export function isNetworkError(error: unknown): boolean {
  return getNetworkErrorCode(error) !== null;
}

/**
 * Network error class for wrapping low-level network failures.
 * Network errors are always retryable.
 */
export class NetworkError extends DepsyncError {
  /** The original system error code (e.g., ECONNRESET) */
  readonly originalCode: string;

  constructor(
    message: string,
    originalCode: string,
    options?: Omit<DepsyncErrorOptions, "isRetryable">
  ) {
    super(message, ErrorCode.NETWORK_ERROR, {
      ...options,
      context: { ...options?.context, originalCode },
      isRetryable: true,
    });
    this.name = "NetworkError";
    this.originalCode = originalCode;
  }
}

/**
 * Wraps a network error with a user-friendly NetworkError.
 *
 * @throws If the error is not a network error
 */
export function wrapNetworkError(error: Error, url?: string): NetworkError {
  const code = getNetworkErrorCode(error);
  if (!code) {
    throw new Error("wrapNetworkError called with non-network error");
  }

  const friendly = NETWORK_ERROR_MESSAGES[code];
  const message = url ? `${friendly}: ${url}` : friendly;
  return new NetworkError(message, code, { cause: error, context: url ? { url } : undefined });
}

/**
 * HTTP-level failure for a registry or download request.
 *
 * 404 means "no data" and is never retried; every other non-OK status and
 * every transport failure is retryable.
 */
export class FetchError extends DepsyncError {
  readonly url: string;
  readonly status?: number;

  constructor(
    message: string,
    url: string,
    options: { status?: number; code?: ErrorCode; cause?: unknown } = {}
  ) {
    const code = options.code ?? (options.status === 404 ? ErrorCode.NOT_FOUND : ErrorCode.FETCH_FAILED);
    super(message, code, {
      cause: options.cause,
      context: { url, status: options.status },
      isRetryable: code === ErrorCode.FETCH_FAILED || code === ErrorCode.REQUEST_TIMEOUT,
    });
    this.name = "FetchError";
    this.url = url;
    this.status = options.status;
  }
}
