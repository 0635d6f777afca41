/**
 * HTTP Connection Pool Module
 *
 * Shared HTTP client with connection pooling for registry and download
 * requests. Registry fetches fan out to a handful of API origins at once,
 * so keep-alive connections are reused across dependencies.
 *
 * @module @depsync/shared/http
 */

import {
  Agent,
  type Agent as AgentType,
  type RequestInit as UndiciRequestInit,
  fetch as undiciFetch,
} from "undici";

/**
 * Configuration options for creating an HTTP connection pool.
 */
export interface HttpPoolOptions {
  /**
   * Maximum time a connection can remain idle before being closed (ms).
   * @default 30_000
   */
  keepAliveTimeout?: number;

  /**
   * Maximum time a connection can be kept alive (ms).
   * @default 60_000
   */
  keepAliveMaxTimeout?: number;

  /**
   * Maximum number of connections per origin.
   * @default 16
   */
  connections?: number;

  /**
   * Connection timeout (ms).
   * @default 10_000
   */
  connect?: {
    timeout?: number;
  };
}

export const DEFAULT_POOL_OPTIONS: Required<Omit<HttpPoolOptions, "connect">> & {
  connect: { timeout: number };
} = {
  keepAliveTimeout: 30_000,
  keepAliveMaxTimeout: 60_000,
  connections: 16,
  connect: {
    timeout: 10_000,
  },
} as const;

/**
 * Creates a new HTTP connection pool with the specified options.
 *
 * @example
 * ```typescript
 * const pool = createHttpPool({ connections: 4 });
 * const response = await fetchWithPool("https://api.github.com/repos/xiph/opus/tags", { pool });
 * ```
 */
export function createHttpPool(options: HttpPoolOptions = {}): AgentType {
  return new Agent({
    keepAliveTimeout: options.keepAliveTimeout ?? DEFAULT_POOL_OPTIONS.keepAliveTimeout,
    keepAliveMaxTimeout: options.keepAliveMaxTimeout ?? DEFAULT_POOL_OPTIONS.keepAliveMaxTimeout,
    connections: options.connections ?? DEFAULT_POOL_OPTIONS.connections,
    connect: {
      timeout: options.connect?.timeout ?? DEFAULT_POOL_OPTIONS.connect.timeout,
    },
  });
}

/**
 * Default shared HTTP connection pool instance.
 */
export const defaultHttpPool: AgentType = createHttpPool();

/**
 * Extended fetch options that include the dispatcher for connection pooling.
 */
export interface FetchWithPoolOptions extends Omit<UndiciRequestInit, "dispatcher"> {
  /**
   * Custom pool to use instead of the default.
   */
  pool?: AgentType;
}

/**
 * Fetch wrapper that automatically uses connection pooling.
 *
 * Drop-in replacement for `fetch()`; redirects are followed as usual.
 */
export async function fetchWithPool(
  url: string | URL,
  options: FetchWithPoolOptions = {}
): Promise<Response> {
  const { pool, ...fetchOptions } = options;
  const dispatcher = pool ?? defaultHttpPool;

  // undici's Response is structurally the global one on Node 20
  return undiciFetch(url, {
    ...fetchOptions,
    dispatcher,
  }) as Promise<Response>;
}

/**
 * Gracefully closes the default HTTP pool so the process can exit.
 */
export async function closeDefaultPool(): Promise<void> {
  await defaultHttpPool.close();
}

export type { AgentType as HttpPool };
