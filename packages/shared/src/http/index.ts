/**
 * HTTP utilities module
 *
 * @module @depsync/shared/http
 */

export {
  closeDefaultPool,
  createHttpPool,
  DEFAULT_POOL_OPTIONS,
  defaultHttpPool,
  type FetchWithPoolOptions,
  fetchWithPool,
  type HttpPool,
  type HttpPoolOptions,
} from "./pool.js";
