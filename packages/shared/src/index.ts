// ============================================
// depsync Shared Utilities
// ============================================

export {
  closeDefaultPool,
  createHttpPool,
  DEFAULT_POOL_OPTIONS,
  defaultHttpPool,
  type FetchWithPoolOptions,
  fetchWithPool,
  type HttpPool,
  type HttpPoolOptions,
} from "./http/index.js";
export {
  asciiIcons,
  getIcons,
  type IconSet,
  type IconSupport,
  resetIconDetection,
  setIconSet,
  unicodeIcons,
} from "./theme/icons.js";
export type { Result } from "./types/result.js";
export { Err, isErr, isOk, Ok } from "./types/result.js";
