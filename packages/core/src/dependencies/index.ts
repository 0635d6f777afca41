export {
  DEPENDENCIES,
  getDependency,
  getDependencyByVersionKey,
  validateRegistry,
} from "./registry.js";
export type { DependencyDescriptor, FetchSource, FetchSourceType, License } from "./types.js";
