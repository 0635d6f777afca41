export {
  formatDate,
  parseVersionsContent,
  renderVersionsDocument,
  TIMESTAMP_PREFIX,
  type VersionsDocument,
  type VersionsLine,
  type VersionsMap,
  type VersionUpdates,
} from "./document.js";
export {
  getMetadataFromContent,
  getVersionMetadataSync,
  type VersionMetadata,
} from "./metadata.js";
export {
  parseVersionsFile,
  parseVersionsFileSync,
  type UpdateVersionsFileOptions,
  updateVersionsFile,
} from "./store.js";
