// ============================================
// depsync Core Engine
// ============================================

/**
 * @module @depsync/core
 *
 * Dependency version resolution and synchronization: registry fetchers,
 * version comparison, checksum verification, the versions file store and
 * the update orchestrator, plus the errors, logging and configuration they
 * share.
 */

export * from "./checksum/index.js";
export * from "./config/index.js";
export * from "./dependencies/index.js";
export * from "./errors/index.js";
export * from "./logger/index.js";
export * from "./registry/index.js";
export * from "./update/index.js";
export * from "./version/index.js";
export * from "./versions-file/index.js";
