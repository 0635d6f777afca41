/**
 * Versions File Store
 *
 * Reads and rewrites the persisted versions file. The file is read once per
 * operation and written at most once.
 *
 * @module core/versions-file/store
 */

import { readFileSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";

import { DepsyncError, ErrorCode, VersionsFileNotFoundError } from "../errors/index.js";
import {
  parseVersionsContent,
  renderVersionsDocument,
  type VersionsDocument,
  type VersionUpdates,
} from "./document.js";

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

function toReadError(filePath: string, error: unknown): DepsyncError {
  if (isMissingFile(error)) {
    return new VersionsFileNotFoundError(filePath, error);
  }
  return new DepsyncError(`Failed to read versions file: ${filePath}`, ErrorCode.SYSTEM_IO_ERROR, {
    cause: error,
    context: { path: filePath },
    isRetryable: false,
  });
}

/**
 * Read and parse a versions file.
 *
 * @throws VersionsFileNotFoundError if the file does not exist
 * @throws DepsyncError with SYSTEM_IO_ERROR for any other read failure
 */
export async function parseVersionsFile(filePath: string): Promise<VersionsDocument> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    throw toReadError(filePath, error);
  }
  return parseVersionsContent(content);
}

/**
 * Synchronous variant of {@link parseVersionsFile}.
 */
export function parseVersionsFileSync(filePath: string): VersionsDocument {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw toReadError(filePath, error);
  }
  return parseVersionsContent(content);
}

export interface UpdateVersionsFileOptions {
  /** Date written to the timestamp anchor (default: now) */
  now?: Date;
}

/**
 * Rewrite the values of `updates` keys in place, preserving every other byte
 * of the file apart from the timestamp anchor.
 */
export async function updateVersionsFile(
  filePath: string,
  updates: VersionUpdates,
  options: UpdateVersionsFileOptions = {}
): Promise<void> {
  const document = await parseVersionsFile(filePath);
  const rendered = renderVersionsDocument(document, updates, options.now ?? new Date());

  try {
    await writeFile(filePath, rendered, "utf-8");
  } catch (error) {
    throw new DepsyncError(
      `Failed to write versions file: ${filePath}`,
      ErrorCode.SYSTEM_IO_ERROR,
      { cause: error, context: { path: filePath }, isRetryable: false }
    );
  }
}
