import { createHash } from "node:crypto";

import { ChecksumDownloadError } from "../errors/index.js";
import type { RegistryHttpClient } from "../registry/index.js";

/**
 * Download `url` and return the lowercase hex SHA-256 of its body.
 * The payload is hashed chunk by chunk and never held in memory.
 *
 * @throws ChecksumDownloadError wrapping whatever made the download fail
 */
export async function computeChecksum(url: string, client: RegistryHttpClient): Promise<string> {
  try {
    return await client.download(url, sha256OfStream);
  } catch (error) {
    throw new ChecksumDownloadError(url, error);
  }
}

/**
 * Hash a byte stream to completion.
 */
export async function sha256OfStream(body: ReadableStream<Uint8Array>): Promise<string> {
  const hash = createHash("sha256");
  const reader = body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      hash.update(value);
    }
  } finally {
    reader.releaseLock();
  }
  return hash.digest("hex");
}
