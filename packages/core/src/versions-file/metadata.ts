import { readFileSync } from "node:fs";

import { formatDate, parseVersionsContent } from "./document.js";

export interface VersionMetadata {
  /** Date of the last recorded update, `YYYY-MM-DD` */
  lastUpdated: string;
  /** Pinned FFmpeg release without its `n` prefix, or "unknown" */
  ffmpegVersion: string;
}

const TIMESTAMP_PATTERN = /^# Updated: (\d{4}-\d{2}-\d{2})/m;

/**
 * Extract release metadata from versions file content.
 * Falls back to `now` when the file carries no timestamp.
 */
export function getMetadataFromContent(content: string, now: Date = new Date()): VersionMetadata {
  const lastUpdated = TIMESTAMP_PATTERN.exec(content)?.[1] ?? formatDate(now);

  const ffmpeg = parseVersionsContent(content).values.get("FFMPEG_VERSION");
  const ffmpegVersion = ffmpeg?.startsWith("n") ? ffmpeg.slice(1) : "unknown";

  return { lastUpdated, ffmpegVersion };
}

export function getVersionMetadataSync(filePath: string): VersionMetadata {
  return getMetadataFromContent(readFileSync(filePath, "utf-8"));
}
