// ============================================
// depsync Version Comparison
// ============================================

/**
 * Known tag prefixes, longest first so `nasm-` wins over `n`.
 */
const VERSION_PREFIX_PATTERN = /^(nasm-|openssl-|v|n)/;

/** Purely numeric segments separated by `.` or `-` */
const NUMERIC_VERSION_PATTERN = /^[0-9]+(?:[.-][0-9]+)*$/;

export type Ordering = -1 | 0 | 1;

/**
 * Remove at most one known prefix from a tag.
 *
 * @example
 * ```typescript
 * stripVersionPrefix("nasm-2.16.03"); // "2.16.03"
 * stripVersionPrefix("n7.1");         // "7.1"
 * stripVersionPrefix("stable");       // "stable"
 * ```
 */
export function stripVersionPrefix(value: string): string {
  return value.replace(VERSION_PREFIX_PATTERN, "");
}

function toSegments(value: string): number[] {
  const cleaned = stripVersionPrefix(value);
  if (cleaned === "") {
    return [];
  }
  // Non-numeric segments count as 0
  return cleaned.split(/[.-]/).map((part) => Number.parseInt(part, 10) || 0);
}

/**
 * Compare two version strings segment by segment.
 *
 * Missing segments are treated as 0, so `1.0` equals `1.0.0`.
 *
 * @returns -1 when `a < b`, 1 when `a > b`, 0 when equal
 */
export function compareVersions(a: string, b: string): Ordering {
  const left = toSegments(a);
  const right = toSegments(b);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const l = left[i] ?? 0;
    const r = right[i] ?? 0;
    if (l !== r) {
      return l < r ? -1 : 1;
    }
  }

  return 0;
}

/**
 * A tag is stable only if, after prefix stripping, it is made of numeric
 * segments alone. `-rc1`, `beta`, `-dev` or `+build` suffixes mark a prerelease.
 */
export function isPrereleaseTag(tag: string): boolean {
  return !NUMERIC_VERSION_PATTERN.test(stripVersionPrefix(tag));
}

/**
 * Whether a value looks like a version number rather than a moving target
 * such as a branch name.
 */
export function isNumericVersion(value: string): boolean {
  return /^[0-9]/.test(stripVersionPrefix(value));
}
