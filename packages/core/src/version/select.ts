import { NoStableTagsFoundError } from "../errors/index.js";
import { compareVersions, isPrereleaseTag } from "./compare.js";

/**
 * Pick the highest stable tag matching `pattern`.
 *
 * Ties keep their input order. The input array is not mutated.
 *
 * @throws NoStableTagsFoundError if no tag matches or every match is a prerelease
 */
export function selectLatestStableTag(tags: readonly string[], pattern: RegExp): string {
  const matching = tags.filter((tag) => matchesPattern(pattern, tag) && !isPrereleaseTag(tag));

  const [latest] = matching.sort((a, b) => compareVersions(b, a));
  if (latest === undefined) {
    throw new NoStableTagsFoundError(pattern, tags.length);
  }
  return latest;
}

function matchesPattern(pattern: RegExp, tag: string): boolean {
  // Global and sticky regexes carry lastIndex between test() calls
  pattern.lastIndex = 0;
  return pattern.test(tag);
}
