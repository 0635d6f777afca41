/**
 * Version Comparison Tests
 *
 * @module core/version/__tests__/compare.test
 */

import { describe, expect, it } from "vitest";

import { NoStableTagsFoundError } from "../../errors/index.js";
import {
  compareVersions,
  isNumericVersion,
  isPrereleaseTag,
  stripVersionPrefix,
} from "../compare.js";
import { selectLatestStableTag } from "../select.js";

const SEMVER_TAG = /^v[0-9]+(?:\.[0-9]+)*$/;

// =============================================================================
// compareVersions
// =============================================================================

describe("compareVersions", () => {
  it("orders by the first differing segment", () => {
    expect(compareVersions("1.10", "1.9")).toBe(1);
    expect(compareVersions("1.9", "1.10")).toBe(-1);
    expect(compareVersions("n7.1", "n7.0.2")).toBe(1);
  });

  it("ignores known prefixes", () => {
    expect(compareVersions("v1.2.3", "1.2.3")).toBe(0);
    expect(compareVersions("nasm-2.16.03", "nasm-3.01")).toBe(-1);
    expect(compareVersions("openssl-3.6.0", "openssl-3.4.0")).toBe(1);
  });

  it("pads the shorter version with zeros", () => {
    expect(compareVersions("1.0", "1.0.0")).toBe(0);
    expect(compareVersions("2", "2.0.1")).toBe(-1);
  });

  it("ignores leading zeros", () => {
    expect(compareVersions("2.16.03", "2.16.3")).toBe(0);
  });

  it("treats non-numeric segments as zero", () => {
    expect(compareVersions("1.2.3-rc1", "1.2.3")).toBe(0);
  });

  it("orders empty strings first", () => {
    expect(compareVersions("", "1.0")).toBe(-1);
    expect(compareVersions("1.0", "")).toBe(1);
    expect(compareVersions("", "")).toBe(0);
  });

  describe("ordering over mixed tags", () => {
    const tags = [
      "v1.2",
      "1.2.0",
      "1.2",
      "nasm-2.16",
      "n7.1",
      "",
      "abc",
      "1.10",
      "1.9",
      "openssl-3.0.1",
      "01.02",
      "2.16.03-rc1",
    ];

    it("is antisymmetric for every pair", () => {
      for (const a of tags) {
        for (const b of tags) {
          expect(compareVersions(a, b) + compareVersions(b, a), `${a} vs ${b}`).toBe(0);
        }
      }
    });

    it("is transitive for every triple", () => {
      for (const a of tags) {
        for (const b of tags) {
          for (const c of tags) {
            if (compareVersions(a, b) <= 0 && compareVersions(b, c) <= 0) {
              expect(compareVersions(a, c), `${a} <= ${b} <= ${c}`).toBeLessThanOrEqual(0);
            }
          }
        }
      }
    });

    it("sorts into a stable order", () => {
      const sorted = [...tags].sort(compareVersions);

      expect(sorted.slice(0, 2)).toEqual(["", "abc"]);
      expect(sorted.slice(-3)).toEqual(["2.16.03-rc1", "openssl-3.0.1", "n7.1"]);
    });
  });
});

describe("stripVersionPrefix", () => {
  it("removes one known prefix", () => {
    expect(stripVersionPrefix("nasm-2.16.03")).toBe("2.16.03");
    expect(stripVersionPrefix("openssl-3.4.0")).toBe("3.4.0");
    expect(stripVersionPrefix("v1.5.2")).toBe("1.5.2");
    expect(stripVersionPrefix("n7.1")).toBe("7.1");
  });

  it("leaves other values alone", () => {
    expect(stripVersionPrefix("1.3.7")).toBe("1.3.7");
    expect(stripVersionPrefix("stable")).toBe("stable");
  });
});

describe("isNumericVersion", () => {
  it("recognizes version numbers", () => {
    expect(isNumericVersion("v3.12.1")).toBe(true);
    expect(isNumericVersion("3.100")).toBe(true);
  });

  it("rejects branch names", () => {
    expect(isNumericVersion("stable")).toBe(false);
    expect(isNumericVersion("")).toBe(false);
  });
});

// =============================================================================
// isPrereleaseTag
// =============================================================================

describe("isPrereleaseTag", () => {
  it("accepts purely numeric tags", () => {
    expect(isPrereleaseTag("v1.2.3")).toBe(false);
    expect(isPrereleaseTag("openssl-3.4.0")).toBe(false);
    expect(isPrereleaseTag("nasm-2.16.03")).toBe(false);
    expect(isPrereleaseTag("n7.1")).toBe(false);
    expect(isPrereleaseTag("1.2.3-4")).toBe(false);
  });

  it("flags suffixed tags", () => {
    expect(isPrereleaseTag("v1.2.3-rc1")).toBe(true);
    expect(isPrereleaseTag("v1.2.3beta")).toBe(true);
    expect(isPrereleaseTag("openssl-3.4.0-alpha1")).toBe(true);
    expect(isPrereleaseTag("n8.1-dev")).toBe(true);
    expect(isPrereleaseTag("v1.0.0-pre")).toBe(true);
    expect(isPrereleaseTag("v1.0.0-snapshot")).toBe(true);
    expect(isPrereleaseTag("v1.0.0+build123")).toBe(true);
  });

  it("flags non-version names", () => {
    expect(isPrereleaseTag("stable")).toBe(true);
  });
});

// =============================================================================
// selectLatestStableTag
// =============================================================================

describe("selectLatestStableTag", () => {
  it("returns the highest matching tag", () => {
    const tags = ["v1.2.0", "v1.10.0", "v1.9.9", "1.11.0"];
    expect(selectLatestStableTag(tags, SEMVER_TAG)).toBe("v1.10.0");
  });

  it("skips prereleases that match the pattern", () => {
    const tags = ["v1.0.0", "v2.0.0-rc1", "v1.1.0"];
    expect(selectLatestStableTag(tags, /^v/)).toBe("v1.1.0");
  });

  it("works with dependency-specific prefixes", () => {
    expect(
      selectLatestStableTag(["nasm-2.16.02", "nasm-2.16.03", "nasm-3.01"], /^nasm-[0-9]+(?:\.[0-9]+)*$/)
    ).toBe("nasm-3.01");
    expect(
      selectLatestStableTag(
        ["openssl-3.0.0", "openssl-3.6.0", "openssl-3.4.0", "OpenSSL_1_1_1w"],
        /^openssl-3\.[0-9]+(?:\.[0-9]+)?$/
      )
    ).toBe("openssl-3.6.0");
  });

  it("keeps input order between equal versions", () => {
    expect(selectLatestStableTag(["1.0", "1.0.0"], /^[0-9]/)).toBe("1.0");
    expect(selectLatestStableTag(["1.0.0", "1.0"], /^[0-9]/)).toBe("1.0.0");
  });

  it("does not mutate the input", () => {
    const tags = ["v1.0.0", "v3.0.0", "v2.0.0"];
    selectLatestStableTag(tags, SEMVER_TAG);
    expect(tags).toEqual(["v1.0.0", "v3.0.0", "v2.0.0"]);
  });

  it("resets lastIndex on global patterns", () => {
    const global = /^v[0-9]+(?:\.[0-9]+)*$/g;
    expect(selectLatestStableTag(["v1.0", "v1.1", "v1.2"], global)).toBe("v1.2");
  });

  it("throws when nothing is eligible", () => {
    expect(() => selectLatestStableTag(["v1.0.0-rc1", "latest"], /^v/)).toThrow(
      NoStableTagsFoundError
    );
    expect(() => selectLatestStableTag([], SEMVER_TAG)).toThrow(
      `No stable tags found matching ${SEMVER_TAG}`
    );
  });
});
