import { describe, expect, it } from "vitest";

import { DepsyncError, ErrorCode } from "../../errors/index.js";
import {
  DEPENDENCIES,
  getDependency,
  getDependencyByVersionKey,
  validateRegistry,
} from "../registry.js";
import type { DependencyDescriptor } from "../types.js";

function descriptor(
  name: string,
  versionKey: string,
  keys: { urlKey?: string; gitUrlKey?: string } = {}
): DependencyDescriptor {
  return {
    name,
    homepage: "https://example.test/",
    releasesUrl: "https://example.test/releases",
    license: { name: "MIT", url: "https://example.test/license" },
    versionKey,
    fetchSource: { type: "static", version: "1.0.0" },
    ...keys,
  };
}

describe("DEPENDENCIES", () => {
  it("tracks every dependency once", () => {
    expect(DEPENDENCIES).toHaveLength(21);
    expect(() => validateRegistry()).not.toThrow();
  });

  it("pairs every checksum key with a download URL", () => {
    for (const dependency of DEPENDENCIES) {
      if (dependency.sha256Key !== undefined) {
        expect(dependency.downloadUrl("1.0")).toMatch(/^https:\/\//);
      }
    }
  });

  it("normalizes prefixed tags to the stored form", () => {
    expect(getDependency("Opus")?.normalize?.("v1.5.2")).toBe("1.5.2");
    expect(getDependency("NASM")?.normalize?.("nasm-2.16.03")).toBe("2.16.03");
    expect(getDependency("OpenSSL")?.normalize?.("openssl-3.4.0")).toBe("3.4.0");
    expect(getDependency("FFmpeg")?.normalize).toBeUndefined();
  });

  it("builds download URLs from the stored form", () => {
    expect(getDependency("NASM")?.downloadUrl?.("2.16.03")).toBe(
      "https://github.com/netwide-assembler/nasm/archive/refs/tags/nasm-2.16.03.tar.gz"
    );
    expect(getDependency("dav1d")?.downloadUrl?.("1.5.0")).toBe(
      "https://downloads.videolan.org/pub/videolan/dav1d/1.5.0/dav1d-1.5.0.tar.xz"
    );
  });
});

describe("getDependency", () => {
  it("matches names case-insensitively", () => {
    expect(getDependency("opus")?.versionKey).toBe("OPUS_VERSION");
    expect(getDependency("SVT-av1")?.versionKey).toBe("SVTAV1_VERSION");
  });

  it("returns undefined for unknown names", () => {
    expect(getDependency("libfoo")).toBeUndefined();
  });
});

describe("getDependencyByVersionKey", () => {
  it("finds the owner of a version key", () => {
    expect(getDependencyByVersionKey("NASM_VERSION")?.name).toBe("NASM");
  });

  it("is case-sensitive", () => {
    expect(getDependencyByVersionKey("nasm_version")).toBeUndefined();
  });
});

describe("validateRegistry", () => {
  it("rejects duplicate names and shared keys", () => {
    const registry = [
      descriptor("Alpha", "ALPHA_VERSION"),
      descriptor("alpha", "ALPHA_VERSION"),
    ];

    const error = (() => {
      try {
        validateRegistry(registry);
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(DepsyncError);
    expect(error).toMatchObject({
      code: ErrorCode.CONFIG_INVALID,
      message:
        'Invalid dependency registry: duplicate dependency name "alpha"; ALPHA_VERSION is owned by both Alpha and alpha',
    });
  });

  it("accepts distinct descriptors", () => {
    expect(() =>
      validateRegistry([
        descriptor("Alpha", "ALPHA_VERSION", { urlKey: "ALPHA_URL" }),
        descriptor("Beta", "BETA_VERSION", { gitUrlKey: "BETA_GIT_URL" }),
      ])
    ).not.toThrow();
  });
});
