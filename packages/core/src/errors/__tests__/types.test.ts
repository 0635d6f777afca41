import { describe, expect, it } from "vitest";
import {
  ChecksumDownloadError,
  NoStableTagsFoundError,
  PinNotFoundError,
  VersionsFileNotFoundError,
} from "../sync.js";
import {
  DepsyncError,
  describeError,
  ErrorCode,
  ErrorSeverity,
  inferSeverity,
  isRetryableError,
} from "../types.js";

describe("inferSeverity", () => {
  it.each([ErrorCode.FETCH_FAILED, ErrorCode.NETWORK_ERROR, ErrorCode.REQUEST_TIMEOUT])(
    "%s is recoverable",
    (code) => {
      expect(inferSeverity(code)).toBe(ErrorSeverity.RECOVERABLE);
    }
  );

  it.each([ErrorCode.NO_STABLE_TAGS, ErrorCode.PIN_NOT_FOUND, ErrorCode.CONFIG_INVALID])(
    "%s needs user action",
    (code) => {
      expect(inferSeverity(code)).toBe(ErrorSeverity.USER_ACTION);
    }
  );

  it("treats a missing versions file as fatal", () => {
    expect(inferSeverity(ErrorCode.VERSIONS_FILE_NOT_FOUND)).toBe(ErrorSeverity.FATAL);
  });
});

describe("DepsyncError", () => {
  it("keeps code, context and cause", () => {
    const cause = new Error("root");
    const error = new DepsyncError("wrapped", ErrorCode.SYSTEM_IO_ERROR, {
      cause,
      context: { path: "versions.properties" },
    });

    expect(error.name).toBe("DepsyncError");
    expect(error.cause).toBe(cause);
    expect(error.code).toBe(ErrorCode.SYSTEM_IO_ERROR);
    expect(error.severity).toBe(ErrorSeverity.RECOVERABLE);
    expect(error.isRetryable).toBe(true);
    expect(error.context).toEqual({ path: "versions.properties" });
  });

  it("lets an explicit isRetryable win over severity", () => {
    const error = new DepsyncError("no", ErrorCode.FETCH_FAILED, { isRetryable: false });

    expect(error.isRetryable).toBe(false);
    expect(isRetryableError(error)).toBe(false);
  });
});

describe("error guards", () => {
  it("only retries DepsyncErrors", () => {
    expect(isRetryableError(new Error("plain"))).toBe(false);
  });

  it("describes any thrown value", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("text")).toBe("text");
    expect(describeError(42)).toBe("42");
  });
});

describe("synchronization errors", () => {
  it("names the pattern when no stable tag matches", () => {
    const error = new NoStableTagsFoundError(/^v[0-9.]+$/, 12);

    expect(error.message).toBe("No stable tags found matching /^v[0-9.]+$/");
    expect(error.code).toBe(ErrorCode.NO_STABLE_TAGS);
    expect(error.candidates).toBe(12);
  });

  it("prefixes checksum failures with the URL", () => {
    const error = new ChecksumDownloadError("https://downloads.example.test/a.tar.gz", new Error("HTTP 500"));

    expect(error.message).toBe("Failed to download https://downloads.example.test/a.tar.gz for checksum: HTTP 500");
    expect(error.code).toBe(ErrorCode.CHECKSUM_DOWNLOAD_FAILED);
  });

  it("points at the missing versions file", () => {
    const error = new VersionsFileNotFoundError("/repo/versions.properties");

    expect(error.message).toBe("Versions file not found: /repo/versions.properties");
    expect(error.isRetryable).toBe(false);
  });

  it("names the dependency and key of a missing pin", () => {
    expect(new PinNotFoundError("Opus", "OPUS_VERSION").message).toBe(
      "Opus has no OPUS_VERSION entry in the versions file"
    );
  });
});
