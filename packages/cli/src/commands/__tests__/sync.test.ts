/**
 * Sync Command Tests
 *
 * Runs the command end to end against a temporary working directory with a
 * stubbed fetch, so no request leaves the process.
 *
 * @module cli/commands/__tests__/sync
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { FetchLike } from "@depsync/core";
import chalk from "chalk";
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

import { EXIT_CODES } from "../exit-codes.js";
import { type CommandIO, runSyncCommand } from "../sync.js";

const HELLO_WORLD_SHA256 = "b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9";
const THEORA_URL = "https://ftp.osuosl.org/pub/xiph/releases/theora/libtheora-1.1.1.tar.gz";

const VERSIONS = [
  "# Updated: 2026-01-04",
  "X264_VERSION=stable",
  "THEORA_VERSION=1.1.0",
  "THEORA_URL=https://ftp.osuosl.org/pub/xiph/releases/theora/libtheora-1.1.0.tar.gz",
  "THEORA_SHA256=old",
  "",
].join("\n");

// =============================================================================
// Test Fixtures
// =============================================================================

interface CapturedIO extends CommandIO {
  out: string[];
  err: string[];
  logs: string[];
}

function createIO(cwd: string, fetch: FetchLike): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  const logs: string[] = [];
  return {
    out,
    err,
    logs,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    log: (line) => logs.push(line),
    cwd,
    env: {},
    fetch,
    now: new Date(2026, 1, 3),
  };
}

function stubFetch() {
  return vi.fn<FetchLike>().mockImplementation(async (url) =>
    url === THEORA_URL ? new Response("hello world") : new Response("not found", { status: 404 })
  );
}

// =============================================================================
// runSyncCommand
// =============================================================================

describe("runSyncCommand", () => {
  let tempDir: string;
  let versionsFile: string;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "depsync-cli-"));
    versionsFile = path.join(tempDir, "versions.properties");
    fs.writeFileSync(versionsFile, VERSIONS);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("reports available updates in dry-run mode", async () => {
    const io = createIO(tempDir, stubFetch());

    const code = await runSyncCommand({ only: ["x264", "theora"] }, io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(io.out).toEqual([
      "",
      "Summary",
      "",
      "⚠ 1 update(s) available:",
      "  - Theora: 1.1.0 → 1.1.1",
      "",
      `ℹ Run with --write to update ${versionsFile}`,
    ]);
    expect(fs.readFileSync(versionsFile, "utf-8")).toBe(VERSIONS);
    expect(io.logs).toContain("[INFO ] Theora: Update available: 1.1.0 → 1.1.1");
  });

  it("writes the versions file with --write", async () => {
    const io = createIO(tempDir, stubFetch());

    const code = await runSyncCommand({ only: ["x264", "Theora"], write: true }, io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(io.out.at(-1)).toBe(`✓ Updated ${versionsFile}`);
    expect(fs.readFileSync(versionsFile, "utf-8")).toBe(
      [
        "# Updated: 2026-02-03",
        "X264_VERSION=stable",
        "THEORA_VERSION=1.1.1",
        `THEORA_URL=${THEORA_URL}`,
        `THEORA_SHA256=${HELLO_WORLD_SHA256}`,
        "",
      ].join("\n")
    );
  });

  it("prints results as JSON", async () => {
    const io = createIO(tempDir, stubFetch());

    const code = await runSyncCommand({ only: ["x264"], json: true }, io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(io.out).toHaveLength(1);
    expect(JSON.parse(io.out[0] ?? "")).toEqual([
      { name: "x264", currentVersion: "stable", latestVersion: "stable", updated: false },
    ]);
  });

  it("fails when a selected dependency has no pin", async () => {
    const io = createIO(tempDir, stubFetch());

    const code = await runSyncCommand({ only: ["LAME"] }, io);

    expect(code).toBe(EXIT_CODES.ERROR);
    expect(io.out).toContain("  - LAME: LAME has no LAME_VERSION entry in the versions file");
  });

  it("rejects unknown dependency names", async () => {
    const fetch = stubFetch();
    const io = createIO(tempDir, fetch);

    const code = await runSyncCommand({ only: ["x264", "nope", "other"] }, io);

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(io.err).toEqual(["✗ Unknown dependency: nope, other", "Run with --list to see tracked dependencies"]);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("lists tracked dependencies", async () => {
    const io = createIO(tempDir, stubFetch());

    const code = await runSyncCommand({ list: true }, io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(io.out).toHaveLength(1);
    expect(io.out[0]).toContain("THEORA_SHA256");
    expect(io.out[0]).toContain("gitlab:code.videolan.org/videolan/dav1d");
    expect(io.out[0]).toContain("https://ffmpeg.org/releases/");
  });

  it("treats a missing versions file as fatal", async () => {
    const io = createIO(tempDir, stubFetch());
    const missing = path.join(tempDir, "missing.properties");

    const code = await runSyncCommand({ file: "missing.properties" }, io);

    expect(code).toBe(EXIT_CODES.ERROR);
    expect(io.err).toEqual([`✗ Fatal error: Versions file not found: ${missing}`]);
  });

  it("reports invalid configuration", async () => {
    fs.writeFileSync(path.join(tempDir, "depsync.toml"), "[http]\nmaxAttempts = 0\n");
    const io = createIO(tempDir, stubFetch());

    const code = await runSyncCommand({}, io);

    expect(code).toBe(EXIT_CODES.ERROR);
    expect(io.err).toEqual([
      "✗ Invalid configuration: http.maxAttempts: Number must be greater than or equal to 1",
    ]);
  });

  it("honors the versions file from the project config", async () => {
    fs.renameSync(versionsFile, path.join(tempDir, "pins.properties"));
    fs.writeFileSync(path.join(tempDir, "depsync.toml"), 'versionsFile = "pins.properties"\n');
    const io = createIO(tempDir, stubFetch());

    const code = await runSyncCommand({ only: ["x264"] }, io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(io.out).toContain("✓ All dependencies up to date");
  });

  it("finds the project's versions file from a subdirectory", async () => {
    fs.renameSync(versionsFile, path.join(tempDir, "pins.properties"));
    fs.writeFileSync(path.join(tempDir, "depsync.toml"), 'versionsFile = "pins.properties"\n');
    const subdir = path.join(tempDir, "scripts");
    fs.mkdirSync(subdir);
    const io = createIO(subdir, stubFetch());

    const code = await runSyncCommand({ only: ["Theora"] }, io);

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(io.err).toEqual([]);
    expect(io.out.at(-1)).toBe(`ℹ Run with --write to update ${path.join(tempDir, "pins.properties")}`);
  });
});
