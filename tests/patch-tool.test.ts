/**
 * パッチツールキャッシュのテスト
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { PatchToolCache, PATCHER_SCRIPT } from "../src/patch/patch-tool.js";
import { PatchFailedError } from "../src/pipeline/errors.js";
import { FakeCommandRunner } from "./helpers/fake-runner.js";

const ARCHIVE_URL = "https://example.invalid/FontPatcher.zip";

describe("PatchToolCache", () => {
  let tempDir: string;
  let toolDir: string;
  let runner: FakeCommandRunner;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "myosevka-patch-tool-"));
    toolDir = path.join(tempDir, "nerd-fonts");
    runner = new FakeCommandRunner();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should download and extract the archive once", async () => {
    const fetchArchive = vi.fn(async (_url: string) => new Uint8Array([80, 75, 3, 4]));
    runner.on("unzip", async () => {
      await fs.writeFile(path.join(toolDir, PATCHER_SCRIPT), "script");
    });
    const tool = new PatchToolCache({
      dir: toolDir,
      source: { kind: "archive", url: ARCHIVE_URL },
      runner,
      fetchArchive,
    });

    const first = await tool.ensure();
    const second = await tool.ensure();

    expect(first).toBe(path.join(toolDir, PATCHER_SCRIPT));
    expect(second).toBe(first);
    expect(fetchArchive).toHaveBeenCalledTimes(1);
    expect(fetchArchive).toHaveBeenCalledWith(ARCHIVE_URL);
    expect(runner.calls).toEqual([
      {
        command: "unzip",
        args: ["-o", path.join(toolDir, "FontPatcher.zip"), "-d", toolDir],
        cwd: undefined,
      },
    ]);
    expect(await fs.readdir(toolDir)).toEqual([PATCHER_SCRIPT]);
  });

  it("should reuse a cached extraction", async () => {
    await fs.mkdir(toolDir);
    await fs.writeFile(path.join(toolDir, PATCHER_SCRIPT), "script");
    const fetchArchive = vi.fn(async (_url: string) => new Uint8Array());

    const tool = new PatchToolCache({
      dir: toolDir,
      source: { kind: "archive", url: ARCHIVE_URL },
      runner,
      fetchArchive,
    });

    expect(await tool.ensure()).toBe(path.join(toolDir, PATCHER_SCRIPT));
    expect(fetchArchive).not.toHaveBeenCalled();
    expect(runner.calls).toHaveLength(0);
  });

  it("should report download failures", async () => {
    const tool = new PatchToolCache({
      dir: toolDir,
      source: { kind: "archive", url: ARCHIVE_URL },
      runner,
      fetchArchive: async () => {
        throw new Error("offline");
      },
    });

    await expect(tool.ensure()).rejects.toThrow(
      new PatchFailedError(`Failed to download patch tool from ${ARCHIVE_URL}`)
    );
  });

  it("should report a cache directory that cannot be created", async () => {
    const blocker = path.join(tempDir, "blocker");
    await fs.writeFile(blocker, "not a directory");
    const dir = path.join(blocker, "nerd-fonts");
    const fetchArchive = vi.fn(async (_url: string) => new Uint8Array([1]));
    const tool = new PatchToolCache({
      dir,
      source: { kind: "archive", url: ARCHIVE_URL },
      runner,
      fetchArchive,
    });

    await expect(tool.ensure()).rejects.toThrow(
      new PatchFailedError(`Failed to create patch tool directory ${dir}`)
    );
    expect(fetchArchive).not.toHaveBeenCalled();
  });

  it("should report extraction failures", async () => {
    runner.on("unzip", () => 9);
    const tool = new PatchToolCache({
      dir: toolDir,
      source: { kind: "archive", url: ARCHIVE_URL },
      runner,
      fetchArchive: async () => new Uint8Array([1]),
    });

    await expect(tool.ensure()).rejects.toThrow(PatchFailedError);
  });

  it("should fail when the archive has no patch script", async () => {
    const tool = new PatchToolCache({
      dir: toolDir,
      source: { kind: "archive", url: ARCHIVE_URL },
      runner,
      fetchArchive: async () => new Uint8Array([1]),
    });

    await expect(tool.ensure()).rejects.toThrow(`Patch tool has no ${PATCHER_SCRIPT}: ${toolDir}`);
  });

  it("should clone the git source", async () => {
    const repo = "https://example.invalid/nerd-fonts.git";
    runner.on("git", async () => {
      await fs.mkdir(path.join(toolDir, ".git"), { recursive: true });
      await fs.writeFile(path.join(toolDir, PATCHER_SCRIPT), "script");
    });
    const tool = new PatchToolCache({ dir: toolDir, source: { kind: "git", url: repo }, runner });

    expect(await tool.ensure()).toBe(path.join(toolDir, PATCHER_SCRIPT));
    expect(runner.commandLines()).toEqual([`git clone --depth 1 ${repo} ${toolDir}`]);
  });

  it("should wrap git failures in PatchFailedError", async () => {
    runner.on("git", () => 128);
    const tool = new PatchToolCache({
      dir: toolDir,
      source: { kind: "git", url: "https://example.invalid/nerd-fonts.git" },
      runner,
    });

    await expect(tool.ensure()).rejects.toThrow(PatchFailedError);
  });
});
