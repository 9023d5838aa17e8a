/**
 * Artifact Installer のテスト
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { installArtifacts, FONT_CACHE_COMMAND } from "../src/install/installer.js";
import { CacheRefreshError, IOError } from "../src/pipeline/errors.js";
import { FakeCommandRunner } from "./helpers/fake-runner.js";

describe("installArtifacts", () => {
  let tempDir: string;
  let outputDir: string;
  let fontDir: string;
  let runner: FakeCommandRunner;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "myosevka-install-test-"));
    outputDir = path.join(tempDir, "dist", "myosevka", "TTF");
    fontDir = path.join(tempDir, "share", "fonts", "myosevka");
    await fs.mkdir(outputDir, { recursive: true });
    runner = new FakeCommandRunner();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should move only the TTF files into a newly created font directory", async () => {
    await fs.writeFile(path.join(outputDir, "Myosevka-Regular.ttf"), "regular");
    await fs.writeFile(path.join(outputDir, "Myosevka-Bold.ttf"), "bold");
    await fs.writeFile(path.join(outputDir, "build.log"), "log");
    await fs.mkdir(path.join(outputDir, "extra.ttf"));

    const installed = await installArtifacts(outputDir, fontDir, runner);

    expect(installed).toEqual([
      path.join(fontDir, "Myosevka-Bold.ttf"),
      path.join(fontDir, "Myosevka-Regular.ttf"),
    ]);
    expect((await fs.readdir(fontDir)).sort()).toEqual(["Myosevka-Bold.ttf", "Myosevka-Regular.ttf"]);
    expect(await fs.readFile(path.join(fontDir, "Myosevka-Bold.ttf"), "utf-8")).toBe("bold");
    expect((await fs.readdir(outputDir)).sort()).toEqual(["build.log", "extra.ttf"]);
  });

  it("should refresh the font cache after moving", async () => {
    await fs.writeFile(path.join(outputDir, "Myosevka-Regular.ttf"), "regular");

    await installArtifacts(outputDir, fontDir, runner);

    expect(runner.calls).toEqual([{ command: FONT_CACHE_COMMAND, args: [], cwd: undefined }]);
  });

  it("should overwrite a previously installed font", async () => {
    await fs.mkdir(fontDir, { recursive: true });
    await fs.writeFile(path.join(fontDir, "Myosevka-Regular.ttf"), "old");
    await fs.writeFile(path.join(outputDir, "Myosevka-Regular.ttf"), "new");

    await installArtifacts(outputDir, fontDir, runner);

    expect(await fs.readFile(path.join(fontDir, "Myosevka-Regular.ttf"), "utf-8")).toBe("new");
  });

  it("should raise CacheRefreshError when fc-cache fails", async () => {
    await fs.writeFile(path.join(outputDir, "Myosevka-Regular.ttf"), "regular");
    runner.on(FONT_CACHE_COMMAND, () => 1);

    await expect(installArtifacts(outputDir, fontDir, runner)).rejects.toThrow(
      new CacheRefreshError("fc-cache failed (exit code 1)")
    );
    expect(await fs.readdir(fontDir)).toEqual(["Myosevka-Regular.ttf"]);
  });

  it("should raise IOError when the output directory is missing", async () => {
    await expect(
      installArtifacts(path.join(tempDir, "missing"), fontDir, runner)
    ).rejects.toBeInstanceOf(IOError);
    expect(runner.calls).toHaveLength(0);
  });
});
