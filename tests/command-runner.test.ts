/**
 * zx による CommandRunner のテスト（ローカルの sh だけを使う）
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ZxCommandRunner, formatCommand } from "../src/exec/command-runner.js";

describe("ZxCommandRunner", () => {
  let tempDir: string;
  const runner = new ZxCommandRunner();

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "myosevka-runner-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should report a zero exit code", async () => {
    expect(await runner.run("sh", ["-c", "exit 0"])).toEqual({ exitCode: 0 });
  });

  it("should return a non-zero exit code instead of rejecting", async () => {
    expect(await runner.run("sh", ["-c", "exit 3"])).toEqual({ exitCode: 3 });
  });

  it("should run the command in the given directory", async () => {
    const result = await runner.run("sh", ["-c", "touch marker"], { cwd: tempDir });

    expect(result.exitCode).toBe(0);
    expect((await fs.stat(path.join(tempDir, "marker"))).isFile()).toBe(true);
  });

  it("should pass arguments with spaces as single arguments", async () => {
    const result = await runner.run("sh", ["-c", 'test "$1" = "a b"', "sh", "a b"]);
    expect(result.exitCode).toBe(0);
  });
});

describe("formatCommand", () => {
  it("should join the command and its arguments", () => {
    expect(formatCommand("npm", ["run", "build", "--", "ttf::myosevka"])).toBe(
      "npm run build -- ttf::myosevka"
    );
  });
});
