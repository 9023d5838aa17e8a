/**
 * git リポジトリの clone / pull
 * ツールチェーンと（git 取得時の）パッチツールで共用
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner } from "../exec/index.js";
import { formatCommand } from "../exec/index.js";

/**
 * リポジトリ同期エラー
 */
export class RepositorySyncError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "RepositorySyncError";
  }
}

export type SyncAction = "cloned" | "pulled";

/**
 * ディレクトリが git のチェックアウトかどうか
 */
export async function isGitCheckout(dir: string): Promise<boolean> {
  try {
    await fs.access(path.join(dir, ".git"));
    return true;
  } catch {
    return false;
  }
}

/**
 * チェックアウトがなければ clone、あれば pull する
 * @throws RepositorySyncError - git が非ゼロで終了
 */
export async function syncRepository(
  runner: CommandRunner,
  url: string,
  dir: string
): Promise<SyncAction> {
  if (await isGitCheckout(dir)) {
    const args = ["pull", "--ff-only"];
    const result = await runner.run("git", args, { cwd: dir });
    if (result.exitCode !== 0) {
      throw new RepositorySyncError(
        `${formatCommand("git", args)} failed in ${dir} (exit code ${result.exitCode})`
      );
    }
    return "pulled";
  }

  try {
    await fs.mkdir(path.dirname(dir), { recursive: true });
  } catch (error) {
    throw new RepositorySyncError(`Failed to create ${path.dirname(dir)}`, error);
  }

  const args = ["clone", "--depth", "1", url, dir];
  const result = await runner.run("git", args);
  if (result.exitCode !== 0) {
    throw new RepositorySyncError(
      `${formatCommand("git", args)} failed (exit code ${result.exitCode})`
    );
  }
  return "cloned";
}
