/**
 * External-Tool Acquirer
 * ツールチェーンのチェックアウトを最新にし、依存をインストールする
 */

import type { CommandRunner } from "../exec/index.js";
import { formatCommand } from "../exec/index.js";
import type { ExternalToolWorkspace } from "../types/index.js";
import { ToolAcquisitionError } from "../pipeline/errors.js";
import { createLogger } from "../logging/logger.js";
import { RepositorySyncError, syncRepository } from "./repository.js";

const logger = createLogger("toolchain");

export interface AcquireToolchainOptions {
  /** チェックアウト先 */
  toolchainDir: string;
  /** 取得元リポジトリ URL */
  remoteUrl: string;
  /** npm install の後に npm audit fix を実行するか */
  auditFix: boolean;
}

/**
 * 依存インストールの手順
 */
export function installSteps(auditFix: boolean): string[][] {
  const steps = [["install"]];
  if (auditFix) {
    steps.push(["audit", "fix"]);
  }
  return steps;
}

/**
 * ツールチェーンを取得・更新する
 * @throws ToolAcquisitionError - clone / pull / install の失敗
 */
export async function acquireToolchain(
  options: AcquireToolchainOptions,
  runner: CommandRunner
): Promise<ExternalToolWorkspace> {
  let action: string;
  try {
    action = await syncRepository(runner, options.remoteUrl, options.toolchainDir);
  } catch (error) {
    if (error instanceof RepositorySyncError) {
      throw new ToolAcquisitionError(error.message, error);
    }
    throw error;
  }
  logger.info(`Toolchain ${action}: ${options.toolchainDir}`);

  for (const args of installSteps(options.auditFix)) {
    const result = await runner.run("npm", args, { cwd: options.toolchainDir });
    if (result.exitCode !== 0) {
      throw new ToolAcquisitionError(
        `${formatCommand("npm", args)} failed in ${options.toolchainDir} (exit code ${result.exitCode})`
      );
    }
  }

  return {
    path: options.toolchainDir,
    remoteUrl: options.remoteUrl,
    refreshed: true,
  };
}
