/**
 * Build Invoker
 * ツールチェーンのビルドを 1 プラン分実行する
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner } from "../exec/index.js";
import { formatCommand } from "../exec/index.js";
import type { ExternalToolWorkspace } from "../types/index.js";
import { BuildFailedError } from "../pipeline/errors.js";
import { createLogger } from "../logging/logger.js";
import { readToolchainVersion, selectOutputLayout } from "./output-layout.js";

const logger = createLogger("build");

/**
 * TTF ビルドの npm 引数
 */
export function buildArgs(planId: string): string[] {
  return ["run", "build", "--", `ttf::${planId}`];
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * ビルドを実行し、TTF の出力ディレクトリを返す
 * 出力レイアウトはビルド前に決めておく
 * @throws UnsupportedToolVersionError - レイアウト不明のバージョン
 * @throws BuildFailedError - 非ゼロ終了、または出力ディレクトリがない
 */
export async function invokeBuild(
  workspace: ExternalToolWorkspace,
  planId: string,
  runner: CommandRunner
): Promise<string> {
  const version = await readToolchainVersion(workspace.path);
  const layout = selectOutputLayout(version);
  logger.info(`Building ${planId} with toolchain ${version} (layout ${layout.name})`);

  const args = buildArgs(planId);
  const result = await runner.run("npm", args, { cwd: workspace.path });
  if (result.exitCode !== 0) {
    throw new BuildFailedError(
      `${formatCommand("npm", args)} failed for plan "${planId}" (exit code ${result.exitCode})`
    );
  }

  const outputDir = path.join(workspace.path, layout.ttfDir(planId));
  if (!(await isDirectory(outputDir))) {
    throw new BuildFailedError(
      `Build for "${planId}" succeeded but ${outputDir} does not exist (layout ${layout.name})`
    );
  }
  return outputDir;
}
