/**
 * Patch Invoker
 * 生成されたフォントにグリフパッチを当て、元のファイル名で置き換える
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { CommandRunner } from "../exec/index.js";
import { formatCommand } from "../exec/index.js";
import type { FontPlan, GeneratedArtifact } from "../types/index.js";
import { PatchFailedError, withIO } from "../pipeline/errors.js";
import { describeArtifact, listRegularFiles } from "../build/index.js";
import { moveFile } from "../fs/move-file.js";
import { createLogger } from "../logging/logger.js";
import type { PatchToolCache } from "./patch-tool.js";

const logger = createLogger("patch");

/**
 * パッチスクリプトを実行するインタプリタ
 */
export const FONTFORGE_COMMAND = "fontforge";

const MONOSPACE_DIRECTIVES = ["sp-term", "sp-fixed"];

/**
 * common 軸に等幅指定があるか
 */
export function isMonospacePlan(plan: FontPlan): boolean {
  return MONOSPACE_DIRECTIVES.some((directive) => plan.styleDirectives.common.has(directive));
}

/**
 * パッチ後のフォント名
 * ファミリー名の空白を除き、元ファイルのスタイル部分を付ける
 */
export function patchedFontName(familyName: string, style: string): string {
  return `${familyName.replace(/\s+/g, "")}-${style}`;
}

export interface PatchArgsOptions {
  scriptPath: string;
  mono: boolean;
  nerdFontOptions: readonly string[];
  name: string;
  outputDir: string;
  inputFile: string;
}

/**
 * fontforge に渡す引数
 */
export function patchArgs(options: PatchArgsOptions): string[] {
  return [
    "-script",
    options.scriptPath,
    "--careful",
    "--progressbars",
    ...(options.mono ? ["--mono"] : []),
    ...options.nerdFontOptions.map((option) => `--${option}`),
    "--name",
    options.name,
    "--outputdir",
    options.outputDir,
    options.inputFile,
  ];
}

/**
 * 出力ディレクトリ直下の全ファイルにパッチを当てる
 * nerdFontOptions が null のプランでは何もしない（ツールの取得もしない）
 * 最初の失敗で中断し、残りのファイルは処理しない
 * @returns パッチ済みの生成物
 * @throws PatchFailedError
 */
export async function invokePatch(
  plan: FontPlan,
  outputDir: string,
  tool: PatchToolCache,
  runner: CommandRunner
): Promise<GeneratedArtifact[]> {
  if (plan.nerdFontOptions === null) {
    return [];
  }
  const nerdFontOptions = plan.nerdFontOptions;

  const files = await listRegularFiles(outputDir, "patch");
  const artifacts = files.map((file) => {
    const artifact = describeArtifact(file);
    if (!artifact) {
      throw new PatchFailedError(
        `Cannot derive a style name from ${path.basename(file)}: expected "<family>-<style>"`
      );
    }
    return artifact;
  });
  if (artifacts.length === 0) {
    logger.warn(`No fonts to patch in ${outputDir}`);
    return [];
  }

  const scriptPath = await tool.ensure();
  const mono = isMonospacePlan(plan);
  const patched: GeneratedArtifact[] = [];

  for (const artifact of artifacts) {
    const stagingDir = await withIO("Failed to create patch staging directory", "patch", () =>
      fs.mkdtemp(path.join(os.tmpdir(), "myosevka-patch-"))
    );
    try {
      const args = patchArgs({
        scriptPath,
        mono,
        nerdFontOptions,
        name: patchedFontName(plan.familyName, artifact.style),
        outputDir: stagingDir,
        inputFile: artifact.sourcePath,
      });
      const result = await runner.run(FONTFORGE_COMMAND, args);
      if (result.exitCode !== 0) {
        throw new PatchFailedError(
          `${formatCommand(FONTFORGE_COMMAND, args)} failed (exit code ${result.exitCode})`
        );
      }

      const produced = await listRegularFiles(stagingDir, "patch");
      const [output] = produced;
      if (produced.length !== 1 || output === undefined) {
        throw new PatchFailedError(
          `Expected one patched file for ${artifact.fileName}, found ${produced.length}`
        );
      }

      await withIO(`Failed to replace ${artifact.sourcePath}`, "patch", () =>
        moveFile(output, artifact.sourcePath)
      );
    } finally {
      await fs.rm(stagingDir, { recursive: true, force: true });
    }

    logger.info(`Patched ${artifact.fileName}`);
    patched.push({ ...artifact, patched: true });
  }

  return patched;
}
