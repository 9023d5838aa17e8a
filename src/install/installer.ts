/**
 * Artifact Installer
 * 生成した TTF をフォントディレクトリへ移動し、フォントキャッシュを再構築する
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner } from "../exec/index.js";
import { CacheRefreshError, withIO } from "../pipeline/errors.js";
import { listRegularFiles } from "../build/index.js";
import { moveFile } from "../fs/move-file.js";
import { createLogger } from "../logging/logger.js";

const logger = createLogger("install");

/**
 * フォントキャッシュ再構築コマンド
 */
export const FONT_CACHE_COMMAND = "fc-cache";

/**
 * TTF を移動してキャッシュを更新する
 * @returns インストール先のパス
 * @throws IOError - ディレクトリ作成・移動の失敗
 * @throws CacheRefreshError - fc-cache が非ゼロで終了
 */
export async function installArtifacts(
  outputDir: string,
  fontDir: string,
  runner: CommandRunner
): Promise<string[]> {
  await withIO(`Failed to create ${fontDir}`, "install", () =>
    fs.mkdir(fontDir, { recursive: true })
  );

  const fonts = (await listRegularFiles(outputDir, "install")).filter(
    (file) => path.extname(file) === ".ttf"
  );

  const installed: string[] = [];
  for (const source of fonts) {
    const destination = path.join(fontDir, path.basename(source));
    await withIO(`Failed to move ${source} to ${destination}`, "install", () =>
      moveFile(source, destination)
    );
    installed.push(destination);
  }
  logger.info(`Installed ${installed.length} font(s) into ${fontDir}`);

  const result = await runner.run(FONT_CACHE_COMMAND, []);
  if (result.exitCode !== 0) {
    throw new CacheRefreshError(`${FONT_CACHE_COMMAND} failed (exit code ${result.exitCode})`);
  }

  return installed;
}
