/**
 * 生成物ファイルの列挙と名前の解釈
 * ファイル名の規約は `<family>-<style>.<ext>`
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { GeneratedArtifact } from "../types/index.js";
import { withIO, type PipelineStage } from "../pipeline/errors.js";

/**
 * ディレクトリ直下の通常ファイルを名前順で列挙
 * @throws IOError
 */
export async function listRegularFiles(dir: string, stage: PipelineStage): Promise<string[]> {
  const entries = await withIO(`Failed to list ${dir}`, stage, () =>
    fs.readdir(dir, { withFileTypes: true })
  );
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}

/**
 * ファイル名を family / style に分解
 * @returns "-" を含まない場合は null
 */
export function describeArtifact(filePath: string, patched = false): GeneratedArtifact | null {
  const fileName = path.basename(filePath);
  const stem = fileName.slice(0, fileName.length - path.extname(fileName).length);
  const dash = stem.indexOf("-");
  if (dash === -1) {
    return null;
  }
  return {
    sourcePath: filePath,
    fileName,
    family: stem.slice(0, dash),
    style: stem.slice(dash + 1),
    patched,
  };
}
