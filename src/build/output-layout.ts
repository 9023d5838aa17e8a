/**
 * ツールチェーンの出力レイアウト
 *
 * 生成 TTF の置き場所はツールチェーンのバージョンで変わってきたため、
 * バージョンごとの規約として明示し、知らないバージョンでは失敗させる。
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { UnsupportedToolVersionError, withIO } from "../pipeline/errors.js";

/**
 * バージョン範囲ごとの出力規約
 */
export interface OutputLayout {
  /** 規約名（ログ・エラー用） */
  name: string;
  /** 対応するメジャーバージョンの下限（含む） */
  minMajor: number;
  /** 対応するメジャーバージョンの上限（含む）。未指定なら上限なし */
  maxMajor?: number;
  /** ワークスペースからの相対パスで TTF ディレクトリを返す */
  ttfDir(planId: string): string;
}

export const OUTPUT_LAYOUTS: readonly OutputLayout[] = [
  {
    name: "dist/<plan>/TTF",
    minMajor: 11,
    ttfDir: (planId) => path.join("dist", planId, "TTF"),
  },
  {
    name: "dist/<plan>/ttf",
    minMajor: 2,
    maxMajor: 10,
    ttfDir: (planId) => path.join("dist", planId, "ttf"),
  },
];

const PackageManifestSchema = z.object({
  version: z.string(),
});

/**
 * "v32.1.0" / "32.1.0" からメジャーバージョンを取り出す
 */
export function parseMajorVersion(version: string): number | null {
  const match = /^v?(\d+)\.\d+/.exec(version.trim());
  const major = match?.[1];
  return major === undefined ? null : Number.parseInt(major, 10);
}

/**
 * バージョン文字列に対応するレイアウトを選ぶ
 * @throws UnsupportedToolVersionError
 */
export function selectOutputLayout(version: string): OutputLayout {
  const major = parseMajorVersion(version);
  const layout =
    major === null
      ? undefined
      : OUTPUT_LAYOUTS.find(
          (candidate) =>
            major >= candidate.minMajor &&
            (candidate.maxMajor === undefined || major <= candidate.maxMajor)
        );

  if (!layout) {
    throw new UnsupportedToolVersionError(
      `No known output layout for toolchain version "${version}"`,
      version
    );
  }
  return layout;
}

/**
 * ワークスペースの package.json からバージョンを読む
 * @throws IOError - 読み込み失敗
 * @throws UnsupportedToolVersionError - version が読めない
 */
export async function readToolchainVersion(workspacePath: string): Promise<string> {
  const manifestPath = path.join(workspacePath, "package.json");
  const content = await withIO(`Failed to read ${manifestPath}`, "build", () =>
    fs.readFile(manifestPath, "utf-8")
  );

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new UnsupportedToolVersionError(`Invalid JSON in ${manifestPath}`, "unknown");
  }

  const result = PackageManifestSchema.safeParse(parsed);
  if (!result.success) {
    throw new UnsupportedToolVersionError(`No version field in ${manifestPath}`, "unknown");
  }
  return result.data.version;
}
