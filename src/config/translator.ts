/**
 * Config Translator
 * 設定ファイルを方言で判定し、対応する変換を呼び出す
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ConfigDialect, ConfigSource, FontPlan } from "../types/index.js";
import { ConfigFormatError, withIO } from "../pipeline/errors.js";
import { translateLegacyIni } from "./legacy-ini.js";
import { translateNativeToml } from "./native-toml.js";

type DialectTranslator = (content: string, sourcePath: string) => FontPlan;

const TRANSLATORS: Readonly<Record<ConfigDialect, DialectTranslator>> = {
  "legacy-ini": translateLegacyIni,
  "native-toml": translateNativeToml,
};

const EXTENSION_DIALECTS: ReadonlyMap<string, ConfigDialect> = new Map([
  [".ini", "legacy-ini"],
  [".toml", "native-toml"],
]);

/**
 * 拡張子から方言を判定
 * @returns 対応しない拡張子なら null
 */
export function detectDialect(filePath: string): ConfigDialect | null {
  return EXTENSION_DIALECTS.get(path.extname(filePath)) ?? null;
}

/**
 * 設定ファイルを読み込み、方言タグを付ける
 * @throws ConfigFormatError - 対応しない拡張子
 * @throws IOError - 読み込み失敗
 */
export async function readConfigSource(filePath: string): Promise<ConfigSource> {
  const dialect = detectDialect(filePath);
  if (dialect === null) {
    throw new ConfigFormatError(`Unsupported config file extension: ${filePath}`);
  }

  const content = await withIO(`Failed to read config file: ${filePath}`, "config", () =>
    fs.readFile(filePath, "utf-8")
  );
  return { dialect, path: filePath, content };
}

/**
 * 方言タグ付きソースを FontPlan に変換
 * @throws ConfigFormatError
 */
export function translateConfig(source: ConfigSource): FontPlan {
  return TRANSLATORS[source.dialect](source.content, source.path);
}

/**
 * ファイルパスから FontPlan を作る
 */
export async function translateConfigFile(filePath: string): Promise<FontPlan> {
  return translateConfig(await readConfigSource(filePath));
}
