/**
 * 実行時設定
 * 起動時に 1 度だけ環境変数から組み立て、Driver に明示的に渡す
 */

import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import type { PatchToolSource } from "../types/index.js";
import { ConfigFormatError } from "../pipeline/errors.js";

const APP_NAME = "myosevka";

export const DEFAULT_TOOLCHAIN_REPO = "https://github.com/be5invis/Iosevka.git";
export const DEFAULT_PATCHER_ARCHIVE_URL =
  "https://github.com/ryanoasis/nerd-fonts/releases/latest/download/FontPatcher.zip";
export const DEFAULT_PATCHER_REPO = "https://github.com/ryanoasis/nerd-fonts.git";

/**
 * 解決済みのディレクトリ群
 */
export interface RuntimePaths {
  /** *.ini / *.toml を置くディレクトリ */
  configDir: string;
  /** キャッシュのルート */
  cacheDir: string;
  /** ツールチェーンのチェックアウト先 */
  toolchainDir: string;
  /** パッチツールの展開先 */
  patchToolDir: string;
  /** 生成フォントのインストール先 */
  fontDir: string;
}

export interface Settings {
  paths: RuntimePaths;
  toolchainRepoUrl: string;
  patchTool: PatchToolSource;
  /** 依存インストール後に npm audit fix を実行するか */
  auditFix: boolean;
}

const EnvSchema = z.object({
  MYOSEVKA_CONFIG_DIR: z.string().optional(),
  MYOSEVKA_CACHE_DIR: z.string().optional(),
  MYOSEVKA_FONT_DIR: z.string().optional(),
  MYOSEVKA_TOOLCHAIN_REPO: z.string().optional(),
  MYOSEVKA_PATCHER_SOURCE: z.enum(["archive", "git"]).optional(),
  MYOSEVKA_PATCHER_URL: z.string().url().optional(),
  MYOSEVKA_AUDIT_FIX: z.enum(["0", "1"]).optional(),
  XDG_CONFIG_HOME: z.string().optional(),
  XDG_CACHE_HOME: z.string().optional(),
  XDG_DATA_HOME: z.string().optional(),
});

export type SettingsEnv = z.infer<typeof EnvSchema>;

/**
 * 空文字の環境変数は未設定として扱う
 */
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      result[key] = value;
    }
  }
  return result;
}

/**
 * プラットフォーム標準のユーザーディレクトリを解決
 */
export function resolveRuntimePaths(
  env: SettingsEnv,
  platform: NodeJS.Platform,
  homeDir: string
): RuntimePaths {
  let configRoot: string;
  let cacheRoot: string;
  let defaultFontDir: string;

  if (platform === "darwin") {
    configRoot = path.join(homeDir, "Library", "Application Support");
    cacheRoot = path.join(homeDir, "Library", "Caches");
    defaultFontDir = path.join(homeDir, "Library", "Fonts");
  } else {
    configRoot = env.XDG_CONFIG_HOME ?? path.join(homeDir, ".config");
    cacheRoot = env.XDG_CACHE_HOME ?? path.join(homeDir, ".cache");
    defaultFontDir = path.join(env.XDG_DATA_HOME ?? path.join(homeDir, ".local", "share"), "fonts");
  }

  const cacheDir = env.MYOSEVKA_CACHE_DIR ?? path.join(cacheRoot, APP_NAME);

  return {
    configDir: env.MYOSEVKA_CONFIG_DIR ?? path.join(configRoot, APP_NAME),
    cacheDir,
    toolchainDir: path.join(cacheDir, "Iosevka"),
    patchToolDir: path.join(cacheDir, "nerd-fonts"),
    fontDir: env.MYOSEVKA_FONT_DIR ?? defaultFontDir,
  };
}

/**
 * 環境変数から Settings を組み立てる
 * @throws ConfigFormatError - 環境変数の値が不正
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir()
): Settings {
  const result = EnvSchema.safeParse(dropEmpty(env));
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new ConfigFormatError(`Invalid environment: ${errors}`);
  }
  const parsed = result.data;

  const patchKind = parsed.MYOSEVKA_PATCHER_SOURCE ?? "archive";
  const patchTool: PatchToolSource =
    patchKind === "git"
      ? { kind: "git", url: parsed.MYOSEVKA_PATCHER_URL ?? DEFAULT_PATCHER_REPO }
      : { kind: "archive", url: parsed.MYOSEVKA_PATCHER_URL ?? DEFAULT_PATCHER_ARCHIVE_URL };

  return {
    paths: resolveRuntimePaths(parsed, platform, homeDir),
    toolchainRepoUrl: parsed.MYOSEVKA_TOOLCHAIN_REPO ?? DEFAULT_TOOLCHAIN_REPO,
    patchTool,
    auditFix: parsed.MYOSEVKA_AUDIT_FIX !== "0",
  };
}
