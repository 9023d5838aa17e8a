/**
 * Driver
 * 設定ディレクトリ内の全設定をビルドしてインストールする
 *
 * 手順:
 * 1. *.ini / *.toml を列挙（名前順）
 * 2. すべて変換（外部プロセスを起動する前に設定エラーを出す）
 * 3. ツールチェーンを 1 度だけ取得
 * 4. プランごとに emit → build → patch（要求時のみ）→ install
 *
 * 1 つでも失敗したらそこで止まり、残りの設定は処理しない。
 * 共有ワークスペースを使うため、プランは必ず 1 つずつ順に処理する。
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner } from "../exec/index.js";
import type { ExternalToolWorkspace, FontPlan, GeneratedArtifact } from "../types/index.js";
import type { Settings } from "../config/index.js";
import { detectDialect, translateConfigFile } from "../config/index.js";
import { emitBuildPlan } from "../plan/index.js";
import { acquireToolchain } from "../toolchain/index.js";
import { invokeBuild } from "../build/index.js";
import { PatchToolCache, invokePatch, type ArchiveFetcher } from "../patch/index.js";
import { installArtifacts } from "../install/index.js";
import { ConfigFormatError, withIO } from "./errors.js";
import { createLogger } from "../logging/logger.js";

const logger = createLogger("pipeline");

export interface PipelineDependencies {
  runner: CommandRunner;
  /** パッチツールのアーカイブ取得（省略時は fetch） */
  fetchArchive?: ArchiveFetcher;
}

/**
 * 1 プラン分の結果
 */
export interface PlanResult {
  planId: string;
  outputDir: string;
  patched: GeneratedArtifact[];
  installed: string[];
}

export interface PipelineSummary {
  workspace: ExternalToolWorkspace;
  results: PlanResult[];
}

/**
 * 1 プランの処理に必要なもの
 */
export interface PlanContext {
  workspace: ExternalToolWorkspace;
  fontDir: string;
  patchTool: PatchToolCache;
  runner: CommandRunner;
}

/**
 * 設定ディレクトリ直下の *.ini / *.toml を名前順で列挙
 * シンボリックリンクはリンク先が通常ファイルなら対象にする
 * @throws IOError - ディレクトリが読めない
 */
export async function discoverConfigFiles(configDir: string): Promise<string[]> {
  const names = await withIO(`Failed to read config directory: ${configDir}`, "config", () =>
    fs.readdir(configDir)
  );

  const files: string[] = [];
  for (const name of names.filter((entry) => detectDialect(entry) !== null).sort()) {
    const filePath = path.join(configDir, name);
    if (await isRegularFile(filePath)) {
      files.push(filePath);
    } else {
      logger.warn(`Skipping ${filePath}: not a regular file`);
    }
  }
  return files;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    // 壊れたシンボリックリンク
    return false;
  }
}

/**
 * 全設定ファイルを FontPlan に変換
 * @throws ConfigFormatError - 変換失敗、または planId の重複
 */
export async function translateAll(files: readonly string[]): Promise<FontPlan[]> {
  const plans: FontPlan[] = [];
  const seen = new Map<string, string>();

  for (const file of files) {
    const plan = await translateConfigFile(file);
    const previous = seen.get(plan.planId);
    if (previous !== undefined) {
      throw new ConfigFormatError(
        `Plan "${plan.planId}" is defined by both ${previous} and ${file}`
      );
    }
    seen.set(plan.planId, file);
    plans.push(plan);
  }

  return plans;
}

/**
 * 1 プランを emit → build → patch → install する
 */
export async function runPlan(plan: FontPlan, context: PlanContext): Promise<PlanResult> {
  logger.info(`Processing ${plan.planId} (${plan.sourcePath})`);

  await emitBuildPlan(plan, context.workspace);
  const outputDir = await invokeBuild(context.workspace, plan.planId, context.runner);
  const patched = await invokePatch(plan, outputDir, context.patchTool, context.runner);
  const installed = await installArtifacts(outputDir, context.fontDir, context.runner);

  return { planId: plan.planId, outputDir, patched, installed };
}

/**
 * パイプライン全体を実行
 */
export async function runPipeline(
  settings: Settings,
  dependencies: PipelineDependencies
): Promise<PipelineSummary> {
  const { paths } = settings;
  const files = await discoverConfigFiles(paths.configDir);
  if (files.length === 0) {
    logger.warn(`No *.ini or *.toml files in ${paths.configDir}`);
  }
  const plans = await translateAll(files);

  const workspace = await acquireToolchain(
    {
      toolchainDir: paths.toolchainDir,
      remoteUrl: settings.toolchainRepoUrl,
      auditFix: settings.auditFix,
    },
    dependencies.runner
  );

  const patchTool = new PatchToolCache({
    dir: paths.patchToolDir,
    source: settings.patchTool,
    runner: dependencies.runner,
    ...(dependencies.fetchArchive !== undefined && { fetchArchive: dependencies.fetchArchive }),
  });

  const context: PlanContext = {
    workspace,
    fontDir: paths.fontDir,
    patchTool,
    runner: dependencies.runner,
  };

  const results: PlanResult[] = [];
  for (const plan of plans) {
    results.push(await runPlan(plan, context));
  }

  return { workspace, results };
}
