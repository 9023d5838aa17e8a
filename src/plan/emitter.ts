/**
 * Build-Plan Emitter
 * FontPlan をツールチェーンのビルドプランファイルとして書き出す
 *
 * 旧形式は TOML テキストを組み立て、ネイティブ形式は元ファイルをそのままコピーする。
 * どちらも既存ファイルを上書きする（マージはしない）。
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ExternalToolWorkspace, FontPlan, StyleAxis } from "../types/index.js";
import { STYLE_AXES } from "../types/index.js";
import { withIO } from "../pipeline/errors.js";
import { createLogger } from "../logging/logger.js";

const logger = createLogger("emit");

/**
 * ツールチェーンが読むビルドプランファイル名
 */
export const BUILD_PLAN_FILE = "private-build-plans.toml";

/**
 * 軸 → variants 配下のテーブル名
 */
const AXIS_TABLES: Readonly<Record<StyleAxis, string>> = {
  common: "design",
  upright: "upright",
  italic: "italic",
  oblique: "oblique",
};

const BARE_KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

function formatKey(key: string): string {
  return BARE_KEY_PATTERN.test(key) ? key : JSON.stringify(key);
}

function sorted(values: ReadonlySet<string>): string[] {
  return [...values].sort();
}

/**
 * 旧形式の FontPlan からビルドプラン TOML を組み立てる
 * ディレクティブは加工せずにソート順で並べる
 */
export function renderBuildPlan(plan: FontPlan): string {
  const root = `buildPlans.${formatKey(plan.planId)}`;
  const blocks: string[][] = [
    [`[${root}]`, `family = ${JSON.stringify(plan.familyName)}`, ...sorted(plan.topLevelOptions)],
  ];

  for (const axis of STYLE_AXES) {
    const directives = sorted(plan.styleDirectives[axis]);
    if (directives.length > 0) {
      blocks.push([`[${root}.variants.${AXIS_TABLES[axis]}]`, ...directives]);
    }
  }

  const ligatures = sorted(plan.ligatureInherits);
  const [onlyLigature] = ligatures;
  if (ligatures.length > 0) {
    const inherits =
      ligatures.length === 1 && onlyLigature !== undefined
        ? JSON.stringify(onlyLigature)
        : `[${ligatures.map((name) => JSON.stringify(name)).join(", ")}]`;
    blocks.push([`[${root}.ligations]`, `inherits = ${inherits}`]);
  }

  return `${blocks.map((block) => block.join("\n")).join("\n\n")}\n`;
}

/**
 * ビルドプランファイルのパス
 */
export function getBuildPlanPath(workspace: ExternalToolWorkspace): string {
  return path.join(workspace.path, BUILD_PLAN_FILE);
}

/**
 * ビルドプランファイルを書き出す
 * @throws IOError - 書き込み / コピー失敗
 */
export async function emitBuildPlan(
  plan: FontPlan,
  workspace: ExternalToolWorkspace
): Promise<void> {
  const target = getBuildPlanPath(workspace);

  if (plan.dialect === "native-toml") {
    await withIO(`Failed to copy ${plan.sourcePath} to ${target}`, "emit", () =>
      fs.copyFile(plan.sourcePath, target)
    );
    logger.info(`Copied ${plan.sourcePath} to ${target}`);
    return;
  }

  await withIO(`Failed to write build plan: ${target}`, "emit", () =>
    fs.writeFile(target, renderBuildPlan(plan), "utf-8")
  );
  logger.info(`Wrote build plan "${plan.planId}" to ${target}`);
}
