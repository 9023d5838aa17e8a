/**
 * ネイティブ形式（Iosevka ビルドプラン TOML）設定 → FontPlan
 *
 * ファイル自体はそのままツールチェーンに渡すので、ここで読むのは
 * プラン名・family・spacing・独自拡張キーだけ
 */

import * as toml from "@iarna/toml";
import { z } from "zod";
import type { FontPlan, StyleAxis } from "../types/index.js";
import { ConfigFormatError } from "../pipeline/errors.js";
import { isValidPlanId } from "./plan-id.js";

/**
 * ビルドプラン内の独自拡張キー
 */
export const EXTENSION_KEY = "iosevka-generate";

// =============================================================================
// Zod スキーマ定義
// =============================================================================

const ExtensionSchema = z
  .object({
    nerdfont: z.array(z.string()).optional(),
  })
  .passthrough();

const BuildPlanEntrySchema = z
  .object({
    family: z.string().min(1).optional(),
    spacing: z.string().optional(),
    [EXTENSION_KEY]: ExtensionSchema.optional(),
  })
  .passthrough();

const NativeDocumentSchema = z
  .object({
    buildPlans: z.record(BuildPlanEntrySchema),
  })
  .passthrough();

/**
 * spacing の値 → common 軸に追加するディレクティブ
 */
const SPACING_DIRECTIVES: ReadonlyMap<string, string> = new Map([
  ["fontconfig-mono", "sp-term"],
  ["term", "sp-term"],
  ["fixed", "sp-fixed"],
]);

/**
 * TOML 文字列を FontPlan に変換
 * @throws ConfigFormatError - TOML 構文エラー、スキーマ不一致、プランが 1 つでない
 */
export function translateNativeToml(content: string, sourcePath: string): FontPlan {
  let parsed: unknown;
  try {
    parsed = toml.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigFormatError(`${sourcePath}: invalid TOML: ${reason}`, error);
  }

  const result = NativeDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new ConfigFormatError(`${sourcePath}: invalid build plan: ${errors}`);
  }

  const entries = Object.entries(result.data.buildPlans);
  const [first] = entries;
  if (entries.length !== 1 || first === undefined) {
    throw new ConfigFormatError(
      `${sourcePath}: expected exactly one build plan, found ${entries.length}`
    );
  }

  const [planId, entry] = first;
  if (!isValidPlanId(planId)) {
    throw new ConfigFormatError(
      `${sourcePath}: build plan key must be a file-system safe identifier, got ${JSON.stringify(planId)}`
    );
  }

  const common = new Set<string>();
  const spacingDirective =
    entry.spacing !== undefined ? SPACING_DIRECTIVES.get(entry.spacing) : undefined;
  if (spacingDirective !== undefined) {
    common.add(spacingDirective);
  }

  const styleDirectives: Record<StyleAxis, Set<string>> = {
    common,
    upright: new Set(),
    italic: new Set(),
    oblique: new Set(),
  };

  return {
    planId,
    familyName: entry.family ?? planId,
    styleDirectives,
    topLevelOptions: new Set(),
    ligatureInherits: new Set(),
    nerdFontOptions: entry[EXTENSION_KEY]?.nerdfont ?? null,
    dialect: "native-toml",
    sourcePath,
  };
}
