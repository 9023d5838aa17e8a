/**
 * 旧形式（INI）設定 → FontPlan
 */

import type { FontPlan, StyleAxis } from "../types/index.js";
import { STYLE_AXES } from "../types/index.js";
import { ConfigFormatError } from "../pipeline/errors.js";
import { createLogger } from "../logging/logger.js";
import { IniSyntaxError, parseIni, type IniDocument } from "./ini-reader.js";
import { DEFAULT_PLAN_ID, isValidPlanId, titleCase } from "./plan-id.js";

const logger = createLogger("config");

/**
 * 旧形式が知っているセクション
 */
const KNOWN_SECTIONS = new Set<string>(["options", ...STYLE_AXES, "ligations"]);

function isStyleAxis(name: string): name is StyleAxis {
  return (STYLE_AXES as readonly string[]).includes(name);
}

/**
 * キーと値からディレクティブ文字列を作る
 * 値のあるキーは `key = "value"`、値のないキーはキーのみ
 */
export function toDirective(key: string, value: string | null): string {
  return value === null ? key : `${key} = "${value}"`;
}

function splitWords(value: string | null): string[] {
  if (value === null) return [];
  return value.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * INI 文字列を FontPlan に変換
 * @param content - 設定ファイルの内容
 * @param sourcePath - 設定ファイルのパス（エラーメッセージ用）
 * @throws ConfigFormatError - 構文エラーまたは不正な name
 */
export function translateLegacyIni(content: string, sourcePath: string): FontPlan {
  let document: IniDocument;
  try {
    document = parseIni(content);
  } catch (error) {
    if (error instanceof IniSyntaxError) {
      throw new ConfigFormatError(`${sourcePath}: ${error.message}`, error);
    }
    throw error;
  }

  const styleDirectives: Record<StyleAxis, Set<string>> = {
    common: new Set(),
    upright: new Set(),
    italic: new Set(),
    oblique: new Set(),
  };
  const topLevelOptions = new Set<string>();
  const ligatureInherits = new Set<string>();
  let planId = DEFAULT_PLAN_ID;
  let nerdFontOptions: string[] | null = null;

  for (const [sectionName, entries] of document) {
    if (!KNOWN_SECTIONS.has(sectionName)) {
      logger.warn(`${sourcePath}: ignoring unknown section [${sectionName}]`);
      continue;
    }

    for (const [key, value] of entries) {
      if (sectionName === "options") {
        switch (key) {
          case "name":
            if (value === null || !isValidPlanId(value)) {
              throw new ConfigFormatError(
                `${sourcePath}: options.name must be a file-system safe identifier, got ${JSON.stringify(value)}`
              );
            }
            planId = value;
            break;
          case "nerdfont":
            nerdFontOptions = splitWords(value);
            break;
          case "ligset":
            if (value === null || value === "") {
              throw new ConfigFormatError(`${sourcePath}: options.ligset requires a value`);
            }
            ligatureInherits.add(value);
            break;
          default:
            topLevelOptions.add(toDirective(key, value));
        }
        continue;
      }

      if (sectionName === "ligations") {
        if (key === "inherits") {
          for (const name of splitWords(value)) {
            ligatureInherits.add(name);
          }
        } else {
          logger.warn(`${sourcePath}: ignoring [ligations] key "${key}"`);
        }
        continue;
      }

      if (isStyleAxis(sectionName)) {
        styleDirectives[sectionName].add(toDirective(key, value));
      }
    }
  }

  return {
    planId,
    familyName: titleCase(planId),
    styleDirectives,
    topLevelOptions,
    ligatureInherits,
    nerdFontOptions,
    dialect: "legacy-ini",
    sourcePath,
  };
}
