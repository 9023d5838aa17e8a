/**
 * Config モジュール
 * 設定ファイルの変換と実行時設定
 */

export { translateConfig, translateConfigFile, readConfigSource, detectDialect } from "./translator.js";
export { translateLegacyIni, toDirective } from "./legacy-ini.js";
export { translateNativeToml, EXTENSION_KEY } from "./native-toml.js";
export { parseIni, IniSyntaxError } from "./ini-reader.js";
export type { IniDocument } from "./ini-reader.js";
export { DEFAULT_PLAN_ID, isValidPlanId, titleCase } from "./plan-id.js";
export {
  loadSettings,
  resolveRuntimePaths,
  DEFAULT_TOOLCHAIN_REPO,
  DEFAULT_PATCHER_ARCHIVE_URL,
  DEFAULT_PATCHER_REPO,
} from "./settings.js";
export type { RuntimePaths, Settings, SettingsEnv } from "./settings.js";
