/**
 * Patch モジュール
 * グリフパッチツールの取得と実行
 */

export {
  invokePatch,
  isMonospacePlan,
  patchedFontName,
  patchArgs,
  FONTFORGE_COMMAND,
} from "./invoker.js";
export type { PatchArgsOptions } from "./invoker.js";
export { PatchToolCache, fetchArchive, PATCHER_SCRIPT } from "./patch-tool.js";
export type { PatchToolCacheOptions, ArchiveFetcher } from "./patch-tool.js";
