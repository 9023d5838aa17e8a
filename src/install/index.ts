/**
 * Install モジュール
 */

export { installArtifacts, FONT_CACHE_COMMAND } from "./installer.js";
