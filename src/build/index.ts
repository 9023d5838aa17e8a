/**
 * Build モジュール
 * 外部ビルドの実行と出力の解釈
 */

export { invokeBuild, buildArgs } from "./invoker.js";
export {
  OUTPUT_LAYOUTS,
  parseMajorVersion,
  selectOutputLayout,
  readToolchainVersion,
} from "./output-layout.js";
export type { OutputLayout } from "./output-layout.js";
export { listRegularFiles, describeArtifact } from "./artifacts.js";
