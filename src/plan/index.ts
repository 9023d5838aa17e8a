/**
 * Plan モジュール
 * ビルドプランファイルの生成
 */

export { emitBuildPlan, renderBuildPlan, getBuildPlanPath, BUILD_PLAN_FILE } from "./emitter.js";
