/**
 * Toolchain モジュール
 * 外部ツールの取得
 */

export { acquireToolchain, installSteps } from "./acquirer.js";
export type { AcquireToolchainOptions } from "./acquirer.js";
export { syncRepository, isGitCheckout, RepositorySyncError } from "./repository.js";
export type { SyncAction } from "./repository.js";
