/**
 * Exec モジュール
 */

export { ZxCommandRunner, formatCommand } from "./command-runner.js";
export type { CommandRunner } from "./command-runner.js";
