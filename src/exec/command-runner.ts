/**
 * 外部コマンド実行
 * git / npm / ビルド / パッチ / fc-cache はすべてここを通す
 */

import { $ } from "zx";
import type { CommandOptions, CommandResult } from "../types/index.js";

/**
 * 外部コマンドの実行インターフェース
 * テストではプロセス内のフェイクに差し替える
 */
export interface CommandRunner {
  /**
   * コマンドを実行して終了を待つ
   * 非ゼロ終了でも reject せず exitCode で返す
   */
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

/**
 * コマンドラインを表示用の文字列にする
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}

/**
 * zx による実装
 * 子プロセスの出力は端末にそのまま流す
 */
export class ZxCommandRunner implements CommandRunner {
  async run(
    command: string,
    args: readonly string[],
    options: CommandOptions = {}
  ): Promise<CommandResult> {
    const shell = $({
      nothrow: true,
      stdio: "inherit",
      verbose: false,
      ...(options.cwd !== undefined && { cwd: options.cwd }),
    });
    const output = await shell`${command} ${[...args]}`;
    // シグナル終了などで exitCode が取れない場合は失敗扱い
    return { exitCode: output.exitCode ?? 1 };
  }
}
