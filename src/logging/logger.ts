/**
 * ステージ別ロガー
 * stdout はサブプロセスの出力に譲り、ログはすべて stderr に書く
 */

export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  /** true ならすべて抑制 */
  silent?: boolean;
}

function isSilentByEnv(): boolean {
  return process.env.MYOSEVKA_SILENT === "1" || process.env.NODE_ENV === "test";
}

/**
 * スコープ付きロガーを作成
 * @param scope - ログ行の先頭に付けるステージ名
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const isSilent = options.silent ?? isSilentByEnv();
  const prefix = `[${scope}]`;

  return {
    info: (...args: unknown[]) => {
      if (!isSilent) {
        console.error(prefix, ...args);
      }
    },
    warn: (...args: unknown[]) => {
      if (!isSilent) {
        console.error(prefix, "warning:", ...args);
      }
    },
    error: (...args: unknown[]) => {
      if (!isSilent) {
        console.error(prefix, ...args);
      }
    },
  };
}
