/**
 * 外部ツールチェーンと生成物の型定義
 */

/**
 * ツールチェーンのローカルチェックアウト
 */
export interface ExternalToolWorkspace {
  /** チェックアウト先ディレクトリ */
  path: string;
  /** 取得元リポジトリ URL */
  remoteUrl: string;
  /** 今回の実行で clone / pull したか */
  refreshed: boolean;
}

/**
 * ビルドで生成されたフォントファイル
 */
export interface GeneratedArtifact {
  /** 出力ツリー内のパス */
  sourcePath: string;
  /** ファイル名（拡張子込み） */
  fileName: string;
  /** ファイル名から読み取ったファミリー部分 */
  family: string;
  /** ファイル名の最初の "-" 以降（拡張子を除く） */
  style: string;
  patched: boolean;
}

/**
 * パッチツールの取得方法
 */
export type PatchToolSource =
  | { kind: "archive"; url: string }
  | { kind: "git"; url: string };

/**
 * 外部コマンドの実行結果
 */
export interface CommandResult {
  exitCode: number;
}

/**
 * 外部コマンドの実行オプション
 */
export interface CommandOptions {
  /** 作業ディレクトリ */
  cwd?: string;
}
