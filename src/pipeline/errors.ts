/**
 * パイプラインのエラー定義
 * どのステージで失敗したかを stage に保持し、CLI が診断メッセージに使う
 */

/**
 * 失敗したステージ
 */
export type PipelineStage =
  | "config"
  | "toolchain"
  | "emit"
  | "build"
  | "patch"
  | "install"
  | "pipeline";

/**
 * パイプラインエラーの基底クラス
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage: PipelineStage,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "PipelineError";
  }
}

/**
 * 設定ファイルの形式エラー（不正・曖昧な設定）
 */
export class ConfigFormatError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_FORMAT", "config", cause);
    this.name = "ConfigFormatError";
  }
}

/**
 * ツールチェーン取得エラー（clone / pull / install 失敗）
 */
export class ToolAcquisitionError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "TOOL_ACQUISITION", "toolchain", cause);
    this.name = "ToolAcquisitionError";
  }
}

/**
 * 外部ビルドの失敗
 */
export class BuildFailedError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "BUILD_FAILED", "build", cause);
    this.name = "BuildFailedError";
  }
}

/**
 * 出力レイアウトが分からないツールチェーンバージョン
 */
export class UnsupportedToolVersionError extends PipelineError {
  constructor(
    message: string,
    public readonly version: string
  ) {
    super(message, "UNSUPPORTED_TOOL_VERSION", "build");
    this.name = "UnsupportedToolVersionError";
  }
}

/**
 * パッチツールの失敗（取得・展開・実行）
 */
export class PatchFailedError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "PATCH_FAILED", "patch", cause);
    this.name = "PatchFailedError";
  }
}

/**
 * フォントキャッシュ再構築の失敗
 */
export class CacheRefreshError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "CACHE_REFRESH", "install", cause);
    this.name = "CacheRefreshError";
  }
}

/**
 * ファイル操作の失敗
 */
export class IOError extends PipelineError {
  constructor(message: string, stage: PipelineStage, cause?: unknown) {
    super(message, "IO_ERROR", stage, cause);
    this.name = "IOError";
  }
}

/**
 * ファイル操作を実行し、失敗を IOError に包む
 * PipelineError はそのまま再送出する
 */
export async function withIO<T>(
  description: string,
  stage: PipelineStage,
  operation: () => Promise<T>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof PipelineError) {
      throw error;
    }
    throw new IOError(description, stage, error);
  }
}
