/**
 * FontPlan 関連の型定義
 * 1 つの設定ファイルから組み立てられるビルド要求
 */

/**
 * スタイル軸（固定の 4 軸）
 */
export const STYLE_AXES = ["common", "upright", "italic", "oblique"] as const;

export type StyleAxis = (typeof STYLE_AXES)[number];

/**
 * 設定ファイルの方言
 * - legacy-ini: key/value 形式の旧設定
 * - native-toml: Iosevka のビルドプラン TOML をそのまま書いたもの
 */
export type ConfigDialect = "legacy-ini" | "native-toml";

/**
 * 方言タグ付きの設定ソース
 * ファイルごとに 1 度だけ判定する
 */
export interface ConfigSource {
  dialect: ConfigDialect;
  /** 設定ファイルのパス */
  path: string;
  /** ファイル内容（UTF-8） */
  content: string;
}

/**
 * 正規化済みのフォントビルド要求
 */
export interface FontPlan {
  /** ビルドプランのキー。出力サブディレクトリ名にもなる */
  planId: string;
  /** 表示用ファミリー名 */
  familyName: string;
  /** 軸ごとのディレクティブ集合（4 軸すべて必ず存在する） */
  styleDirectives: Record<StyleAxis, ReadonlySet<string>>;
  /** 軸に属さないディレクティブ */
  topLevelOptions: ReadonlySet<string>;
  /** 継承するリガチャセット名 */
  ligatureInherits: ReadonlySet<string>;
  /**
   * グリフパッチのオプション
   * null はパッチしない、空配列はデフォルト設定でパッチする
   */
  nerdFontOptions: readonly string[] | null;
  /** 翻訳元の方言 */
  dialect: ConfigDialect;
  /** 翻訳元の設定ファイル */
  sourcePath: string;
}
