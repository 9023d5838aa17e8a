/**
 * 旧形式（INI）設定のリーダー
 *
 * - セクション見出しは `[name]`
 * - `key = value` / `key: value`、値のないキーも許可
 * - `#` / `;` で始まる行はコメント、空白に続く `;` 以降も捨てる
 * - 字下げした行は直前の値の続き（改行でつなぐ）
 * - キーは小文字化、値は前後の空白を除去
 * - 同じセクションが複数回出てきた場合はマージ（後勝ち）
 */

/**
 * INI 構文エラー
 */
export class IniSyntaxError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`line ${line}: ${message}`);
    this.name = "IniSyntaxError";
  }
}

/**
 * セクション名 → (キー → 値)。値のないキーは null
 */
export type IniDocument = Map<string, Map<string, string | null>>;

const SECTION_PATTERN = /^\[([^\]]+)\]$/;

/** 行頭または空白の直後の `;` から行末まで */
const COMMENT_PATTERN = /(^|\s);.*$/;

/**
 * INI 文字列をパース
 * @throws IniSyntaxError - セクション外のエントリや不正な見出し
 */
export function parseIni(content: string): IniDocument {
  const document: IniDocument = new Map();
  let current: Map<string, string | null> | undefined;

  // 続き行を受け付けるキー（値のあるキーを読んだ直後だけ）
  let openKey: string | undefined;

  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const raw = lines[i] ?? "";
    const line = raw.replace(COMMENT_PATTERN, "").trim();

    if (line === "") {
      if (raw.trim() === "") {
        openKey = undefined;
      }
      continue;
    }
    if (line.startsWith("#")) {
      continue;
    }

    if (/^\s/.test(raw) && current && openKey !== undefined) {
      const previous = current.get(openKey);
      current.set(openKey, previous ? `${previous}\n${line}` : line);
      continue;
    }
    openKey = undefined;

    if (line.startsWith("[")) {
      const match = SECTION_PATTERN.exec(line);
      const name = match?.[1]?.trim();
      if (!name) {
        throw new IniSyntaxError(`Malformed section header: ${line}`, lineNumber);
      }
      current = document.get(name);
      if (!current) {
        current = new Map();
        document.set(name, current);
      }
      continue;
    }

    if (!current) {
      throw new IniSyntaxError(`Entry outside of any section: ${line}`, lineNumber);
    }

    const delimiterIndex = findDelimiter(line);
    if (delimiterIndex === -1) {
      current.set(line.toLowerCase(), null);
      continue;
    }

    const key = line.slice(0, delimiterIndex).trim().toLowerCase();
    if (key === "") {
      throw new IniSyntaxError(`Missing key: ${line}`, lineNumber);
    }
    current.set(key, line.slice(delimiterIndex + 1).trim());
    openKey = key;
  }

  return document;
}

/**
 * 最初の "=" または ":" の位置
 */
function findDelimiter(line: string): number {
  const eq = line.indexOf("=");
  const colon = line.indexOf(":");
  if (eq === -1) return colon;
  if (colon === -1) return eq;
  return Math.min(eq, colon);
}
