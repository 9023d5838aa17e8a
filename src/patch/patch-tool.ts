/**
 * パッチツールのキャッシュ
 * アーカイブ取得（ダウンロード + 展開）か git 取得のどちらかで用意する
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner } from "../exec/index.js";
import { formatCommand } from "../exec/index.js";
import type { PatchToolSource } from "../types/index.js";
import { PatchFailedError } from "../pipeline/errors.js";
import { RepositorySyncError, syncRepository } from "../toolchain/index.js";
import { createLogger } from "../logging/logger.js";

const logger = createLogger("patch");

/**
 * パッチスクリプトのファイル名（アーカイブ・リポジトリとも直下）
 */
export const PATCHER_SCRIPT = "font-patcher";

const ARCHIVE_FILE = "FontPatcher.zip";

/**
 * URL からアーカイブを取得する関数
 */
export type ArchiveFetcher = (url: string) => Promise<Uint8Array>;

/**
 * fetch によるアーカイブ取得
 */
export async function fetchArchive(url: string): Promise<Uint8Array> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`GET ${url} returned ${response.status} ${response.statusText}`);
  }
  return new Uint8Array(await response.arrayBuffer());
}

export interface PatchToolCacheOptions {
  /** 展開先 / チェックアウト先 */
  dir: string;
  source: PatchToolSource;
  runner: CommandRunner;
  fetchArchive?: ArchiveFetcher;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * パッチツールを 1 回の実行につき 1 度だけ用意する
 */
export class PatchToolCache {
  private readonly dir: string;
  private readonly source: PatchToolSource;
  private readonly runner: CommandRunner;
  private readonly fetcher: ArchiveFetcher;
  private pending: Promise<string> | null = null;

  constructor(options: PatchToolCacheOptions) {
    this.dir = options.dir;
    this.source = options.source;
    this.runner = options.runner;
    this.fetcher = options.fetchArchive ?? fetchArchive;
  }

  /**
   * パッチスクリプトのパス
   */
  getScriptPath(): string {
    return path.join(this.dir, PATCHER_SCRIPT);
  }

  /**
   * ツールを用意してスクリプトのパスを返す
   * 2 回目以降は最初の結果を返す
   * @throws PatchFailedError - 取得・展開の失敗
   */
  ensure(): Promise<string> {
    if (this.pending === null) {
      this.pending =
        this.source.kind === "git"
          ? this.syncGit(this.source.url)
          : this.extractArchive(this.source.url);
    }
    return this.pending;
  }

  private async syncGit(url: string): Promise<string> {
    try {
      const action = await syncRepository(this.runner, url, this.dir);
      logger.info(`Patch tool ${action}: ${this.dir}`);
    } catch (error) {
      if (error instanceof RepositorySyncError) {
        throw new PatchFailedError(error.message, error);
      }
      throw error;
    }
    return this.requireScript();
  }

  private async extractArchive(url: string): Promise<string> {
    const scriptPath = this.getScriptPath();
    if (await fileExists(scriptPath)) {
      logger.info(`Using cached patch tool: ${this.dir}`);
      return scriptPath;
    }

    const archivePath = path.join(this.dir, ARCHIVE_FILE);
    try {
      await fs.mkdir(this.dir, { recursive: true });
    } catch (error) {
      throw new PatchFailedError(`Failed to create patch tool directory ${this.dir}`, error);
    }
    try {
      const bytes = await this.fetcher(url);
      await fs.writeFile(archivePath, bytes);
    } catch (error) {
      throw new PatchFailedError(`Failed to download patch tool from ${url}`, error);
    }
    logger.info(`Downloaded ${url}`);

    const args = ["-o", archivePath, "-d", this.dir];
    const result = await this.runner.run("unzip", args);
    if (result.exitCode !== 0) {
      throw new PatchFailedError(
        `${formatCommand("unzip", args)} failed (exit code ${result.exitCode})`
      );
    }

    try {
      await fs.rm(archivePath, { force: true });
    } catch (error) {
      throw new PatchFailedError(`Failed to remove ${archivePath}`, error);
    }
    return this.requireScript();
  }

  private async requireScript(): Promise<string> {
    const scriptPath = this.getScriptPath();
    if (!(await fileExists(scriptPath))) {
      throw new PatchFailedError(`Patch tool has no ${PATCHER_SCRIPT}: ${this.dir}`);
    }
    return scriptPath;
  }
}
