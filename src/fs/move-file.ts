/**
 * ファイル移動
 * rename できないデバイス間の移動はコピーしてから元を消す
 */

import * as fs from "node:fs/promises";

export async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await fs.rename(source, destination);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "EXDEV") {
      throw error;
    }
    await fs.copyFile(source, destination);
    await fs.unlink(source);
  }
}
