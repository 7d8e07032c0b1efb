import { randomBytes } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import type { FileBackend } from "../storage.js";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Writes to a temporary sibling and renames it into place, so a concurrent
 * reader sees either the old file or the new one, never a partial write.
 */
export async function writeFileAtomic(
  filePath: string,
  value: Uint8Array,
): Promise<void> {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`,
  );

  try {
    await fs.writeFile(tempPath, value);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export class FSBackend implements FileBackend {
  async readRaw(key: string): Promise<Uint8Array | undefined> {
    try {
      return new Uint8Array(await fs.readFile(key));
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async writeRaw(key: string, value: Uint8Array): Promise<void> {
    await writeFileAtomic(key, value);
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.unlink(key);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }
}
