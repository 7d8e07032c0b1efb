import * as fs from "node:fs/promises";
import * as path from "node:path";

import { ConfigurationError } from "./errors.js";
import { writeFileAtomic } from "./storage/filesystem.js";
import type { TargetFile } from "./types.js";

// Percent-encodes everything but A-Z a-z 0-9 _ . - ~, slashes included
export function escapeTargetPath(targetPath: string): string {
  return encodeURIComponent(targetPath).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

export class LocalCache {
  private readonly targetDir?: string;

  constructor(targetDir?: string) {
    this.targetDir = targetDir;
  }

  pathFor(target: TargetFile): string {
    if (this.targetDir === undefined) {
      throw new ConfigurationError(
        "targetDir must be set if filePath is not given",
      );
    }
    const name = escapeTargetPath(target.path);
    if (name === "" || name === "." || name === "..") {
      throw new ConfigurationError(
        `Target path "${target.path}" cannot be used as a file name`,
      );
    }
    return path.join(this.targetDir, name);
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      return (await fs.stat(filePath)).isFile();
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return false;
      }
      throw error;
    }
  }

  async write(filePath: string, data: Uint8Array): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data);
  }
}
