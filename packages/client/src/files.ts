/**
 * Local file access for backup sources and restore targets.
 *
 * Every failure becomes a FileAccessError so the engine can record it against one file
 * and move on to the next.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { createFileAccessError } from "@stowage/protocol";

export interface FileAdapter {
  readAll(path: string): Promise<Uint8Array>;
  /** Create or replace `path` with `bytes` */
  writeAll(path: string, bytes: Uint8Array): Promise<void>;
}

export class LocalFileAdapter implements FileAdapter {
  private baseDir: string;

  /** Relative paths resolve against `baseDir` (default: the working directory) */
  constructor(baseDir: string = process.cwd()) {
    this.baseDir = baseDir;
  }

  async readAll(path: string): Promise<Uint8Array> {
    try {
      return await readFile(resolve(this.baseDir, path));
    } catch (err) {
      throw createFileAccessError(path, "read", err);
    }
  }

  async writeAll(path: string, bytes: Uint8Array): Promise<void> {
    const target = resolve(this.baseDir, path);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, bytes);
    } catch (err) {
      throw createFileAccessError(path, "write", err);
    }
  }
}
